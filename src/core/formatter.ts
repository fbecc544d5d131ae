/**
 * XML Formatter
 *
 * Pulls tokens one at a time and emits one indented line per token.
 * State is the element stack alone; its depth drives indentation.
 */

import { ElementStack } from './element-stack';
import {
  ConfigError,
  MismatchedCloseTagError,
  UnclosedElementsError,
  UnexpectedCloseTagError,
} from './errors';
import { trimXmlWhitespace } from './tokenizer';
import { Attribute, FormatOptions, OpenTagToken, SourcePosition, Token } from './types';

export const DEFAULT_INDENT_WIDTH = 2;
export const MAX_INDENT_WIDTH = 16;

// ─── Options ────────────────────────────────────────────────────────────────

/**
 * Resolve the indent width, rejecting anything that is not a small
 * non-negative integer.
 */
export function resolveIndentWidth(options: FormatOptions = {}): number {
  const width = options.indentWidth ?? DEFAULT_INDENT_WIDTH;
  if (!Number.isInteger(width) || width < 0 || width > MAX_INDENT_WIDTH) {
    throw new ConfigError(
      `Indent width must be an integer between 0 and ${MAX_INDENT_WIDTH}, got ${width}`
    );
  }
  return width;
}

// ─── Rendering ──────────────────────────────────────────────────────────────

function renderAttribute(attr: Attribute): string {
  return `${attr.name}="${attr.value.replace(/"/g, '&quot;')}"`;
}

function renderOpenTag(token: OpenTagToken): string {
  const parts = [token.name, ...token.attributes.map(renderAttribute)];
  return `<${parts.join(' ')}${token.selfClosing ? '/>' : '>'}`;
}

// ─── Format ─────────────────────────────────────────────────────────────────

/**
 * Format a token sequence into canonical, indented text.
 *
 * Throws a FormatError on the first structural defect; nothing is returned
 * for a document that fails.
 */
export function formatTokens(tokens: Iterable<Token>, options: FormatOptions = {}): string {
  const unit = ' '.repeat(resolveIndentWidth(options));
  const stack = new ElementStack();
  const lines: string[] = [];
  let lastPosition: SourcePosition = { offset: 0, line: 1, column: 1 };

  const emit = (line: string): void => {
    lines.push(unit.repeat(stack.depth) + line);
  };

  for (const token of tokens) {
    lastPosition = token.position;

    switch (token.type) {
      case 'open-tag':
        emit(renderOpenTag(token));
        if (!token.selfClosing) stack.push(token.name);
        break;

      case 'close-tag': {
        const top = stack.peek();
        if (top === null) {
          throw new UnexpectedCloseTagError(token.name, token.position);
        }
        if (top !== token.name) {
          throw new MismatchedCloseTagError(top, token.name, token.position);
        }
        stack.pop();
        emit(`</${token.name}>`);
        break;
      }

      case 'text': {
        const content = trimXmlWhitespace(token.content);
        if (content) emit(content);
        break;
      }

      case 'comment':
        emit(`<!--${token.content}-->`);
        break;

      case 'cdata':
        emit(`<![CDATA[${token.content}]]>`);
        break;

      case 'doctype':
        emit(`<!DOCTYPE ${token.content}>`);
        break;

      case 'processing-instruction':
        emit(token.content ? `<?${token.target} ${token.content}?>` : `<?${token.target}?>`);
        break;

      case 'end-of-document':
        if (!stack.isEmpty()) {
          throw new UnclosedElementsError(stack.names(), token.position);
        }
        return lines.join('\n');
    }
  }

  // A sequence that stops without its sentinel ends where its last token started.
  if (!stack.isEmpty()) {
    throw new UnclosedElementsError(stack.names(), lastPosition);
  }
  return lines.join('\n');
}
