/**
 * XmlPrettifier: main API
 *
 * The primary entry point for xml-reindent. Holds the formatting options and
 * provides:
 * - Formatting a document into its canonical indented form
 * - Checking whether a document is already canonical
 * - Dumping the token stream of a document
 * - Rendering diagnostics for failures
 */

import { CheckResult, PrettifierOptions, ReportFormat, Token } from './core/types';
import { ValidationError } from './core/errors';
import { SourceText } from './core/source';
import { collectTokens, tokenize } from './core/tokenizer';
import { formatTokens, resolveIndentWidth } from './core/formatter';
import { formatCheckResult, formatDiagnostic } from './core/reporter';
import { decodeInput, validateXml } from './formats';

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * 1-based line number of the first line that differs between two texts.
 */
function firstDifferingLine(a: string, b: string): number {
  const left = a.split('\n');
  const right = b.split('\n');
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) return i + 1;
  }
  return shared + 1;
}

// ─── XmlPrettifier Class ────────────────────────────────────────────────────

export class XmlPrettifier {
  private readonly indentWidth: number;
  private readonly validate: boolean;

  constructor(options: PrettifierOptions = {}) {
    this.indentWidth = resolveIndentWidth(options);
    this.validate = options.validate ?? false;
  }

  /**
   * Format a document.
   *
   * @param input Document text, or its UTF-8 bytes
   */
  format(input: string | Uint8Array): string {
    const text = decodeInput(input);

    if (this.validate) {
      const result = validateXml(text);
      if (!result.valid) {
        throw new ValidationError(result.code, result.message, result.line, result.column);
      }
    }

    return formatTokens(tokenize(new SourceText(text)), { indentWidth: this.indentWidth });
  }

  /**
   * Compare a document with its canonical form. Trailing newlines on the
   * input are ignored, since the CLI always writes one.
   */
  check(input: string | Uint8Array): CheckResult {
    const text = decodeInput(input).replace(/\n+$/, '');
    const formatted = this.format(text);

    if (text === formatted) {
      return { formatted, canonical: true };
    }
    return { formatted, canonical: false, firstDifferenceLine: firstDifferingLine(text, formatted) };
  }

  /**
   * Tokenize a document without formatting it.
   */
  tokens(input: string | Uint8Array): Token[] {
    return collectTokens(decodeInput(input));
  }

  /**
   * Render an error raised by this instance.
   *
   * @param source The document that failed, used to quote the offending line
   */
  describe(error: unknown, format: ReportFormat = 'console', source?: string | Uint8Array): string {
    return formatDiagnostic(error, format, source === undefined ? undefined : decodeInput(source));
  }

  /**
   * Render a check result.
   */
  summarize(result: CheckResult, label: string, format: ReportFormat = 'console'): string {
    return formatCheckResult(result, label, format);
  }
}

// ─── Convenience ────────────────────────────────────────────────────────────

/**
 * One-shot formatting with default options.
 *
 * @example
 * ```typescript
 * prettifyXml('<root><child>text</child></root>');
 * // '<root>\n  <child>\n    text\n  </child>\n</root>'
 * ```
 */
export function prettifyXml(input: string | Uint8Array, options?: PrettifierOptions): string {
  return new XmlPrettifier(options).format(input);
}
