/**
 * XML Tokenizer
 *
 * Single forward pass over the input with bounded lookahead (at most the nine
 * characters of `<![CDATA[`). Tokens are produced lazily; the sequence always
 * ends with an `end-of-document` token. Malformed input throws a
 * TokenizeError at the point it is discovered, with no recovery.
 */

import { SourceText } from './source';
import { TokenizeError } from './errors';
import {
  Attribute,
  CDataToken,
  CloseTagToken,
  CommentToken,
  DoctypeToken,
  OpenTagToken,
  ProcessingInstructionToken,
  QuoteChar,
  SourcePosition,
  TextToken,
  Token,
} from './types';

// ─── Character Classes ──────────────────────────────────────────────────────

const COMMENT_OPEN = '<!--';
const COMMENT_CLOSE = '-->';
const CDATA_OPEN = '<![CDATA[';
const CDATA_CLOSE = ']]>';
const DOCTYPE_OPEN = '<!DOCTYPE';
const PI_OPEN = '<?';
const PI_CLOSE = '?>';
const BYTE_ORDER_MARK = '\uFEFF';

// ASCII subset of XML NameStartChar; anything above 0x7f is accepted as-is.
function isNameStart(ch: string | undefined): boolean {
  if (ch === undefined || ch === '') return false;
  return /[A-Za-z_:]/.test(ch) || ch.charCodeAt(0) > 0x7f;
}

function isNameChar(ch: string | undefined): boolean {
  return isNameStart(ch) || (ch !== undefined && /[0-9.\-]/.test(ch));
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function isQuote(ch: string | undefined): ch is QuoteChar {
  return ch === '"' || ch === "'";
}

const LEADING_WHITESPACE = /^[ \t\r\n]+/;
const TRAILING_WHITESPACE = /[ \t\r\n]+$/;

/**
 * Strip XML whitespace (space, tab, CR, LF) from both ends. Other Unicode
 * spaces such as U+00A0 are content.
 */
export function trimXmlWhitespace(text: string): string {
  return text.replace(LEADING_WHITESPACE, '').replace(TRAILING_WHITESPACE, '');
}

// ─── Scanner ────────────────────────────────────────────────────────────────

class Scanner {
  private pos = 0;
  private readonly text: string;

  constructor(private readonly source: SourceText) {
    this.text = source.text;
    // A byte order mark opening the document belongs to no token; positions still count it.
    if (this.text.startsWith(BYTE_ORDER_MARK)) this.pos = BYTE_ORDER_MARK.length;
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  endPosition(): SourcePosition {
    return this.source.positionAt(this.text.length);
  }

  /**
   * Classify the construct at the cursor and consume it.
   */
  next(): Token {
    const start = this.pos;
    const position = this.source.positionAt(start);

    if (!this.isMarkupStart(start)) {
      return this.readText(position);
    }

    if (this.text.startsWith(COMMENT_OPEN, start)) return this.readComment(position);
    if (this.text.startsWith(CDATA_OPEN, start)) return this.readCData(position);
    if (this.text.slice(start, start + DOCTYPE_OPEN.length).toUpperCase() === DOCTYPE_OPEN) {
      return this.readDoctype(position);
    }
    if (this.text.startsWith(PI_OPEN, start)) return this.readProcessingInstruction(position);
    if (this.text.startsWith('</', start)) return this.readCloseTag(position);
    if (this.text.startsWith('<!', start)) {
      throw new TokenizeError('unsupported markup declaration', position);
    }
    return this.readOpenTag(position);
  }

  /** A `<` only opens markup when followed by `/`, `!`, `?` or a name. */
  private isMarkupStart(index: number): boolean {
    if (this.text[index] !== '<') return false;
    const next = this.text[index + 1];
    return next === '/' || next === '!' || next === '?' || isNameStart(next);
  }

  private here(): SourcePosition {
    return this.source.positionAt(this.pos);
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.text[this.pos])) this.pos++;
  }

  private readName(): string {
    const start = this.pos;
    if (!isNameStart(this.text[this.pos])) return '';
    this.pos++;
    while (isNameChar(this.text[this.pos])) this.pos++;
    return this.text.slice(start, this.pos);
  }

  /**
   * Consume up to and including `terminator`, returning the text before it.
   */
  private readUntil(terminator: string, from: number, what: string, position: SourcePosition): string {
    const end = this.text.indexOf(terminator, from);
    if (end === -1) {
      throw new TokenizeError(`unterminated ${what}`, position);
    }
    this.pos = end + terminator.length;
    return this.text.slice(from, end);
  }

  // ─── Character Data ───────────────────────────────────────────────────

  private readText(position: SourcePosition): TextToken {
    const start = this.pos;
    let end = this.text.indexOf('<', start + 1);
    while (end !== -1 && !this.isMarkupStart(end)) {
      end = this.text.indexOf('<', end + 1);
    }
    if (end === -1) end = this.text.length;

    this.pos = end;
    return { type: 'text', content: this.text.slice(start, end), position };
  }

  private readComment(position: SourcePosition): CommentToken {
    const from = this.pos + COMMENT_OPEN.length;
    const content = this.readUntil(COMMENT_CLOSE, from, 'comment', position);
    return { type: 'comment', content, position };
  }

  private readCData(position: SourcePosition): CDataToken {
    const from = this.pos + CDATA_OPEN.length;
    const content = this.readUntil(CDATA_CLOSE, from, 'CDATA section', position);
    return { type: 'cdata', content, position };
  }

  /**
   * The first `>` outside the internal subset ends the declaration. Quoted
   * literals before the subset are skipped; the subset itself is opaque text
   * whose brackets are counted but whose quotes are not.
   */
  private readDoctype(position: SourcePosition): DoctypeToken {
    const from = this.pos + DOCTYPE_OPEN.length;
    let bracketDepth = 0;
    let quote: QuoteChar | null = null;

    for (let i = from; i < this.text.length; i++) {
      const ch = this.text[i];

      if (quote) {
        if (ch === quote) quote = null;
      } else if (bracketDepth > 0) {
        if (ch === '[') bracketDepth++;
        else if (ch === ']') bracketDepth--;
      } else if (isQuote(ch)) {
        quote = ch;
      } else if (ch === '[') {
        bracketDepth = 1;
      } else if (ch === '>') {
        this.pos = i + 1;
        const content = this.text.slice(from, i).replace(LEADING_WHITESPACE, '');
        return { type: 'doctype', content, position };
      }
    }

    throw new TokenizeError('unterminated DOCTYPE declaration', position);
  }

  private readProcessingInstruction(position: SourcePosition): ProcessingInstructionToken {
    const from = this.pos + PI_OPEN.length;
    const body = this.readUntil(PI_CLOSE, from, 'processing instruction', position);

    const match = /^([^ \t\r\n]+)[ \t\r\n]*([\s\S]*)$/.exec(body);
    if (!match) {
      throw new TokenizeError('processing instruction is missing a target', position);
    }

    return { type: 'processing-instruction', target: match[1], content: match[2], position };
  }

  // ─── Tags ─────────────────────────────────────────────────────────────

  private readCloseTag(position: SourcePosition): CloseTagToken {
    this.pos += 2;
    const name = this.readName();
    if (!name) {
      if (this.atEnd()) throw new TokenizeError('unterminated close tag', position);
      throw new TokenizeError('invalid close tag name', this.here());
    }

    this.skipWhitespace();
    if (this.atEnd()) {
      throw new TokenizeError(`unterminated close tag </${name}>`, position);
    }
    if (this.text[this.pos] !== '>') {
      throw new TokenizeError(`unexpected character '${this.text[this.pos]}' in close tag </${name}>`, this.here());
    }

    this.pos++;
    return { type: 'close-tag', name, position };
  }

  private readOpenTag(position: SourcePosition): OpenTagToken {
    this.pos++;
    const name = this.readName();
    const attributes: Attribute[] = [];

    for (;;) {
      this.skipWhitespace();
      if (this.atEnd()) {
        throw new TokenizeError(`unterminated tag <${name}>`, position);
      }

      const ch = this.text[this.pos];
      if (ch === '>') {
        this.pos++;
        return { type: 'open-tag', name, attributes, selfClosing: false, position };
      }
      if (ch === '/') {
        if (this.text[this.pos + 1] === '>') {
          this.pos += 2;
          return { type: 'open-tag', name, attributes, selfClosing: true, position };
        }
        if (this.pos + 1 >= this.text.length) {
          throw new TokenizeError(`unterminated tag <${name}>`, position);
        }
        throw new TokenizeError(`expected '>' after '/' in tag <${name}>`, this.here());
      }
      if (isNameStart(ch)) {
        attributes.push(this.readAttribute(name, position));
        continue;
      }

      throw new TokenizeError(`unexpected character '${ch}' in tag <${name}>`, this.here());
    }
  }

  private readAttribute(tagName: string, tagPosition: SourcePosition): Attribute {
    const name = this.readName();

    this.skipWhitespace();
    if (this.atEnd()) throw new TokenizeError(`unterminated tag <${tagName}>`, tagPosition);
    if (this.text[this.pos] !== '=') {
      throw new TokenizeError(`attribute '${name}' is missing '='`, this.here());
    }
    this.pos++;

    this.skipWhitespace();
    if (this.atEnd()) throw new TokenizeError(`unterminated tag <${tagName}>`, tagPosition);

    const quote = this.text[this.pos];
    if (!isQuote(quote)) {
      throw new TokenizeError(`value of attribute '${name}' must be quoted`, this.here());
    }

    const valuePosition = this.here();
    const end = this.text.indexOf(quote, this.pos + 1);
    if (end === -1) {
      throw new TokenizeError(`unterminated value for attribute '${name}'`, valuePosition);
    }

    const value = this.text.slice(this.pos + 1, end);
    this.pos = end + 1;
    return { name, value, quote };
  }
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Lazily tokenize a document. Each call starts from the beginning of a fresh
 * input; the returned generator cannot be rewound.
 *
 * @example
 * ```typescript
 * for (const token of tokenize('<a x="1"/>')) {
 *   console.log(token.type); // 'open-tag', then 'end-of-document'
 * }
 * ```
 */
export function* tokenize(input: string | SourceText): Generator<Token, void, undefined> {
  const source = typeof input === 'string' ? new SourceText(input) : input;
  const scanner = new Scanner(source);

  while (!scanner.atEnd()) {
    yield scanner.next();
  }

  yield { type: 'end-of-document', position: scanner.endPosition() };
}

/**
 * Tokenize a whole document into an array.
 */
export function collectTokens(input: string | SourceText): Token[] {
  return Array.from(tokenize(input));
}
