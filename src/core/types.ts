/**
 * Canonical token and option type definitions for xml-reindent.
 * These types flow from the tokenizer through the formatter to the CLI.
 */

// ─── Source Positions ───────────────────────────────────────────────────────

export interface SourcePosition {
  /** UTF-8 byte offset from the start of the input */
  offset: number;

  /** 1-based line number */
  line: number;

  /** 1-based column, counted in code points */
  column: number;
}

// ─── Tokens ─────────────────────────────────────────────────────────────────

export type QuoteChar = '"' | "'";

export interface Attribute {
  name: string;

  /** Raw text between the quotes; entities are left undecoded */
  value: string;

  /** Quote character the value was written with */
  quote: QuoteChar;
}

interface BaseToken {
  /** Where the construct starts in the input */
  position: SourcePosition;
}

export interface OpenTagToken extends BaseToken {
  type: 'open-tag';
  name: string;
  attributes: Attribute[];
  selfClosing: boolean;
}

export interface CloseTagToken extends BaseToken {
  type: 'close-tag';
  name: string;
}

export interface TextToken extends BaseToken {
  type: 'text';
  content: string;
}

export interface CommentToken extends BaseToken {
  type: 'comment';
  content: string;
}

export interface CDataToken extends BaseToken {
  type: 'cdata';
  content: string;
}

export interface DoctypeToken extends BaseToken {
  type: 'doctype';
  content: string;
}

export interface ProcessingInstructionToken extends BaseToken {
  type: 'processing-instruction';
  target: string;
  content: string;
}

export interface EndOfDocumentToken extends BaseToken {
  type: 'end-of-document';
}

export type Token =
  | OpenTagToken
  | CloseTagToken
  | TextToken
  | CommentToken
  | CDataToken
  | DoctypeToken
  | ProcessingInstructionToken
  | EndOfDocumentToken;

export type TokenType = Token['type'];

// ─── Formatting Options ─────────────────────────────────────────────────────

export interface FormatOptions {
  /** Spaces per nesting level (default: 2) */
  indentWidth?: number;
}

export interface PrettifierOptions extends FormatOptions {
  /** Run a well-formedness pre-check before formatting (default: false) */
  validate?: boolean;
}

// ─── Results ────────────────────────────────────────────────────────────────

export interface CheckResult {
  /** The canonical form of the input */
  formatted: string;

  /** Whether the input already equals its canonical form */
  canonical: boolean;

  /** 1-based line of the first difference, when not canonical */
  firstDifferenceLine?: number;
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; code: string; message: string; line: number; column: number };

// ─── Report Format ──────────────────────────────────────────────────────────

export type ReportFormat = 'console' | 'json';
