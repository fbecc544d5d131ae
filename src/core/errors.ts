/**
 * Error taxonomy
 *
 * Every failure the library raises extends XmlReindentError and carries a
 * stable `kind` so callers (and the CLI reporter) can branch without
 * instanceof chains.
 */

import { SourcePosition } from './types';

export type ErrorKind =
  | 'TokenizeError'
  | 'MismatchedCloseTag'
  | 'UnexpectedCloseTag'
  | 'UnclosedElements'
  | 'ValidationError'
  | 'ConfigError'
  | 'InputError';

export abstract class XmlReindentError extends Error {
  abstract readonly kind: ErrorKind;

  /** Location of the defect, when it has one */
  readonly position?: SourcePosition;

  /** The message without the location suffix */
  readonly detail: string;

  protected constructor(message: string, position?: SourcePosition) {
    super(position ? `${message} (byte ${position.offset})` : message);
    this.name = new.target.name;
    this.position = position;
    this.detail = message;
  }
}

// ─── Lexical Errors ─────────────────────────────────────────────────────────

export class TokenizeError extends XmlReindentError {
  readonly kind = 'TokenizeError';
  declare readonly position: SourcePosition;

  constructor(
    readonly reason: string,
    position: SourcePosition
  ) {
    super(reason, position);
  }
}

// ─── Structural Errors ──────────────────────────────────────────────────────

export abstract class FormatError extends XmlReindentError {
  declare readonly position: SourcePosition;
}

export class MismatchedCloseTagError extends FormatError {
  readonly kind = 'MismatchedCloseTag';

  constructor(
    readonly expected: string,
    readonly found: string,
    position: SourcePosition
  ) {
    super(`Expected </${expected}> but found </${found}>`, position);
  }
}

export class UnexpectedCloseTagError extends FormatError {
  readonly kind = 'UnexpectedCloseTag';

  constructor(
    readonly tagName: string,
    position: SourcePosition
  ) {
    super(`Close tag </${tagName}> has no open element`, position);
  }
}

export class UnclosedElementsError extends FormatError {
  readonly kind = 'UnclosedElements';

  /**
   * @param openElements names still open at end of input, innermost first
   */
  constructor(
    readonly openElements: string[],
    position: SourcePosition
  ) {
    super(`Unclosed elements: ${openElements.join(', ')}`, position);
  }
}

// ─── Everything Else ────────────────────────────────────────────────────────

export class ValidationError extends XmlReindentError {
  readonly kind = 'ValidationError';

  constructor(
    readonly code: string,
    message: string,
    readonly line: number,
    readonly column: number
  ) {
    super(`${message} at line ${line}, column ${column}`);
  }
}

export class ConfigError extends XmlReindentError {
  readonly kind = 'ConfigError';

  constructor(message: string) {
    super(message);
  }
}

export class InputError extends XmlReindentError {
  readonly kind = 'InputError';

  constructor(message: string) {
    super(message);
  }
}

export function isXmlReindentError(error: unknown): error is XmlReindentError {
  return error instanceof XmlReindentError;
}
