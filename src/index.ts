/**
 * xml-reindent
 *
 * Reformat minified or unevenly indented XML into one construct per line,
 * indented by nesting depth.
 *
 * @example
 * ```typescript
 * import { XmlPrettifier } from 'xml-reindent';
 *
 * const prettifier = new XmlPrettifier({ indentWidth: 2 });
 *
 * try {
 *   console.log(prettifier.format('<note><to>Tove</to></note>'));
 * } catch (error) {
 *   console.error(prettifier.describe(error, 'console'));
 * }
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { XmlPrettifier, prettifyXml } from './prettifier';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  Attribute,
  CDataToken,
  CheckResult,
  CloseTagToken,
  CommentToken,
  DoctypeToken,
  EndOfDocumentToken,
  FormatOptions,
  OpenTagToken,
  PrettifierOptions,
  ProcessingInstructionToken,
  QuoteChar,
  ReportFormat,
  SourcePosition,
  TextToken,
  Token,
  TokenType,
  ValidationResult,
} from './core/types';

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  ErrorKind,
  XmlReindentError,
  TokenizeError,
  FormatError,
  MismatchedCloseTagError,
  UnexpectedCloseTagError,
  UnclosedElementsError,
  ValidationError,
  ConfigError,
  InputError,
  isXmlReindentError,
} from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { SourceText } from './core/source';
export { tokenize, collectTokens } from './core/tokenizer';
export { ElementStack } from './core/element-stack';
export { formatTokens, resolveIndentWidth, DEFAULT_INDENT_WIDTH } from './core/formatter';
export { formatDiagnostic, formatCheckResult, toDiagnostic, Diagnostic } from './core/reporter';

// ─── Format Helpers ─────────────────────────────────────────────────────────
export { decodeInput, isXml, validateXml } from './formats';
