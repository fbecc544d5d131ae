/**
 * Report Generator
 *
 * Renders failures and check results in two formats:
 * Console (colored) and JSON.
 */

import chalk from 'chalk';
import {
  MismatchedCloseTagError,
  UnclosedElementsError,
  UnexpectedCloseTagError,
  ValidationError,
  isXmlReindentError,
} from './errors';
import { CheckResult, ReportFormat } from './types';

// ─── Diagnostic Model ───────────────────────────────────────────────────────

export interface Diagnostic {
  kind: string;
  message: string;

  /** UTF-8 byte offset of the defect */
  offset?: number;

  line?: number;
  column?: number;

  /** Kind-specific context (expected vs found names, open elements, ...) */
  details?: Record<string, unknown>;
}

/**
 * Flatten any thrown value into a Diagnostic.
 */
export function toDiagnostic(error: unknown): Diagnostic {
  if (!isXmlReindentError(error)) {
    return {
      kind: 'Error',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  const diagnostic: Diagnostic = { kind: error.kind, message: error.detail };

  if (error.position) {
    diagnostic.offset = error.position.offset;
    diagnostic.line = error.position.line;
    diagnostic.column = error.position.column;
  }

  if (error instanceof MismatchedCloseTagError) {
    diagnostic.details = { expected: error.expected, found: error.found };
  } else if (error instanceof UnexpectedCloseTagError) {
    diagnostic.details = { name: error.tagName };
  } else if (error instanceof UnclosedElementsError) {
    diagnostic.details = { openElements: error.openElements };
  } else if (error instanceof ValidationError) {
    diagnostic.line = error.line;
    diagnostic.column = error.column;
    diagnostic.details = { code: error.code };
  }

  return diagnostic;
}

// ─── Format Diagnostic ──────────────────────────────────────────────────────

/**
 * Format an error in the specified format.
 *
 * @param source The document that failed; when given, the console format
 *               quotes the offending line with a caret under the column.
 */
export function formatDiagnostic(error: unknown, format: ReportFormat, source?: string): string {
  const diagnostic = toDiagnostic(error);

  switch (format) {
    case 'json':
      return JSON.stringify(diagnostic, null, 2);
    case 'console':
    default:
      return formatDiagnosticConsole(diagnostic, source);
  }
}

function describeLocation(diagnostic: Diagnostic): string {
  const { offset, line, column } = diagnostic;
  if (offset !== undefined) {
    return ` at byte ${offset} (line ${line}, column ${column})`;
  }
  if (line !== undefined) {
    return ` at line ${line}, column ${column}`;
  }
  return '';
}

function formatDiagnosticConsole(diagnostic: Diagnostic, source?: string): string {
  const lines: string[] = [];

  const location = diagnostic.kind === 'ValidationError' ? '' : describeLocation(diagnostic);
  lines.push(`${chalk.red(`✖ ${diagnostic.kind}`)}${location}: ${diagnostic.message}`);

  if (source !== undefined && diagnostic.line !== undefined && diagnostic.column !== undefined) {
    const text = (source.split('\n')[diagnostic.line - 1] ?? '').replace(/\r$/, '');
    const gutter = String(diagnostic.line);

    lines.push(chalk.gray(`  ${gutter} | `) + text);
    lines.push(chalk.gray(`  ${' '.repeat(gutter.length)} | `) + ' '.repeat(diagnostic.column - 1) + chalk.red('^'));
  }

  return lines.join('\n');
}

// ─── Format Check Result ────────────────────────────────────────────────────

export function formatCheckResult(result: CheckResult, label: string, format: ReportFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      { label, canonical: result.canonical, firstDifferenceLine: result.firstDifferenceLine },
      null,
      2
    );
  }

  if (result.canonical) {
    return chalk.green(`✅ ${label} is already formatted`);
  }
  return chalk.yellow(`✖ ${label} is not formatted (first difference at line ${result.firstDifferenceLine})`);
}
