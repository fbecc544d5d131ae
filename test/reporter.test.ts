/**
 * Tests for the Report Generator
 */

import chalk from 'chalk';
import { formatCheckResult, formatDiagnostic, toDiagnostic } from '../src/core/reporter';
import {
  InputError,
  TokenizeError,
  UnclosedElementsError,
  UnexpectedCloseTagError,
  ValidationError,
} from '../src/core/errors';

chalk.level = 0;

const at = (offset: number, line = 1, column = offset + 1) => ({ offset, line, column });

describe('Reporter', () => {
  // ─── toDiagnostic ─────────────────────────────────────────────────────

  describe('toDiagnostic', () => {
    test('carries kind, message and position', () => {
      expect(toDiagnostic(new TokenizeError('unterminated comment', at(3)))).toEqual({
        kind: 'TokenizeError',
        message: 'unterminated comment',
        offset: 3,
        line: 1,
        column: 4,
      });
    });

    test('adds the open elements of an unclosed document', () => {
      expect(toDiagnostic(new UnclosedElementsError(['b', 'a'], at(6))).details).toEqual({
        openElements: ['b', 'a'],
      });
    });

    test('adds the name of an unexpected close tag', () => {
      expect(toDiagnostic(new UnexpectedCloseTagError('x', at(0))).details).toEqual({ name: 'x' });
    });

    test('uses the validator location for validation errors', () => {
      expect(toDiagnostic(new ValidationError('InvalidTag', 'bad tag', 2, 5))).toEqual({
        kind: 'ValidationError',
        message: 'bad tag at line 2, column 5',
        line: 2,
        column: 5,
        details: { code: 'InvalidTag' },
      });
    });

    test('wraps foreign errors and thrown values', () => {
      expect(toDiagnostic(new Error('boom'))).toEqual({ kind: 'Error', message: 'boom' });
      expect(toDiagnostic('plain')).toEqual({ kind: 'Error', message: 'plain' });
    });
  });

  // ─── formatDiagnostic ─────────────────────────────────────────────────

  describe('formatDiagnostic', () => {
    test('console format without source is a single line', () => {
      expect(formatDiagnostic(new TokenizeError('unterminated tag <a>', at(0)), 'console')).toBe(
        '✖ TokenizeError at byte 0 (line 1, column 1): unterminated tag <a>'
      );
    });

    test('console format without a position omits the location', () => {
      expect(formatDiagnostic(new InputError('Input not found: x'), 'console')).toBe(
        '✖ InputError: Input not found: x'
      );
    });

    test('console format quotes the source line under a caret', () => {
      const source = 'one\ntwo words';
      const output = formatDiagnostic(new ValidationError('InvalidTag', 'bad', 2, 5), 'console', source);
      expect(output.split('\n')).toEqual([
        '✖ ValidationError: bad at line 2, column 5',
        '  2 | two words',
        '    |     ^',
      ]);
    });

    test('json format is parseable', () => {
      const output = formatDiagnostic(new UnclosedElementsError(['a'], at(3)), 'json');
      expect(JSON.parse(output)).toEqual({
        kind: 'UnclosedElements',
        message: 'Unclosed elements: a',
        offset: 3,
        line: 1,
        column: 4,
        details: { openElements: ['a'] },
      });
    });
  });

  // ─── formatCheckResult ────────────────────────────────────────────────

  describe('formatCheckResult', () => {
    test('console format for canonical and non-canonical documents', () => {
      expect(formatCheckResult({ formatted: '', canonical: true }, 'a.xml', 'console')).toBe(
        '✅ a.xml is already formatted'
      );
      expect(
        formatCheckResult({ formatted: '', canonical: false, firstDifferenceLine: 4 }, 'a.xml', 'console')
      ).toBe('✖ a.xml is not formatted (first difference at line 4)');
    });

    test('json format omits the difference line when canonical', () => {
      const output = formatCheckResult({ formatted: '<a/>', canonical: true }, 'a.xml', 'json');
      expect(JSON.parse(output)).toEqual({ label: 'a.xml', canonical: true });
    });
  });
});
