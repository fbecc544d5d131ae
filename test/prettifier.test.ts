/**
 * Tests for the XmlPrettifier main API
 */

import chalk from 'chalk';
import { XmlPrettifier, prettifyXml } from '../src/prettifier';
import { ConfigError, MismatchedCloseTagError, ValidationError } from '../src/core/errors';

chalk.level = 0;

describe('XmlPrettifier', () => {
  // ─── format ──────────────────────────────────────────────────────────

  describe('format', () => {
    test('formats with default options', () => {
      expect(new XmlPrettifier().format('<a><b/></a>')).toBe('<a>\n  <b/>\n</a>');
    });

    test('accepts UTF-8 bytes', () => {
      const bytes = new TextEncoder().encode('<a><b>é</b></a>');
      expect(new XmlPrettifier().format(bytes)).toBe('<a>\n  <b>\n    é\n  </b>\n</a>');
    });

    test('drops a leading byte order mark', () => {
      expect(prettifyXml('\uFEFF<a/>')).toBe('<a/>');
      expect(prettifyXml(Uint8Array.from([0xef, 0xbb, 0xbf, 0x3c, 0x61, 0x2f, 0x3e]))).toBe('<a/>');
    });

    test('keeps non-breaking spaces as text content', () => {
      const once = prettifyXml('<a>\u00a0x\u00a0</a>');
      expect(once).toBe('<a>\n  \u00a0x\u00a0\n</a>');
      expect(prettifyXml(once)).toBe(once);
    });

    test('honors the indent width', () => {
      expect(prettifyXml('<a><b/></a>', { indentWidth: 3 })).toBe('<a>\n   <b/>\n</a>');
    });

    test('rejects an invalid indent width at construction', () => {
      expect(() => new XmlPrettifier({ indentWidth: -2 })).toThrow(ConfigError);
    });

    test('surfaces structural errors', () => {
      expect(() => prettifyXml('<a><b></a>')).toThrow(MismatchedCloseTagError);
    });
  });

  // ─── validate option ────────────────────────────────────────────────

  describe('validate option', () => {
    test('passes well-formed documents through', () => {
      const prettifier = new XmlPrettifier({ validate: true });
      expect(prettifier.format('<a><b x="1"/></a>')).toBe('<a>\n  <b x="1"/>\n</a>');
    });

    test('fails malformed documents with a ValidationError', () => {
      const prettifier = new XmlPrettifier({ validate: true });
      expect(() => prettifier.format('<a><b></a>')).toThrow(ValidationError);
    });
  });

  // ─── check ───────────────────────────────────────────────────────────

  describe('check', () => {
    test('reports a canonical document', () => {
      const result = new XmlPrettifier().check('<a>\n  <b/>\n</a>\n');
      expect(result).toEqual({ formatted: '<a>\n  <b/>\n</a>', canonical: true });
    });

    test('reports the first differing line', () => {
      const result = new XmlPrettifier().check('<a>\n  <b/>\n    <c/>\n</a>');
      expect(result.canonical).toBe(false);
      expect(result.firstDifferenceLine).toBe(3);
      expect(result.formatted).toBe('<a>\n  <b/>\n  <c/>\n</a>');
    });

    test('reports a length difference after a shared prefix', () => {
      const result = new XmlPrettifier().check('<a/>\n\n<!---->\n');
      expect(result.firstDifferenceLine).toBe(2);
    });
  });

  // ─── tokens ──────────────────────────────────────────────────────────

  describe('tokens', () => {
    test('returns the full token list', () => {
      const tokens = new XmlPrettifier().tokens('<a>hi</a>');
      expect(tokens.map((t) => t.type)).toEqual(['open-tag', 'text', 'close-tag', 'end-of-document']);
    });
  });

  // ─── describe / summarize ───────────────────────────────────────────

  describe('describe', () => {
    test('renders an error against its source', () => {
      const prettifier = new XmlPrettifier();
      const source = '<a><b></a>';

      let caught: unknown;
      try {
        prettifier.format(source);
      } catch (error) {
        caught = error;
      }

      expect(prettifier.describe(caught, 'console', source)).toBe(
        [
          '✖ MismatchedCloseTag at byte 6 (line 1, column 7): Expected </b> but found </a>',
          '  1 | <a><b></a>',
          '    | ' + ' '.repeat(6) + '^',
        ].join('\n')
      );
    });

    test('summarizes a check result', () => {
      const prettifier = new XmlPrettifier();
      expect(prettifier.summarize(prettifier.check('<a/>'), 'doc.xml')).toBe('✅ doc.xml is already formatted');
    });
  });
});
