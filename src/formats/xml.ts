/**
 * XML Input Helpers
 *
 * Decodes raw input and offers an optional well-formedness pre-check backed
 * by fast-xml-parser's validator.
 */

import { XMLValidator } from 'fast-xml-parser';
import { ValidationResult } from '../core/types';

const utf8 = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * Decode input bytes as UTF-8. A byte order mark is kept so that byte offsets
 * reported later match the file on disk.
 */
export function decodeInput(input: string | Uint8Array): string {
  return typeof input === 'string' ? input : utf8.decode(input);
}

/**
 * Check if a string looks like XML.
 */
export function isXml(input: string): boolean {
  const trimmed = input.trim();
  return trimmed.startsWith('<') && trimmed.endsWith('>');
}

/**
 * Check that a document is well-formed XML.
 */
export function validateXml(input: string): ValidationResult {
  const result = XMLValidator.validate(input, { allowBooleanAttributes: false });
  if (result === true) {
    return { valid: true };
  }

  const { code, msg, line, col } = result.err;
  return { valid: false, code, message: msg, line, column: col };
}
