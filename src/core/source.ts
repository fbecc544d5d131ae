/**
 * Source Text
 *
 * Wraps a decoded document and translates string indices (UTF-16 code units)
 * into byte offsets, lines and columns. The tokenizer only ever moves forward,
 * so positions are computed from the last resolved index instead of from the
 * start of the input.
 */

import { SourcePosition } from './types';

const LF = 0x0a;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * UTF-8 width of the code unit at `code`. A surrogate pair is counted as four
 * bytes on its high half and zero on its low half.
 */
function utf8Width(code: number, next: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (isHighSurrogate(code) && isLowSurrogate(next)) return 4;
  if (isLowSurrogate(code)) return 0;
  return 3;
}

export class SourceText {
  readonly text: string;

  private cursorIndex = 0;
  private cursor: SourcePosition = { offset: 0, line: 1, column: 1 };

  constructor(text: string) {
    this.text = text;
  }

  /**
   * Resolve a string index into a position. Indices past the end resolve to
   * the end of input.
   */
  positionAt(index: number): SourcePosition {
    const target = Math.max(0, Math.min(index, this.text.length));

    if (target < this.cursorIndex) {
      this.cursorIndex = 0;
      this.cursor = { offset: 0, line: 1, column: 1 };
    }

    let { offset, line, column } = this.cursor;
    for (let i = this.cursorIndex; i < target; i++) {
      const code = this.text.charCodeAt(i);
      const width = utf8Width(code, this.text.charCodeAt(i + 1));
      offset += width;

      if (code === LF) {
        line++;
        column = 1;
      } else if (width > 0) {
        column++;
      }
    }

    this.cursorIndex = target;
    this.cursor = { offset, line, column };
    return { ...this.cursor };
  }
}
