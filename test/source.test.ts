/**
 * Tests for Source Text positions
 */

import { SourceText } from '../src/core/source';

describe('SourceText', () => {
  test('starts at offset zero, line one, column one', () => {
    expect(new SourceText('abc').positionAt(0)).toEqual({ offset: 0, line: 1, column: 1 });
  });

  test('advances across lines', () => {
    const source = new SourceText('ab\ncd\nef');
    expect(source.positionAt(4)).toEqual({ offset: 4, line: 2, column: 2 });
    expect(source.positionAt(7)).toEqual({ offset: 7, line: 3, column: 2 });
  });

  test('resolves an earlier index after a later one', () => {
    const source = new SourceText('ab\ncd');
    source.positionAt(5);
    expect(source.positionAt(1)).toEqual({ offset: 1, line: 1, column: 2 });
  });

  test('clamps indices past the end', () => {
    const source = new SourceText('ab');
    expect(source.positionAt(10)).toEqual({ offset: 2, line: 1, column: 3 });
  });

  test('measures offsets in UTF-8 bytes', () => {
    // ß = 2 bytes, € = 3 bytes, 😀 = 4 bytes (two UTF-16 code units)
    const source = new SourceText('ß€😀x');
    expect(source.positionAt(4)).toEqual({ offset: 9, line: 1, column: 4 });
  });

  test('returns copies that later calls do not mutate', () => {
    const source = new SourceText('abc');
    const first = source.positionAt(1);
    source.positionAt(3);
    expect(first).toEqual({ offset: 1, line: 1, column: 2 });
  });
});
