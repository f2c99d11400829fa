import { describe, expect, it } from 'vitest';
import {
  charCount,
  charOffsets,
  findIdentifiers,
  lexTokens,
  nextBoundaryIndex,
  previousBoundaryIndex,
  splitLines,
  tokenBoundaries,
} from '../lexer.js';

describe('lexTokens', () => {
  it('splits words, whitespace and punctuation', () => {
    expect(lexTokens('foo(bar, 1)')).toEqual([
      { start: 0, end: 3, kind: 'word' },
      { start: 3, end: 4, kind: 'punct' },
      { start: 4, end: 7, kind: 'word' },
      { start: 7, end: 8, kind: 'punct' },
      { start: 8, end: 9, kind: 'space' },
      { start: 9, end: 10, kind: 'word' },
      { start: 10, end: 11, kind: 'punct' },
    ]);
  });

  it('tiles the text', () => {
    const text = 'const $el = document.querySelector("#ü");\n\treturn;';
    const tokens = lexTokens(text);
    expect(tokens.map((t) => text.slice(t.start, t.end)).join('')).toBe(text);
    for (let i = 1; i < tokens.length; i++) {
      expect(tokens[i].start).toBe(tokens[i - 1].end);
    }
  });
});

describe('tokenBoundaries', () => {
  it('starts at 0 and ends at the text length', () => {
    expect(tokenBoundaries('a + b')).toEqual([0, 1, 2, 3, 4, 5]);
    expect(tokenBoundaries('')).toEqual([0]);
  });
});

describe('findIdentifiers', () => {
  it('finds runs of two or more identifier characters', () => {
    expect(findIdentifiers('x = foo_bar + a1')).toEqual([
      { start: 4, end: 11 },
      { start: 14, end: 16 },
    ]);
  });
});

describe('splitLines', () => {
  it('keeps every terminator', () => {
    expect(splitLines('a\nb\r\nc\rd')).toEqual(['a\n', 'b\r\n', 'c\r', 'd']);
  });

  it('does not emit an empty trailing line', () => {
    expect(splitLines('a\n')).toEqual(['a\n']);
    expect(splitLines('')).toEqual([]);
  });
});

describe('boundary search', () => {
  const boundaries = [0, 3, 5];

  it('finds the next boundary strictly after an offset', () => {
    expect(nextBoundaryIndex(boundaries, 0)).toBe(1);
    expect(nextBoundaryIndex(boundaries, 3)).toBe(2);
    expect(nextBoundaryIndex(boundaries, 4)).toBe(2);
    expect(nextBoundaryIndex(boundaries, 5)).toBe(-1);
  });

  it('finds the previous boundary strictly before an offset', () => {
    expect(previousBoundaryIndex(boundaries, 5)).toBe(1);
    expect(previousBoundaryIndex(boundaries, 3)).toBe(0);
    expect(previousBoundaryIndex(boundaries, 0)).toBe(-1);
  });
});

describe('code point lengths', () => {
  it('counts a surrogate pair as one character', () => {
    expect(charCount('a\u{1F600}b')).toBe(3);
    expect(charCount('')).toBe(0);
    expect(Array.from(charOffsets('a\u{1F600}b'))).toEqual([0, 1, 2, 2, 3]);
  });

  it('counts a lone surrogate as one character', () => {
    expect(charCount('\uDE00x')).toBe(2);
  });
});
