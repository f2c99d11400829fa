// ============================================================================
// @fimsmith/core — Lexical Units
// ============================================================================
//
// Language-agnostic splitting used by the line, identifier and token
// strategies. Every function here tiles its input: concatenating the pieces
// gives back the original text.
// ============================================================================

import type { TextRange } from './types.js';

const LEXICAL_UNIT_RE = /[\p{L}\p{N}_$]+|\s+|[^\p{L}\p{N}_$\s]+/gu;

/** Runs of two or more identifier characters. */
const IDENTIFIER_RE = /[A-Za-z_]\w+/g;

export type LexicalKind = 'word' | 'space' | 'punct';

export interface LexicalToken extends TextRange {
  kind: LexicalKind;
}

function classify(value: string): LexicalKind {
  if (/^\s/u.test(value)) return 'space';
  if (/^[\p{L}\p{N}_$]/u.test(value)) return 'word';
  return 'punct';
}

/**
 * Split text into minimal lexical units: word runs, whitespace runs and
 * punctuation runs.
 */
export function lexTokens(text: string): LexicalToken[] {
  const tokens: LexicalToken[] = [];
  for (const match of text.matchAll(LEXICAL_UNIT_RE)) {
    const start = match.index ?? 0;
    tokens.push({ start, end: start + match[0].length, kind: classify(match[0]) });
  }
  return tokens;
}

/**
 * Sorted token boundary offsets, always starting at 0 and ending at text.length.
 */
export function tokenBoundaries(text: string): number[] {
  const boundaries = [0];
  for (const token of lexTokens(text)) {
    boundaries.push(token.end);
  }
  return boundaries;
}

/**
 * Identifier-shaped runs, used when no syntax tree is available.
 */
export function findIdentifiers(text: string): TextRange[] {
  const ranges: TextRange[] = [];
  for (const match of text.matchAll(IDENTIFIER_RE)) {
    const start = match.index ?? 0;
    ranges.push({ start, end: start + match[0].length });
  }
  return ranges;
}

/**
 * Length in code points. Span bounds are measured this way, so a character
 * outside the Basic Multilingual Plane counts once.
 */
export function charCount(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (!isTrailingSurrogate(text, i)) count++;
  }
  return count;
}

/**
 * Code point count of `text.slice(0, i)` for every UTF-16 offset `i`, so the
 * character length of `[start, end)` is `offsets[end] - offsets[start]`.
 */
export function charOffsets(text: string): Uint32Array {
  const offsets = new Uint32Array(text.length + 1);
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    offsets[i] = count;
    if (!isTrailingSurrogate(text, i)) count++;
  }
  offsets[text.length] = count;
  return offsets;
}

function isTrailingSurrogate(text: string, i: number): boolean {
  const code = text.charCodeAt(i);
  if (code < 0xdc00 || code > 0xdfff || i === 0) return false;
  const lead = text.charCodeAt(i - 1);
  return lead >= 0xd800 && lead <= 0xdbff;
}

/**
 * Split into lines, keeping each line's terminator (`\n`, `\r\n` or `\r`).
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let lineStart = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\n' || ch === '\r') {
      const end = ch === '\r' && text[i + 1] === '\n' ? i + 2 : i + 1;
      lines.push(text.slice(lineStart, end));
      lineStart = end;
      i = end - 1;
    }
  }
  if (lineStart < text.length) {
    lines.push(text.slice(lineStart));
  }
  return lines;
}

/**
 * Index of the first boundary strictly greater than `offset`, or -1.
 */
export function nextBoundaryIndex(boundaries: readonly number[], offset: number): number {
  let lo = 0;
  let hi = boundaries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (boundaries[mid] <= offset) lo = mid + 1;
    else hi = mid;
  }
  return lo < boundaries.length ? lo : -1;
}

/**
 * Index of the last boundary strictly less than `offset`, or -1.
 */
export function previousBoundaryIndex(boundaries: readonly number[], offset: number): number {
  let lo = 0;
  let hi = boundaries.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (boundaries[mid] < offset) lo = mid + 1;
    else hi = mid;
  }
  return lo - 1;
}
