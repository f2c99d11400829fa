// ============================================================================
// @fimsmith/core — Span Locators
// ============================================================================
//
// One locator per strategy. Each makes a single attempt and reports a
// tri-state result; retrying is the selector's job.
//
//   function:   a whole function body block (braces included, header excluded)
//   line:       a contiguous run of whole lines
//   identifier: an identifier occurrence, grown over adjacent tokens to the minimum
//   token:      a run of lexical tokens grown to a drawn target length
//
// Offsets are UTF-16 indices; lengths checked against the bounds are code
// points.
// ============================================================================

import {
  charOffsets,
  findIdentifiers,
  nextBoundaryIndex,
  previousBoundaryIndex,
  splitLines,
  tokenBoundaries,
} from './lexer.js';
import type { Rng } from './rng.js';
import type { ParseResult } from './syntax.js';
import type { SpanBounds, StrategyName, TextRange } from './types.js';

export type LocateResult =
  | { kind: 'span'; start: number; end: number }
  | { kind: 'no-span' }
  | { kind: 'unavailable'; reason: string };

/**
 * Per-text state shared by every attempt on that text. The parse and the
 * token boundaries are computed at most once.
 */
export class LocatorContext {
  private parsed?: ParseResult;
  private boundaryCache?: number[];
  private charCache?: Uint32Array;

  constructor(
    readonly text: string,
    readonly bounds: SpanBounds,
    readonly rng: Rng,
    private readonly parse: () => ParseResult,
  ) {}

  syntax(): ParseResult {
    if (!this.parsed) this.parsed = this.parse();
    return this.parsed;
  }

  boundaries(): number[] {
    if (!this.boundaryCache) this.boundaryCache = tokenBoundaries(this.text);
    return this.boundaryCache;
  }

  /** Code points in `[start, end)`. */
  charLength(start: number, end: number): number {
    if (!this.charCache) this.charCache = charOffsets(this.text);
    return this.charCache[end] - this.charCache[start];
  }

  get textLength(): number {
    return this.charLength(0, this.text.length);
  }

  fits(range: TextRange): boolean {
    const length = this.charLength(range.start, range.end);
    return length >= this.bounds.minMiddleChars && length <= this.bounds.maxMiddleChars;
  }
}

const NO_SPAN: LocateResult = { kind: 'no-span' };

/**
 * Grow `[start, end)` one token boundary at a time, rightwards first and
 * leftwards once the right edge reaches the end of the text, until it is at
 * least `target` long. Fails when the text runs out or the result overshoots
 * `maxMiddleChars`.
 */
function growToLength(
  ctx: LocatorContext,
  range: TextRange,
  target: number,
): LocateResult {
  const boundaries = ctx.boundaries();
  let { start, end } = range;
  while (ctx.charLength(start, end) < target) {
    const next = nextBoundaryIndex(boundaries, end);
    if (next !== -1) {
      end = boundaries[next];
      continue;
    }
    const previous = previousBoundaryIndex(boundaries, start);
    if (previous === -1) return NO_SPAN;
    start = boundaries[previous];
  }
  if (ctx.charLength(start, end) > ctx.bounds.maxMiddleChars) return NO_SPAN;
  return { kind: 'span', start, end };
}

// ---- function ----

export function locateFunction(ctx: LocatorContext): LocateResult {
  const parsed = ctx.syntax();
  if (parsed.status === 'unavailable') {
    return { kind: 'unavailable', reason: parsed.reason };
  }
  const candidates = parsed.tree.functionBodies().filter((body) => ctx.fits(body));
  if (candidates.length === 0) return NO_SPAN;
  const body = ctx.rng.pick(candidates);
  return { kind: 'span', start: body.start, end: body.end };
}

// ---- line ----

interface LineRunChoice {
  /** Index of the first line in the run. */
  first: number;
  /** Inclusive range of valid exclusive end-line indices. */
  lo: number;
  hi: number;
}

export function locateLines(ctx: LocatorContext): LocateResult {
  const { text, bounds } = ctx;
  if (ctx.textLength < bounds.minMiddleChars) return NO_SPAN;

  const lines = splitLines(text);
  const offsets = [0];
  for (const line of lines) offsets.push(offsets[offsets.length - 1] + line.length);
  const n = lines.length;

  // For each first line, the valid end lines form one contiguous range, and
  // both ends of that range only move forward as the first line does.
  const choices: LineRunChoice[] = [];
  let lo = 1;
  let hi = 0;
  for (let first = 0; first < n; first++) {
    lo = Math.max(lo, first + 1);
    while (lo <= n && ctx.charLength(offsets[first], offsets[lo]) < bounds.minMiddleChars) lo++;
    hi = Math.max(hi, first);
    while (hi + 1 <= n && ctx.charLength(offsets[first], offsets[hi + 1]) <= bounds.maxMiddleChars) hi++;
    if (lo <= n && lo <= hi) choices.push({ first, lo, hi });
  }
  if (choices.length === 0) return NO_SPAN;

  const choice = ctx.rng.pick(choices);
  const last = ctx.rng.int(choice.lo, choice.hi);
  return { kind: 'span', start: offsets[choice.first], end: offsets[last] };
}

// ---- identifier ----

export function locateIdentifier(ctx: LocatorContext): LocateResult {
  const parsed = ctx.syntax();
  const occurrences =
    parsed.status === 'ok' ? parsed.tree.identifiers() : findIdentifiers(ctx.text);
  if (occurrences.length === 0) return NO_SPAN;
  const occurrence = ctx.rng.pick(occurrences);
  return growToLength(ctx, occurrence, ctx.bounds.minMiddleChars);
}

// ---- token ----

export function locateTokens(ctx: LocatorContext): LocateResult {
  const { bounds } = ctx;
  const length = ctx.textLength;
  if (length < bounds.minMiddleChars) return NO_SPAN;

  const ceiling = Math.min(
    bounds.maxMiddleChars,
    Math.max(bounds.minMiddleChars, Math.floor(length / 3)),
  );
  const target = ctx.rng.int(bounds.minMiddleChars, ceiling);
  const boundaries = ctx.boundaries();
  const start = boundaries[ctx.rng.int(0, boundaries.length - 2)];
  return growToLength(ctx, { start, end: start }, target);
}

export const LOCATORS: Record<StrategyName, (ctx: LocatorContext) => LocateResult> = {
  function: locateFunction,
  line: locateLines,
  identifier: locateIdentifier,
  token: locateTokens,
};
