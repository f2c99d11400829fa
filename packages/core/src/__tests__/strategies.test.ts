import { describe, expect, it } from 'vitest';
import { tokenBoundaries } from '../lexer.js';
import { Rng } from '../rng.js';
import {
  type LocateResult,
  LocatorContext,
  locateFunction,
  locateIdentifier,
  locateLines,
  locateTokens,
} from '../strategies.js';
import type { ParseResult, SyntaxTree } from '../syntax.js';
import type { SpanBounds, TextRange } from '../types.js';

const UNAVAILABLE: ParseResult = { status: 'unavailable', reason: 'no parser' };

function fakeTree(bodies: TextRange[], identifiers: TextRange[] = []): ParseResult {
  const tree: SyntaxTree = {
    functionBodies: () => bodies,
    identifiers: () => identifiers,
  };
  return { status: 'ok', tree };
}

function context(
  text: string,
  bounds: SpanBounds,
  seed = 1,
  parse: ParseResult = UNAVAILABLE,
): LocatorContext {
  return new LocatorContext(text, bounds, new Rng(seed), () => parse);
}

function spanOf(result: LocateResult): [number, number] | undefined {
  return result.kind === 'span' ? [result.start, result.end] : undefined;
}

describe('LocatorContext', () => {
  it('parses at most once', () => {
    let calls = 0;
    const ctx = new LocatorContext('abc', { minMiddleChars: 1, maxMiddleChars: 3 }, new Rng(1), () => {
      calls++;
      return UNAVAILABLE;
    });
    ctx.syntax();
    ctx.syntax();
    expect(calls).toBe(1);
  });
});

describe('locateFunction', () => {
  it('is unavailable without a syntax tree', () => {
    expect(locateFunction(context('function f() {}', { minMiddleChars: 1, maxMiddleChars: 50 }))).toEqual(
      { kind: 'unavailable', reason: 'no parser' },
    );
  });

  it('picks only bodies that fit the bounds', () => {
    const ctx = context('x'.repeat(40), { minMiddleChars: 5, maxMiddleChars: 20 }, 1, fakeTree([
      { start: 0, end: 3 },
      { start: 5, end: 20 },
      { start: 0, end: 40 },
    ]));
    expect(locateFunction(ctx)).toEqual({ kind: 'span', start: 5, end: 20 });
  });

  it('reports no span when no body fits', () => {
    const ctx = context('x'.repeat(40), { minMiddleChars: 5, maxMiddleChars: 20 }, 1, fakeTree([
      { start: 0, end: 3 },
    ]));
    expect(locateFunction(ctx)).toEqual({ kind: 'no-span' });
  });
});

describe('locateLines', () => {
  const text = 'aaaa\nbbbb\ncccc\n';
  const bounds = { minMiddleChars: 6, maxMiddleChars: 10 };

  it('returns whole-line runs within the bounds', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const span = spanOf(locateLines(context(text, bounds, seed)));
      expect([
        [0, 10],
        [5, 15],
      ]).toContainEqual(span);
    }
  });

  it('fails on text shorter than the minimum', () => {
    expect(locateLines(context('abc', bounds))).toEqual({ kind: 'no-span' });
  });

  it('fails when a single line exceeds the maximum', () => {
    expect(locateLines(context('x'.repeat(50), bounds))).toEqual({ kind: 'no-span' });
  });
});

describe('locateIdentifier', () => {
  it('grows an identifier over neighbouring tokens', () => {
    const bounds = { minMiddleChars: 10, maxMiddleChars: 40 };
    for (let seed = 1; seed <= 10; seed++) {
      const span = spanOf(locateIdentifier(context('alpha beta gamma', bounds, seed)));
      expect([
        [0, 10],
        [6, 16],
      ]).toContainEqual(span);
    }
  });

  it('uses syntax identifiers when a tree is available', () => {
    const text = 'let alpha = beta;';
    const ctx = context(text, { minMiddleChars: 4, maxMiddleChars: 10 }, 1, fakeTree([], [
      { start: 12, end: 16 },
    ]));
    expect(locateIdentifier(ctx)).toEqual({ kind: 'span', start: 12, end: 16 });
  });

  it('fails when the identifier alone is longer than the maximum', () => {
    const ctx = context('a_very_long_identifier_name;', { minMiddleChars: 5, maxMiddleChars: 12 });
    expect(locateIdentifier(ctx)).toEqual({ kind: 'no-span' });
  });

  it('fails when there is no identifier', () => {
    expect(locateIdentifier(context('1 + 2', { minMiddleChars: 1, maxMiddleChars: 5 }))).toEqual({
      kind: 'no-span',
    });
  });
});

describe('locateTokens', () => {
  const text = 'let value = compute(input) + offset;\n'.repeat(4);
  const bounds = { minMiddleChars: 20, maxMiddleChars: 40 };
  const boundaries = tokenBoundaries(text);

  it('returns token-aligned spans within the bounds', () => {
    let found = 0;
    for (let seed = 1; seed <= 20; seed++) {
      const result = locateTokens(context(text, bounds, seed));
      if (result.kind !== 'span') continue;
      found++;
      expect(boundaries).toContain(result.start);
      expect(boundaries).toContain(result.end);
      expect(result.end - result.start).toBeGreaterThanOrEqual(20);
      expect(result.end - result.start).toBeLessThanOrEqual(40);
    }
    expect(found).toBeGreaterThan(0);
  });

  it('fails on text shorter than the minimum', () => {
    expect(locateTokens(context('short', bounds))).toEqual({ kind: 'no-span' });
  });
});
