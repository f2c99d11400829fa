// ============================================================================
// @fimsmith/core — Span Selector
// ============================================================================
//
// Draw a strategy, run its locator, retry with a fresh draw on failure, up to
// maxRetriesPerRecord attempts. A strategy whose collaborator is unavailable
// for this text's language is excluded from later draws, so its weight flows
// proportionally to the remaining strategies.
// ============================================================================

import { type SpanOptions, type StrategyDistribution, normalizeWeights } from './config.js';
import { logSelectionFailed } from './logger.js';
import type { Rng } from './rng.js';
import { LOCATORS, LocatorContext } from './strategies.js';
import type { ParseResult, SyntaxProvider } from './syntax.js';
import type { Span, StrategyName } from './types.js';

/** Strategies that cannot run at all without a syntax tree. */
const SYNTAX_REQUIRED: ReadonlySet<StrategyName> = new Set(['function']);

export type SelectionFailure =
  /** Text shorter than minMiddleChars; no attempt made. */
  | 'too-short'
  /** Every strategy with positive weight is unavailable for this language. */
  | 'no-strategy'
  /** All attempts failed to find a span. */
  | 'exhausted';

export type SpanSelection =
  | { ok: true; span: Span; attempts: number }
  | { ok: false; reason: SelectionFailure; attempts: number };

export interface SelectSpanOptions {
  /** Overrides `options.language` (per-record language hints). */
  language?: string;
}

/**
 * Draw one strategy from a normalized distribution.
 */
export function drawStrategy(distribution: StrategyDistribution, rng: Rng): StrategyName {
  const r = rng.next();
  let acc = 0;
  for (const { strategy, probability } of distribution) {
    acc += probability;
    if (r < acc) return strategy;
  }
  // float round-off can leave acc a hair under 1
  return distribution[distribution.length - 1].strategy;
}

function isWhitespaceOnly(text: string, start: number, end: number): boolean {
  return /^\s*$/u.test(text.slice(start, end));
}

/**
 * Find a span in `text` satisfying the size bounds, or report why none was found.
 * Never throws for per-record conditions.
 */
export function selectSpan(
  text: string,
  options: SpanOptions,
  rng: Rng,
  syntax: SyntaxProvider,
  selectOptions: SelectSpanOptions = {},
): SpanSelection {
  const language = selectOptions.language ?? options.language;
  const supported = syntax.supports(language);
  const parse = (): ParseResult =>
    supported
      ? syntax.parse(text, language)
      : { status: 'unavailable', reason: `no parser for ${language}` };
  const ctx = new LocatorContext(text, options, rng, parse);
  const textLength = ctx.textLength;

  if (textLength < options.minMiddleChars) {
    logSelectionFailed('too-short', 0, textLength);
    return { ok: false, reason: 'too-short', attempts: 0 };
  }

  const excluded = new Set<StrategyName>();
  if (!supported) {
    for (const strategy of SYNTAX_REQUIRED) excluded.add(strategy);
  }

  let attempts = 0;
  while (attempts < options.maxRetriesPerRecord) {
    const distribution = normalizeWeights(options.weights, excluded);
    if (!distribution) {
      logSelectionFailed('no-strategy', attempts, textLength);
      return { ok: false, reason: 'no-strategy', attempts };
    }

    attempts++;
    const strategy = drawStrategy(distribution, rng);
    const result = LOCATORS[strategy](ctx);

    if (result.kind === 'unavailable') {
      excluded.add(strategy);
      continue;
    }
    if (result.kind === 'no-span') continue;

    if (!ctx.fits(result) || isWhitespaceOnly(text, result.start, result.end)) continue;

    return { ok: true, span: { start: result.start, end: result.end, strategy }, attempts };
  }

  logSelectionFailed('exhausted', attempts, textLength);
  return { ok: false, reason: 'exhausted', attempts };
}
