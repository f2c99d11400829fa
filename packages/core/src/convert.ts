// ============================================================================
// @fimsmith/core — Text Conversion Step
// ============================================================================
//
// Span selection + assembly for one text, shared by the eval builder and the
// mixing sampler. Failures are counted and absorbed; only an assembler
// precondition violation escapes.
// ============================================================================

import { assembleFim } from './assembler.js';
import type { SpanOptions } from './config.js';
import type { Rng } from './rng.js';
import { selectSpan } from './span_selector.js';
import type { RunStats } from './stats.js';
import type { SyntaxProvider } from './syntax.js';
import type { FimExample } from './types.js';

export interface ConversionDeps {
  rng: Rng;
  syntax: SyntaxProvider;
}

export function convertText(
  text: string,
  options: SpanOptions,
  deps: ConversionDeps,
  stats: RunStats,
  language?: string,
): FimExample | undefined {
  stats.attempted++;
  const selection = selectSpan(text, options, deps.rng, deps.syntax, { language });
  if (!selection.ok) {
    stats.failed[selection.reason]++;
    return undefined;
  }
  const example = assembleFim(text, selection.span);
  stats.converted++;
  stats.byStrategy[selection.span.strategy]++;
  return example;
}
