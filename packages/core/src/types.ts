// ============================================================================
// @fimsmith/core — Type Definitions
// ============================================================================

// ---- FIM Format ----

/** Tag literals of the FIM training format. Fixed; never configurable. */
export const FIM_PREFIX = '<|fim_prefix|>';
export const FIM_SUFFIX = '<|fim_suffix|>';
export const FIM_MIDDLE = '<|fim_middle|>';

// ---- Strategies ----

/** Span-selection strategies, in the order weights are accumulated when drawing. */
export const STRATEGY_NAMES = ['function', 'line', 'identifier', 'token'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/** Non-negative sampling weight per strategy (normalized before use). */
export type StrategyWeights = Record<StrategyName, number>;

/** How converted and original lines are combined in a mixed output file. */
export type MixMode = 'interleave' | 'randomReplay';

// ---- Records ----

/**
 * One usable input unit.
 * `auxText` is the resolved `llm_formatted` variant; absent when the input had none.
 */
export interface SourceRecord {
  baseText: string;
  auxText?: string;
  /** Per-record language hint; overrides the run's default language. */
  language?: string;
}

export type SkipReason = 'no-text' | 'malformed-json' | 'not-an-object';

// ---- Spans & Examples ----

/** Half-open character range `[start, end)` over one specific text. */
export interface Span {
  start: number;
  end: number;
  strategy: StrategyName;
}

/** Plain character range produced by collaborators (syntax trees, lexers). */
export interface TextRange {
  start: number;
  end: number;
}

export interface FimMeta {
  /** UTF-16 offsets of the middle in the source text. */
  middleChars: [number, number];
  /** Lengths in code points. */
  prefixLen: number;
  middleLen: number;
  suffixLen: number;
  strategy: StrategyName;
}

/** A text split around a span, plus its tagged rendering. Immutable once built. */
export interface FimExample {
  readonly prefix: string;
  readonly middle: string;
  readonly suffix: string;
  /** `FIM_PREFIX + prefix + FIM_SUFFIX + suffix + FIM_MIDDLE + middle` */
  readonly text: string;
  readonly span: Span;
  readonly meta: FimMeta;
}

/** One JSON line of output. `meta` is only present when a caller opts in. */
export interface OutputLine {
  text: string;
  meta?: FimMeta;
}

// ---- Span Bounds ----

export interface SpanBounds {
  minMiddleChars: number;
  maxMiddleChars: number;
}
