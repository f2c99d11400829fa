// ============================================================================
// @fimsmith/core — Public API
// ============================================================================

// Data model
export { FIM_PREFIX, FIM_SUFFIX, FIM_MIDDLE, STRATEGY_NAMES } from './types.js';
export type {
  StrategyName,
  StrategyWeights,
  MixMode,
  SourceRecord,
  SkipReason,
  Span,
  TextRange,
  FimMeta,
  FimExample,
  OutputLine,
  SpanBounds,
} from './types.js';

// Errors
export {
  FimsmithError,
  ConfigurationError,
  AssemblerPreconditionError,
  InputReadError,
  OutputWriteError,
} from './errors.js';

// Logging
export * as logger from './logger.js';
export type { LogLevel } from './logger.js';

// Configuration
export {
  DEFAULT_MIN_MIDDLE_CHARS,
  DEFAULT_MAX_MIDDLE_CHARS,
  DEFAULT_SEED,
  MAX_SEED,
  DEFAULT_MAX_RETRIES,
  DEFAULT_SAMPLES_CAP,
  DEFAULT_LANGUAGE,
  DEFAULT_OUT_EXT,
  DEFAULT_WEIGHTS,
  spanOptionsSchema,
  evalOptionsSchema,
  mixOptionsSchema,
  mixModeSchema,
  parseSpanOptions,
  parseEvalOptions,
  parseMixOptions,
  parseMixMode,
  normalizeWeights,
  loadConfigFile,
} from './config.js';
export type {
  SpanOptions,
  EvalOptions,
  MixOptions,
  SpanOptionsInput,
  EvalOptionsInput,
  MixOptionsInput,
  StrategyDistribution,
} from './config.js';

// Randomness
export { Rng, deriveFileSeed } from './rng.js';

// Input
export {
  loadRecord,
  parseJsonl,
  readJsonl,
  resolveEvalText,
  conversionCandidates,
} from './loader.js';
export type { LoadResult, SkippedLine, LoadedFile } from './loader.js';

// Lexical + syntax collaborators
export {
  lexTokens,
  tokenBoundaries,
  findIdentifiers,
  splitLines,
  charCount,
  charOffsets,
  nextBoundaryIndex,
  previousBoundaryIndex,
} from './lexer.js';
export type { LexicalKind, LexicalToken } from './lexer.js';
export { NullSyntaxProvider, TypeScriptSyntaxProvider } from './syntax.js';
export type { SyntaxTree, ParseResult, SyntaxProvider } from './syntax.js';

// Span selection
export {
  LocatorContext,
  LOCATORS,
  locateFunction,
  locateLines,
  locateIdentifier,
  locateTokens,
} from './strategies.js';
export type { LocateResult } from './strategies.js';
export { selectSpan, drawStrategy } from './span_selector.js';
export type { SelectionFailure, SpanSelection, SelectSpanOptions } from './span_selector.js';

// Assembly
export { assembleFim, parseFimText, isFimText } from './assembler.js';
export type { ParsedFim } from './assembler.js';
export { convertText } from './convert.js';
export type { ConversionDeps } from './convert.js';

// Pipelines
export { buildEvalDataset, runEvalFile } from './eval_builder.js';
export type { EvalResult, EvalFileResult } from './eval_builder.js';
export {
  fimTargetCount,
  roundHalfToEven,
  interleaveProportionally,
  combineLines,
  mixRecords,
  mixOutputPath,
  runMixFile,
  runMixFiles,
} from './mixer.js';
export type { MixResult, MixFileResult } from './mixer.js';

// Output + reporting
export { formatJsonlLine, serializeJsonl, writeJsonl } from './writer.js';
export { createRunStats, countSkips, mergeRunStats } from './stats.js';
export type { RunStats } from './stats.js';
export { inspectJsonl, inspectJsonlContent } from './inspect.js';
export type { InspectReport, InspectOptions, MiddleLengthStats } from './inspect.js';

// Token accounting
export { TokenizerManager, isTokenizerEncoding } from './tokenizer.js';
export type { TokenizerEncoding } from './tokenizer.js';
