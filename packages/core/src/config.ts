// ============================================================================
// @fimsmith/core — Run Configuration
// ============================================================================
//
// Options are validated once, at startup. Every invalid value is a
// ConfigurationError; nothing downstream re-checks them.
// ============================================================================

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, InputReadError } from './errors.js';
import { STRATEGY_NAMES, type MixMode, type StrategyName, type StrategyWeights } from './types.js';

export const DEFAULT_MIN_MIDDLE_CHARS = 80;
export const DEFAULT_MAX_MIDDLE_CHARS = 1200;
export const DEFAULT_SEED = 42;
/** The generator keeps 32 bits of state; larger seeds would alias. */
export const MAX_SEED = 0xffff_ffff;
export const DEFAULT_MAX_RETRIES = 12;
export const DEFAULT_SAMPLES_CAP = 2000;
export const DEFAULT_LANGUAGE = 'typescript';
export const DEFAULT_OUT_EXT = '.jsonl';

export const DEFAULT_WEIGHTS: StrategyWeights = {
  function: 0.4,
  line: 0.3,
  identifier: 0.2,
  token: 0.1,
};

// ---- Schemas ----

const weightSchema = z.number().finite().nonnegative();

const weightsSchema = z
  .object({
    function: weightSchema.default(DEFAULT_WEIGHTS.function),
    line: weightSchema.default(DEFAULT_WEIGHTS.line),
    identifier: weightSchema.default(DEFAULT_WEIGHTS.identifier),
    token: weightSchema.default(DEFAULT_WEIGHTS.token),
  })
  .default({});

const spanOptionsShape = {
  minMiddleChars: z.number().int().positive().default(DEFAULT_MIN_MIDDLE_CHARS),
  maxMiddleChars: z.number().int().positive().default(DEFAULT_MAX_MIDDLE_CHARS),
  weights: weightsSchema,
  seed: z.number().int().min(0).max(MAX_SEED).default(DEFAULT_SEED),
  maxRetriesPerRecord: z.number().int().positive().default(DEFAULT_MAX_RETRIES),
  language: z.string().min(1).default(DEFAULT_LANGUAGE),
};

export const spanOptionsSchema = z.object(spanOptionsShape);

export const evalOptionsSchema = z.object({
  ...spanOptionsShape,
  samplesCap: z.number().int().positive().default(DEFAULT_SAMPLES_CAP),
  includeMeta: z.boolean().default(false),
});

export const mixModeSchema = z.enum(['interleave', 'randomReplay']);

export const mixOptionsSchema = z.object({
  ...spanOptionsShape,
  fimPercent: z.number().finite().min(0).max(100),
  mixMode: mixModeSchema.default('interleave'),
  outputDir: z.string().min(1).optional(),
  outExt: z.string().default(DEFAULT_OUT_EXT),
});

export type SpanOptions = z.infer<typeof spanOptionsSchema>;
export type EvalOptions = z.infer<typeof evalOptionsSchema>;
export type MixOptions = z.infer<typeof mixOptionsSchema>;

export type SpanOptionsInput = z.input<typeof spanOptionsSchema>;
export type EvalOptionsInput = z.input<typeof evalOptionsSchema>;
export type MixOptionsInput = z.input<typeof mixOptionsSchema>;

// ---- Validation ----

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const issue = error.issues[0];
  const field = issue?.path.join('.') || undefined;
  const reason = issue?.message ?? 'invalid configuration';
  return new ConfigurationError(
    field ? `Invalid configuration for "${field}": ${reason}` : `Invalid configuration: ${reason}`,
    { field, reason },
  );
}

function checkCrossFieldRules(options: SpanOptions): void {
  if (options.minMiddleChars > options.maxMiddleChars) {
    throw new ConfigurationError(
      `minMiddleChars (${options.minMiddleChars}) must not exceed maxMiddleChars (${options.maxMiddleChars}).`,
      { field: 'minMiddleChars', reason: 'min > max', value: options.minMiddleChars },
    );
  }
  const total = STRATEGY_NAMES.reduce((sum, name) => sum + options.weights[name], 0);
  if (total <= 0) {
    throw new ConfigurationError('At least one strategy weight must be positive.', {
      field: 'weights',
      reason: 'all weights are zero',
      value: options.weights,
    });
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  return result.data;
}

export function parseSpanOptions(input: unknown): SpanOptions {
  const options = parseWith(spanOptionsSchema, input);
  checkCrossFieldRules(options);
  return options;
}

export function parseEvalOptions(input: unknown): EvalOptions {
  const options = parseWith(evalOptionsSchema, input);
  checkCrossFieldRules(options);
  return options;
}

export function parseMixOptions(input: unknown): MixOptions {
  const options = parseWith(mixOptionsSchema, input);
  checkCrossFieldRules(options);
  return options;
}

/**
 * Accepts the spellings used on the command line and in older config files.
 */
export function parseMixMode(value: string): MixMode {
  const normalized = value.trim().toLowerCase().replace(/[-_]/g, '');
  if (normalized === 'interleave') return 'interleave';
  if (normalized === 'randomreplay') return 'randomReplay';
  throw new ConfigurationError(
    `Unknown mix mode "${value}". Expected interleave or random-replay.`,
    { field: 'mixMode', reason: 'unknown mix mode', value },
  );
}

// ---- Weights ----

export type StrategyDistribution = ReadonlyArray<{ strategy: StrategyName; probability: number }>;

/**
 * Normalize weights to sum to 1 over the strategies not in `excluded`.
 * The excluded strategies' mass is redistributed proportionally.
 * Returns undefined when no positive weight remains.
 */
export function normalizeWeights(
  weights: StrategyWeights,
  excluded: ReadonlySet<StrategyName> = new Set(),
): StrategyDistribution | undefined {
  const active = STRATEGY_NAMES.filter((name) => !excluded.has(name) && weights[name] > 0);
  const total = active.reduce((sum, name) => sum + weights[name], 0);
  if (active.length === 0 || total <= 0) return undefined;
  return active.map((strategy) => ({ strategy, probability: weights[strategy] / total }));
}

// ---- Config Files ----

/**
 * Read a JSON config file. Keys are option names (`minMiddleChars`, `weights`, ...).
 * Validation happens after CLI flags are merged in.
 */
export function loadConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputReadError(filePath, err instanceof Error ? err.message : String(err));
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Config file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { field: 'config', reason: 'malformed JSON' },
    );
  }
  if (!isPlainRecord(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object.`, {
      field: 'config',
      reason: 'not an object',
    });
  }
  return parsed;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
