// ============================================================================
// @fimsmith/core — Eval Dataset Builder
// ============================================================================
//
// One input file -> an FIM-only output file, capped at samplesCap lines.
// Each record contributes at most one example (from its aux text when it has
// one); records with no span are dropped, not kept as originals.
// ============================================================================

import type { EvalOptions } from './config.js';
import { type ConversionDeps, convertText } from './convert.js';
import { type LoadedFile, readJsonl, resolveEvalText } from './loader.js';
import { logRunSummary, timer } from './logger.js';
import { Rng } from './rng.js';
import { type RunStats, countSkips, createRunStats } from './stats.js';
import type { SyntaxProvider } from './syntax.js';
import type { FimExample, OutputLine, SourceRecord } from './types.js';
import { writeJsonl } from './writer.js';

export interface EvalResult {
  lines: OutputLine[];
  examples: FimExample[];
  stats: RunStats;
}

export function buildEvalDataset(
  records: readonly SourceRecord[],
  options: EvalOptions,
  deps: ConversionDeps,
  stats: RunStats = createRunStats(),
): EvalResult {
  const examples: FimExample[] = [];
  const lines: OutputLine[] = [];

  for (const record of records) {
    if (examples.length >= options.samplesCap) break;
    stats.selected++;
    const example = convertText(resolveEvalText(record), options, deps, stats, record.language);
    if (!example) continue;
    examples.push(example);
    lines.push(options.includeMeta ? { text: example.text, meta: example.meta } : { text: example.text });
  }

  stats.linesWritten = lines.length;
  return { lines, examples, stats };
}

export interface EvalFileResult extends EvalResult {
  inputPath: string;
  outputPath: string;
}

/**
 * Read `inputPath`, build the eval set with a generator seeded from
 * `options.seed`, and write it to `outputPath`.
 */
export function runEvalFile(
  inputPath: string,
  outputPath: string,
  options: EvalOptions,
  syntax: SyntaxProvider,
): EvalFileResult {
  const t = timer(`eval ${inputPath}`);
  const loaded: LoadedFile = readJsonl(inputPath);

  const stats = createRunStats();
  stats.recordsSeen = loaded.linesSeen;
  stats.recordsLoaded = loaded.records.length;
  countSkips(stats, loaded.skipped);

  const result = buildEvalDataset(
    loaded.records,
    options,
    { rng: new Rng(options.seed), syntax },
    stats,
  );
  writeJsonl(outputPath, result.lines);

  t.endWith({ lines: result.lines.length });
  logRunSummary('eval', {
    input: inputPath,
    output: outputPath,
    converted: stats.converted,
    byStrategy: stats.byStrategy,
  });
  return { ...result, inputPath, outputPath };
}
