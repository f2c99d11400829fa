// ============================================================================
// @fimsmith/core — Mixing Sampler
// ============================================================================
//
// Per file: sample fimPercent% of records, convert their base and aux texts
// independently, and blend the FIM pool back with every original.
//
//   interleave:   proportional scatter; any window of w lines holds
//                 floor or ceil of w * F / (O + F) FIM lines
//   randomReplay: originals + FIM pool, one Fisher-Yates shuffle
// ============================================================================

import path from 'node:path';
import type { MixOptions } from './config.js';
import { type ConversionDeps, convertText } from './convert.js';
import { conversionCandidates, readJsonl } from './loader.js';
import { logRunSummary, timer } from './logger.js';
import { Rng, deriveFileSeed } from './rng.js';
import { type RunStats, countSkips, createRunStats } from './stats.js';
import type { SyntaxProvider } from './syntax.js';
import type { MixMode, OutputLine, SourceRecord } from './types.js';
import { writeJsonl } from './writer.js';

export interface MixResult {
  lines: OutputLine[];
  /** Record indices chosen for conversion, ascending. */
  selectedIndices: number[];
  originalCount: number;
  fimCount: number;
  stats: RunStats;
}

/**
 * Round to the nearest integer, ties to the even neighbour (2.5 -> 2, 3.5 -> 4).
 */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Number of records to convert: round(fimPercent% of n), clamped to [0, n].
 */
export function fimTargetCount(recordCount: number, fimPercent: number): number {
  return Math.max(0, Math.min(recordCount, roundHalfToEven((fimPercent / 100) * recordCount)));
}

/**
 * Merge two lists so the FIM share of every emitted prefix tracks the global
 * ratio. Slot t (1-based) takes a FIM item iff fewer than floor(t * F / T)
 * have been emitted so far. Relative order within each list is kept.
 */
export function interleaveProportionally<T>(originals: readonly T[], fim: readonly T[]): T[] {
  const total = originals.length + fim.length;
  const out: T[] = [];
  let o = 0;
  let f = 0;
  for (let t = 1; t <= total; t++) {
    const fimDue = Math.floor((t * fim.length) / total);
    if (f < fimDue) {
      out.push(fim[f++]);
    } else {
      out.push(originals[o++]);
    }
  }
  return out;
}

export function combineLines<T>(
  originals: readonly T[],
  fim: readonly T[],
  mode: MixMode,
  rng: Rng,
): T[] {
  switch (mode) {
    case 'interleave':
      return interleaveProportionally(originals, fim);
    case 'randomReplay':
      return rng.shuffle([...originals, ...fim]);
  }
}

export function mixRecords(
  records: readonly SourceRecord[],
  options: MixOptions,
  deps: ConversionDeps,
  stats: RunStats = createRunStats(),
): MixResult {
  const k = fimTargetCount(records.length, options.fimPercent);
  const selectedIndices = deps.rng.sampleIndices(records.length, k);
  stats.selected += selectedIndices.length;

  const fimLines: OutputLine[] = [];
  for (const index of selectedIndices) {
    const record = records[index];
    for (const text of conversionCandidates(record)) {
      const example = convertText(text, options, deps, stats, record.language);
      if (example) fimLines.push({ text: example.text });
    }
  }

  // every original survives, converted or not; aux-only records have no base to keep
  const originals: OutputLine[] = [];
  for (const record of records) {
    if (record.baseText) originals.push({ text: record.baseText });
  }

  const lines = combineLines(originals, fimLines, options.mixMode, deps.rng);
  stats.originalsRetained += originals.length;
  stats.linesWritten += lines.length;

  return {
    lines,
    selectedIndices,
    originalCount: originals.length,
    fimCount: fimLines.length,
    stats,
  };
}

// ---- Files ----

/**
 * `<dir>/<stem>_<round(fimPercent)>FIM<outExt>`, where `dir` defaults to the
 * input's own directory. Rounds like `fimTargetCount`.
 */
export function mixOutputPath(
  inputPath: string,
  fimPercent: number,
  outputDir?: string,
  outExt = '.jsonl',
): string {
  const parsed = path.parse(inputPath);
  const dir = outputDir ?? parsed.dir;
  return path.join(dir, `${parsed.name}_${roundHalfToEven(fimPercent)}FIM${outExt}`);
}

export interface MixFileResult extends MixResult {
  inputPath: string;
  outputPath: string;
  seed: number;
}

/**
 * Mix one file with its own generator, seeded from the run seed and the
 * file's name.
 */
export function runMixFile(
  inputPath: string,
  options: MixOptions,
  syntax: SyntaxProvider,
): MixFileResult {
  const t = timer(`mix ${inputPath}`);
  const outputPath = mixOutputPath(inputPath, options.fimPercent, options.outputDir, options.outExt);
  const seed = deriveFileSeed(options.seed, inputPath);
  const loaded = readJsonl(inputPath);

  const stats = createRunStats();
  stats.recordsSeen = loaded.linesSeen;
  stats.recordsLoaded = loaded.records.length;
  countSkips(stats, loaded.skipped);

  const result = mixRecords(loaded.records, options, { rng: new Rng(seed), syntax }, stats);
  writeJsonl(outputPath, result.lines);

  t.endWith({ lines: result.lines.length });
  logRunSummary('mix', {
    input: inputPath,
    output: outputPath,
    originals: result.originalCount,
    fim: result.fimCount,
    mode: options.mixMode,
  });
  return { ...result, inputPath, outputPath, seed };
}

/**
 * Files are independent. An unreadable input stops the batch; files already
 * mixed stay written.
 */
export function runMixFiles(
  inputPaths: readonly string[],
  options: MixOptions,
  syntax: SyntaxProvider,
): MixFileResult[] {
  return inputPaths.map((inputPath) => runMixFile(inputPath, options, syntax));
}
