// ============================================================================
// @fimsmith/core — Output Inspection
// ============================================================================
//
// Summarizes a written JSONL file: how many lines are FIM-tagged, whether the
// tags parse, how long the middles are, and (optionally) the token totals.
// ============================================================================

import { readFileSync } from 'node:fs';
import { FIM_PREFIX } from './types.js';
import { parseFimText } from './assembler.js';
import { InputReadError } from './errors.js';
import { charCount } from './lexer.js';
import { type TokenizerEncoding, TokenizerManager } from './tokenizer.js';

export interface MiddleLengthStats {
  min: number;
  max: number;
  mean: number;
}

export interface InspectReport {
  path: string;
  lines: number;
  fimLines: number;
  plainLines: number;
  /** Lines that are not JSON objects with a string `text`. */
  malformedLines: number;
  /** Lines that start with the prefix tag but do not parse as FIM. */
  brokenFimLines: number;
  fimRatio: number;
  middleLength?: MiddleLengthStats;
  tokens?: {
    encoding: TokenizerEncoding;
    total: number;
    fim: number;
    plain: number;
  };
}

export interface InspectOptions {
  encoding?: TokenizerEncoding;
}

function lineText(line: string): string | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || !('text' in value)) return undefined;
  return typeof value.text === 'string' ? value.text : undefined;
}

export function inspectJsonlContent(
  content: string,
  sourcePath: string,
  options: InspectOptions = {},
): InspectReport {
  const tokenizer = options.encoding ? new TokenizerManager(options.encoding) : undefined;
  const report: InspectReport = {
    path: sourcePath,
    lines: 0,
    fimLines: 0,
    plainLines: 0,
    malformedLines: 0,
    brokenFimLines: 0,
    fimRatio: 0,
  };
  let tokenTotals = { total: 0, fim: 0, plain: 0 };
  let middleMin = Number.POSITIVE_INFINITY;
  let middleMax = 0;
  let middleSum = 0;

  for (const raw of content.split('\n')) {
    if (!raw.trim()) continue;
    report.lines++;
    const text = lineText(raw);
    if (text === undefined) {
      report.malformedLines++;
      continue;
    }

    const parsed = parseFimText(text);
    const tokens = tokenizer ? tokenizer.countTokens(text) : 0;
    tokenTotals = { ...tokenTotals, total: tokenTotals.total + tokens };

    if (parsed) {
      report.fimLines++;
      tokenTotals.fim += tokens;
      const middleLength = charCount(parsed.middle);
      middleMin = Math.min(middleMin, middleLength);
      middleMax = Math.max(middleMax, middleLength);
      middleSum += middleLength;
    } else {
      if (text.startsWith(FIM_PREFIX)) report.brokenFimLines++;
      report.plainLines++;
      tokenTotals.plain += tokens;
    }
  }

  const wellFormed = report.fimLines + report.plainLines;
  report.fimRatio = wellFormed === 0 ? 0 : report.fimLines / wellFormed;
  if (report.fimLines > 0) {
    report.middleLength = {
      min: middleMin,
      max: middleMax,
      mean: middleSum / report.fimLines,
    };
  }
  if (tokenizer && options.encoding) {
    report.tokens = { encoding: options.encoding, ...tokenTotals };
    tokenizer.dispose();
  }
  return report;
}

export function inspectJsonl(filePath: string, options: InspectOptions = {}): InspectReport {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputReadError(filePath, err instanceof Error ? err.message : String(err));
  }
  return inspectJsonlContent(content, filePath, options);
}
