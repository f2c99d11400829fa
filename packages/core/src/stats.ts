// ============================================================================
// @fimsmith/core — Run Statistics
// ============================================================================

import type { SkippedLine } from './loader.js';
import type { SelectionFailure } from './span_selector.js';
import { STRATEGY_NAMES, type StrategyName } from './types.js';

export interface RunStats {
  /** Non-blank input lines read. */
  recordsSeen: number;
  /** Lines that produced a usable record. */
  recordsLoaded: number;
  skipped: {
    noText: number;
    malformedJson: number;
    notAnObject: number;
  };
  /** Records picked for conversion (mixing mode: the sampled set; eval mode: every record tried). */
  selected: number;
  /** Texts handed to the span selector. */
  attempted: number;
  /** FIM examples emitted. */
  converted: number;
  failed: Record<SelectionFailure, number>;
  /** Successful conversions per strategy. */
  byStrategy: Record<StrategyName, number>;
  /** Pass-through original lines emitted (mixing mode). */
  originalsRetained: number;
  linesWritten: number;
}

function emptyStrategyCounts(): Record<StrategyName, number> {
  return { function: 0, line: 0, identifier: 0, token: 0 };
}

export function createRunStats(): RunStats {
  return {
    recordsSeen: 0,
    recordsLoaded: 0,
    skipped: { noText: 0, malformedJson: 0, notAnObject: 0 },
    selected: 0,
    attempted: 0,
    converted: 0,
    failed: { 'too-short': 0, 'no-strategy': 0, exhausted: 0 },
    byStrategy: emptyStrategyCounts(),
    originalsRetained: 0,
    linesWritten: 0,
  };
}

/**
 * Fold a file's skip list into the stats.
 */
export function countSkips(stats: RunStats, skipped: readonly SkippedLine[]): void {
  for (const { reason } of skipped) {
    switch (reason) {
      case 'no-text':
        stats.skipped.noText++;
        break;
      case 'malformed-json':
        stats.skipped.malformedJson++;
        break;
      case 'not-an-object':
        stats.skipped.notAnObject++;
        break;
    }
  }
}

export function mergeRunStats(a: RunStats, b: RunStats): RunStats {
  const merged = createRunStats();
  merged.recordsSeen = a.recordsSeen + b.recordsSeen;
  merged.recordsLoaded = a.recordsLoaded + b.recordsLoaded;
  merged.skipped = {
    noText: a.skipped.noText + b.skipped.noText,
    malformedJson: a.skipped.malformedJson + b.skipped.malformedJson,
    notAnObject: a.skipped.notAnObject + b.skipped.notAnObject,
  };
  merged.selected = a.selected + b.selected;
  merged.attempted = a.attempted + b.attempted;
  merged.converted = a.converted + b.converted;
  merged.failed = {
    'too-short': a.failed['too-short'] + b.failed['too-short'],
    'no-strategy': a.failed['no-strategy'] + b.failed['no-strategy'],
    exhausted: a.failed.exhausted + b.failed.exhausted,
  };
  for (const name of STRATEGY_NAMES) {
    merged.byStrategy[name] = a.byStrategy[name] + b.byStrategy[name];
  }
  merged.originalsRetained = a.originalsRetained + b.originalsRetained;
  merged.linesWritten = a.linesWritten + b.linesWritten;
  return merged;
}
