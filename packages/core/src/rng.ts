// ============================================================================
// @fimsmith/core — Seeded Random Generator
// ============================================================================
//
// Mulberry32. One instance per run (or per file, see deriveFileSeed) is passed
// explicitly to every component that draws; nothing reads Math.random.
// ============================================================================

import { createHash } from 'node:crypto';
import path from 'node:path';

export class Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    if (max < min) {
      throw new RangeError(`Rng.int: max (${max}) < min (${min})`);
    }
    return min + Math.floor(this.next() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Rng.pick: empty list');
    }
    return items[this.int(0, items.length - 1)];
  }

  /**
   * Choose `k` distinct indices from `[0, n)` with a partial Fisher-Yates pass.
   * Consumes exactly `k` draws; the result is sorted ascending.
   */
  sampleIndices(n: number, k: number): number[] {
    const count = Math.max(0, Math.min(n, k));
    const pool = Array.from({ length: n }, (_, i) => i);
    for (let i = 0; i < count; i++) {
      const j = this.int(i, n - 1);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, count).sort((a, b) => a - b);
  }

  /** In-place Fisher-Yates shuffle. Returns the same array. */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
  }
}

/**
 * Per-file seed: the run seed XOR the first 32 bits of SHA-256(basename).
 * Files of one batch get independent generators, so they can be processed in
 * any order (or in parallel) and still reproduce.
 */
export function deriveFileSeed(seed: number, filePath: string): number {
  const digest = createHash('sha256').update(path.basename(filePath)).digest();
  return (seed ^ digest.readInt32BE(0)) | 0;
}
