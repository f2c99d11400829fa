import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { parseEvalOptions } from '../config.js';
import { buildEvalDataset, runEvalFile } from '../eval_builder.js';
import { Rng } from '../rng.js';
import { NullSyntaxProvider, TypeScriptSyntaxProvider } from '../syntax.js';
import type { SourceRecord } from '../types.js';

const ADD = 'function add(a, b) { return a + b; }';
const MUL = 'function mul(a, b) { return a * b; }';
const LINE_ONLY = { function: 0, line: 1, identifier: 0, token: 0 };

function lineOptions(extra: Record<string, unknown> = {}) {
  return parseEvalOptions({ minMiddleChars: 5, maxMiddleChars: 40, weights: LINE_ONLY, ...extra });
}

function deps(seed = 42) {
  return { rng: new Rng(seed), syntax: new NullSyntaxProvider() };
}

describe('buildEvalDataset', () => {
  it('stops at the sample cap', () => {
    const records: SourceRecord[] = [ADD, MUL, ADD, MUL].map((baseText) => ({ baseText }));
    const result = buildEvalDataset(records, lineOptions({ samplesCap: 2 }), deps());
    expect(result.lines).toEqual([
      { text: `<|fim_prefix|><|fim_suffix|><|fim_middle|>${ADD}` },
      { text: `<|fim_prefix|><|fim_suffix|><|fim_middle|>${MUL}` },
    ]);
    expect(result.stats.selected).toBe(2);
    expect(result.stats.converted).toBe(2);
    expect(result.stats.byStrategy.line).toBe(2);
    expect(result.stats.linesWritten).toBe(2);
  });

  it('converts the aux text when a record has one', () => {
    const result = buildEvalDataset([{ baseText: ADD, auxText: MUL }], lineOptions(), deps());
    expect(result.examples[0].middle).toBe(MUL);
  });

  it('drops records without a span', () => {
    const result = buildEvalDataset([{ baseText: 'tiny' }, { baseText: ADD }], lineOptions(), deps());
    expect(result.lines).toHaveLength(1);
    expect(result.stats.failed['too-short']).toBe(1);
    expect(result.stats.attempted).toBe(2);
  });

  it('attaches meta only when asked', () => {
    const plain = buildEvalDataset([{ baseText: ADD }], lineOptions(), deps());
    expect(plain.lines[0].meta).toBeUndefined();

    const withMeta = buildEvalDataset([{ baseText: ADD }], lineOptions({ includeMeta: true }), deps());
    expect(withMeta.lines[0].meta).toEqual({
      middleChars: [0, 36],
      prefixLen: 0,
      middleLen: 36,
      suffixLen: 0,
      strategy: 'line',
    });
  });

  it('is reproducible for a fixed seed', () => {
    const code = [
      'export class Stack<T> {',
      '  private items: T[] = [];',
      '  push(item: T): void {',
      '    this.items.push(item);',
      '  }',
      '  pop(): T | undefined {',
      '    return this.items.pop();',
      '  }',
      '}',
      '',
    ].join('\n');
    const records = Array.from({ length: 5 }, () => ({ baseText: code }));
    const options = parseEvalOptions({ minMiddleChars: 10, maxMiddleChars: 100 });
    const run = () =>
      buildEvalDataset(records, options, { rng: new Rng(7), syntax: new TypeScriptSyntaxProvider() });
    expect(run().lines).toEqual(run().lines);
  });
});

describe('runEvalFile', () => {
  it('reads, converts and writes one file', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'fimsmith-eval-'));
    try {
      const input = path.join(dir, 'valid.jsonl');
      const output = path.join(dir, 'out', 'eval.jsonl');
      writeFileSync(
        input,
        [JSON.stringify({ text: ADD }), 'oops', JSON.stringify({ llm_formatted: {} }), JSON.stringify({ code: MUL })].join(
          '\n',
        ),
      );

      const result = runEvalFile(input, output, lineOptions(), new NullSyntaxProvider());

      expect(readFileSync(output, 'utf-8')).toBe(
        `${JSON.stringify({ text: `<|fim_prefix|><|fim_suffix|><|fim_middle|>${ADD}` })}\n` +
          `${JSON.stringify({ text: `<|fim_prefix|><|fim_suffix|><|fim_middle|>${MUL}` })}\n`,
      );
      expect(result.outputPath).toBe(output);
      expect(result.stats.recordsSeen).toBe(4);
      expect(result.stats.recordsLoaded).toBe(2);
      expect(result.stats.skipped).toEqual({ noText: 1, malformedJson: 1, notAnObject: 0 });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
