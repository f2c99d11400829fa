import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { InputReadError } from '../errors.js';
import { inspectJsonl, inspectJsonlContent } from '../inspect.js';

const CONTENT = [
  JSON.stringify({ text: '<|fim_prefix|>ab<|fim_suffix|>ef<|fim_middle|>cd' }),
  JSON.stringify({ text: 'plain code' }),
  'not json',
  JSON.stringify({ text: '<|fim_prefix|>broken' }),
  '',
  JSON.stringify({ text: '<|fim_prefix|>x<|fim_suffix|><|fim_middle|>1234' }),
  '',
].join('\n');

describe('inspectJsonlContent', () => {
  it('classifies lines and measures middles', () => {
    expect(inspectJsonlContent(CONTENT, 'mixed.jsonl')).toEqual({
      path: 'mixed.jsonl',
      lines: 5,
      fimLines: 2,
      plainLines: 2,
      malformedLines: 1,
      brokenFimLines: 1,
      fimRatio: 0.5,
      middleLength: { min: 2, max: 4, mean: 3 },
    });
  });

  it('omits middle stats when there are no FIM lines', () => {
    const report = inspectJsonlContent('{"text":"a"}\n', 'plain.jsonl');
    expect(report.fimRatio).toBe(0);
    expect(report.middleLength).toBeUndefined();
  });

  it('counts tokens when an encoding is given', () => {
    const content = `${JSON.stringify({ text: '<|fim_prefix|>a<|fim_suffix|>c<|fim_middle|>b' })}\n`;
    expect(inspectJsonlContent(content, 'one.jsonl', { encoding: 'cl100k_base' }).tokens).toEqual({
      encoding: 'cl100k_base',
      total: 6,
      fim: 6,
      plain: 0,
    });
  });
});

describe('inspectJsonl', () => {
  it('reads the file from disk', () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'fimsmith-inspect-'));
    try {
      const file = path.join(dir, 'out.jsonl');
      writeFileSync(file, CONTENT);
      const report = inspectJsonl(file);
      expect(report.path).toBe(file);
      expect(report.fimLines).toBe(2);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('raises a read error for a missing file', () => {
    expect(() => inspectJsonl('/nonexistent/fimsmith/out.jsonl')).toThrow(InputReadError);
  });
});
