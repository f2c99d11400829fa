import { describe, expect, it } from 'vitest';
import { ArgReader, UsageError } from '../args.js';

describe('ArgReader', () => {
  it('reads flag values and switches', () => {
    const args = new ArgReader(['--input', 'a.jsonl', '--with-meta']);
    expect(args.getFlag('input')).toBe('a.jsonl');
    expect(args.getFlag('output')).toBeUndefined();
    expect(args.hasFlag('with-meta')).toBe(true);
    expect(args.hasFlag('json')).toBe(false);
  });

  it('rejects a flag with no value', () => {
    expect(() => new ArgReader(['--input']).getFlag('input')).toThrow(UsageError);
    expect(() => new ArgReader(['--input', '--json']).getFlag('input')).toThrow(UsageError);
  });

  it('collects list values up to the next flag', () => {
    const args = new ArgReader(['--inputs', 'a.jsonl', 'b.jsonl', '--fim-percent', '20']);
    expect(args.getList('inputs')).toEqual(['a.jsonl', 'b.jsonl']);
    expect(args.getList('outputs')).toBeUndefined();
    expect(() => new ArgReader(['--inputs', '--json']).getList('inputs')).toThrow(UsageError);
  });

  it('parses numbers', () => {
    const args = new ArgReader(['--seed', '7', '--fim-percent', '12.5', '--samples', 'ten']);
    expect(args.getNumber('seed')).toBe(7);
    expect(args.getNumber('fim-percent')).toBe(12.5);
    expect(args.getNumber('max-retries')).toBeUndefined();
    expect(() => args.getNumber('samples')).toThrow(UsageError);
  });

  it('separates positionals from flags and their values', () => {
    expect(new ArgReader(['out.jsonl', '--encoding', 'cl100k_base', '--json']).positionals()).toEqual([
      'out.jsonl',
    ]);
    expect(new ArgReader(['--json', 'out.jsonl']).positionals()).toEqual(['out.jsonl']);
    expect(new ArgReader(['--quiet', 'out.jsonl', '--verbose']).positionals()).toEqual(['out.jsonl']);
  });
});
