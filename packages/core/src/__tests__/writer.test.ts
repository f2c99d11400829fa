import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { OutputWriteError } from '../errors.js';
import { formatJsonlLine, serializeJsonl, writeJsonl } from '../writer.js';

describe('formatJsonlLine', () => {
  it('writes only the text field by default', () => {
    expect(formatJsonlLine({ text: 'a\nb' })).toBe('{"text":"a\\nb"}');
  });

  it('adds meta when present', () => {
    const line = formatJsonlLine({
      text: 'x',
      meta: { middleChars: [0, 1], prefixLen: 0, middleLen: 1, suffixLen: 0, strategy: 'token' },
    });
    expect(JSON.parse(line)).toEqual({
      text: 'x',
      meta: { middleChars: [0, 1], prefixLen: 0, middleLen: 1, suffixLen: 0, strategy: 'token' },
    });
  });

  it('writes non-ASCII characters unescaped', () => {
    expect(formatJsonlLine({ text: 'größe' })).toBe('{"text":"größe"}');
  });
});

describe('serializeJsonl', () => {
  it('terminates every line', () => {
    expect(serializeJsonl([{ text: 'a' }, { text: 'b' }])).toBe('{"text":"a"}\n{"text":"b"}\n');
    expect(serializeJsonl([])).toBe('');
  });
});

describe('writeJsonl', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'fimsmith-writer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing directories', () => {
    const file = path.join(dir, 'nested', 'out', 'eval.jsonl');
    writeJsonl(file, [{ text: 'a' }]);
    expect(readFileSync(file, 'utf-8')).toBe('{"text":"a"}\n');
  });

  it('writes an empty file for zero lines', () => {
    const file = path.join(dir, 'empty.jsonl');
    writeJsonl(file, []);
    expect(readFileSync(file, 'utf-8')).toBe('');
  });

  it('raises a write error when the target cannot be created', () => {
    const blocker = path.join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    expect(() => writeJsonl(path.join(blocker, 'out.jsonl'), [{ text: 'a' }])).toThrow(
      OutputWriteError,
    );
  });
});
