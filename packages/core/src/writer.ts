// ============================================================================
// @fimsmith/core — JSONL Output Writer
// ============================================================================

import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { OutputWriteError } from './errors.js';
import { logFileWritten } from './logger.js';
import type { OutputLine } from './types.js';

/**
 * One output line, without its terminator. Non-ASCII text is written as-is.
 */
export function formatJsonlLine(line: OutputLine): string {
  return JSON.stringify(line.meta ? { text: line.text, meta: line.meta } : { text: line.text });
}

export function serializeJsonl(lines: readonly OutputLine[]): string {
  let out = '';
  for (const line of lines) {
    out += `${formatJsonlLine(line)}\n`;
  }
  return out;
}

/**
 * Write all lines in one call. A line is either written whole or the file
 * is not written at all; zero lines produce an empty file.
 */
export function writeJsonl(filePath: string, lines: readonly OutputLine[]): void {
  const content = serializeJsonl(lines);
  try {
    mkdirSync(path.dirname(filePath), { recursive: true });
    writeFileSync(filePath, content, 'utf-8');
  } catch (err) {
    throw new OutputWriteError(filePath, err instanceof Error ? err.message : String(err));
  }
  logFileWritten(filePath, lines.length);
}
