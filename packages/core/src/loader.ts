// ============================================================================
// @fimsmith/core — Source Record Loader
// ============================================================================
//
// Normalizes heterogeneous input lines into SourceRecord. The duck-typed
// `llm_formatted` field (string | { text } | absent) is resolved here, once,
// into an optional string and never inspected again downstream.
// ============================================================================

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InputReadError } from './errors.js';
import { logLinesSkipped, logRecordSkipped } from './logger.js';
import type { SkipReason, SourceRecord } from './types.js';

const rawRecordSchema = z
  .object({
    text: z.unknown().optional(),
    code: z.unknown().optional(),
    llm_formatted: z.unknown().optional(),
    language: z.unknown().optional(),
    lang: z.unknown().optional(),
  })
  .passthrough();

/** The `llm_formatted` field, as found in the wild. */
type LlmFormattedField =
  | { kind: 'absent' }
  | { kind: 'string'; value: string }
  | { kind: 'object'; text: string | undefined };

export type LoadResult =
  | { kind: 'record'; record: SourceRecord }
  | { kind: 'skip'; reason: SkipReason };

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function classifyLlmFormatted(value: unknown): LlmFormattedField {
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'object' && value !== null && !Array.isArray(value) && 'text' in value) {
    return { kind: 'object', text: typeof value.text === 'string' ? value.text : undefined };
  }
  return { kind: 'absent' };
}

function resolveAuxText(field: LlmFormattedField): string | undefined {
  switch (field.kind) {
    case 'string':
      return nonEmptyString(field.value);
    case 'object':
      return nonEmptyString(field.text);
    case 'absent':
      return undefined;
  }
}

/**
 * Turn one parsed JSON value into a SourceRecord, or a skip signal when it
 * carries no usable text. Skips are not errors.
 */
export function loadRecord(raw: unknown): LoadResult {
  const parsed = rawRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: 'skip', reason: 'not-an-object' };
  }
  const obj = parsed.data;

  const baseText = nonEmptyString(obj.text) ?? nonEmptyString(obj.code) ?? '';
  const auxText = resolveAuxText(classifyLlmFormatted(obj.llm_formatted));
  if (!baseText && !auxText) {
    return { kind: 'skip', reason: 'no-text' };
  }

  const record: SourceRecord = { baseText };
  if (auxText) record.auxText = auxText;
  const language = nonEmptyString(obj.language) ?? nonEmptyString(obj.lang);
  if (language) record.language = language;
  return { kind: 'record', record };
}

// ---- Files ----

export interface SkippedLine {
  line: number;
  reason: SkipReason;
}

export interface LoadedFile {
  path: string;
  records: SourceRecord[];
  skipped: SkippedLine[];
  /** Non-blank lines read, including skipped ones. */
  linesSeen: number;
}

/**
 * Parse JSONL text. Blank lines are ignored; malformed JSON lines are
 * recorded as skips and processing continues.
 */
export function parseJsonl(content: string, sourcePath = '<memory>'): LoadedFile {
  const records: SourceRecord[] = [];
  const skipped: SkippedLine[] = [];
  let linesSeen = 0;

  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    linesSeen++;
    const lineNo = i + 1;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      skipped.push({ line: lineNo, reason: 'malformed-json' });
      logRecordSkipped('malformed-json', lineNo);
      continue;
    }

    const result = loadRecord(value);
    if (result.kind === 'skip') {
      skipped.push({ line: lineNo, reason: result.reason });
      logRecordSkipped(result.reason, lineNo);
      continue;
    }
    records.push(result.record);
  }

  return { path: sourcePath, records, skipped, linesSeen };
}

/**
 * Read a whole JSONL file synchronously.
 */
export function readJsonl(filePath: string): LoadedFile {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputReadError(filePath, err instanceof Error ? err.message : String(err));
  }
  const loaded = parseJsonl(content, filePath);
  if (loaded.skipped.length > 0) logLinesSkipped(filePath, loaded.skipped.length);
  return loaded;
}

// ---- Text Pools ----

/**
 * Eval mode converts a single text per record: the aux variant when present,
 * else the base text.
 */
export function resolveEvalText(record: SourceRecord): string {
  return record.auxText ?? record.baseText;
}

/**
 * Mixing mode converts base and aux independently. Empty texts are omitted.
 */
export function conversionCandidates(record: SourceRecord): string[] {
  const candidates: string[] = [];
  if (record.baseText) candidates.push(record.baseText);
  if (record.auxText) candidates.push(record.auxText);
  return candidates;
}
