// ============================================================================
// @fimsmith/core — Logging
// ============================================================================

import process from 'node:process';
import type { SkipReason } from './types.js';

/**
 * Log levels for fimsmith.
 */
export type LogLevel = 'debug' | 'info' | 'warn';

/**
 * Current log level. Starts from FIMSMITH_DEBUG; the CLI's --verbose and
 * --quiet override it per invocation.
 */
let currentLevel: LogLevel = 'info';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
};

function initLevel(): void {
  const debug = process.env.FIMSMITH_DEBUG;
  if (debug === '1' || debug === 'true') {
    currentLevel = 'debug';
  } else if (debug === 'warn') {
    currentLevel = 'warn';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[fimsmith] ${message}${dataStr}`;

  // stderr for everything: stdout carries command output
  switch (level) {
    case 'debug':
      console.error(msg);
      break;
    case 'info':
    case 'warn':
      console.warn(msg);
      break;
  }
}

/**
 * Debug-level logging. Only emitted when FIMSMITH_DEBUG=1.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

/**
 * Something unexpected but absorbed, such as input lines that were dropped.
 */
export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End the timer and log the result at debug level.
   */
  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

export function logRecordSkipped(reason: SkipReason, line: number): void {
  debug(`skipped input line ${line} (${reason})`, { reason, line });
}

export function logSelectionFailed(reason: string, attempts: number, textLength: number): void {
  debug(`no span after ${attempts} attempt(s): ${reason}`, { reason, attempts, textLength });
}

export function logLinesSkipped(path: string, count: number): void {
  warn(`skipped ${count} unusable line(s) in ${path}`, { path, count });
}

export function logFileWritten(path: string, lines: number): void {
  info(`wrote ${lines} line(s) to ${path}`, { path, lines });
}

export function logRunSummary(label: string, summary: Record<string, unknown>): void {
  info(`${label} finished`, summary);
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
