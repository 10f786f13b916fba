import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { isDebugEnabled } from './config.js';

/**
 * Internal cached state for debug mode.
 * Resolved on first call and never changes (debug mode is process-lifetime).
 */
let _enabled: boolean | null = null;

/** Run log file; every `log()` line is appended here when set. */
let _logFile: string | null = null;

function enabled(): boolean {
  if (_enabled === null) {
    _enabled = isDebugEnabled();
  }
  return _enabled;
}

export type LogLevel = 'info' | 'warn' | 'error';

function format(tag: string, category: string, message: string, data?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  let line = `[${timestamp}] [${tag}:${category}] ${message}`;
  if (data !== undefined) {
    line += ` ${JSON.stringify(data)}`;
  }
  return line + '\n';
}

/**
 * Directs `log()` output to a file in addition to stderr.
 * Pass null to stop writing to the file.
 */
export function setLogFile(path: string | null): void {
  if (path !== null) {
    mkdirSync(dirname(path), { recursive: true });
  }
  _logFile = path;
}

/**
 * Resets cached debug state. Tests only.
 */
export function resetDebugState(): void {
  _enabled = null;
  _logFile = null;
}

/**
 * Logs a debug message to stderr when debug mode is active.
 *
 * Format: `[ISO_TIMESTAMP] [DISNET:category] message {json_data}`
 *
 * @param category - Debug category (e.g., 'db', 'drug', 'cell', 'http')
 * @param message - Human-readable log message
 * @param data - Optional structured data to include (keep lightweight -- no large payloads)
 */
export function debug(
  category: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!enabled()) {
    return;
  }
  process.stderr.write(format('DISNET', category, message, data));
}

/**
 * Operational log line. Always written to stderr, and to the run log file
 * when one is configured. Used for stage and run summaries, skips and failures.
 */
export function log(
  level: LogLevel,
  category: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  const line = format(level.toUpperCase(), category, message, data);
  process.stderr.write(line);
  if (_logFile !== null) {
    appendFileSync(_logFile, line, 'utf-8');
  }
}

/**
 * Wraps a synchronous function with timing instrumentation.
 *
 * When debug is disabled, calls `fn()` directly with zero overhead.
 */
export function debugTimed<T>(
  category: string,
  message: string,
  fn: () => T,
): T {
  if (!enabled()) {
    return fn();
  }

  const start = performance.now();
  const result = fn();
  const duration = (performance.now() - start).toFixed(2);
  debug(category, `${message} (${duration}ms)`);
  return result;
}

/**
 * Async counterpart of debugTimed, for network-bound work.
 */
export async function debugTimedAsync<T>(
  category: string,
  message: string,
  fn: () => Promise<T>,
): Promise<T> {
  if (!enabled()) {
    return fn();
  }

  const start = performance.now();
  const result = await fn();
  const duration = (performance.now() - start).toFixed(2);
  debug(category, `${message} (${duration}ms)`);
  return result;
}
