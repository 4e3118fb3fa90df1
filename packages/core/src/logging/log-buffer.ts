/**
 * Bounded in-memory log. Core code never writes to the console; front ends
 * read the history or subscribe with onLog and decide how to show entries.
 */

export type LogLevel = 'log' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const listeners: Array<(entry: LogEntry) => void> = [];

function format(args: unknown[]): string {
  return args
    .map((a) => (typeof a === 'string' ? a : a instanceof Error ? a.message : JSON.stringify(a)))
    .join(' ');
}

function push(level: LogLevel, scope: string, args: unknown[]) {
  const entry: LogEntry = { timestamp: Date.now(), level, scope, message: format(args) };
  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) buffer.shift();
  for (const cb of listeners) cb(entry);
}

/** A logger whose entries are tagged with `scope` (e.g. "stats", "queries") */
export function createLogger(scope: string): Logger {
  return {
    log: (...args: unknown[]) => push('log', scope, args),
    warn: (...args: unknown[]) => push('warn', scope, args),
    error: (...args: unknown[]) => push('error', scope, args),
  };
}

export function getLogHistory(): LogEntry[] {
  return [...buffer];
}

export function clearLogs() {
  buffer.length = 0;
}

export function onLog(callback: (entry: LogEntry) => void): () => void {
  listeners.push(callback);
  return () => {
    const idx = listeners.indexOf(callback);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}
