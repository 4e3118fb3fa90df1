/**
 * CLI helpers: the lazily opened database, "today" resolution, argument
 * parsing, error handling.
 */

import type { CadenceDb, CalendarContext, CategoryName, Day, RecurrenceRule, Weekday } from '@cadence/core';
import {
  createDb, getDefaultDbPath, dayOf, fixedCalendar, getFirstWeekday, getDefaultCategory,
  parseDate, parseRecurrence, isWeekday, weekdayFromName, TaskStats, onLog,
} from '@cadence/core';
import * as out from './output.js';

/** Options every command can read through optsWithGlobals() */
export interface GlobalOptions {
  db?: string;
  today?: string;
  verbose?: boolean;
}

/**
 * Per-invocation state shared by the commands. The database is only opened
 * when a command first needs it, after the global options are parsed.
 */
export class CliContext {
  private openDb: CadenceDb | null = null;
  private stopLogging: (() => void) | null = null;

  constructor(
    private readonly globals: () => GlobalOptions,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get db(): CadenceDb {
    if (!this.openDb) this.openDb = createDb(this.globals().db ?? getDefaultDbPath());
    return this.openDb;
  }

  /** Use an already open database (tests) */
  withDb(db: CadenceDb): this {
    this.openDb = db;
    return this;
  }

  today(): Day {
    return resolveToday(this.globals().today, dayOf(this.clock()));
  }

  now(): Date {
    return this.clock();
  }

  calendar(): CalendarContext {
    return fixedCalendar(this.today(), getFirstWeekday(this.db));
  }

  stats(): TaskStats {
    return new TaskStats(this.calendar());
  }

  /** Print core log entries; repeated calls keep a single subscription */
  enableVerboseLogging(print: (line: string) => void = line => console.error(line)): void {
    if (this.stopLogging) return;
    this.stopLogging = onLog(entry => print(out.formatLogEntry(entry)));
  }

  disableVerboseLogging(): void {
    this.stopLogging?.();
    this.stopLogging = null;
  }
}

/** --today override, else the system day */
export function resolveToday(input: string | undefined, systemToday: Day): Day {
  if (input === undefined) return systemToday;
  const day = parseDate(input, systemToday);
  if (day === null) throw new Error(`Invalid date for --today: "${input}"`);
  return day;
}

export function parseDateArg(input: string, today: Day): Day {
  const day = parseDate(input, today);
  if (day === null) {
    throw new Error(`Invalid date: "${input}" (try today, tomorrow, +3d, friday, jan15 or 2026-01-15)`);
  }
  return day;
}

export function parseRuleArg(input: string): RecurrenceRule {
  const rule = parseRecurrence(input);
  if (rule === null) {
    throw new Error(`Invalid recurrence: "${input}" (try none, daily, weekly:mon,wed,fri or monthly:1,15)`);
  }
  return rule;
}

/** A weekday name or its number (1 = Sunday) */
export function parseWeekdayArg(input: string): Weekday | null {
  const named = weekdayFromName(input);
  if (named !== null) return named;
  const n = Number(input.trim());
  return isWeekday(n) ? n : null;
}

export function parseDaysArg(input: string | undefined, fallback: number): number {
  if (input === undefined) return fallback;
  const n = Number(input);
  if (!Number.isInteger(n) || n < 1) throw new Error(`Expected a positive number of days, got "${input}"`);
  return n;
}

/** Explicit category, else the configured default, else none */
export function resolveCategoryForAdd(db: CadenceDb, explicit: string | undefined): CategoryName | null {
  if (explicit !== undefined) return explicit.trim() || null;
  return getDefaultCategory(db);
}

/**
 * Run a command action, printing any thrown error in red and marking the
 * process as failed.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
