import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { createTestDb, createLogger, setDefaultCategory, setFirstWeekday, dayFromParts, Weekday } from '@cadence/core';
import type { CadenceDb } from '@cadence/core';
import {
  CliContext,
  resolveToday,
  parseDateArg,
  parseRuleArg,
  parseWeekdayArg,
  parseDaysArg,
  resolveCategoryForAdd,
  $try,
} from '../src/helpers.js';

const today = dayFromParts(2024, 1, 10);

describe('resolveToday', () => {
  it('uses the system day without an override', () => {
    expect(resolveToday(undefined, today)).toBe(today);
  });

  it('parses the override relative to the system day', () => {
    expect(resolveToday('2024-02-01', today)).toBe(dayFromParts(2024, 2, 1));
    expect(resolveToday('yesterday', today)).toBe(today - 1);
  });

  it('throws on an unreadable override', () => {
    expect(() => resolveToday('someday', today)).toThrow('Invalid date for --today: "someday"');
  });
});

describe('parseDateArg', () => {
  it('parses relative dates', () => {
    expect(parseDateArg('tomorrow', today)).toBe(today + 1);
    expect(parseDateArg('+3d', today)).toBe(today + 3);
  });

  it('throws with examples', () => {
    expect(() => parseDateArg('later', today)).toThrow(/^Invalid date: "later" \(try today/);
  });
});

describe('parseRuleArg', () => {
  it('parses rules', () => {
    expect(parseRuleArg('daily')).toEqual({ kind: 'daily' });
  });

  it('throws on unknown rules', () => {
    expect(() => parseRuleArg('hourly')).toThrow(/^Invalid recurrence: "hourly"/);
  });
});

describe('parseWeekdayArg', () => {
  it('parses names and numbers', () => {
    expect(parseWeekdayArg('sun')).toBe(Weekday.Sunday);
    expect(parseWeekdayArg('Monday')).toBe(Weekday.Monday);
    expect(parseWeekdayArg('7')).toBe(Weekday.Saturday);
  });

  it('returns null for anything else', () => {
    expect(parseWeekdayArg('0')).toBeNull();
    expect(parseWeekdayArg('funday')).toBeNull();
  });
});

describe('parseDaysArg', () => {
  it('falls back when missing', () => {
    expect(parseDaysArg(undefined, 7)).toBe(7);
  });

  it('parses positive integers', () => {
    expect(parseDaysArg('14', 7)).toBe(14);
  });

  it('throws on zero, fractions and text', () => {
    expect(() => parseDaysArg('0', 7)).toThrow('Expected a positive number of days, got "0"');
    expect(() => parseDaysArg('1.5', 7)).toThrow();
    expect(() => parseDaysArg('week', 7)).toThrow();
  });
});

describe('resolveCategoryForAdd', () => {
  let db: CadenceDb;

  beforeEach(() => {
    db = createTestDb();
  });

  it('returns the explicit category', () => {
    setDefaultCategory(db, 'work');
    expect(resolveCategoryForAdd(db, ' health ')).toBe('health');
  });

  it('treats an empty explicit category as none', () => {
    setDefaultCategory(db, 'work');
    expect(resolveCategoryForAdd(db, '')).toBeNull();
  });

  it('falls back to the configured default', () => {
    expect(resolveCategoryForAdd(db, undefined)).toBeNull();
    setDefaultCategory(db, 'work');
    expect(resolveCategoryForAdd(db, undefined)).toBe('work');
  });
});

describe('CliContext', () => {
  it('resolves today from --today', () => {
    const ctx = new CliContext(() => ({ today: '2024-01-10' }), () => new Date(2030, 0, 1));
    expect(ctx.today()).toBe(today);
  });

  it('resolves today from the clock', () => {
    const ctx = new CliContext(() => ({}), () => new Date(2024, 0, 10, 23, 59));
    expect(ctx.today()).toBe(today);
  });

  it('builds the calendar from config', () => {
    const db = createTestDb();
    setFirstWeekday(db, Weekday.Sunday);
    const ctx = new CliContext(() => ({ today: '2024-01-10' })).withDb(db);

    const calendar = ctx.calendar();
    expect(calendar.today()).toBe(today);
    expect(calendar.firstWeekday).toBe(Weekday.Sunday);
  });
});

describe('CliContext verbose logging', () => {
  it('subscribes once however often it is enabled', () => {
    const ctx = new CliContext(() => ({}));
    const print = vi.fn();
    ctx.enableVerboseLogging(print);
    ctx.enableVerboseLogging(print);

    createLogger('test').log('hello');
    expect(print).toHaveBeenCalledOnce();
    expect(String(print.mock.calls[0]?.[0])).toContain('[test] hello');

    ctx.disableVerboseLogging();
    createLogger('test').log('again');
    expect(print).toHaveBeenCalledOnce();
  });
});

describe('$try', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('prints the error and marks the process as failed', () => {
    $try(() => {
      throw new Error('test error');
    });
    expect(logSpy).toHaveBeenCalledOnce();
    expect(String(logSpy.mock.calls[0]?.[0])).toContain('test error');
    expect(process.exitCode).toBe(1);
  });
});
