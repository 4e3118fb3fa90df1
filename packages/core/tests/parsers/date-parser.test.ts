import { describe, it, expect } from 'vitest';
import { parseDate } from '../../src/parsers/date-parser.js';
import { dayFromParts } from '../../src/calendar/day.js';

/** Shorthand for a calendar day */
function day(y: number, m: number, d: number): number {
  return dayFromParts(y, m, d);
}

describe('parseDate', () => {
  const fixed = day(2026, 2, 8); // Sunday Feb 8 2026

  it('returns null for empty/null/undefined', () => {
    expect(parseDate(null, fixed)).toBeNull();
    expect(parseDate(undefined, fixed)).toBeNull();
    expect(parseDate('', fixed)).toBeNull();
    expect(parseDate('  ', fixed)).toBeNull();
  });

  // --- Named dates ---

  it('parses "today"', () => {
    expect(parseDate('today', fixed)).toBe(fixed);
  });

  it('parses "tomorrow"', () => {
    expect(parseDate('tomorrow', fixed)).toBe(day(2026, 2, 9));
  });

  it('parses "yesterday"', () => {
    expect(parseDate('yesterday', fixed)).toBe(day(2026, 2, 7));
  });

  it('is case-insensitive', () => {
    expect(parseDate('TODAY', fixed)).toBe(fixed);
    expect(parseDate(' Tomorrow ', fixed)).toBe(day(2026, 2, 9));
  });

  // --- Relative dates ---

  it('parses +Nd and -Nd for days', () => {
    expect(parseDate('+3d', fixed)).toBe(day(2026, 2, 11));
    expect(parseDate('-10d', fixed)).toBe(day(2026, 1, 29));
  });

  it('parses weeks', () => {
    expect(parseDate('+2w', fixed)).toBe(day(2026, 2, 22));
    expect(parseDate('-1w', fixed)).toBe(day(2026, 2, 1));
  });

  it('parses months, clamping to the end of shorter months', () => {
    expect(parseDate('+1m', fixed)).toBe(day(2026, 3, 8));
    expect(parseDate('+1m', day(2026, 1, 31))).toBe(day(2026, 2, 28));
    expect(parseDate('-2m', day(2026, 1, 15))).toBe(day(2025, 11, 15));
  });

  it('requires a sign on relative dates', () => {
    expect(parseDate('3d', fixed)).toBeNull();
  });

  // --- Weekday names ---

  it('parses the next occurrence of a weekday', () => {
    expect(parseDate('monday', fixed)).toBe(day(2026, 2, 9));
    expect(parseDate('fri', fixed)).toBe(day(2026, 2, 13));
    expect(parseDate('sat', fixed)).toBe(day(2026, 2, 14));
  });

  it('goes a week ahead when the weekday is today', () => {
    expect(parseDate('sunday', fixed)).toBe(day(2026, 2, 15));
  });

  // --- Month + day ---

  it('parses month-day in the current year', () => {
    expect(parseDate('mar1', fixed)).toBe(day(2026, 3, 1));
    expect(parseDate('feb8', fixed)).toBe(fixed);
  });

  it('moves past month-days to next year', () => {
    expect(parseDate('jan15', fixed)).toBe(day(2027, 1, 15));
  });

  it('rejects impossible month-days', () => {
    expect(parseDate('feb30', fixed)).toBeNull();
    expect(parseDate('apr31', fixed)).toBeNull();
  });

  // --- ISO ---

  it('parses ISO dates', () => {
    expect(parseDate('2026-03-01', fixed)).toBe(day(2026, 3, 1));
    expect(parseDate('2020-02-29', fixed)).toBe(day(2020, 2, 29));
  });

  it('returns null for unknown input', () => {
    expect(parseDate('someday', fixed)).toBeNull();
    expect(parseDate('2026-02-30', fixed)).toBeNull();
  });
});
