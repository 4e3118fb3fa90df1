/**
 * Parses human-friendly date strings into calendar days.
 * Supports: today, tomorrow, yesterday, relative (+3d/-2w/+1m),
 * day-of-week names (mon-sunday), month+day (jan15), and ISO format.
 */

import type { Day } from '../calendar/day.js';
import {
  dayFromIso, dayFromParts, daysInMonth,
  yearOf, monthOf, dayOfMonth, weekdayOf, weekdayFromName,
} from '../calendar/day.js';

const RELATIVE_RE = /^([+-])(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;

const MONTH_MAP: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4,
  may: 5, jun: 6, jul: 7, aug: 8,
  sep: 9, oct: 10, nov: 11, dec: 12,
};

/** Shift by whole months, clamping to the target month's last day (jan31 +1m = feb28) */
function shiftMonths(day: Day, n: number): Day {
  const total = yearOf(day) * 12 + (monthOf(day) - 1) + n;
  const year = Math.floor(total / 12);
  const month = (total % 12) + 1;
  return dayFromParts(year, month, Math.min(dayOfMonth(day), daysInMonth(year, month)));
}

function tryParseRelative(input: string, today: Day): Day | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const sign = m[1] === '-' ? -1 : 1;
  const count = sign * parseInt(m[2]!, 10);
  switch (m[3]) {
    case 'd': return today + count;
    case 'w': return today + count * 7;
    case 'm': return shiftMonths(today, count);
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Day): Day | null {
  const target = weekdayFromName(input);
  if (target === null) return null;

  let daysUntil = (target - weekdayOf(today) + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return today + daysUntil;
}

function tryParseMonthDay(input: string, today: Day): Day | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const month = MONTH_MAP[m[1]!]!;
  const date = parseInt(m[2]!, 10);
  let year = yearOf(today);

  // Validate the day is valid for that month (e.g. feb30)
  if (date < 1 || date > daysInMonth(year, month)) return null;

  // If the date is in the past, use next year
  if (dayFromParts(year, month, date) < today) {
    year += 1;
    if (date > daysInMonth(year, month)) return null;
  }
  return dayFromParts(year, month, date);
}

/**
 * Parse a human-friendly date string into a Day.
 * Returns null if the input can't be parsed.
 *
 * @param input - Date string (e.g. "today", "+3d", "friday", "jan15", "2026-03-01")
 * @param today - The reference day
 */
export function parseDate(input: string | null | undefined, today: Day): Day | null {
  if (!input?.trim()) return null;

  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return today;
    case 'tomorrow': return today + 1;
    case 'yesterday': return today - 1;
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? dayFromIso(normalized);
  }
}
