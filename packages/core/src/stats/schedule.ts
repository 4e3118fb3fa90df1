/**
 * Schedule accounting: how many occurrences a rule actually scheduled in a
 * range. Completion rates divide by this instead of by elapsed days, so a
 * Monday-only task is not penalised for the other six days of the week.
 */

import type { Day } from '../calendar/day.js';
import {
  addDays, daysBetween, dayFromParts, daysInMonth, weekdayOf,
  yearOf, monthOf, startOfMonth, addMonths,
} from '../calendar/day.js';
import type { RecurrenceRule } from '../types/recurrence.js';
import { selectsDay, normalizeRule, assertNever } from '../recurrence/rule.js';

/** Days in the inclusive range that the rule selects */
export function scheduledDays(rule: RecurrenceRule, from: Day, through: Day): Day[] {
  const days: Day[] = [];
  for (let d = from; d <= through; d++) {
    if (selectsDay(rule, d)) days.push(d);
  }
  return days;
}

function countWeekday(weekday: number, from: Day, through: Day): number {
  const first = addDays(from, (weekday - weekdayOf(from) + 7) % 7);
  if (first > through) return 0;
  return Math.floor(daysBetween(first, through) / 7) + 1;
}

function countMonthDays(monthDays: readonly number[], from: Day, through: Day): number {
  let count = 0;
  for (let month = startOfMonth(from); month <= through; month = addMonths(month, 1)) {
    const year = yearOf(month);
    const m = monthOf(month);
    const length = daysInMonth(year, m);
    for (const md of monthDays) {
      // No rollover: the 31st simply does not occur in shorter months
      if (md > length) continue;
      const day = dayFromParts(year, m, md);
      if (day >= from && day <= through) count++;
    }
  }
  return count;
}

/** Exact number of scheduled days in the inclusive range, 0 when empty */
export function countScheduledDays(rule: RecurrenceRule, from: Day, through: Day): number {
  if (through < from) return 0;

  const r = normalizeRule(rule);
  switch (r.kind) {
    case 'none':
    case 'daily':
      return daysBetween(from, through) + 1;
    case 'weekly':
      return r.weekdays.reduce((sum, w) => sum + countWeekday(w, from, through), 0);
    case 'monthly':
      return countMonthDays(r.monthDays, from, through);
    default:
      return assertNever(r);
  }
}

/** Scheduled days in the inclusive range, never less than 1 so it can be divided by */
export function scheduledDayCount(rule: RecurrenceRule, from: Day, through: Day): number {
  return Math.max(1, countScheduledDays(rule, from, through));
}

/**
 * Longest run of consecutive scheduled occurrences that were all completed.
 * Three completed Mondays in a row count as 3 for a Monday-only task, where
 * the calendar-day streak would report 1.
 */
export function longestScheduledRun(
  completed: ReadonlySet<Day>,
  rule: RecurrenceRule,
  from: Day,
  through: Day,
): number {
  let best = 0;
  let run = 0;
  for (const day of scheduledDays(rule, from, through)) {
    run = completed.has(day) ? run + 1 : 0;
    if (run > best) best = run;
  }
  return best;
}
