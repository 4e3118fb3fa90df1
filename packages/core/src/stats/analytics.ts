/**
 * History views over a multiset of occurrence days (one entry per
 * completion, so two tasks done on the same day count twice).
 */

import type { Day, Weekday } from '../calendar/day.js';
import {
  WeekdayName, weekdayOf, dayFromParts, daysInMonth,
  yearOf, startOfMonth, addMonths,
} from '../calendar/day.js';
import { orderedWeekdays } from '../calendar/calendar.js';
import { longestStreak } from './streak.js';

export interface WeekdayCount {
  readonly weekday: Weekday;
  readonly label: string;
  readonly count: number;
}

/** Completions per weekday, in display order starting from `firstWeekday` */
export function weeklyRhythm(days: readonly Day[], firstWeekday: Weekday): WeekdayCount[] {
  const counts = new Map<Weekday, number>();
  for (const d of days) {
    const w = weekdayOf(d);
    counts.set(w, (counts.get(w) ?? 0) + 1);
  }
  return orderedWeekdays(firstWeekday).map(weekday => ({
    weekday,
    label: WeekdayName[weekday],
    count: counts.get(weekday) ?? 0,
  }));
}

export interface MonthlyTrend {
  readonly thisMonth: number;
  readonly lastMonth: number;
  /** Percent change truncated toward zero; null when last month had none */
  readonly changePercent: number | null;
  readonly improving: boolean;
}

/** This month (up to today) against the whole previous month */
export function monthlyTrend(days: readonly Day[], today: Day): MonthlyTrend {
  const thisStart = startOfMonth(today);
  const lastStart = addMonths(thisStart, -1);

  let thisMonth = 0;
  let lastMonth = 0;
  for (const d of days) {
    if (d >= thisStart && d <= today) thisMonth++;
    else if (d >= lastStart && d < thisStart) lastMonth++;
  }

  const changePercent = lastMonth > 0
    ? Math.trunc(((thisMonth - lastMonth) / lastMonth) * 100)
    : null;

  return { thisMonth, lastMonth, changePercent, improving: thisMonth >= lastMonth };
}

export interface PixelDay {
  readonly day: Day;
  readonly count: number;
  readonly isToday: boolean;
  readonly isFuture: boolean;
}

export interface YearInPixels {
  readonly year: number;
  /** Twelve rows, one entry per day of the month */
  readonly months: PixelDay[][];
  readonly totalCompletions: number;
  readonly activeDays: number;
  readonly bestDay: number;
  readonly longestStreak: number;
}

export function yearInPixels(days: readonly Day[], year: number, today: Day): YearInPixels {
  const counts = new Map<Day, number>();
  for (const d of days) {
    if (yearOf(d) !== year) continue;
    counts.set(d, (counts.get(d) ?? 0) + 1);
  }

  const months: PixelDay[][] = [];
  for (let month = 1; month <= 12; month++) {
    const row: PixelDay[] = [];
    for (let date = 1; date <= daysInMonth(year, month); date++) {
      const day = dayFromParts(year, month, date);
      row.push({ day, count: counts.get(day) ?? 0, isToday: day === today, isFuture: day > today });
    }
    months.push(row);
  }

  const values = [...counts.values()];
  return {
    year,
    months,
    totalCompletions: values.reduce((a, b) => a + b, 0),
    activeDays: counts.size,
    bestDay: values.length > 0 ? Math.max(...values) : 0,
    longestStreak: longestStreak(counts.keys()),
  };
}
