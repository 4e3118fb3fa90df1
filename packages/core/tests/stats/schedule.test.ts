import { describe, it, expect } from 'vitest';
import { dayFromParts, Weekday } from '../../src/calendar/day.js';
import {
  scheduledDays, countScheduledDays, scheduledDayCount, longestScheduledRun,
} from '../../src/stats/schedule.js';
import { ONE_TIME, DAILY, weekly, monthly } from '../../src/types/recurrence.js';

const jan = (d: number) => dayFromParts(2024, 1, d); // 2024-01-01 is a Monday
const MWF = weekly([Weekday.Monday, Weekday.Wednesday, Weekday.Friday]);

describe('countScheduledDays', () => {
  it('counts every day for daily and one-time rules', () => {
    expect(countScheduledDays(DAILY, jan(1), jan(31))).toBe(31);
    expect(countScheduledDays(ONE_TIME, jan(1), jan(1))).toBe(1);
  });

  it('counts Mondays, Wednesdays and Fridays in January 2024', () => {
    // Mon 1,8,15,22,29 + Wed 3,10,17,24,31 + Fri 5,12,19,26
    expect(countScheduledDays(MWF, jan(1), jan(31))).toBe(14);
  });

  it('counts eight Mondays in eight weeks', () => {
    expect(countScheduledDays(weekly([Weekday.Monday]), jan(1), jan(1) + 55)).toBe(8);
  });

  it('skips the 31st in shorter months', () => {
    expect(countScheduledDays(monthly([31]), jan(1), dayFromParts(2024, 12, 31))).toBe(7);
  });

  it('counts only listed days inside the range', () => {
    expect(countScheduledDays(monthly([1, 15]), jan(10), dayFromParts(2024, 2, 10))).toBe(2);
  });

  it('is 0 for an empty or reversed range', () => {
    expect(countScheduledDays(DAILY, jan(5), jan(4))).toBe(0);
    expect(countScheduledDays(weekly([]), jan(1), jan(31))).toBe(0);
  });

  it('agrees with walking the days', () => {
    const rules = [MWF, weekly([Weekday.Sunday]), monthly([1, 29, 30, 31]), monthly([15])];
    const ranges: Array<[number, number]> = [
      [jan(1), jan(1)],
      [jan(3), dayFromParts(2024, 3, 2)],
      [dayFromParts(2023, 11, 17), dayFromParts(2024, 5, 9)],
    ];
    for (const rule of rules) {
      for (const [from, through] of ranges) {
        expect(countScheduledDays(rule, from, through)).toBe(scheduledDays(rule, from, through).length);
      }
    }
  });
});

describe('scheduledDayCount', () => {
  it('never drops below 1', () => {
    expect(scheduledDayCount(DAILY, jan(5), jan(4))).toBe(1);
    expect(scheduledDayCount(monthly([31]), dayFromParts(2024, 2, 1), dayFromParts(2024, 2, 29))).toBe(1);
  });

  it('matches the exact count otherwise', () => {
    expect(scheduledDayCount(MWF, jan(1), jan(31))).toBe(14);
  });
});

describe('scheduledDays', () => {
  it('lists the selected days in order', () => {
    expect(scheduledDays(MWF, jan(1), jan(7))).toEqual([jan(1), jan(3), jan(5)]);
  });
});

describe('longestScheduledRun', () => {
  const mondays = weekly([Weekday.Monday]);

  it('counts consecutive scheduled occurrences', () => {
    const done = new Set([jan(1), jan(8), jan(15), jan(29)]);
    expect(longestScheduledRun(done, mondays, jan(1), jan(31))).toBe(3);
  });

  it('ignores completions on unscheduled days', () => {
    const done = new Set([jan(1), jan(2), jan(3)]);
    expect(longestScheduledRun(done, mondays, jan(1), jan(31))).toBe(1);
  });

  it('is 0 without completions', () => {
    expect(longestScheduledRun(new Set(), MWF, jan(1), jan(31))).toBe(0);
  });
});
