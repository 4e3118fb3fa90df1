/**
 * Parses the CLI recurrence syntax:
 *   none | once          one-time task
 *   daily
 *   weekly:mon,wed,fri   weekday names or numbers (1 = Sunday ... 7 = Saturday)
 *   monthly:1,15,31      days of the month
 */

import { isWeekday, weekdayFromName } from '../calendar/day.js';
import type { Weekday } from '../calendar/day.js';
import type { RecurrenceRule } from '../types/recurrence.js';
import { normalizeRule } from '../recurrence/rule.js';

const WEEKDAY_GROUPS: Record<string, Weekday[]> = {
  weekdays: [2, 3, 4, 5, 6],
  weekends: [1, 7],
};

function parseWeekdayToken(token: string): Weekday[] | null {
  const group = WEEKDAY_GROUPS[token];
  if (group) return group;

  const named = weekdayFromName(token);
  if (named !== null) return [named];

  if (!/^\d$/.test(token)) return null;
  const n = parseInt(token, 10);
  return isWeekday(n) ? [n] : null;
}

function parseMonthDayToken(token: string): number | null {
  if (!/^\d{1,2}$/.test(token)) return null;
  const n = parseInt(token, 10);
  return n >= 1 && n <= 31 ? n : null;
}

function splitList(list: string): string[] {
  return list.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/** Parse a recurrence string. Returns null for unknown syntax or an empty day list. */
export function parseRecurrence(input: string | null | undefined): RecurrenceRule | null {
  if (!input?.trim()) return null;

  const normalized = input.trim().toLowerCase();
  const sep = normalized.indexOf(':');
  const head = sep < 0 ? normalized : normalized.slice(0, sep);
  const tail = sep < 0 ? '' : normalized.slice(sep + 1);

  switch (head) {
    case 'none':
    case 'once':
      return sep < 0 ? { kind: 'none' } : null;
    case 'daily':
      return sep < 0 ? { kind: 'daily' } : null;
    case 'weekly': {
      const weekdays: Weekday[] = [];
      for (const token of splitList(tail)) {
        const parsed = parseWeekdayToken(token);
        if (!parsed) return null;
        weekdays.push(...parsed);
      }
      return weekdays.length > 0 ? normalizeRule({ kind: 'weekly', weekdays }) : null;
    }
    case 'monthly': {
      const monthDays: number[] = [];
      for (const token of splitList(tail)) {
        const parsed = parseMonthDayToken(token);
        if (parsed === null) return null;
        monthDays.push(parsed);
      }
      return monthDays.length > 0 ? normalizeRule({ kind: 'monthly', monthDays }) : null;
    }
    default:
      return null;
  }
}
