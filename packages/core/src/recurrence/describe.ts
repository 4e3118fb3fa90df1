import { WeekdayName } from '../calendar/day.js';
import type { RecurrenceRule } from '../types/recurrence.js';
import { normalizeRule, assertNever } from './rule.js';

/** 1 -> "1st", 12 -> "12th", 22 -> "22nd" */
export function ordinal(n: number): string {
  const ones = n % 10;
  const tens = Math.floor(n / 10) % 10;

  let suffix = 'th';
  if (tens !== 1) {
    if (ones === 1) suffix = 'st';
    else if (ones === 2) suffix = 'nd';
    else if (ones === 3) suffix = 'rd';
  }
  return `${n}${suffix}`;
}

/** Short uppercase label shown next to a task, empty for one-time tasks */
export function describeRule(rule: RecurrenceRule): string {
  const r = normalizeRule(rule);
  switch (r.kind) {
    case 'none':
      return '';
    case 'daily':
      return 'DAILY';
    case 'weekly':
      if (r.weekdays.length === 0) return 'WEEKLY';
      return r.weekdays.map(w => WeekdayName[w]).join(', ').toUpperCase();
    case 'monthly':
      if (r.monthDays.length === 0) return 'MONTHLY';
      return r.monthDays.map(ordinal).join(', ').toUpperCase();
    default:
      return assertNever(r);
  }
}
