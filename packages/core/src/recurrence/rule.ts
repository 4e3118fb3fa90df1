/**
 * Recurrence decision table. One `switch` over the rule kind decides whether
 * an occurrence falls on a given day.
 */

import type { Day } from '../calendar/day.js';
import { weekdayOf, dayOfMonth, isWeekday } from '../calendar/day.js';
import type { RecurrenceRule } from '../types/recurrence.js';

/**
 * First day an occurrence can exist. A start date on or before the creation
 * day is ignored rather than trusted.
 */
export function effectiveStart(createdAt: Day, startDate: Day | null): Day {
  return Math.max(createdAt, startDate ?? createdAt);
}

/**
 * Whether the rule schedules an occurrence on `day`.
 *
 * For one-time tasks this is only the necessary condition; "never completed
 * yet" needs the ledger and is checked by the stats facade. Weekly and
 * monthly rules ignore the start date. An empty day set is never due.
 */
export function isDue(rule: RecurrenceRule, day: Day, createdAt: Day, startDate: Day | null): boolean {
  switch (rule.kind) {
    case 'none':
    case 'daily':
      return day >= effectiveStart(createdAt, startDate);
    case 'weekly':
      return day >= createdAt && rule.weekdays.includes(weekdayOf(day));
    case 'monthly':
      return day >= createdAt && rule.monthDays.includes(dayOfMonth(day));
    default:
      return assertNever(rule);
  }
}

/** First day the rule can be due for a task, i.e. where its schedule begins */
export function scheduleStart(rule: RecurrenceRule, createdAt: Day, startDate: Day | null): Day {
  return supportsStartDate(rule) ? effectiveStart(createdAt, startDate) : createdAt;
}

/** Rule selection ignoring creation and start days */
export function selectsDay(rule: RecurrenceRule, day: Day): boolean {
  return isDue(rule, day, day, null);
}

export function isRecurring(rule: RecurrenceRule): boolean {
  return rule.kind !== 'none';
}

/** Whether the rule keeps a start date (weekly and monthly rules drop it) */
export function supportsStartDate(rule: RecurrenceRule): boolean {
  return rule.kind === 'none' || rule.kind === 'daily';
}

/** Validate a rule at creation or edit time. Returns the first problem, or null. */
export function validateRule(rule: RecurrenceRule): string | null {
  switch (rule.kind) {
    case 'none':
    case 'daily':
      return null;
    case 'weekly': {
      if (rule.weekdays.length === 0) return 'Weekly tasks need at least one weekday';
      const bad = rule.weekdays.find(w => !isWeekday(w));
      return bad === undefined ? null : `Invalid weekday: ${bad}`;
    }
    case 'monthly': {
      if (rule.monthDays.length === 0) return 'Monthly tasks need at least one day of the month';
      const bad = rule.monthDays.find(d => !Number.isInteger(d) || d < 1 || d > 31);
      return bad === undefined ? null : `Invalid day of month: ${bad}`;
    }
    default:
      return assertNever(rule);
  }
}

/** Sort and de-duplicate the rule's day set */
export function normalizeRule(rule: RecurrenceRule): RecurrenceRule {
  switch (rule.kind) {
    case 'none':
    case 'daily':
      return rule;
    case 'weekly':
      return { kind: 'weekly', weekdays: [...new Set(rule.weekdays)].sort((a, b) => a - b) };
    case 'monthly':
      return { kind: 'monthly', monthDays: [...new Set(rule.monthDays)].sort((a, b) => a - b) };
    default:
      return assertNever(rule);
  }
}

export function rulesEqual(a: RecurrenceRule, b: RecurrenceRule): boolean {
  const na = normalizeRule(a);
  const nb = normalizeRule(b);
  if (na.kind === 'weekly' && nb.kind === 'weekly') return na.weekdays.join(',') === nb.weekdays.join(',');
  if (na.kind === 'monthly' && nb.kind === 'monthly') return na.monthDays.join(',') === nb.monthDays.join(',');
  return na.kind === nb.kind;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled recurrence rule: ${JSON.stringify(value)}`);
}
