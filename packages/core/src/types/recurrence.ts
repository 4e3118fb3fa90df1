import type { Weekday } from '../calendar/day.js';

export const RecurrenceKind = {
  None: 'none',
  Daily: 'daily',
  Weekly: 'weekly',
  Monthly: 'monthly',
} as const;

export type RecurrenceKind = (typeof RecurrenceKind)[keyof typeof RecurrenceKind];

export type RecurrenceRule =
  | { readonly kind: 'none' }
  | { readonly kind: 'daily' }
  | { readonly kind: 'weekly'; readonly weekdays: readonly Weekday[] }
  | { readonly kind: 'monthly'; readonly monthDays: readonly number[] };

export const ONE_TIME: RecurrenceRule = { kind: 'none' };
export const DAILY: RecurrenceRule = { kind: 'daily' };

export function weekly(weekdays: readonly Weekday[]): RecurrenceRule {
  return { kind: 'weekly', weekdays };
}

export function monthly(monthDays: readonly number[]): RecurrenceRule {
  return { kind: 'monthly', monthDays };
}
