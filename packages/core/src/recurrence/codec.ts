/**
 * Storage codec for recurrence rules. Day sets are stored as comma-joined
 * integers ("2,4,6"). Decoding never throws: unknown kinds fall back to a
 * one-time rule and unparseable list entries are skipped.
 */

import { isWeekday } from '../calendar/day.js';
import type { Weekday } from '../calendar/day.js';
import type { RecurrenceRule } from '../types/recurrence.js';
import { RecurrenceKind } from '../types/recurrence.js';

export interface EncodedRule {
  recurrenceType: RecurrenceKind;
  weekdays: string | null;
  monthDays: string | null;
}

export interface StoredRuleColumns {
  recurrenceType: string | null;
  isRecurring: number | null;
  weekdays: string | null;
  monthDays: string | null;
}

export function encodeRule(rule: RecurrenceRule): EncodedRule {
  return {
    recurrenceType: rule.kind,
    weekdays: rule.kind === 'weekly' ? rule.weekdays.join(',') : null,
    monthDays: rule.kind === 'monthly' ? rule.monthDays.join(',') : null,
  };
}

export function parseDayList(raw: string | null): number[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(s => s.trim())
    .filter(s => /^\d+$/.test(s))
    .map(s => parseInt(s, 10));
}

export function decodeRule(row: StoredRuleColumns): RecurrenceRule {
  // Rows written before recurrence types existed only carry the flag
  const kind = row.recurrenceType ?? (row.isRecurring ? RecurrenceKind.Daily : RecurrenceKind.None);

  switch (kind) {
    case RecurrenceKind.Daily:
      return { kind: 'daily' };
    case RecurrenceKind.Weekly: {
      const weekdays: Weekday[] = parseDayList(row.weekdays).filter(isWeekday);
      return { kind: 'weekly', weekdays };
    }
    case RecurrenceKind.Monthly:
      return { kind: 'monthly', monthDays: parseDayList(row.monthDays).filter(d => d >= 1 && d <= 31) };
    default:
      return { kind: 'none' };
  }
}
