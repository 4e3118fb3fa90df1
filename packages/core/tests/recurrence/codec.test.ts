import { describe, it, expect } from 'vitest';
import { encodeRule, decodeRule, parseDayList } from '../../src/recurrence/codec.js';
import { ONE_TIME, DAILY, weekly, monthly } from '../../src/types/recurrence.js';

describe('encodeRule', () => {
  it('stores day sets as comma-joined numbers', () => {
    expect(encodeRule(weekly([2, 4]))).toEqual({ recurrenceType: 'weekly', weekdays: '2,4', monthDays: null });
    expect(encodeRule(monthly([1, 15]))).toEqual({ recurrenceType: 'monthly', weekdays: null, monthDays: '1,15' });
  });

  it('stores no day sets for one-time and daily rules', () => {
    expect(encodeRule(ONE_TIME)).toEqual({ recurrenceType: 'none', weekdays: null, monthDays: null });
    expect(encodeRule(DAILY)).toEqual({ recurrenceType: 'daily', weekdays: null, monthDays: null });
  });
});

describe('parseDayList', () => {
  it('returns an empty list for null or empty input', () => {
    expect(parseDayList(null)).toEqual([]);
    expect(parseDayList('')).toEqual([]);
  });

  it('skips entries that are not numbers', () => {
    expect(parseDayList('2, 4,x,,6')).toEqual([2, 4, 6]);
  });
});

describe('decodeRule', () => {
  const columns = { recurrenceType: null, isRecurring: 0, weekdays: null, monthDays: null };

  it('decodes each kind', () => {
    expect(decodeRule({ ...columns, recurrenceType: 'none' })).toEqual({ kind: 'none' });
    expect(decodeRule({ ...columns, recurrenceType: 'daily' })).toEqual({ kind: 'daily' });
    expect(decodeRule({ ...columns, recurrenceType: 'weekly', weekdays: '2,4,6' }))
      .toEqual({ kind: 'weekly', weekdays: [2, 4, 6] });
    expect(decodeRule({ ...columns, recurrenceType: 'monthly', monthDays: '1,15' }))
      .toEqual({ kind: 'monthly', monthDays: [1, 15] });
  });

  it('falls back on the legacy recurring flag', () => {
    expect(decodeRule({ ...columns, isRecurring: 1 })).toEqual({ kind: 'daily' });
    expect(decodeRule({ ...columns, isRecurring: 0 })).toEqual({ kind: 'none' });
    expect(decodeRule({ ...columns, isRecurring: null })).toEqual({ kind: 'none' });
  });

  it('drops out-of-range days', () => {
    expect(decodeRule({ ...columns, recurrenceType: 'weekly', weekdays: '0,2,9' }))
      .toEqual({ kind: 'weekly', weekdays: [2] });
    expect(decodeRule({ ...columns, recurrenceType: 'monthly', monthDays: '0,31,32' }))
      .toEqual({ kind: 'monthly', monthDays: [31] });
  });

  it('treats unknown kinds as one-time', () => {
    expect(decodeRule({ ...columns, recurrenceType: 'yearly', isRecurring: 1 })).toEqual({ kind: 'none' });
  });
});
