import { describe, it, expect } from 'vitest';
import { currentStreak, longestStreak } from '../../src/stats/streak.js';

const today = 1000;

describe('currentStreak', () => {
  it('is 0 without completions', () => {
    expect(currentStreak([], today)).toBe(0);
  });

  it('counts back from today when today is completed', () => {
    expect(currentStreak([today - 2, today - 1, today], today)).toBe(3);
  });

  it('does not break while today is still open', () => {
    expect(currentStreak([today - 3, today - 2, today - 1], today)).toBe(3);
  });

  it('is 0 once a whole day was skipped', () => {
    expect(currentStreak([today - 3, today - 2], today)).toBe(0);
  });

  it('stops at the first gap', () => {
    expect(currentStreak([today - 5, today - 4, today - 1, today], today)).toBe(2);
  });

  it('grows by one when today is completed on top of a run ending yesterday', () => {
    const run = [today - 4, today - 3, today - 2, today - 1];
    const before = currentStreak(run, today);
    expect(currentStreak([...run, today], today)).toBe(before + 1);
  });

  it('ignores duplicate days', () => {
    expect(currentStreak(new Set([today, today - 1]), today)).toBe(2);
    expect(currentStreak([today, today, today - 1], today)).toBe(2);
  });
});

describe('longestStreak', () => {
  it('is 0 without completions', () => {
    expect(longestStreak([])).toBe(0);
  });

  it('is 1 for a single day', () => {
    expect(longestStreak([42])).toBe(1);
  });

  it('finds the longer of two runs', () => {
    expect(longestStreak([1, 2, 10, 11, 12, 13])).toBe(4);
    expect(longestStreak([1, 2, 3, 10, 11])).toBe(3);
  });

  it('does not depend on input order or duplicates', () => {
    expect(longestStreak([13, 11, 12, 12, 10])).toBe(4);
  });

  it('is at least the current streak', () => {
    const days = [today - 9, today - 2, today - 1];
    expect(longestStreak(days)).toBeGreaterThanOrEqual(currentStreak(days, today));
  });
});
