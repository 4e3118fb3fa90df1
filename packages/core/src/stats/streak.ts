import type { Day } from '../calendar/day.js';
import { addDays, daysBetween } from '../calendar/day.js';

function toSet(days: Iterable<Day>): ReadonlySet<Day> {
  return days instanceof Set ? days : new Set(days);
}

/**
 * Consecutive completed days ending today, or ending yesterday when today has
 * not been completed yet. A streak only breaks once a whole day is skipped.
 */
export function currentStreak(days: Iterable<Day>, today: Day): number {
  const set = toSet(days);

  let check = today;
  if (!set.has(check)) {
    check = addDays(today, -1);
    if (!set.has(check)) return 0;
  }

  let streak = 0;
  while (set.has(check)) {
    streak++;
    check = addDays(check, -1);
  }
  return streak;
}

/** Longest run of consecutive calendar days anywhere in the history */
export function longestStreak(days: Iterable<Day>): number {
  const sorted = [...toSet(days)].sort((a, b) => a - b);

  let best = 0;
  let run = 0;
  let prev: Day | null = null;
  for (const day of sorted) {
    run = prev !== null && daysBetween(prev, day) === 1 ? run + 1 : 1;
    if (run > best) best = run;
    prev = day;
  }
  return best;
}
