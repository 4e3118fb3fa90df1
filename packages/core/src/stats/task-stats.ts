/**
 * Aggregate statistics facade. Storage and UI layers ask this class, and only
 * this class, whether a task is due, done, on a streak, or how often it gets
 * completed. Everything is recomputed from the completions on each call; no
 * counters are stored.
 *
 * Nothing here throws on bad data: completions owned by another task are
 * dropped (and logged), empty day sets are never due, and a start date before
 * the creation day is ignored.
 */

import type { Day } from '../calendar/day.js';
import { yearOf } from '../calendar/day.js';
import type { CalendarContext } from '../calendar/calendar.js';
import type { Completion, TaskWithCompletions, CategoryName } from '../types/task.js';
import { isDue, isRecurring, scheduleStart } from '../recurrence/rule.js';
import { indexByDay } from '../ledger/completion-ledger.js';
import type { Logger } from '../logging/log-buffer.js';
import { createLogger } from '../logging/log-buffer.js';
import { currentStreak, longestStreak } from './streak.js';
import { scheduledDayCount, longestScheduledRun } from './schedule.js';
import { weeklyRhythm, monthlyTrend, yearInPixels } from './analytics.js';
import type { WeekdayCount, MonthlyTrend, YearInPixels } from './analytics.js';

export interface TaskSummary {
  readonly taskId: string;
  readonly dueToday: boolean;
  readonly completedToday: boolean;
  readonly currentStreak: number;
  readonly bestStreak: number;
  /** Longest run of consecutive scheduled occurrences completed */
  readonly bestScheduledRun: number;
  /** 0..100, null for one-time tasks */
  readonly completionRate: number | null;
  readonly completionDays: number;
  readonly firstCompletion: Day | null;
  readonly lastCompletion: Day | null;
}

export interface RollupStats {
  readonly taskCount: number;
  readonly currentStreak: number;
  readonly bestStreak: number;
  /** Blended rate over recurring members, null when there are none */
  readonly completionRate: number | null;
  readonly completedOccurrences: number;
  readonly scheduledOccurrences: number;
  /** Distinct days on which any member was completed */
  readonly activeDays: number;
  readonly totalCompletions: number;
}

export interface CategoryRollup extends RollupStats {
  readonly category: CategoryName | null;
}

export interface TodaySummary {
  /** Active tasks due today and not yet completed, by sort order */
  readonly remaining: TaskWithCompletions[];
  readonly completedCount: number;
  readonly totalCount: number;
}

interface RateParts {
  completed: number;
  scheduled: number;
}

export class TaskStats {
  private readonly logger: Logger;

  constructor(
    private readonly calendar: CalendarContext,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('stats');
  }

  today(): Day {
    return this.calendar.today();
  }

  /** Distinct occurrence days of the task, orphans dropped */
  occurrenceDays(task: TaskWithCompletions): Set<Day> {
    return new Set(indexByDay(task.id, task.completions, this.logger).keys());
  }

  private ownCompletions(task: TaskWithCompletions): Completion[] {
    return [...indexByDay(task.id, task.completions, this.logger).values()];
  }

  isDueToday(task: TaskWithCompletions): boolean {
    if (!task.active) return false;
    if (!isDue(task.rule, this.today(), task.createdAt, task.startDate)) return false;
    // One-time tasks leave the due list for good once completed
    return task.rule.kind !== 'none' || this.occurrenceDays(task).size === 0;
  }

  isCompletedToday(task: TaskWithCompletions): boolean {
    return this.occurrenceDays(task).has(this.today());
  }

  currentStreak(task: TaskWithCompletions): number {
    return currentStreak(this.occurrenceDays(task), this.today());
  }

  bestStreak(task: TaskWithCompletions): number {
    return longestStreak(this.occurrenceDays(task));
  }

  bestScheduledRun(task: TaskWithCompletions): number {
    const start = scheduleStart(task.rule, task.createdAt, task.startDate);
    return longestScheduledRun(this.occurrenceDays(task), task.rule, start, this.today());
  }

  private rateParts(task: TaskWithCompletions): RateParts | null {
    if (!isRecurring(task.rule)) return null;

    const today = this.today();
    const start = scheduleStart(task.rule, task.createdAt, task.startDate);
    let completed = 0;
    for (const d of this.occurrenceDays(task)) {
      // Only completions of scheduled occurrences count
      if (d <= today && isDue(task.rule, d, task.createdAt, task.startDate)) completed++;
    }
    return { completed, scheduled: scheduledDayCount(task.rule, start, today) };
  }

  /** Completed over scheduled occurrences as a percentage capped at 100 */
  completionRate(task: TaskWithCompletions): number | null {
    const parts = this.rateParts(task);
    return parts ? toRate(parts) : null;
  }

  summarize(task: TaskWithCompletions): TaskSummary {
    const days = [...this.occurrenceDays(task)].sort((a, b) => a - b);
    return {
      taskId: task.id,
      dueToday: this.isDueToday(task),
      completedToday: this.isCompletedToday(task),
      currentStreak: this.currentStreak(task),
      bestStreak: this.bestStreak(task),
      bestScheduledRun: this.bestScheduledRun(task),
      completionRate: this.completionRate(task),
      completionDays: days.length,
      firstCompletion: days[0] ?? null,
      lastCompletion: days[days.length - 1] ?? null,
    };
  }

  /**
   * Roll a collection up as if it were one task: a day counts toward the
   * shared streak when any member was completed on it, and the rate divides
   * summed completed occurrences by summed scheduled occurrences.
   */
  rollup(tasks: readonly TaskWithCompletions[]): RollupStats {
    const union = new Set<Day>();
    let totalCompletions = 0;
    let completed = 0;
    let scheduled = 0;
    let anyRecurring = false;

    for (const task of tasks) {
      const days = this.occurrenceDays(task);
      for (const d of days) union.add(d);
      totalCompletions += days.size;

      const parts = this.rateParts(task);
      if (parts) {
        anyRecurring = true;
        completed += parts.completed;
        scheduled += parts.scheduled;
      }
    }

    return {
      taskCount: tasks.length,
      currentStreak: currentStreak(union, this.today()),
      bestStreak: longestStreak(union),
      completionRate: anyRecurring ? toRate({ completed, scheduled }) : null,
      completedOccurrences: completed,
      scheduledOccurrences: scheduled,
      activeDays: union.size,
      totalCompletions,
    };
  }

  /** One rollup per category, uncategorised tasks last under `null` */
  categoryRollups(tasks: readonly TaskWithCompletions[]): CategoryRollup[] {
    const groups = new Map<CategoryName | null, TaskWithCompletions[]>();
    for (const task of tasks) {
      const group = groups.get(task.category);
      if (group) group.push(task);
      else groups.set(task.category, [task]);
    }

    return [...groups.entries()]
      .sort(([a], [b]) => (a === null ? 1 : b === null ? -1 : a.localeCompare(b)))
      .map(([category, members]) => ({ category, ...this.rollup(members) }));
  }

  private completionDayList(tasks: readonly TaskWithCompletions[]): Day[] {
    return tasks.flatMap(t => this.ownCompletions(t).map(c => c.occurrenceDay));
  }

  weeklyRhythm(tasks: readonly TaskWithCompletions[]): WeekdayCount[] {
    return weeklyRhythm(this.completionDayList(tasks), this.calendar.firstWeekday);
  }

  monthlyTrend(tasks: readonly TaskWithCompletions[]): MonthlyTrend {
    return monthlyTrend(this.completionDayList(tasks), this.today());
  }

  yearInPixels(tasks: readonly TaskWithCompletions[], year: number = yearOf(this.today())): YearInPixels {
    return yearInPixels(this.completionDayList(tasks), year, this.today());
  }

  /** What the "today" list and widgets show */
  todaySummary(tasks: readonly TaskWithCompletions[]): TodaySummary {
    const active = tasks.filter(t => t.active);
    const remaining = active
      .filter(t => this.isDueToday(t) && !this.isCompletedToday(t))
      .sort((a, b) => a.sortOrder - b.sortOrder);
    const completedCount = active.filter(t => this.isCompletedToday(t)).length;

    return { remaining, completedCount, totalCount: remaining.length + completedCount };
  }
}

function toRate({ completed, scheduled }: RateParts): number {
  if (scheduled <= 0) return 0;
  return Math.min(100, (100 * completed) / scheduled);
}
