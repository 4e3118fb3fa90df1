import type { Day } from '../calendar/day.js';
import type { RecurrenceRule } from './recurrence.js';

/** Plain aliases; branded ids were not worth the friction at the call sites */
export type TaskId = string;
export type CompletionId = string;
export type CategoryName = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly category: CategoryName | null;
  readonly rule: RecurrenceRule;
  readonly createdAt: Day;
  /** Not due before this day. Only kept for one-time and daily rules. */
  readonly startDate: Day | null;
  readonly sortOrder: number;
  readonly active: boolean;
}

export interface Completion {
  readonly id: CompletionId;
  readonly taskId: TaskId;
  readonly completedAt: string; // ISO string
  /** The occurrence this completion satisfies */
  readonly occurrenceDay: Day;
}

export interface TaskWithCompletions extends Task {
  readonly completions: readonly Completion[];
}

export interface Category {
  readonly name: CategoryName;
  readonly icon: string | null;
  readonly color: string | null;
  readonly createdAt: string; // ISO string
  readonly sortOrder: number;
}
