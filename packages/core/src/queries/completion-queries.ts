/**
 * Completion persistence. All single-day changes go through CompletionLedger.toggle;
 * this module only supplies the SQLite store and the transaction around it.
 */

import { eq, and, asc, gte, lte } from 'drizzle-orm';
import type { CadenceDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { Day } from '../calendar/day.js';
import { dayOf, formatDay } from '../calendar/day.js';
import type { Completion, CompletionId, TaskId } from '../types/task.js';
import type { DataResult, BatchResult, TaskResult } from '../types/results.js';
import type { CompletionStore } from '../ledger/completion-ledger.js';
import { CompletionLedger } from '../ledger/completion-ledger.js';
import { completions } from '../schema/completions.js';
import { tasks } from '../schema/tasks.js';
import { parseStoredDay, storeDay, toCompletion } from './task-helpers.js';

/** CompletionStore backed by the completions table */
export class SqliteCompletionStore implements CompletionStore {
  constructor(private readonly db: CadenceDb) {}

  listCompletions(taskId: TaskId): Completion[] {
    const rows = this.db.select().from(completions)
      .where(eq(completions.taskId, taskId))
      .orderBy(asc(completions.occurrenceDay))
      .all();
    return rows.flatMap(row => toCompletion(row) ?? []);
  }

  insertCompletion(completion: Completion): void {
    this.db.insert(completions).values({
      id: completion.id,
      taskId: completion.taskId,
      completedAt: completion.completedAt,
      occurrenceDay: storeDay(completion.occurrenceDay),
    }).run();
  }

  deleteCompletion(id: CompletionId): void {
    this.db.delete(completions).where(eq(completions.id, id)).run();
  }
}

export interface ToggleOptions {
  /** The day toggles may not go past */
  today?: Day;
  now?: Date;
}

/**
 * Flip the completion state of `day` for a task. Returns true when the day is
 * now completed. Archived tasks, days after `today` and days before the task
 * was created are rejected.
 */
export function toggleCompletion(
  db: CadenceDb,
  taskId: TaskId,
  day: Day,
  options: ToggleOptions = {},
): DataResult<boolean> {
  const now = options.now ?? new Date();
  const today = options.today ?? dayOf(now);

  const row = db.select({ isActive: tasks.isActive, createdAt: tasks.createdAt })
    .from(tasks).where(eq(tasks.id, taskId)).get();
  if (!row) return { type: 'not-found', taskId };
  if (row.isActive === 0) return { type: 'error', message: `Task ${taskId} is archived` };
  if (day > today) return { type: 'error', message: `Cannot complete ${taskId} on ${formatDay(day)}: that day is in the future` };

  // No occurrence exists before the task was created
  const createdAt = parseStoredDay(row.createdAt);
  if (createdAt !== null && day < createdAt) {
    return { type: 'error', message: `Cannot complete ${taskId} on ${formatDay(day)}: the task was created on ${formatDay(createdAt)}` };
  }

  let completed = false;
  getRawDb(db).transaction(() => {
    completed = new CompletionLedger(taskId, new SqliteCompletionStore(db)).toggle(day, now);
  })();

  return {
    type: 'success',
    data: completed,
    message: `${completed ? 'Checked' : 'Unchecked'} ${taskId} for ${formatDay(day)}`,
  };
}

/** Toggle several tasks on the same day */
export function toggleCompletions(
  db: CadenceDb,
  taskIds: TaskId[],
  day: Day,
  options: ToggleOptions = {},
): BatchResult {
  const results: TaskResult[] = taskIds.map(taskId => {
    const r = toggleCompletion(db, taskId, day, options);
    return r.type === 'success' ? { type: 'success', message: r.message } : r;
  });
  return { results };
}

/** Completions recorded for `day`, any task */
export function getCompletionsForDay(db: CadenceDb, day: Day): Completion[] {
  const rows = db.select().from(completions)
    .where(eq(completions.occurrenceDay, storeDay(day)))
    .all();
  return rows.flatMap(row => toCompletion(row) ?? []);
}

/**
 * A task's completions, oldest first, optionally limited to [from, through].
 * Stored days are yyyy-MM-dd so string comparison orders them.
 */
export function getCompletionHistory(
  db: CadenceDb,
  taskId: TaskId,
  range?: { from?: Day; through?: Day },
): Completion[] {
  const conditions = [eq(completions.taskId, taskId)];
  if (range?.from !== undefined) conditions.push(gte(completions.occurrenceDay, storeDay(range.from)));
  if (range?.through !== undefined) conditions.push(lte(completions.occurrenceDay, storeDay(range.through)));

  const rows = db.select().from(completions)
    .where(and(...conditions))
    .orderBy(asc(completions.occurrenceDay))
    .all();
  return rows.flatMap(row => toCompletion(row) ?? []);
}

export interface DayHistory {
  day: Day;
  completions: Completion[];
}

/** Completions of the last `days` days up to `today`, grouped by day, newest first */
export function getRecentHistory(db: CadenceDb, days: number, today: Day): DayHistory[] {
  const from = today - Math.max(1, days) + 1;
  const rows = db.select().from(completions)
    .where(and(gte(completions.occurrenceDay, storeDay(from)), lte(completions.occurrenceDay, storeDay(today))))
    .orderBy(asc(completions.completedAt))
    .all();

  const byDay = new Map<Day, Completion[]>();
  for (const row of rows) {
    const c = toCompletion(row);
    if (!c) continue;
    const bucket = byDay.get(c.occurrenceDay);
    if (bucket) bucket.push(c);
    else byDay.set(c.occurrenceDay, [c]);
  }

  return [...byDay.entries()]
    .sort(([a], [b]) => b - a)
    .map(([day, list]) => ({ day, completions: list }));
}
