/**
 * Task CRUD using Drizzle ORM. Completions are only touched here when a task
 * is deleted (cascade) or explicitly reactivated.
 */

import { eq, asc, max, inArray } from 'drizzle-orm';
import type { CadenceDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { Day } from '../calendar/day.js';
import { dayOf, formatDay } from '../calendar/day.js';
import type { Task, TaskId, TaskWithCompletions, CategoryName, Completion } from '../types/task.js';
import type { TaskResult, DataResult, BatchResult } from '../types/results.js';
import type { RecurrenceRule } from '../types/recurrence.js';
import { tasks } from '../schema/tasks.js';
import { completions } from '../schema/completions.js';
import { validateRule, normalizeRule, supportsStartDate, rulesEqual } from '../recurrence/rule.js';
import { encodeRule } from '../recurrence/codec.js';
import { CompletionLedger } from '../ledger/completion-ledger.js';
import { createLogger } from '../logging/log-buffer.js';
import { generateId, toTask, toCompletion, storeDay, sortTasksForDisplay } from './task-helpers.js';
import { SqliteCompletionStore } from './completion-queries.js';

const log = createLogger('queries');
const MAX_TITLE_LENGTH = 200;

export interface NewTaskInput {
  title: string;
  category?: CategoryName | null;
  rule?: RecurrenceRule;
  startDate?: Day | null;
}

export interface TaskChanges {
  title?: string;
  category?: CategoryName | null;
  rule?: RecurrenceRule;
  /** null clears the start date */
  startDate?: Day | null;
  /** Clear a completed one-time task's history so it shows up as due again */
  reactivate?: boolean;
}

export interface TaskFilter {
  /** undefined = any category, null = uncategorised only */
  category?: CategoryName | null;
  includeInactive?: boolean;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateTitle(title: string): string | null {
  if (title.length === 0) return 'Task title cannot be empty';
  if (title.length > MAX_TITLE_LENGTH) return `Task title cannot be longer than ${MAX_TITLE_LENGTH} characters`;
  return null;
}

/**
 * Resolve the start date to store. Weekly and monthly rules never keep one,
 * and a start date of today means "start now".
 */
function resolveStartDate(
  rule: RecurrenceRule,
  startDate: Day | null,
  today: Day,
): { startDate: Day | null } | { error: string } {
  if (!supportsStartDate(rule) || startDate === null) return { startDate: null };
  if (startDate < today) return { error: `Start date ${formatDay(startDate)} is in the past` };
  return { startDate: startDate === today ? null : startDate };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID, active or not */
export function getTaskById(db: CadenceDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Get all tasks in display order, optionally including archived ones */
export function getAllTasks(db: CadenceDb, filter?: TaskFilter): Task[] {
  const rows = filter?.includeInactive
    ? db.select().from(tasks).orderBy(asc(tasks.sortOrder)).all()
    : db.select().from(tasks).where(eq(tasks.isActive, 1)).orderBy(asc(tasks.sortOrder)).all();

  let list = rows.map(toTask);
  if (filter?.category !== undefined) {
    list = list.filter(t => t.category === filter.category);
  }
  return sortTasksForDisplay(list);
}

export function getActiveTasks(db: CadenceDb): Task[] {
  return getAllTasks(db);
}

/** Tasks with their completions loaded, in two queries */
export function getTasksWithCompletions(db: CadenceDb, filter?: TaskFilter): TaskWithCompletions[] {
  const list = getAllTasks(db, filter);
  if (list.length === 0) return [];

  const rows = db.select().from(completions)
    .where(inArray(completions.taskId, list.map(t => t.id)))
    .orderBy(asc(completions.occurrenceDay))
    .all();

  const byTask = new Map<TaskId, Completion[]>();
  for (const row of rows) {
    const c = toCompletion(row);
    if (!c) continue;
    const bucket = byTask.get(c.taskId);
    if (bucket) bucket.push(c);
    else byTask.set(c.taskId, [c]);
  }

  return list.map(t => ({ ...t, completions: byTask.get(t.id) ?? [] }));
}

export function getTaskWithCompletions(db: CadenceDb, taskId: TaskId): TaskWithCompletions | null {
  const task = getTaskById(db, taskId);
  if (!task) return null;
  return { ...task, completions: new SqliteCompletionStore(db).listCompletions(taskId) };
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

function nextSortOrder(db: CadenceDb): number {
  const row = db.select({ maxOrder: max(tasks.sortOrder) }).from(tasks).where(eq(tasks.isActive, 1)).get();
  return (row?.maxOrder ?? -1) + 1;
}

function ruleColumns(rule: RecurrenceRule) {
  const encoded = encodeRule(rule);
  return {
    isRecurring: rule.kind === 'none' ? 0 : 1,
    recurrenceType: encoded.recurrenceType,
    weekdays: encoded.weekdays,
    monthDays: encoded.monthDays,
  };
}

/** Insert a fully built task */
export function insertTask(db: CadenceDb, task: Task): void {
  db.insert(tasks).values({
    id: task.id,
    title: task.title,
    category: task.category,
    ...ruleColumns(task.rule),
    createdAt: storeDay(task.createdAt),
    startDate: task.startDate === null ? null : storeDay(task.startDate),
    sortOrder: task.sortOrder,
    isActive: task.active ? 1 : 0,
  }).run();
}

function uniqueId(db: CadenceDb): TaskId {
  for (let i = 0; i < 50; i++) {
    const id = generateId();
    if (!getTaskById(db, id)) return id;
  }
  throw new Error('Could not allocate a task id');
}

/** Create a task at the end of the list. `today` becomes its creation day. */
export function addTask(db: CadenceDb, input: NewTaskInput, today: Day = dayOf(new Date())): DataResult<Task> {
  const title = input.title.trim();
  const titleError = validateTitle(title);
  if (titleError) return { type: 'error', message: titleError };

  const rule = normalizeRule(input.rule ?? { kind: 'none' });
  const ruleError = validateRule(rule);
  if (ruleError) return { type: 'error', message: ruleError };

  const start = resolveStartDate(rule, input.startDate ?? null, today);
  if ('error' in start) return { type: 'error', message: start.error };

  const category = input.category?.trim() || null;
  const task: Task = {
    id: uniqueId(db),
    title,
    category,
    rule,
    createdAt: today,
    startDate: start.startDate,
    sortOrder: nextSortOrder(db),
    active: true,
  };

  insertTask(db, task);
  log.log(`Added task ${task.id} (${rule.kind})`);
  return { type: 'success', data: task, message: `Added task (${task.id}): ${title}` };
}

/**
 * Edit a task. Changing the rule never touches existing completions; only an
 * explicit `reactivate` clears them.
 */
export function updateTask(
  db: CadenceDb,
  taskId: TaskId,
  changes: TaskChanges,
  today: Day = dayOf(new Date()),
): DataResult<Task> {
  const task = getTaskById(db, taskId);
  if (!task) return { type: 'not-found', taskId };

  const title = changes.title?.trim() ?? task.title;
  const titleError = validateTitle(title);
  if (titleError) return { type: 'error', message: titleError };

  const rule = normalizeRule(changes.rule ?? task.rule);
  const ruleError = validateRule(rule);
  if (ruleError) return { type: 'error', message: ruleError };

  // An unchanged stored start date is kept as long as the rule allows one
  let startDate: Day | null;
  if (changes.startDate !== undefined) {
    const start = resolveStartDate(rule, changes.startDate, today);
    if ('error' in start) return { type: 'error', message: start.error };
    startDate = start.startDate;
  } else {
    startDate = supportsStartDate(rule) ? task.startDate : null;
  }

  const category = changes.category === undefined ? task.category : changes.category?.trim() || null;
  const updated: Task = { ...task, title, category, rule, startDate };

  const reactivate = changes.reactivate === true && rule.kind === 'none';
  const changed = title !== task.title
    || category !== task.category
    || startDate !== task.startDate
    || !rulesEqual(rule, task.rule);

  if (!changed && !reactivate) {
    return { type: 'no-change', message: `Task ${taskId} is unchanged` };
  }

  let cleared = 0;
  getRawDb(db).transaction(() => {
    db.update(tasks).set({
      title,
      category,
      ...ruleColumns(rule),
      startDate: startDate === null ? null : storeDay(startDate),
    }).where(eq(tasks.id, taskId)).run();

    if (reactivate) {
      cleared = new CompletionLedger(taskId, new SqliteCompletionStore(db)).clear();
    }
  })();

  const suffix = cleared > 0 ? ` and cleared ${cleared} completion(s)` : '';
  return { type: 'success', data: updated, message: `Updated task ${taskId}${suffix}` };
}

function setActive(db: CadenceDb, taskId: TaskId, active: boolean): TaskResult {
  const task = getTaskById(db, taskId);
  if (!task) return { type: 'not-found', taskId };
  if (task.active === active) {
    return { type: 'no-change', message: `Task ${taskId} is already ${active ? 'active' : 'archived'}` };
  }

  db.update(tasks).set({
    isActive: active ? 1 : 0,
    // Restored tasks go to the end of the list
    ...(active ? { sortOrder: nextSortOrder(db) } : {}),
  }).where(eq(tasks.id, taskId)).run();
  return { type: 'success', message: `${active ? 'Restored' : 'Archived'} task: ${taskId}` };
}

/** Hide a task from every "due" and "today" view, keeping its history */
export function softDeleteTask(db: CadenceDb, taskId: TaskId): TaskResult {
  return setActive(db, taskId, false);
}

export function restoreTask(db: CadenceDb, taskId: TaskId): TaskResult {
  return setActive(db, taskId, true);
}

/** Delete a task permanently; its completions go with it */
export function deleteTask(db: CadenceDb, taskId: TaskId): TaskResult {
  const task = getTaskById(db, taskId);
  if (!task) return { type: 'not-found', taskId };

  db.delete(tasks).where(eq(tasks.id, taskId)).run();
  return { type: 'success', message: `Deleted task: ${taskId}` };
}

/** Batch version of softDeleteTask */
export function softDeleteTasks(db: CadenceDb, taskIds: TaskId[]): BatchResult {
  const results: TaskResult[] = [];
  getRawDb(db).transaction(() => {
    for (const taskId of taskIds) results.push(softDeleteTask(db, taskId));
  })();
  return { results };
}

/** Batch version of deleteTask */
export function deleteTasks(db: CadenceDb, taskIds: TaskId[]): BatchResult {
  const results: TaskResult[] = [];
  getRawDb(db).transaction(() => {
    for (const taskId of taskIds) results.push(deleteTask(db, taskId));
  })();
  return { results };
}

/**
 * Persist a new manual order: each listed task gets its index as sort order.
 * Unknown ids are ignored.
 */
export function reorderTasks(db: CadenceDb, orderedIds: TaskId[]): number {
  let updated = 0;
  getRawDb(db).transaction(() => {
    orderedIds.forEach((id, index) => {
      const result = db.update(tasks).set({ sortOrder: index }).where(eq(tasks.id, id)).run();
      updated += result.changes;
    });
  })();
  return updated;
}
