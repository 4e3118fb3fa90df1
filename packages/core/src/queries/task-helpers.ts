import type { Day } from '../calendar/day.js';
import { dayFromIso, dayOf, formatDay } from '../calendar/day.js';
import type { Task, TaskId, Completion } from '../types/task.js';
import type { tasks } from '../schema/tasks.js';
import type { completions } from '../schema/completions.js';
import { decodeRule } from '../recurrence/codec.js';
import { createLogger } from '../logging/log-buffer.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 3;

const log = createLogger('queries');

/** Generate a random 3-character task ID */
export function generateId(): TaskId {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_CHARS[Math.floor(Math.random() * ID_CHARS.length)];
  }
  return id;
}

/**
 * Read a stored day. Accepts yyyy-MM-dd and, for rows written by older
 * versions, a full ISO timestamp (projected onto its local day).
 */
export function parseStoredDay(value: string | null): Day | null {
  if (!value) return null;
  const day = dayFromIso(value);
  if (day !== null) return day;

  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    log.warn(`Unreadable stored date: ${value}`);
    return null;
  }
  return dayOf(ms);
}

export function storeDay(day: Day): string {
  return formatDay(day);
}

/** Map a Drizzle row to a Task */
export function toTask(row: typeof tasks.$inferSelect): Task {
  const createdAt = parseStoredDay(row.createdAt);
  if (createdAt === null) log.warn(`Task ${row.id} has no readable creation day, using today`);

  return {
    id: row.id,
    title: row.title,
    category: row.category,
    rule: decodeRule({
      recurrenceType: row.recurrenceType,
      isRecurring: row.isRecurring,
      weekdays: row.weekdays,
      monthDays: row.monthDays,
    }),
    createdAt: createdAt ?? dayOf(new Date()),
    startDate: parseStoredDay(row.startDate),
    sortOrder: row.sortOrder ?? 0,
    active: row.isActive !== 0,
  };
}

/** Map a Drizzle row to a Completion; rows with an unreadable day are skipped */
export function toCompletion(row: typeof completions.$inferSelect): Completion | null {
  const occurrenceDay = parseStoredDay(row.occurrenceDay) ?? parseStoredDay(row.completedAt);
  if (occurrenceDay === null) return null;
  return {
    id: row.id,
    taskId: row.taskId,
    completedAt: row.completedAt,
    occurrenceDay,
  };
}

/** Display order: manual sort order, then oldest first */
export function sortTasksForDisplay<T extends Task>(list: readonly T[]): T[] {
  return [...list].sort((a, b) => a.sortOrder - b.sortOrder || a.createdAt - b.createdAt);
}
