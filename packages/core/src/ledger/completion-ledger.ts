/**
 * Per-task completion ledger. Holds at most one completion per occurrence day
 * and funnels every single-day change through `toggle`.
 */

import { randomUUID } from 'node:crypto';
import type { Day } from '../calendar/day.js';
import type { Completion, CompletionId, TaskId } from '../types/task.js';
import type { Logger } from '../logging/log-buffer.js';
import { createLogger } from '../logging/log-buffer.js';

/** Storage port. The ledger never persists anything itself. */
export interface CompletionStore {
  listCompletions(taskId: TaskId): Completion[];
  insertCompletion(completion: Completion): void;
  deleteCompletion(id: CompletionId): void;
}

/** A store kept in memory, for callers that already hold the completions */
export class MemoryCompletionStore implements CompletionStore {
  private readonly rows: Completion[];

  constructor(completions: readonly Completion[] = []) {
    this.rows = [...completions];
  }

  listCompletions(taskId: TaskId): Completion[] {
    return this.rows.filter(c => c.taskId === taskId);
  }

  insertCompletion(completion: Completion): void {
    this.rows.push(completion);
  }

  deleteCompletion(id: CompletionId): void {
    const idx = this.rows.findIndex(c => c.id === id);
    if (idx >= 0) this.rows.splice(idx, 1);
  }

  all(): Completion[] {
    return [...this.rows];
  }
}

/**
 * Map each occurrence day to one completion. Completions that belong to a
 * different task are dropped; on a duplicate day the first record wins.
 */
export function indexByDay(
  taskId: TaskId,
  completions: Iterable<Completion>,
  logger?: Logger,
): Map<Day, Completion> {
  const byDay = new Map<Day, Completion>();
  for (const c of completions) {
    if (c.taskId !== taskId) {
      logger?.warn(`Ignoring completion ${c.id}: belongs to task ${c.taskId}, not ${taskId}`);
      continue;
    }
    if (byDay.has(c.occurrenceDay)) {
      logger?.warn(`Ignoring duplicate completion ${c.id} for task ${taskId}`);
      continue;
    }
    byDay.set(c.occurrenceDay, c);
  }
  return byDay;
}

export class CompletionLedger {
  private readonly logger: Logger;

  constructor(
    readonly taskId: TaskId,
    private readonly store: CompletionStore,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('ledger');
  }

  private index(): Map<Day, Completion> {
    return indexByDay(this.taskId, this.store.listCompletions(this.taskId), this.logger);
  }

  /** Distinct days with a completion */
  occurrenceDays(): ReadonlySet<Day> {
    return new Set(this.index().keys());
  }

  isCompletedOn(day: Day): boolean {
    return this.index().has(day);
  }

  hasAnyCompletion(): boolean {
    return this.index().size > 0;
  }

  /**
   * Flip the completion state of `day`: delete the existing completion, or
   * record a new one stamped `now`. Returns true when the day is now completed.
   */
  toggle(day: Day, now: Date = new Date()): boolean {
    const existing = this.store
      .listCompletions(this.taskId)
      .filter(c => c.taskId === this.taskId && c.occurrenceDay === day);

    if (existing.length > 0) {
      // Removes stray duplicates too, so one toggle always leaves the day empty
      for (const c of existing) this.store.deleteCompletion(c.id);
      this.logger.log(`Uncompleted ${this.taskId} on day ${day}`);
      return false;
    }

    this.store.insertCompletion({
      id: randomUUID(),
      taskId: this.taskId,
      completedAt: now.toISOString(),
      occurrenceDay: day,
    });
    this.logger.log(`Completed ${this.taskId} on day ${day}`);
    return true;
  }

  /** Remove every completion for the task. Returns how many were removed. */
  clear(): number {
    const all = this.store.listCompletions(this.taskId).filter(c => c.taskId === this.taskId);
    for (const c of all) this.store.deleteCompletion(c.id);
    if (all.length > 0) this.logger.log(`Cleared ${all.length} completion(s) for ${this.taskId}`);
    return all.length;
  }
}
