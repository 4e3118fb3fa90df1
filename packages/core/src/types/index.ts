export { RecurrenceKind, ONE_TIME, DAILY, weekly, monthly } from './recurrence.js';
export type { RecurrenceRule } from './recurrence.js';
export type { TaskId, CompletionId, CategoryName, Task, Completion, TaskWithCompletions, Category } from './task.js';
export type { TaskResult, DataResult, BatchResult } from './results.js';
export { isError, successCount, anyFailed } from './results.js';
