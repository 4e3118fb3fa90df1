// Types
export { RecurrenceKind, ONE_TIME, DAILY, weekly, monthly } from './types/index.js';
export type {
  RecurrenceRule, TaskId, CompletionId, CategoryName, Task, Completion, TaskWithCompletions, Category,
  TaskResult, DataResult, BatchResult,
} from './types/index.js';
export { isError, successCount, anyFailed } from './types/index.js';

// Calendar
export {
  Weekday, WeekdayName, isWeekday, weekdayFromName, dayFromParts, dayOf, dayFromIso, formatDay, toDate,
  addDays, daysBetween, weekdayOf, dayOfMonth, monthOf, yearOf, startOfMonth, addMonths,
  daysInMonth, dayRange,
} from './calendar/day.js';
export type { Day } from './calendar/day.js';
export { systemCalendar, fixedCalendar, orderedWeekdays } from './calendar/calendar.js';
export type { CalendarContext } from './calendar/calendar.js';

// Recurrence
export {
  effectiveStart, isDue, scheduleStart, selectsDay, isRecurring, supportsStartDate,
  validateRule, normalizeRule, rulesEqual, assertNever,
} from './recurrence/rule.js';
export { describeRule, ordinal } from './recurrence/describe.js';
export { encodeRule, decodeRule, parseDayList } from './recurrence/codec.js';
export type { EncodedRule, StoredRuleColumns } from './recurrence/codec.js';

// Ledger
export { CompletionLedger, MemoryCompletionStore, indexByDay } from './ledger/completion-ledger.js';
export type { CompletionStore } from './ledger/completion-ledger.js';

// Stats
export { currentStreak, longestStreak } from './stats/streak.js';
export { scheduledDays, countScheduledDays, scheduledDayCount, longestScheduledRun } from './stats/schedule.js';
export { weeklyRhythm, monthlyTrend, yearInPixels } from './stats/analytics.js';
export type { WeekdayCount, MonthlyTrend, PixelDay, YearInPixels } from './stats/analytics.js';
export { TaskStats } from './stats/task-stats.js';
export type { TaskSummary, RollupStats, CategoryRollup, TodaySummary } from './stats/task-stats.js';

// Logging
export { createLogger, getLogHistory, clearLogs, onLog } from './logging/log-buffer.js';
export type { Logger, LogEntry, LogLevel } from './logging/log-buffer.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getDbPath, getRawDb, withRetry, CREATE_SCHEMA_SQL } from './db.js';
export type { CadenceDb } from './db.js';

// Parsers
export { parseDate, parseRecurrence } from './parsers/index.js';

// Queries
export * from './queries/index.js';
