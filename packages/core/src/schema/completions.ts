import { sqliteTable, text, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { tasks } from './tasks.js';

export const completions = sqliteTable('completions', {
  id: text('id').primaryKey(),
  taskId: text('task_id').notNull().references(() => tasks.id, { onDelete: 'cascade' }),
  /** ISO timestamp of the tap */
  completedAt: text('completed_at').notNull(),
  /** yyyy-MM-dd of the occurrence this completion satisfies */
  occurrenceDay: text('occurrence_day').notNull(),
}, (table) => [
  uniqueIndex('idx_completions_task_day').on(table.taskId, table.occurrenceDay),
  index('idx_completions_day').on(table.occurrenceDay),
]);
