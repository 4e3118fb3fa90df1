import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  /** Free label, usually the name of a row in categories */
  category: text('category'),
  /** Legacy flag, kept in sync with recurrence_type */
  isRecurring: integer('is_recurring').default(0),
  recurrenceType: text('recurrence_type'),
  /** Comma-joined weekday numbers, 1 = Sunday */
  weekdays: text('weekdays'),
  /** Comma-joined days of the month */
  monthDays: text('month_days'),
  /** yyyy-MM-dd, local calendar day */
  createdAt: text('created_at').notNull(),
  /** yyyy-MM-dd; only one-time and daily tasks keep one */
  startDate: text('start_date'),
  /** Lowest value first */
  sortOrder: integer('sort_order').default(0),
  isActive: integer('is_active').default(1),
}, (table) => [
  index('idx_tasks_category').on(table.category),
  index('idx_tasks_active_sort').on(table.isActive, table.sortOrder),
]);
