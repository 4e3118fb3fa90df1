import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const categories = sqliteTable('categories', {
  name: text('name').primaryKey(),
  icon: text('icon'),
  /** Hex without the leading # */
  color: text('color'),
  createdAt: text('created_at').notNull(),
  sortOrder: integer('sort_order').default(0),
});
