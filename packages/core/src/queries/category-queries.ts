/**
 * Category management. A task's category is a free label; the categories
 * table only adds an icon, a color and a display order to known labels.
 */

import { eq, count, max, asc, isNotNull } from 'drizzle-orm';
import type { CadenceDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { Category, CategoryName } from '../types/task.js';
import type { TaskResult } from '../types/results.js';
import { categories } from '../schema/categories.js';
import { tasks } from '../schema/tasks.js';

const MAX_NAME_LENGTH = 40;
const COLOR_RE = /^[0-9a-fA-F]{6}$/;

/** Check if a category name is usable: non-blank, no commas, at most 40 characters */
export function isValidCategoryName(name: string): boolean {
  const trimmed = name.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_NAME_LENGTH && !trimmed.includes(',');
}

/** Accepts `#aabbcc` or `aabbcc`; stored without the # */
export function normalizeColor(color: string): string | null {
  const hex = color.startsWith('#') ? color.slice(1) : color;
  return COLOR_RE.test(hex) ? hex.toLowerCase() : null;
}

export function categoryExists(db: CadenceDb, name: CategoryName): boolean {
  const row = db.select({ cnt: count() }).from(categories).where(eq(categories.name, name)).get();
  return (row?.cnt ?? 0) > 0;
}

/** Registered categories in display order */
export function getAllCategories(db: CadenceDb): Category[] {
  return db.select().from(categories).orderBy(asc(categories.sortOrder), asc(categories.name)).all()
    .map(row => ({
      name: row.name,
      icon: row.icon,
      color: row.color,
      createdAt: row.createdAt,
      sortOrder: row.sortOrder ?? 0,
    }));
}

/**
 * Every category name in use: registered ones in display order, then labels
 * that only appear on tasks, alphabetically.
 */
export function getCategoryNames(db: CadenceDb): CategoryName[] {
  const registered = getAllCategories(db).map(c => c.name);
  const known = new Set(registered);
  const labels = db.selectDistinct({ category: tasks.category }).from(tasks)
    .where(isNotNull(tasks.category))
    .all()
    .flatMap(r => (r.category !== null && !known.has(r.category) ? [r.category] : []))
    .sort((a, b) => a.localeCompare(b));
  return [...registered, ...labels];
}

export interface CategoryInput {
  icon?: string | null;
  color?: string | null;
}

export function createCategory(
  db: CadenceDb,
  name: CategoryName,
  input: CategoryInput = {},
  now: Date = new Date(),
): TaskResult {
  const trimmed = name.trim();
  if (!isValidCategoryName(trimmed)) return { type: 'error', message: `Invalid category name: "${name}"` };
  if (categoryExists(db, trimmed)) return { type: 'no-change', message: `Category already exists: ${trimmed}` };

  let color: string | null = null;
  if (input.color) {
    color = normalizeColor(input.color);
    if (color === null) return { type: 'error', message: `Invalid color: "${input.color}" (expected a hex value like #3a7bd5)` };
  }

  const row = db.select({ maxOrder: max(categories.sortOrder) }).from(categories).get();
  db.insert(categories).values({
    name: trimmed,
    icon: input.icon ?? null,
    color,
    createdAt: now.toISOString(),
    sortOrder: (row?.maxOrder ?? -1) + 1,
  }).run();
  return { type: 'success', message: `Created category: ${trimmed}` };
}

/** Remove a category. Tasks keep their label. */
export function deleteCategory(db: CadenceDb, name: CategoryName): TaskResult {
  if (!categoryExists(db, name)) return { type: 'error', message: `Category not found: ${name}` };
  db.delete(categories).where(eq(categories.name, name)).run();
  return { type: 'success', message: `Deleted category: ${name}` };
}

/** Rename a category and re-label every task that carries the old name */
export function renameCategory(db: CadenceDb, oldName: CategoryName, newName: CategoryName): TaskResult {
  const target = newName.trim();
  if (!isValidCategoryName(target)) return { type: 'error', message: `Invalid category name: "${newName}"` };
  if (target === oldName) return { type: 'no-change', message: `Category is already named ${target}` };
  if (categoryExists(db, target)) return { type: 'error', message: `Category already exists: ${target}` };

  let relabelled = 0;
  getRawDb(db).transaction(() => {
    db.update(categories).set({ name: target }).where(eq(categories.name, oldName)).run();
    relabelled = db.update(tasks).set({ category: target }).where(eq(tasks.category, oldName)).run().changes;
  })();

  if (relabelled === 0 && !categoryExists(db, target)) {
    return { type: 'error', message: `Category not found: ${oldName}` };
  }
  return { type: 'success', message: `Renamed category ${oldName} to ${target}` };
}
