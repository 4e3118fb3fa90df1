/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { CadenceDb } from '../db.js';
import { config } from '../schema/index.js';
import { Weekday, isWeekday } from '../calendar/day.js';
import type { CategoryName } from '../types/task.js';

const FIRST_WEEKDAY_KEY = 'first_weekday';
const DEFAULT_CATEGORY_KEY = 'default_category';

/** Get a config value by key */
export function getConfig(db: CadenceDb, key: string): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: CadenceDb, key: string, value: string): void {
  db.insert(config).values({ key, value }).onConflictDoUpdate({ target: config.key, set: { value } }).run();
}

export function deleteConfig(db: CadenceDb, key: string): void {
  db.delete(config).where(eq(config.key, key)).run();
}

/** First day of the week for display; Monday unless configured */
export function getFirstWeekday(db: CadenceDb): Weekday {
  const n = Number(getConfig(db, FIRST_WEEKDAY_KEY));
  return isWeekday(n) ? n : Weekday.Monday;
}

export function setFirstWeekday(db: CadenceDb, weekday: Weekday): void {
  setConfig(db, FIRST_WEEKDAY_KEY, String(weekday));
}

/** Category given to new tasks when none is passed */
export function getDefaultCategory(db: CadenceDb): CategoryName | null {
  return getConfig(db, DEFAULT_CATEGORY_KEY);
}

/** null clears the default */
export function setDefaultCategory(db: CadenceDb, name: CategoryName | null): void {
  if (name === null) deleteConfig(db, DEFAULT_CATEGORY_KEY);
  else setConfig(db, DEFAULT_CATEGORY_KEY, name);
}
