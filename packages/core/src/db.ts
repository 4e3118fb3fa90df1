import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';
import { createLogger } from './logging/log-buffer.js';

export type CadenceDb = BetterSQLite3Database<typeof schema>;

const log = createLogger('db');

/** Drizzle instance -> the better-sqlite3 connection behind it */
const rawConnections = new WeakMap<CadenceDb, Database.Database>();

/** Returns the database path: $CADENCE_DB, else the platform data directory */
export function getDefaultDbPath(): string {
  const override = process.env['CADENCE_DB'];
  if (override) return override;

  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'cadence');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'cadence');
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'cadence');
  }

  return join(dir, 'cadence.db');
}

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    category TEXT,
    is_recurring INTEGER DEFAULT 0,
    recurrence_type TEXT,
    weekdays TEXT,
    month_days TEXT,
    created_at TEXT NOT NULL,
    start_date TEXT,
    sort_order INTEGER DEFAULT 0,
    is_active INTEGER DEFAULT 1
);

CREATE INDEX IF NOT EXISTS idx_tasks_category ON tasks(category);
CREATE INDEX IF NOT EXISTS idx_tasks_active_sort ON tasks(is_active, sort_order);

CREATE TABLE IF NOT EXISTS completions (
    id TEXT PRIMARY KEY,
    task_id TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
    completed_at TEXT NOT NULL,
    occurrence_day TEXT NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_completions_task_day ON completions(task_id, occurrence_day);
CREATE INDEX IF NOT EXISTS idx_completions_day ON completions(occurrence_day);

CREATE TABLE IF NOT EXISTS categories (
    name TEXT PRIMARY KEY,
    icon TEXT,
    color TEXT,
    created_at TEXT NOT NULL,
    sort_order INTEGER DEFAULT 0
);

CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

/** Columns added to tasks after the first release */
const TASK_COLUMN_MIGRATIONS: Array<[column: string, ddl: string]> = [
  ['recurrence_type', 'ALTER TABLE tasks ADD COLUMN recurrence_type TEXT'],
  ['weekdays', 'ALTER TABLE tasks ADD COLUMN weekdays TEXT'],
  ['month_days', 'ALTER TABLE tasks ADD COLUMN month_days TEXT'],
  ['start_date', 'ALTER TABLE tasks ADD COLUMN start_date TEXT'],
];

function migrate(sqlite: Database.Database): void {
  const columns = sqlite.prepare('SELECT name FROM pragma_table_info(?)').all('tasks') as Array<{ name: string }>;
  const existing = new Set(columns.map(c => c.name));
  for (const [column, ddl] of TASK_COLUMN_MIGRATIONS) {
    if (!existing.has(column)) {
      sqlite.exec(ddl);
      log.log(`Migrated tasks: added ${column}`);
    }
  }
}

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): CadenceDb {
  const dbPath = path ?? getDefaultDbPath();

  // Ensure directory exists for file-based databases
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // All statements use IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);
  migrate(sqlite);

  const db = drizzle(sqlite, { schema });
  rawConnections.set(db, sqlite);
  return db;
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): CadenceDb {
  return createDb(':memory:');
}

/** Sleep utility for retry logic */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isBusyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_BUSY';
}

/**
 * Retry wrapper with exponential backoff for SQLITE_BUSY errors.
 * Wraps write operations that may fail under concurrent access.
 */
export async function withRetry<T>(fn: () => T, maxRetries = 3): Promise<T> {
  for (let i = 0; i < maxRetries; i++) {
    try {
      return fn();
    } catch (err: unknown) {
      if (isBusyError(err) && i < maxRetries - 1) {
        log.warn(`Database busy, retrying (attempt ${i + 2} of ${maxRetries})`);
        await sleep(100 * Math.pow(2, i)); // 100ms, 200ms, 400ms
        continue;
      }
      throw err;
    }
  }
  throw new Error('withRetry: max retries exceeded');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (raw exec, pragmas, etc).
 */
export function getRawDb(db: CadenceDb): Database.Database {
  const raw = rawConnections.get(db);
  if (!raw) throw new Error('Database was not created with createDb');
  return raw;
}

/** Get the file path of the database ('' for in-memory databases) */
export function getDbPath(db: CadenceDb): string {
  const list = getRawDb(db).pragma('database_list') as Array<{ file: string }>;
  return list[0]?.file ?? '';
}
