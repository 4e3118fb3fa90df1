import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import {
  createDb, createTestDb, getRawDb, getDbPath, getDefaultDbPath, CREATE_SCHEMA_SQL, withRetry,
} from '../src/db.js';
import { getTaskById } from '../src/queries/task-queries.js';

function busyError(): Error {
  return Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });
}

describe('createDb', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) {
      rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = null;
    }
  });

  it('creates an in-memory database', () => {
    const db = createDb(':memory:');
    const raw = getRawDb(db);
    expect(raw.name).toBe(':memory:');
    raw.close();
  });

  it('creates a file-based database and parent directories', () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'cadence-db-test-'));
    const dbPath = join(tmpDir, 'nested', 'dir', 'cadence.db');

    const db = createDb(dbPath);
    const raw = getRawDb(db);

    expect(existsSync(dbPath)).toBe(true);
    expect(getDbPath(db)).toMatch(/cadence\.db$/);
    expect(raw.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(raw.pragma('foreign_keys', { simple: true })).toBe(1);
    raw.close();
  });

  it('adds columns missing from older databases', () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'cadence-db-test-'));
    const dbPath = join(tmpDir, 'old.db');

    const old = new Database(dbPath);
    old.exec(`
      CREATE TABLE tasks (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        category TEXT,
        is_recurring INTEGER DEFAULT 0,
        created_at TEXT NOT NULL,
        sort_order INTEGER DEFAULT 0,
        is_active INTEGER DEFAULT 1
      );
      INSERT INTO tasks (id, title, is_recurring, created_at) VALUES ('old', 'Stretch', 1, '2024-01-01T08:00:00.000Z');
    `);
    old.close();

    const db = createDb(dbPath);
    const raw = getRawDb(db);
    const columns = (raw.prepare('SELECT name FROM pragma_table_info(?)').all('tasks') as Array<{ name: string }>)
      .map(c => c.name);
    expect(columns).toEqual(expect.arrayContaining(['recurrence_type', 'weekdays', 'month_days', 'start_date']));

    // Legacy rows decode through the recurring flag
    const task = getTaskById(db, 'old');
    expect(task?.rule).toEqual({ kind: 'daily' });
    expect(task?.startDate).toBeNull();
    raw.close();
  });
});

describe('createTestDb', () => {
  it('creates schema tables', () => {
    const db = createTestDb();
    const raw = getRawDb(db);
    const tables = raw.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    ).all() as Array<{ name: string }>;

    expect(tables.map(t => t.name)).toEqual(['categories', 'completions', 'config', 'tasks']);
  });

  it('enforces one completion per task and day', () => {
    const raw = getRawDb(createTestDb());
    raw.exec("INSERT INTO tasks (id, title, created_at) VALUES ('abc', 'Read', '2024-01-01')");
    const insert = raw.prepare(
      "INSERT INTO completions (id, task_id, completed_at, occurrence_day) VALUES (?, 'abc', '2024-01-01T08:00:00.000Z', '2024-01-01')",
    );
    insert.run('c1');
    expect(() => insert.run('c2')).toThrow();
  });
});

describe('getDefaultDbPath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('honours CADENCE_DB', () => {
    vi.stubEnv('CADENCE_DB', '/tmp/elsewhere/cadence.db');
    expect(getDefaultDbPath()).toBe('/tmp/elsewhere/cadence.db');
  });

  it('falls back to a cadence data directory', () => {
    vi.stubEnv('CADENCE_DB', '');
    expect(getDefaultDbPath()).toMatch(/cadence[\\/]cadence\.db$/);
  });
});

describe('getRawDb', () => {
  it('returns the underlying better-sqlite3 instance', () => {
    const db = createTestDb();
    const raw = getRawDb(db);
    expect(typeof raw.prepare).toBe('function');
    expect(typeof raw.exec).toBe('function');
  });
});

describe('withRetry', () => {
  it('returns the result on success', async () => {
    const result = await withRetry(() => 42);
    expect(result).toBe(42);
  });

  it('retries on SQLITE_BUSY and succeeds', async () => {
    let attempts = 0;
    const result = await withRetry(() => {
      attempts++;
      if (attempts < 3) throw busyError();
      return 'ok';
    }, 3);

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('throws after max retries', async () => {
    await expect(withRetry(() => { throw busyError(); }, 2)).rejects.toThrow('database is locked');
  });

  it('throws non-BUSY errors immediately', async () => {
    let attempts = 0;
    await expect(withRetry(() => {
      attempts++;
      throw new Error('unrelated error');
    }, 3)).rejects.toThrow('unrelated error');

    expect(attempts).toBe(1);
  });
});

describe('CREATE_SCHEMA_SQL', () => {
  it('is idempotent (can run twice without error)', () => {
    const db = createTestDb();
    const raw = getRawDb(db);
    expect(() => raw.exec(CREATE_SCHEMA_SQL)).not.toThrow();
  });
});
