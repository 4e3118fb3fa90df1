import { describe, it, expect, vi } from 'vitest';
import { CompletionLedger, MemoryCompletionStore, indexByDay } from '../../src/ledger/completion-ledger.js';
import type { Logger } from '../../src/logging/log-buffer.js';
import type { Completion } from '../../src/types/task.js';

function completion(id: string, taskId: string, occurrenceDay: number): Completion {
  return { id, taskId, occurrenceDay, completedAt: '2024-01-01T08:00:00.000Z' };
}

function fakeLogger(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('CompletionLedger.toggle', () => {
  it('records a completion stamped with the given time', () => {
    const store = new MemoryCompletionStore();
    const ledger = new CompletionLedger('abc', store, fakeLogger());
    const now = new Date('2024-01-05T09:30:00.000Z');

    expect(ledger.toggle(100, now)).toBe(true);
    expect(ledger.isCompletedOn(100)).toBe(true);

    const [saved] = store.all();
    expect(saved?.taskId).toBe('abc');
    expect(saved?.occurrenceDay).toBe(100);
    expect(saved?.completedAt).toBe('2024-01-05T09:30:00.000Z');
  });

  it('removes the completion on the second toggle', () => {
    const store = new MemoryCompletionStore();
    const ledger = new CompletionLedger('abc', store, fakeLogger());

    ledger.toggle(100);
    expect(ledger.toggle(100)).toBe(false);
    expect(ledger.isCompletedOn(100)).toBe(false);
    expect(store.all()).toHaveLength(0);
  });

  it('returns to the original state after an even number of toggles', () => {
    const store = new MemoryCompletionStore([completion('c1', 'abc', 99)]);
    const ledger = new CompletionLedger('abc', store, fakeLogger());

    for (let i = 0; i < 4; i++) ledger.toggle(100);
    expect([...ledger.occurrenceDays()]).toEqual([99]);
  });

  it('keeps at most one completion per day', () => {
    const store = new MemoryCompletionStore();
    const ledger = new CompletionLedger('abc', store, fakeLogger());

    ledger.toggle(100);
    ledger.toggle(101);
    ledger.toggle(100);
    ledger.toggle(100);
    expect(store.all().filter(c => c.occurrenceDay === 100)).toHaveLength(1);
    expect(ledger.occurrenceDays().size).toBe(2);
  });

  it('clears every duplicate for the day in one toggle', () => {
    const store = new MemoryCompletionStore([
      completion('c1', 'abc', 100),
      completion('c2', 'abc', 100),
    ]);
    const ledger = new CompletionLedger('abc', store, fakeLogger());

    expect(ledger.toggle(100)).toBe(false);
    expect(store.all()).toHaveLength(0);
  });

  it('leaves other tasks alone', () => {
    const store = new MemoryCompletionStore([completion('c1', 'xyz', 100)]);
    const ledger = new CompletionLedger('abc', store, fakeLogger());

    expect(ledger.toggle(100)).toBe(true);
    expect(store.all()).toHaveLength(2);
    expect(store.listCompletions('xyz')).toHaveLength(1);
  });
});

describe('CompletionLedger queries', () => {
  it('reports whether anything was ever completed', () => {
    const store = new MemoryCompletionStore();
    const ledger = new CompletionLedger('abc', store, fakeLogger());
    expect(ledger.hasAnyCompletion()).toBe(false);
    ledger.toggle(5);
    expect(ledger.hasAnyCompletion()).toBe(true);
  });

  it('clear removes all of the task\'s completions', () => {
    const store = new MemoryCompletionStore([
      completion('c1', 'abc', 1),
      completion('c2', 'abc', 2),
      completion('c3', 'xyz', 2),
    ]);
    const ledger = new CompletionLedger('abc', store, fakeLogger());

    expect(ledger.clear()).toBe(2);
    expect(store.all().map(c => c.id)).toEqual(['c3']);
    expect(ledger.clear()).toBe(0);
  });
});

describe('indexByDay', () => {
  it('drops completions of other tasks and warns', () => {
    const logger = fakeLogger();
    const index = indexByDay('abc', [completion('c1', 'abc', 1), completion('c2', 'xyz', 2)], logger);

    expect([...index.keys()]).toEqual([1]);
    expect(logger.warn).toHaveBeenCalledWith('Ignoring completion c2: belongs to task xyz, not abc');
  });

  it('keeps the first completion of a duplicated day', () => {
    const logger = fakeLogger();
    const index = indexByDay('abc', [completion('c1', 'abc', 1), completion('c2', 'abc', 1)], logger);

    expect(index.get(1)?.id).toBe('c1');
    expect(logger.warn).toHaveBeenCalledWith('Ignoring duplicate completion c2 for task abc');
  });
});
