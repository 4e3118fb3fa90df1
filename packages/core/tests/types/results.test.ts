import { describe, it, expect } from 'vitest';
import { isError, successCount, anyFailed } from '../../src/types/results.js';
import type { BatchResult } from '../../src/types/results.js';

describe('isError', () => {
  it('treats not-found and error as failures', () => {
    expect(isError({ type: 'error', message: 'bad' })).toBe(true);
    expect(isError({ type: 'not-found', taskId: 'abc' })).toBe(true);
  });

  it('does not treat success or no-change as failures', () => {
    expect(isError({ type: 'success', message: 'ok' })).toBe(false);
    expect(isError({ type: 'success', data: 1, message: 'ok' })).toBe(false);
    expect(isError({ type: 'no-change', message: 'same' })).toBe(false);
  });
});

describe('batch helpers', () => {
  const batch: BatchResult = {
    results: [
      { type: 'success', message: 'a' },
      { type: 'no-change', message: 'b' },
      { type: 'success', message: 'c' },
    ],
  };

  it('counts successes', () => {
    expect(successCount(batch)).toBe(2);
    expect(successCount({ results: [] })).toBe(0);
  });

  it('reports whether anything failed', () => {
    expect(anyFailed(batch)).toBe(false);
    expect(anyFailed({ results: [...batch.results, { type: 'not-found', taskId: 'zzz' }] })).toBe(true);
  });
});
