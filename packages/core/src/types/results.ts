/** Outcome of a single write operation */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: string }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: string }
  | { readonly type: 'no-change'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export interface BatchResult {
  readonly results: readonly TaskResult[];
}

/** Not found and validation failures both count as failed */
export function isError(r: TaskResult | DataResult<unknown>): boolean {
  return r.type === 'error' || r.type === 'not-found';
}

export function successCount(batch: BatchResult): number {
  return batch.results.filter(r => r.type === 'success').length;
}

export function anyFailed(batch: BatchResult): boolean {
  return batch.results.some(r => isError(r));
}
