import type { TaskId } from './task.js';

/** Field name -> message. One entry per failing field. */
export type ValidationDetails = Readonly<Record<string, string>>;

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'invalid'; readonly details: ValidationDetails };

/** Creation has no target to miss */
export type CreateResult<T> = Exclude<DataResult<T>, { readonly type: 'not-found' }>;

export type ValidationResult<T> =
  | { readonly type: 'valid'; readonly value: T }
  | { readonly type: 'invalid'; readonly details: ValidationDetails };

// Helper functions
export function isSuccess<T>(r: DataResult<T>): r is { readonly type: 'success'; readonly data: T } {
  return r.type === 'success';
}

export function isNotFound<T>(r: DataResult<T>): r is { readonly type: 'not-found'; readonly taskId: TaskId } {
  return r.type === 'not-found';
}
