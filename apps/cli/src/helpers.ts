/**
 * CLI helpers: argument parsing, result handling, error handling.
 */

import type { DataResult, TaskId } from '@tasklane/core';
import {
  Priority, StorageError, TaskValidationError,
  isNotFound, isSuccess, parseDate,
} from '@tasklane/core';
import * as out from './output.js';

const PRIORITY_NAMES: Record<string, number> = {
  lowest: Priority.Lowest,
  low: Priority.Low,
  medium: Priority.Medium,
  high: Priority.High,
  highest: Priority.Highest,
};

/**
 * Parse a priority argument: a name (low, high, ...), a number or p<number>.
 * Numbers are passed through unchecked so range errors come from validation.
 */
export function parsePriorityArg(level: string): number | null {
  const normalized = level.trim().toLowerCase();
  const named = PRIORITY_NAMES[normalized];
  if (named !== undefined) return named;

  const digits = normalized.startsWith('p') ? normalized.slice(1) : normalized;
  if (!/^-?\d+$/.test(digits)) return null;
  return Number(digits);
}

/** Resolve friendly dates (tomorrow, +3d, friday); unknown input is kept for validation to report */
export function parseDueArg(input: string, now?: Date): string {
  return parseDate(input, now) ?? input;
}

export function parseTaskIdArg(raw: string): TaskId | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/**
 * Unwrap a repository result: data on success, null (after reporting) when
 * the task is missing. Validation failures are thrown for `$try` to print.
 */
export function unwrap<T>(result: DataResult<T>, taskId?: TaskId): T | null {
  if (isSuccess(result)) return result.data;
  if (isNotFound(result)) {
    out.error(`Task not found: ${taskId ?? result.taskId}`);
    process.exitCode = 1;
    return null;
  }
  throw new TaskValidationError(result.details);
}

/**
 * Wrap a command action with error handling.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    process.exitCode = 1;
    if (err instanceof TaskValidationError) {
      out.validationErrors(err.details);
    } else if (err instanceof StorageError) {
      out.error(`Storage error: ${err.message}`);
    } else if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
  }
}
