/**
 * Thrown error types. Expected outcomes (not-found, invalid input) travel as
 * `DataResult` values instead; these cover the cases a caller cannot fix by
 * changing its request.
 */

import type { ValidationDetails } from './types/results.js';
import { isSqliteError } from './db.js';

/** Storage failure (connection, constraint, I/O). Fatal to the current operation. */
export class StorageError extends Error {
  override readonly name = 'StorageError';
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.operation = operation;
  }
}

/** Exception form of a validation failure, for callers that prefer to throw */
export class TaskValidationError extends Error {
  override readonly name = 'TaskValidationError';
  readonly details: ValidationDetails;

  constructor(details: ValidationDetails) {
    const fields = Object.keys(details).join(', ');
    super(`Validation failed for: ${fields}`);
    this.details = details;
  }
}

/** Invalid environment configuration */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly details: ValidationDetails;

  constructor(details: ValidationDetails) {
    const lines = Object.entries(details).map(([key, message]) => `${key}: ${message}`);
    super(`Invalid configuration\n${lines.join('\n')}`);
    this.details = details;
  }
}

/**
 * Run a storage operation, converting SQLite failures into StorageError.
 * Anything else (a bug) propagates unchanged.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err: unknown) {
    if (isSqliteError(err)) {
      throw new StorageError(operation, err.message, { cause: err });
    }
    throw err;
  }
}
