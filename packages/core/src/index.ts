// Types
export {
  Priority, PriorityName, PRIORITY_MIN, PRIORITY_MAX, isPriority,
  TaskVisibility, TASK_VISIBILITIES,
  isSuccess, isNotFound,
} from './types/index.js';
export type {
  TaskId, TagId, Tag, Task, TaskListQuery,
  DataResult, CreateResult, ValidationResult, ValidationDetails,
} from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export {
  createDb, createTestDb, getRawDb, closeDb, getDefaultDbPath, isSqliteError,
  CREATE_SCHEMA_SQL, MEMORY_DB_PATH,
} from './db.js';
export type { AppDb, DbExecutor, SqliteError } from './db.js';

// Errors
export { StorageError, TaskValidationError, ConfigError, withStorage } from './errors.js';

// Config
export { loadConfig, resolveDbPath } from './config.js';
export type { AppConfig } from './config.js';

// Logging
export { createLogger, LOG_LEVELS } from './logging/index.js';
export type { Logger, LoggerOptions, LogLevel } from './logging/index.js';

// Parsers
export { parseDate, formatDate, addDays, isIsoDate, todayString, parseTagList } from './parsers/index.js';

// Validation
export * from './validation/index.js';

// Queries
export * from './queries/index.js';
