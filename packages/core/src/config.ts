/**
 * Environment configuration shared by the API and the CLI.
 */

import { z } from 'zod';
import { getDefaultDbPath } from './db.js';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './logging/logger.js';
import type { LogLevel } from './logging/logger.js';
import { toValidationDetails } from './validation/task-validator.js';

export interface AppConfig {
  /** SQLite file path, or ':memory:' */
  dbPath: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  logPretty: boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1, 'must not be empty').optional(),
  HOST: z.string().trim().min(1, 'must not be empty').default('127.0.0.1'),
  PORT: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .min(1, 'must be between 1 and 65535')
    .max(65535, 'must be between 1 and 65535')
    .default(8000),
  LOG_LEVEL: z.string()
    .trim()
    .toLowerCase()
    .refine(isLogLevel, `must be one of ${LOG_LEVELS.join(', ')}`)
    .default('info'),
  LOG_PRETTY: z.enum(['true', 'false', '1', '0'], { errorMap: () => ({ message: 'must be true or false' }) })
    .default('false'),
});

/** `file:./data/tasks.db` and `./data/tasks.db` name the same file */
export function resolveDbPath(databaseUrl: string | undefined): string {
  if (!databaseUrl) return getDefaultDbPath();
  return databaseUrl.replace(/^file:/, '');
}

/** Read configuration from the environment; throws ConfigError listing every bad key */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new ConfigError(toValidationDetails(parsed.error));

  const vars = parsed.data;
  return {
    dbPath: resolveDbPath(vars.DATABASE_URL),
    host: vars.HOST,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    logPretty: vars.LOG_PRETTY === 'true' || vars.LOG_PRETTY === '1',
  };
}
