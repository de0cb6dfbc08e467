/**
 * Structured logging with pino.
 *
 * JSON lines with ISO timestamps by default; `pretty` routes through
 * pino-pretty for local development. The API hands the same instance to
 * Fastify so request logs and application logs share one stream.
 */

import { pino } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
  /** Write here instead of stdout (tests capture logs this way) */
  destination?: pino.DestinationStream;
}

export type Logger = pino.Logger;

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    name: options.name ?? 'tasklane',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.destination) {
    return pino(pinoOptions, options.destination);
  }

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions);
}
