#!/usr/bin/env tsx

import { ConfigError, closeDb, createDb, createLogger, loadConfig } from '@tasklane/core';
import type { AppConfig } from '@tasklane/core';
import { createProgram } from './program.js';
import * as out from './output.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err: unknown) {
  if (err instanceof ConfigError) {
    out.error(err.message);
    process.exit(1);
  }
  throw err;
}

// Diagnostics go to stderr so they never mix with command output
const logger = createLogger({ level: config.logLevel, name: 'tasklane-cli', destination: process.stderr });

const db = createDb(config.dbPath);
logger.debug({ dbPath: config.dbPath }, 'database opened');

try {
  createProgram(db).parse();
} finally {
  closeDb(db);
}
