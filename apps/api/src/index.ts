import { ConfigError, closeDb, createDb, createLogger, loadConfig } from '@tasklane/core';
import type { AppConfig } from '@tasklane/core';
import { buildApp } from './app.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err: unknown) {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
}

const logger = createLogger({ level: config.logLevel, pretty: config.logPretty, name: 'tasklane-api' });
const db = createDb(config.dbPath);
const app = buildApp({ db, logger });

app.addHook('onClose', async () => {
  closeDb(db);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  });
}

try {
  await app.listen({ host: config.host, port: config.port });
  logger.info({ dbPath: config.dbPath }, 'database ready');
} catch (err: unknown) {
  logger.fatal({ err }, 'failed to start');
  closeDb(db);
  process.exit(1);
}
