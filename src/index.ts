/**
 * sqlchat server - Main Entry Point
 *
 * Usage: node dist/src/index.js <DATABASE_FILEPATH>
 * Falls back to DATABASE_PATH when no argument is given.
 */

import { loadConfig } from './config.js';
import { startServer } from './app.js';
import { logger } from './utils/logger.js';
import { ConfigError } from './types/errors.js';

const start = async () => {
  try {
    const config = loadConfig();
    const databasePath = process.argv[2] ?? config.DATABASE_PATH;
    if (!databasePath) {
      logger.error('Database filepath argument required. Usage: sqlchat <DATABASE_FILEPATH>');
      process.exit(1);
    }

    const { server } = await startServer(config, databasePath);

    process.on('SIGINT', () => {
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
    } else {
      logger.error({ err }, 'Failed to start server');
    }
    process.exit(1);
  }
};

void start();
