#!/usr/bin/env node
/**
 * sqlchat CLI
 * Serve a chat over a SQLite database, create databases, ask questions.
 */

import { cac } from 'cac';
import { z } from 'zod';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { startServer } from './app.js';
import { runCreateDatabase } from './cli/create-db.js';
import * as logger from './cli/logger.js';
import { ConfigError } from './types/errors.js';
import { NO_SQL } from './types/models.js';

const cli = cac('sqlchat');

const VERSION = '1.0.0';

cli.version(VERSION);
cli.help();

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load configuration or print every invalid variable and exit.
 */
function loadCliConfig(port?: number): Config {
  try {
    return loadConfig(port === undefined ? process.env : { ...process.env, PORT: String(port) });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Configuration validation failed');
      for (const issue of error.issues) {
        logger.field('invalid', issue, false);
      }
      logger.info('Set the variables in your environment or a .env file');
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Shape of the /api/chat response the CLI prints.
 */
const TurnResponseSchema = z
  .object({
    session_id: z.string(),
    status: z.enum(['ok', 'error']),
    model: z.string(),
    latency_ms: z.number().optional(),
    token_usage: z
      .object({
        prompt_tokens: z.number(),
        completion_tokens: z.number(),
        total_tokens: z.number(),
      })
      .optional(),
    SQL: z.unknown().optional(),
    Answer: z.unknown().optional(),
  })
  .passthrough();

/**
 * sqlchat serve <database>
 * Start the chat server on a SQLite file
 */
cli
  .command('serve [database]', 'Start the chat server on a SQLite database')
  .option('-p, --port <port>', 'Server port')
  .action(async (database: string | undefined, options: { port?: number }) => {
    logger.printBanner(VERSION);

    const config = loadCliConfig(options.port);

    const databasePath = database ?? config.DATABASE_PATH;
    if (!databasePath) {
      logger.error('Database filepath argument required', 'Usage: sqlchat serve <DATABASE_FILEPATH>');
      process.exit(1);
    }

    try {
      const { server, controller, address } = await startServer(config, databasePath);
      logger.success('Server started');
      logger.panel('sqlchat', [
        ['Database', controller.databasePath],
        ['Session', controller.sessionId],
        ['Model', `${controller.provider}/${controller.model}`],
        ['Chat', address],
        ['API docs', `${address}/docs`],
      ]);

      process.on('SIGINT', () => {
        logger.info('Keyboard interrupt received. Server stopping...');
        server.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error('Error during shutdown', describeError(error));
            process.exit(1);
          }
        );
      });
    } catch (error) {
      logger.failurePanel('Failed to start server', describeError(error));
      process.exit(1);
    }
  });

/**
 * sqlchat create-db <handle> <script>
 * Build ./data/<handle>/data.sqlite from a SQL script
 */
cli
  .command('create-db <handle> <script>', 'Create ./data/<handle>/data.sqlite from a SQL script')
  .example('sqlchat create-db shop sql/example.sql')
  .action((handle: string, script: string) => {
    try {
      runCreateDatabase(handle, script);
    } catch (error) {
      logger.error('Error while creating database', describeError(error));
      process.exit(1);
    }
  });

/**
 * sqlchat ask <text>
 * Send one message to a running server
 */
cli
  .command('ask <text>', 'Send a message to a running sqlchat server')
  .option('--url <url>', 'Server address', { default: 'http://localhost:8000' })
  .action(async (text: string, options: { url: string }) => {
    logger.info(`Message: "${text}"`);

    try {
      const response = await fetch(`${options.url}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ message: text }),
      });

      if (!response.ok) {
        throw new Error(`Server answered ${response.status}: ${await response.text()}`);
      }

      const result = TurnResponseSchema.parse(await response.json());

      if (result.SQL !== undefined && result.SQL !== NO_SQL) {
        logger.heading('Generated SQL');
        logger.sqlBlock(typeof result.SQL === 'string' ? result.SQL : JSON.stringify(result.SQL));
      }

      if (result.Answer !== undefined) {
        logger.heading('Answer');
        console.log(typeof result.Answer === 'string' ? result.Answer : JSON.stringify(result.Answer, null, 2));
      }

      logger.heading('Turn');
      logger.field('Status', result.status, result.status === 'ok');
      logger.field('Model', result.model);
      if (result.latency_ms !== undefined) {
        logger.field('Latency', `${result.latency_ms}ms`);
      }
      if (result.token_usage) {
        logger.field('Tokens', String(result.token_usage.total_tokens));
      }
      console.log('');
    } catch (error) {
      logger.error('Request failed', describeError(error));
      logger.info('Make sure the server is running: sqlchat serve <database>');
      process.exit(1);
    }
  });

// Parse CLI arguments
cli.parse();
