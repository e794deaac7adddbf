/**
 * Application bootstrap shared by the server entry point and the CLI.
 */

import type { FastifyInstance } from 'fastify';
import type { Config } from './config.js';
import { buildServer } from './server.js';
import { ChatController } from './services/chat.js';
import { AiSdkCompletionClient } from './services/llm.js';
import { TranscriptStore } from './services/transcript-store.js';
import { logger } from './utils/logger.js';

export interface RunningApp {
  server: FastifyInstance;
  controller: ChatController;
  address: string;
}

/**
 * Build the controller for a database and serve it over HTTP until closed.
 */
export async function startServer(config: Config, databasePath: string): Promise<RunningApp> {
  const store = new TranscriptStore(config.MESSAGE_LOGS_PATH);
  const completionClient = new AiSdkCompletionClient(config.LLM_CONFIG);

  let controller: ChatController;
  try {
    controller = await ChatController.create({
      completionClient,
      store,
      taskTemplatePath: config.TASK_TEMPLATE_PATH,
      databasePath,
      interCallDelayMs: config.INTER_CALL_DELAY_MS,
    });
  } catch (error) {
    await store.close();
    throw error;
  }

  const server = await buildServer(controller);

  /**
   * Lifecycle hooks.
   */
  server.addHook('onClose', async () => {
    logger.info('Shutting down sqlchat server...');
    await store.close();
  });

  const address = await server.listen({ port: config.PORT, host: config.HOST });
  logger.info(`Server running at ${address}`);
  logger.info(`API docs at ${address}/docs`);

  return { server, controller, address };
}
