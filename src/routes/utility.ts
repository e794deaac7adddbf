/**
 * Utility endpoints (API status, health).
 */

import { FastifyInstance } from 'fastify';
import type { ChatController } from '../services/chat.js';
import { listTables } from '../services/database.js';

export interface UtilityRouteOptions {
  controller: ChatController;
}

export async function utilityRoutes(fastify: FastifyInstance, opts: UtilityRouteOptions) {
  const { controller } = opts;

  // GET /api - API status check
  fastify.get('/api', async () => {
    return { message: 'API Ready' };
  });

  // GET /health - Health check
  fastify.get('/health', async () => {
    const tables = await listTables(controller.databasePath);
    return {
      status: 'ok',
      session_id: controller.sessionId,
      llm: {
        provider: controller.provider,
        model: controller.model,
      },
      database: {
        path: controller.databasePath,
        tables,
      },
    };
  });
}
