/**
 * Chat endpoints: submit turns and inspect or replace the session.
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ChatController } from '../services/chat.js';
import { ChatRequestSchema, ReconfigureRequestSchema } from '../types/models.js';

export interface ChatRouteOptions {
  controller: ChatController;
}

export const MISSING_MESSAGE_ERROR = 'The JSON payload is missing the "message" field';

export async function chatRoutes(fastify: FastifyInstance, opts: ChatRouteOptions) {
  const { controller } = opts;

  // POST /api/chat - Submit one user turn
  fastify.post(
    '/api/chat',
    {
      schema: {
        description: 'Send a message and receive the merged turn result',
        body: {
          type: 'object',
          properties: {
            message: { type: 'string' },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = ChatRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: MISSING_MESSAGE_ERROR });
      }
      return controller.submitTurn(parsed.data.message);
    }
  );

  // GET /api/chat - Only POST is supported
  fastify.get('/api/chat', async (_request, reply) => {
    return reply
      .status(405)
      .send({ error: 'This endpoint can only be called using a POST request' });
  });

  // GET /api/session - Current transcript
  fastify.get('/api/session', async () => {
    return controller.snapshot();
  });

  // POST /api/session/database - Start a new session on another database
  fastify.post(
    '/api/session/database',
    {
      schema: {
        description: 'Switch to another SQLite database and open a new session',
        body: {
          type: 'object',
          properties: {
            database_path: { type: 'string' },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = ReconfigureRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply
          .status(400)
          .send({ error: 'The JSON payload is missing the "database_path" field' });
      }
      const sessionId = await controller.reconfigure(parsed.data.database_path);
      return { session_id: sessionId, database_path: parsed.data.database_path };
    }
  );
}
