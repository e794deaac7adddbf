/**
 * Fastify application wiring.
 */

import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import fastifyStatic from '@fastify/static';
import { join } from 'path';
import { rootDir } from './config.js';
import { loggerConfig } from './utils/logger.js';
import { chatRoutes } from './routes/chat.js';
import { utilityRoutes } from './routes/utility.js';
import type { ChatController } from './services/chat.js';
import {
  LLMError,
  ReplyParseError,
  SQLExecutionError,
  TemplateError,
} from './types/errors.js';

/**
 * Static files of the browser chat page.
 */
export const PUBLIC_DIR = join(rootDir, 'public');

export interface ServerOptions {
  /** Enable Fastify request logging (off in tests). */
  logger?: boolean;
}

/**
 * Create and configure the Fastify server around one controller.
 */
export async function buildServer(
  controller: ChatController,
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : loggerConfig,
  });

  // Plugins registered below inherit these handlers
  fastify.setNotFoundHandler((_request, reply) => {
    reply.status(404).send({ error: "Endpoint Doesn't exist" });
  });

  /**
   * Global error handler: every failure leaves the transport as a JSON body.
   */
  fastify.setErrorHandler<FastifyError>((error, _request, reply) => {
    if (error instanceof ReplyParseError) {
      reply.status(502).send({
        error: 'ReplyParseError',
        message: error.message,
        suggestion: 'The model did not answer with a JSON object; try rephrasing',
      });
    } else if (error instanceof LLMError) {
      reply.status(502).send({
        error: 'LLMError',
        message: 'Language model service unavailable',
        detail: error.message,
      });
    } else if (error instanceof SQLExecutionError) {
      reply.status(500).send({
        error: 'SQLExecutionError',
        message: error.message,
      });
    } else if (error instanceof TemplateError) {
      reply.status(500).send({
        error: 'TemplateError',
        message: error.message,
      });
    } else if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.code ?? 'BadRequest',
        message: error.message,
      });
    } else {
      reply.log.error({ err: error }, 'Unhandled error');
      reply.status(500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  /**
   * Register CORS plugin.
   */
  await fastify.register(cors, {
    origin: '*',
  });

  /**
   * Register Swagger documentation.
   */
  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'sqlchat API',
        description: 'Chat with a SQLite database in natural language',
        version: '1.0.0',
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  /**
   * Register route handlers.
   */
  await fastify.register(utilityRoutes, { controller });
  await fastify.register(chatRoutes, { controller });

  /**
   * Browser chat page.
   */
  await fastify.register(fastifyStatic, {
    root: PUBLIC_DIR,
    index: false,
    wildcard: false,
  });

  fastify.get('/', async (_request, reply) => {
    return reply.sendFile('index.html');
  });

  return fastify;
}
