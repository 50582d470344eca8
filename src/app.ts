import Fastify, { type FastifyBaseLogger, type FastifyError } from 'fastify';
import { logger } from './utils/logger.js';
import { registerRoutes } from './api/routes.js';
import type { IntentExtractionService } from './services/extraction/IntentExtractionService.js';
import type { KeyRotator } from './services/llm/KeyRotator.js';

export interface AppDeps {
  extraction: IntentExtractionService;
  rotator: KeyRotator;
  apiToken: string | undefined;
}

const loggerInstance: FastifyBaseLogger = logger;

export async function buildApp(deps: AppDeps) {
  const fastify = Fastify({ loggerInstance });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({
        error: 'BAD_REQUEST',
        message: error.message,
      });
    }

    if (error.statusCode && error.statusCode < 500) {
      logger.warn({ error, url: request.url }, 'Bad request');
      return reply.code(error.statusCode).send({
        error: 'BAD_REQUEST',
        message: error.message,
      });
    }

    logger.error({ error, url: request.url }, 'Request error');
    return reply.code(500).send({
      error: 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  await registerRoutes(fastify, deps.extraction, deps.rotator, deps.apiToken);

  return fastify;
}
