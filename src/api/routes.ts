import type { FastifyInstance } from 'fastify';
import { createIntentHandler, type IntentBody } from './handlers/intent.handler.js';
import { createHealthHandler } from './handlers/health.handler.js';
import { createBearerAuth } from './auth.js';
import { intentRequestSchema, intentResponseSchema, healthResponseSchema } from './schemas/intent.schema.js';
import { errorResponseSchema } from './schemas/common.schema.js';
import type { IntentExtractionService } from '../services/extraction/IntentExtractionService.js';
import type { KeyRotator } from '../services/llm/KeyRotator.js';

export async function registerRoutes(
  fastify: FastifyInstance,
  extraction: IntentExtractionService,
  rotator: KeyRotator,
  apiToken: string | undefined
) {
  fastify.get('/health', {
    schema: {
      response: {
        200: healthResponseSchema,
      },
    },
    handler: createHealthHandler(),
  });

  fastify.post<{ Body: IntentBody }>('/intent-extractor/', {
    schema: {
      body: intentRequestSchema,
      response: {
        200: intentResponseSchema,
        401: errorResponseSchema,
        500: errorResponseSchema,
        502: errorResponseSchema,
      },
    },
    onRequest: createBearerAuth(apiToken),
    handler: createIntentHandler(extraction, rotator),
  });
}
