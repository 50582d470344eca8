import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { ConfigurationError, UpstreamError } from '../../utils/errors.js';
import type { IntentKind } from '../../domain/intents/IntentKind.js';
import type { IntentExtractionService } from '../../services/extraction/IntentExtractionService.js';
import type { KeyRotator } from '../../services/llm/KeyRotator.js';

export interface IntentBody {
  inputs: string[];
  kind?: IntentKind;
}

export const DEFAULT_INTENT_KIND: IntentKind = 'detailed_intent';

export function createIntentHandler(extraction: IntentExtractionService, rotator: KeyRotator) {
  return async (
    request: FastifyRequest<{ Body: IntentBody }>,
    reply: FastifyReply
  ) => {
    try {
      const { inputs, kind = DEFAULT_INTENT_KIND } = request.body;
      const apiKey = rotator.advance();

      logger.debug({ kind, count: inputs.length, keySlot: rotator.position }, 'Intent extraction request');

      const response = await extraction.extract(kind, inputs, apiKey);

      return reply.code(200).send({ response });
    } catch (error) {
      logger.error({ error }, 'Intent extraction handler error');

      if (error instanceof UpstreamError) {
        return reply.code(502).send({ error: error.code, message: error.message });
      }

      if (error instanceof ConfigurationError) {
        return reply.code(500).send({ error: error.code, message: error.message });
      }

      return reply.code(500).send({
        error: 'INTERNAL_ERROR',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  };
}
