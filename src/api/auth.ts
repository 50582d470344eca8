import { timingSafeEqual } from 'crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../utils/logger.js';
import { ConfigurationError, UnauthorizedError } from '../utils/errors.js';

function tokensMatch(received: string, expected: string): boolean {
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** onRequest hook that requires `Authorization: Bearer <apiToken>`. */
export function createBearerAuth(apiToken: string | undefined) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!apiToken) {
      const error = new ConfigurationError('API token is not configured');
      logger.error({ url: request.url }, error.message);
      return reply.code(500).send({ error: error.code, message: error.message });
    }

    const header = request.headers.authorization;
    if (!header || !tokensMatch(header, `Bearer ${apiToken}`)) {
      const error = new UnauthorizedError();
      logger.warn({ url: request.url, hasHeader: header !== undefined }, 'Rejected unauthorized request');
      return reply.code(401).send({ error: error.code, message: error.message });
    }
  };
}
