import { timingSafeEqual, createHash } from 'node:crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';

export type AuthMiddleware = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

/**
 * Timing-safe API key verification for the /v1 routes.
 * Accepts both `Authorization: Bearer <key>` and `x-api-key: <key>`.
 *
 * Without a configured key the shim is open and the middleware passes
 * every request through.
 */
export function createAuthMiddleware(apiKey: string | undefined): AuthMiddleware {
  if (!apiKey) {
    return async function openAccess(): Promise<void> {};
  }

  // Pre-hash the key to ensure fixed-length comparison
  const expectedBuffer = createHash('sha256').update(apiKey).digest();

  return async function authMiddleware(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    const token = extractToken(request);

    if (!token) {
      await reply.status(401).send({
        error: {
          message: 'Missing authentication. Provide Authorization: Bearer <key> or x-api-key: <key>',
          type: 'invalid_request_error',
          code: 'missing_api_key',
        },
      });
      return;
    }

    const providedBuffer = createHash('sha256').update(token).digest();

    if (!timingSafeEqual(expectedBuffer, providedBuffer)) {
      await reply.status(401).send({
        error: {
          message: 'Invalid API key',
          type: 'invalid_request_error',
          code: 'invalid_api_key',
        },
      });
    }
  };
}

/**
 * Priority: x-api-key header → Authorization: Bearer token
 */
function extractToken(request: FastifyRequest): string | null {
  const xApiKey = request.headers['x-api-key'];
  if (typeof xApiKey === 'string' && xApiKey.trim()) {
    return xApiKey.trim();
  }

  const authHeader = request.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7).trim() || null;
  }

  return null;
}
