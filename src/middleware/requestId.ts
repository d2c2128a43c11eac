import { randomUUID } from 'node:crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Propagates the caller's x-request-id (or mints one) on the request, its
 * log line and the response.
 */
export async function requestIdMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const existing = request.headers['x-request-id'];
  const requestId =
    typeof existing === 'string' && existing.length > 0 && existing.length <= MAX_REQUEST_ID_LENGTH
      ? existing
      : randomUUID();

  request.requestId = requestId;
  request.log = request.log.child({ requestId });

  void reply.header('x-request-id', requestId);
}

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}
