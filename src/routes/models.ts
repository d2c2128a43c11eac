import type { FastifyInstance } from 'fastify';
import { type ProviderRegistry } from '../core/ProviderRegistry.js';
import { type ModelEntry } from '../types/request.js';
import { type AuthMiddleware } from '../middleware/auth.js';
import { requestIdMiddleware } from '../middleware/requestId.js';

export function createModelRoutes(registry: ProviderRegistry, authMiddleware: AuthMiddleware) {
  return async function modelRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get(
      '/v1/models',
      { preHandler: [requestIdMiddleware, authMiddleware] },
      async (_request, reply) => {
        const data: ModelEntry[] = registry.modelSpecs().map((id) => ({
          id,
          object: 'model',
          owned_by: id.slice(0, id.indexOf('/')),
        }));
        return reply.status(200).send({ object: 'list', data });
      }
    );
  };
}
