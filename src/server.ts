import Fastify, { type FastifyInstance } from 'fastify';
import { type Config, loadConfig } from './config.js';
import { type ProviderRegistry, createDefaultRegistry } from './core/ProviderRegistry.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { healthRoutes } from './routes/health.js';
import { createModelRoutes } from './routes/models.js';
import { createChatRoutes } from './routes/chat.js';

export interface AppDependencies {
  config?: Config;
  registry?: ProviderRegistry;
}

export async function buildApp(deps: AppDependencies = {}): Promise<FastifyInstance> {
  const config = deps.config ?? loadConfig();

  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      redact: ['req.headers.authorization', 'req.headers["x-api-key"]'],
    },
    disableRequestLogging: false,
    trustProxy: true,
  });

  // ── Dependency injection ────────────────────────────────────────────────

  const registry = deps.registry ?? createDefaultRegistry(config);
  const authMiddleware = createAuthMiddleware(config.API_KEY);

  // ── Routes ──────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes);
  await fastify.register(createModelRoutes(registry, authMiddleware));
  await fastify.register(
    createChatRoutes(registry, authMiddleware, { historyOffset: config.HISTORY_OFFSET })
  );

  // ── Error handler ───────────────────────────────────────────────────────

  fastify.setErrorHandler(async (error, _request, reply) => {
    fastify.log.error({ err: error }, 'Unhandled error');
    return reply.status(error.statusCode ?? 500).send({
      error: {
        message: error.message,
        type: 'api_error',
        code: 'internal_server_error',
      },
    });
  });

  return fastify;
}

// ── Entrypoint ──────────────────────────────────────────────────────────────

if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  const config = loadConfig();
  const app = await buildApp({ config });

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
    app.log.info(`stream-sanitizer listening on ${config.HOST}:${config.PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}
