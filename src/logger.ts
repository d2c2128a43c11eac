import { pino, type Logger } from 'pino';

const ROOT_NAME = 'stream-sanitizer';

/**
 * Root logger for library code. The HTTP shim logs through fastify's own
 * pino instance instead.
 */
export const rootLogger: Logger = pino({
  name: ROOT_NAME,
  level: process.env['LOG_LEVEL'] ?? 'info',
});

/**
 * Child logger tagged with the module it belongs to.
 *
 * @example
 * ```typescript
 * const log = createLogger('provider:zai');
 * log.debug({ model }, 'request sent');
 * ```
 */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

export type { Logger };
