import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((s) => (s && s.trim() ? s.trim() : undefined));

export const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  // When set, every /v1 route requires it as a bearer token or x-api-key
  API_KEY: optionalString,

  // Upstream calls
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  DEFAULT_PROVIDER: z.string().min(1).default('openai-compatible'),

  // OpenAI-compatible upstream
  OPENAI_COMPATIBLE_BASE_URL: z.string().url().optional(),
  OPENAI_COMPATIBLE_API_KEY: optionalString,
  OPENAI_COMPATIBLE_MODEL: optionalString,

  // Z.AI
  ZAI_API_KEY: optionalString,

  // Conversation
  HISTORY_OFFSET: z.coerce.number().int().positive().default(10250),
  MAX_TOKENS: z.coerce.number().int().positive().default(600),
});

export type Config = z.infer<typeof envSchema>;

export type ConfigResult = { ok: true; config: Config } | { ok: false; issues: string[] };

export function parseConfig(env: NodeJS.ProcessEnv): ConfigResult {
  const result = envSchema.safeParse(env);
  if (result.success) return { ok: true, config: result.data };

  return {
    ok: false,
    issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = parseConfig(env);

  if (!result.ok) {
    const errors = result.issues.map((issue) => `  ${issue}`).join('\n');
    // eslint-disable-next-line no-console
    console.error(`\n[stream-sanitizer] Configuration error:\n${errors}\n`);
    process.exit(1);
  }

  return result.config;
}
