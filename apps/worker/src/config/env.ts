import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

/**
 * Zod schema for all environment variables.
 * Validation fails fast at startup if any variable is invalid.
 */
const envSchema = z.object({
  // Diagnostics server
  FLOWQA_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  FLOWQA_HOST: z.string().default('0.0.0.0'),
  FLOWQA_NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  FLOWQA_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Redis (BullMQ job intake)
  FLOWQA_REDIS_HOST: z.string().min(1).default('localhost'),
  FLOWQA_REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  FLOWQA_REDIS_PASSWORD: z.string().optional(),
  FLOWQA_WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  // Unit/route tests run without Redis
  FLOWQA_SKIP_QUEUE: booleanFlag,

  // Flows
  FLOWQA_FLOWS_DIR: z.string().min(1).optional(),
  FLOWQA_DEFAULT_FLOW: z.string().min(1).default('qa_default'),
  // Flows that predate annotation support; their outputs are not enriched.
  FLOWQA_LEGACY_CITATION_FLOWS: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0)),

  // Flow runtime
  FLOWQA_RUNNER_URL: z.string().url().optional(),
  FLOWQA_RUNNER_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30 * 60 * 1000),

  // Chunk service used for citation enrichment
  FLOWQA_CHUNK_SERVICE_URL: z.string().url().optional(),
  FLOWQA_CHUNK_SERVICE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Parse and validate environment variables.
 * Throws with a human-readable message on failure.
 * Returns cached result on subsequent calls.
 */
export function parseEnv(raw: NodeJS.ProcessEnv = process.env): Env {
  if (_env !== null) return _env;

  const result = envSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${errors}\n\nCheck your .env file.`);
  }

  _env = result.data;
  return _env;
}

/** Reset cached env (tests only). */
export function _resetEnvCache(): void {
  _env = null;
}
