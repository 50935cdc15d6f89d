import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance } from 'fastify';
import { parseEnv, _resetEnvCache, type Env } from './config/index.js';
import { buildLoggerOptions } from './lib/logger.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { processorPlugin, type ProcessorPluginOptions } from './plugins/processor.js';
import { queuePlugin } from './plugins/queue.js';
import { redisPlugin } from './plugins/redis.js';
import { healthRoutes } from './routes/health.js';
import { flowRoutes } from './modules/flows/routes.js';

export interface BuildAppOptions {
  /** Raw env values layered over process.env (used in tests). */
  env?: Partial<Record<keyof Env, string>>;
  processor?: ProcessorPluginOptions['overrides'];
}

/**
 * Builds and configures the Fastify application instance.
 * Used for both production and testing (each test gets a fresh app instance).
 */
export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  if (options.env) {
    _resetEnvCache();
  }
  const config = parseEnv(options.env ? { ...process.env, ...options.env } : process.env);

  const app = Fastify({
    logger: buildLoggerOptions(config),
    requestIdLogLabel: 'requestId',
    genReqId: () => randomUUID(),
  });

  // ── Plugins ─────────────────────────────────────────────────────────────
  await app.register(errorHandlerPlugin);
  await app.register(processorPlugin, {
    config,
    ...(options.processor ? { overrides: options.processor } : {}),
  });

  // Redis + BullMQ; skipped when FLOWQA_SKIP_QUEUE is set (tests without infrastructure)
  if (!config.FLOWQA_SKIP_QUEUE) {
    await app.register(redisPlugin, { config });
    await app.register(queuePlugin, { config });
  } else {
    app.decorate('redis', undefined);
    app.log.info('Queue disabled (FLOWQA_SKIP_QUEUE); serving diagnostics only');
  }

  // ── Routes ──────────────────────────────────────────────────────────────
  await app.register(healthRoutes, {
    runnerConfigured: Boolean(config.FLOWQA_RUNNER_URL),
    chunkServiceConfigured: Boolean(config.FLOWQA_CHUNK_SERVICE_URL),
  });
  await app.register(flowRoutes);

  return app;
}
