import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { Redis } from 'ioredis';
import type { Env } from '../config/index.js';

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis | undefined;
  }
}

/**
 * Redis plugin.
 * Opens the IORedis connection the health route pings. BullMQ keeps its own
 * connections (see the queue plugin).
 */
export const redisPlugin = fp(async function (app: FastifyInstance, options: { config: Env }): Promise<void> {
  const { config } = options;

  const redis = new Redis({
    host: config.FLOWQA_REDIS_HOST,
    port: config.FLOWQA_REDIS_PORT,
    password: config.FLOWQA_REDIS_PASSWORD || undefined,
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    enableReadyCheck: true,
  });

  try {
    await redis.connect();
    app.log.info({ host: config.FLOWQA_REDIS_HOST, port: config.FLOWQA_REDIS_PORT }, 'Redis connected');
  } catch (err) {
    app.log.error({ err }, 'Failed to connect to Redis');
    throw err;
  }

  app.decorate('redis', redis);

  app.addHook('onClose', async () => {
    try {
      await redis.quit();
    } catch (err) {
      app.log.warn({ err }, 'Redis quit failed; disconnecting');
      redis.disconnect();
    }
  });
});
