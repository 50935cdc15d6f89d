import type { FastifyInstance } from 'fastify';
import type { ApiResponse } from '@flowqa/shared';

type ServiceStatus = 'connected' | 'disconnected' | 'disabled';

interface HealthData {
  status: 'ok' | 'degraded';
  timestamp: string;
  version: string;
  services: {
    redis: ServiceStatus;
    runner: 'configured' | 'unconfigured';
    chunkService: 'configured' | 'unconfigured';
  };
}

const healthResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    data: {
      type: 'object',
      properties: {
        status: { type: 'string', enum: ['ok', 'degraded'] },
        timestamp: { type: 'string' },
        version: { type: 'string' },
        services: {
          type: 'object',
          properties: {
            redis: { type: 'string', enum: ['connected', 'disconnected', 'disabled'] },
            runner: { type: 'string', enum: ['configured', 'unconfigured'] },
            chunkService: { type: 'string', enum: ['configured', 'unconfigured'] },
          },
        },
      },
    },
  },
} as const;

export interface HealthRouteOptions {
  runnerConfigured: boolean;
  chunkServiceConfigured: boolean;
}

/**
 * Health check route.
 * Pings Redis when the queue is enabled. Returns 200 when it answers (or is
 * disabled), 503 otherwise.
 */
export async function healthRoutes(app: FastifyInstance, options: HealthRouteOptions): Promise<void> {
  app.get<{ Reply: ApiResponse<HealthData> }>(
    '/health',
    {
      schema: {
        response: {
          200: healthResponseSchema,
          503: healthResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      let redisStatus: ServiceStatus = 'disabled';

      if (app.redis) {
        try {
          await app.redis.ping();
          redisStatus = 'connected';
        } catch (err) {
          app.log.warn({ err }, 'Health check: Redis connection failed');
          redisStatus = 'disconnected';
        }
      }

      const healthy = redisStatus !== 'disconnected';
      return reply.status(healthy ? 200 : 503).send({
        success: healthy,
        data: {
          status: healthy ? 'ok' : 'degraded',
          timestamp: new Date().toISOString(),
          version: '0.1.0',
          services: {
            redis: redisStatus,
            runner: options.runnerConfigured ? 'configured' : 'unconfigured',
            chunkService: options.chunkServiceConfigured ? 'configured' : 'unconfigured',
          },
        },
      });
    },
  );
}
