/**
 * BullMQ queue plugin.
 * Initializes the custom-workflow queue and its worker from the Redis config.
 * BullMQ manages its own Redis connections, separate from the IORedis app.redis instance.
 */
import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Worker } from 'bullmq';
import type { CustomWorkflowJobData, CustomWorkflowResult } from '@flowqa/shared';
import type { Env } from '../config/index.js';
import {
  closeCustomWorkflowQueue,
  initCustomWorkflowQueue,
  type CustomWorkflowQueue,
} from '../queue/custom-workflow-queue.js';
import { createCustomWorkflowWorker } from '../queue/custom-workflow-worker.js';

declare module 'fastify' {
  interface FastifyInstance {
    customWorkflowQueue: CustomWorkflowQueue;
    customWorkflowWorker: Worker<CustomWorkflowJobData, CustomWorkflowResult>;
  }
}

export const queuePlugin = fp(async function (app: FastifyInstance, options: { config: Env }): Promise<void> {
  const { config } = options;

  const connection = {
    host: config.FLOWQA_REDIS_HOST,
    port: config.FLOWQA_REDIS_PORT,
    password: config.FLOWQA_REDIS_PASSWORD || undefined,
    maxRetriesPerRequest: null, // Required for BullMQ blocking commands
    enableReadyCheck: false,
  };

  const queue = initCustomWorkflowQueue(connection);
  const worker = createCustomWorkflowWorker(app.customWorkflowActivity, {
    connection,
    concurrency: config.FLOWQA_WORKER_CONCURRENCY,
    logger: app.log,
  });

  app.decorate('customWorkflowQueue', queue);
  app.decorate('customWorkflowWorker', worker);

  app.addHook('onClose', async () => {
    await worker.close();
    await closeCustomWorkflowQueue();
    app.log.info('BullMQ worker and queue closed');
  });

  app.log.info({ concurrency: config.FLOWQA_WORKER_CONCURRENCY }, 'Custom workflow worker started');
});
