/**
 * BullMQ worker for custom-workflow jobs.
 * Each job is validated, handed to the activity, and settled into a
 * CustomWorkflowResult. Failed jobs are not retried.
 */
import { UnrecoverableError, Worker } from 'bullmq';
import type { ConnectionOptions, Job } from 'bullmq';
import type { CustomWorkflowJobData, CustomWorkflowResult } from '@flowqa/shared';
import { isAbortError } from '../lib/abort.js';
import type { Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/records.js';
import type { CustomWorkflowActivity } from '../modules/custom-workflow/activity.js';
import { parseJobData } from '../modules/custom-workflow/schemas.js';
import { ProcessorError } from '../types/index.js';
import { CUSTOM_WORKFLOW_QUEUE_NAME } from './custom-workflow-queue.js';

export interface CustomWorkflowWorkerOptions {
  connection: ConnectionOptions;
  concurrency: number;
  logger: Logger;
}

/**
 * Runs one job payload to completion. Never throws: every outcome is a
 * settled result.
 */
export async function settleCustomWorkflowJob(
  activity: CustomWorkflowActivity,
  payload: unknown,
  logger: Logger,
  signal?: AbortSignal,
): Promise<CustomWorkflowResult> {
  const parsed = parseJobData(payload);
  if (!parsed.success) {
    logger.warn({ reason: parsed.message }, 'Rejected invalid custom workflow job payload');
    return {
      status: 'failed',
      error: { code: 'VALIDATION_ERROR', message: `Invalid job payload: ${parsed.message}` },
    };
  }

  const { context, config } = parsed.data;
  try {
    const output = await activity.process(context, config, signal ? { signal } : {});
    return { status: 'succeeded', ...output };
  } catch (err) {
    if (err instanceof ProcessorError) {
      logger.warn({ jobId: context.id, code: err.code, details: err.details }, err.message);
      return { status: 'failed', error: { code: err.code, message: err.message } };
    }
    if (isAbortError(err)) {
      logger.warn({ jobId: context.id }, 'Custom workflow job cancelled');
      return { status: 'failed', error: { code: 'INTERNAL_ERROR', message: 'Job cancelled' } };
    }
    logger.error({ jobId: context.id, err }, 'Custom workflow job failed unexpectedly');
    return { status: 'failed', error: { code: 'INTERNAL_ERROR', message: errorMessage(err) } };
  }
}

/**
 * Creates and starts the worker. Jobs still running when the worker closes
 * are cancelled.
 */
export function createCustomWorkflowWorker(
  activity: CustomWorkflowActivity,
  options: CustomWorkflowWorkerOptions,
): Worker<CustomWorkflowJobData, CustomWorkflowResult> {
  const { connection, concurrency, logger } = options;
  const active = new Set<AbortController>();

  const worker = new Worker<CustomWorkflowJobData, CustomWorkflowResult>(
    CUSTOM_WORKFLOW_QUEUE_NAME,
    async (job: Job<CustomWorkflowJobData, CustomWorkflowResult>) => {
      const controller = new AbortController();
      active.add(controller);
      try {
        const result = await settleCustomWorkflowJob(
          activity,
          job.data,
          logger.child({ bullJobId: job.id }),
          controller.signal,
        );
        if (result.status === 'failed') {
          throw new UnrecoverableError(`${result.error.code}: ${result.error.message}`);
        }
        return result;
      } finally {
        active.delete(controller);
      }
    },
    { connection, concurrency },
  );

  worker.on('closing', () => {
    for (const controller of active) controller.abort();
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err: err.message }, 'Custom workflow job failed');
  });

  worker.on('error', (err) => {
    // Redis connection errors land here; BullMQ reconnects by itself.
    logger.error({ err }, 'Custom workflow worker error');
  });

  return worker;
}
