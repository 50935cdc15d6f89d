/**
 * BullMQ queue carrying custom-workflow jobs.
 * BullMQ manages its own Redis connections, so pass connection options rather than an IORedis instance.
 */
import { Queue } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import type { CustomWorkflowJobData, CustomWorkflowResult } from '@flowqa/shared';

export const CUSTOM_WORKFLOW_QUEUE_NAME = 'custom-workflow';

export type CustomWorkflowQueue = Queue<CustomWorkflowJobData, CustomWorkflowResult>;

let _queue: CustomWorkflowQueue | null = null;

/** One attempt per job; re-submission is up to the caller. */
export function initCustomWorkflowQueue(connection: ConnectionOptions): CustomWorkflowQueue {
  if (_queue) return _queue;

  _queue = new Queue<CustomWorkflowJobData, CustomWorkflowResult>(CUSTOM_WORKFLOW_QUEUE_NAME, {
    connection,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 50 },
    },
  });

  return _queue;
}

export async function closeCustomWorkflowQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
