/**
 * Job settlement: every payload ends as a CustomWorkflowResult.
 */
import { describe, it, expect } from 'vitest';
import type { CustomWorkflowJobInput } from '../../src/modules/custom-workflow/schemas.js';
import { CustomWorkflowActivity } from '../../src/modules/custom-workflow/activity.js';
import { BUNDLED_FLOWS_DIR } from '../../src/modules/flows/directory.js';
import { FlowLoader } from '../../src/modules/flows/loader.js';
import type { ChunkSource } from '../../src/modules/citations/chunk-client.js';
import type { FlowResult } from '@flowqa/shared';
import { settleCustomWorkflowJob } from '../../src/queue/custom-workflow-worker.js';
import { FakeChunkSource, fakeRunnerFactory, silentLogger, succeeded } from '../helpers/fakes.js';

function activity(result: FlowResult | Error, chunkSource: ChunkSource = new FakeChunkSource()): CustomWorkflowActivity {
  return new CustomWorkflowActivity({
    flowLoader: new FlowLoader({ flowsDir: BUNDLED_FLOWS_DIR }),
    runnerFactory: fakeRunnerFactory(result).factory,
    chunkSourceFactory: () => chunkSource,
    logger: silentLogger,
    defaultFlow: 'qa_default',
  });
}

const payload: CustomWorkflowJobInput = {
  context: { id: 'job-7', headers: { Authorization: 'Bearer test-token' } },
  config: {
    firstSourceFiles: [{ id: 'd1', checksum: 'c1', name: 'doc.pdf' }],
    questions: [{ id: 'q1', question: 'What is X?' }],
    collectionId: 'col-1',
  },
};

const answered = succeeded({
  answers: [{ id: 'q1', question: 'What is X?', answer: 'X', answer_explanation: 'E', justifying_contents_ids: [] }],
});

describe('settleCustomWorkflowJob', () => {
  it('settles a successful job with its answers', async () => {
    const result = await settleCustomWorkflowJob(activity(answered), payload, silentLogger);

    expect(result.status).toBe('succeeded');
    if (result.status !== 'succeeded') return;
    expect(result.collectionId).toBe('col-1');
    expect(result.answers.map((a) => [a.id, a.answer, a.sourcedContent])).toEqual([['q1', 'X', 'X']]);
  });

  it('rejects invalid payloads without running anything', async () => {
    const result = await settleCustomWorkflowJob(
      activity(answered),
      { context: { headers: {} }, config: { questions: 'nope' } },
      silentLogger,
    );

    expect(result).toEqual({
      status: 'failed',
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid job payload: context.id: Required; config.questions: Expected array, received string',
      },
    });
  });

  it('settles processor errors with their code', async () => {
    const result = await settleCustomWorkflowJob(
      activity({ status: 'failed', outputs: {}, error: 'boom' }),
      payload,
      silentLogger,
    );

    expect(result).toEqual({
      status: 'failed',
      error: { code: 'RUNNER_FAILURE', message: 'Flow failed with status failed: boom' },
    });
  });

  it('settles unexpected errors as INTERNAL_ERROR', async () => {
    const failing: ChunkSource = {
      listChunks: async () => {
        throw new Error('socket hang up');
      },
    };
    const cited = succeeded({
      final_result: { answer: 'X', answer_explanation: 'E', justifying_contents_ids: ['some-id'] },
    });

    const result = await settleCustomWorkflowJob(activity(cited, failing), payload, silentLogger);

    expect(result).toEqual({ status: 'failed', error: { code: 'INTERNAL_ERROR', message: 'socket hang up' } });
  });

  it('settles cancelled jobs', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await settleCustomWorkflowJob(activity(answered), payload, silentLogger, controller.signal);

    expect(result).toEqual({ status: 'failed', error: { code: 'INTERNAL_ERROR', message: 'Job cancelled' } });
  });
});
