/**
 * Flow runner backed by the flow runtime's HTTP API.
 *
 * Request:  POST {baseUrl}/runs  { flow, inputs, context: { runId, headers } }
 * Response: { status: "succeeded" | "failed", outputs: {...}, error?: string }
 */
import { z } from 'zod';
import type { FlowResult } from '@flowqa/shared';
import type { Env } from '../../config/index.js';
import { linkAbortSignal } from '../../lib/abort.js';
import { fetchJson } from '../../lib/http-client.js';
import { ProcessorError } from '../../types/index.js';
import type { FlowRunner, FlowRunnerFactory, FlowRunRequest } from './types.js';

const flowResultSchema = z.object({
  status: z.enum(['succeeded', 'failed']),
  outputs: z.record(z.unknown()).default({}),
  error: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
});

export interface HttpFlowRunnerConfig {
  baseUrl: string;
  timeoutMs: number;
}

export class HttpFlowRunner implements FlowRunner {
  private readonly baseUrl: string;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(private readonly config: HttpFlowRunnerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async run(request: FlowRunRequest): Promise<FlowResult> {
    if (this.closed) {
      throw new Error('Flow runner already cleaned up');
    }

    const { controller, unlink } = linkAbortSignal(request.signal);
    this.inFlight.add(controller);

    try {
      const body = await fetchJson(`${this.baseUrl}/runs`, {
        method: 'POST',
        headers: { 'X-Run-Id': request.context.runId },
        body: { flow: request.flow, inputs: request.inputs, context: request.context },
        timeoutMs: this.config.timeoutMs,
        signal: controller.signal,
      });

      const parsed = flowResultSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error(`Flow runtime returned an invalid result: ${parsed.error.errors[0]?.message ?? 'unknown error'}`);
      }
      return parsed.data;
    } finally {
      unlink();
      this.inFlight.delete(controller);
    }
  }

  /** Aborts requests still in flight; the runner is unusable afterwards. */
  async cleanup(): Promise<void> {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }
}

/**
 * Factory of HTTP runners. Without FLOWQA_RUNNER_URL every acquisition fails
 * with DEPENDENCY_UNAVAILABLE.
 */
export function createHttpFlowRunnerFactory(
  env: Pick<Env, 'FLOWQA_RUNNER_URL' | 'FLOWQA_RUNNER_TIMEOUT_MS'>,
): FlowRunnerFactory {
  return () => {
    if (!env.FLOWQA_RUNNER_URL) {
      throw ProcessorError.dependencyUnavailable('Flow runtime is not configured (FLOWQA_RUNNER_URL)');
    }
    return new HttpFlowRunner({ baseUrl: env.FLOWQA_RUNNER_URL, timeoutMs: env.FLOWQA_RUNNER_TIMEOUT_MS });
  };
}
