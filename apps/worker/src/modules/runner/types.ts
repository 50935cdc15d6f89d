import type { FlowDefinition, FlowResult } from '@flowqa/shared';

export interface RunContext {
  runId: string;
  /** Caller auth headers, available to the runtime's registered functions. */
  headers: Record<string, string>;
}

export interface FlowRunRequest {
  flow: FlowDefinition;
  inputs: Record<string, unknown>;
  context: RunContext;
  signal?: AbortSignal;
}

/**
 * Executes flow definitions. The engine lives outside this worker; a runner
 * is acquired per invocation and must be cleaned up on every exit path.
 */
export interface FlowRunner {
  run(request: FlowRunRequest): Promise<FlowResult>;
  cleanup(): Promise<void>;
}

export type FlowRunnerFactory = () => FlowRunner;
