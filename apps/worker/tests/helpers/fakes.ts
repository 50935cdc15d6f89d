/**
 * In-process stand-ins for the flow runtime and the chunk service.
 */
import type { FlowResult } from '@flowqa/shared';
import { createLogger, type Logger } from '../../src/lib/logger.js';
import type { ChunkSource, DocumentChunk, ListChunksOptions } from '../../src/modules/citations/chunk-client.js';
import type { FlowRunner, FlowRunnerFactory, FlowRunRequest } from '../../src/modules/runner/types.js';

export const silentLogger: Logger = createLogger({ FLOWQA_NODE_ENV: 'test', FLOWQA_LOG_LEVEL: 'silent' });

type RunBehaviour = FlowResult | Error | ((request: FlowRunRequest) => Promise<FlowResult>);

export class FakeFlowRunner implements FlowRunner {
  readonly requests: FlowRunRequest[] = [];
  cleanups = 0;

  constructor(
    private readonly behaviour: RunBehaviour,
    private readonly cleanupError?: Error,
  ) {}

  async run(request: FlowRunRequest): Promise<FlowResult> {
    this.requests.push(request);
    if (this.behaviour instanceof Error) throw this.behaviour;
    if (typeof this.behaviour === 'function') return this.behaviour(request);
    return this.behaviour;
  }

  async cleanup(): Promise<void> {
    this.cleanups += 1;
    if (this.cleanupError) throw this.cleanupError;
  }
}

/** Factory handing out one shared fake runner, so tests can inspect it afterwards. */
export function fakeRunnerFactory(
  behaviour: RunBehaviour,
  cleanupError?: Error,
): { runner: FakeFlowRunner; factory: FlowRunnerFactory } {
  const runner = new FakeFlowRunner(behaviour, cleanupError);
  return { runner, factory: () => runner };
}

export function succeeded(outputs: Record<string, unknown>): FlowResult {
  return { status: 'succeeded', outputs };
}

export class FakeChunkSource implements ChunkSource {
  readonly calls: string[] = [];

  constructor(private readonly documents: Record<string, DocumentChunk[]> = {}) {}

  async listChunks(checksum: string, options: ListChunksOptions = {}): Promise<DocumentChunk[]> {
    options.signal?.throwIfAborted();
    this.calls.push(checksum);
    return this.documents[checksum] ?? [];
  }
}

export function chunk(id: string, content: string, positions: DocumentChunk['positions'] = []): DocumentChunk {
  return { id, content, positions };
}
