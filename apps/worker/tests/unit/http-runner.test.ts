import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FlowDefinition } from '@flowqa/shared';
import { HttpCallError } from '../../src/lib/http-client.js';
import { createHttpFlowRunnerFactory, HttpFlowRunner } from '../../src/modules/runner/http-runner.js';
import type { FlowRunRequest } from '../../src/modules/runner/types.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const fetchMock = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => jsonResponse({}));

const flow: FlowDefinition = {
  flow_id: 'qa',
  version: '1',
  name: 'QA',
  inputs: { parameters: { query: 'str' }, defaults: {} },
  steps: [{ step_id: 's', tasks: [{ task_id: 't', function: 'qa_agent_flow', inputs: {}, export_to_flow: true }] }],
};

const request: FlowRunRequest = {
  flow,
  inputs: { query: 'What is the rent?' },
  context: { runId: 'custom-workflow-job-1', headers: { Authorization: 'Bearer test-token' } },
};

describe('HttpFlowRunner', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the flow, inputs and context to /runs', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'succeeded', outputs: { final_result: { answer: 'x' } } }));
    const runner = new HttpFlowRunner({ baseUrl: 'http://runtime.test//', timeoutMs: 5000 });

    const result = await runner.run(request);

    expect(result).toEqual({ status: 'succeeded', outputs: { final_result: { answer: 'x' } } });
    const call = fetchMock.mock.calls[0];
    const url = call?.[0];
    const init = call?.[1];
    expect(url).toBe('http://runtime.test/runs');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'X-Run-Id': 'custom-workflow-job-1',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      flow,
      inputs: { query: 'What is the rent?' },
      context: { runId: 'custom-workflow-job-1', headers: { Authorization: 'Bearer test-token' } },
    });
  });

  it('defaults missing outputs of a failed run and rejects null ones', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'failed', error: 'task qa_agent raised', outputs: null }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'failed', error: 'task qa_agent raised' }));
    const runner = new HttpFlowRunner({ baseUrl: 'http://runtime.test', timeoutMs: 5000 });

    await expect(runner.run(request)).rejects.toThrow(/^Flow runtime returned an invalid result: /);
    expect(await runner.run(request)).toEqual({ status: 'failed', outputs: {}, error: 'task qa_agent raised' });
  });

  it('rejects results with an unknown status', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: 'weird', outputs: {} }));
    const runner = new HttpFlowRunner({ baseUrl: 'http://runtime.test', timeoutMs: 5000 });

    await expect(runner.run(request)).rejects.toThrow(/^Flow runtime returned an invalid result: /);
  });

  it('surfaces HTTP errors as HttpCallError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('upstream down', { status: 502 }));
    const runner = new HttpFlowRunner({ baseUrl: 'http://runtime.test', timeoutMs: 5000 });

    const err: unknown = await runner.run(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpCallError);
    expect(err).toMatchObject({
      code: 'HTTP_ERROR',
      status: 502,
      message: 'http://runtime.test/runs returned HTTP 502 (non-JSON error body)',
    });
  });

  it('aborts in-flight runs on cleanup and refuses new ones', async () => {
    fetchMock.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const runner = new HttpFlowRunner({ baseUrl: 'http://runtime.test', timeoutMs: 60_000 });

    const pending = runner.run(request);
    await runner.cleanup();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
    await expect(runner.run(request)).rejects.toThrow('Flow runner already cleaned up');
  });

  it('times out slow runs', async () => {
    fetchMock.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const runner = new HttpFlowRunner({ baseUrl: 'http://runtime.test', timeoutMs: 20 });

    await expect(runner.run(request)).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'http://runtime.test/runs timed out after 20ms',
    });
  });
});

describe('createHttpFlowRunnerFactory', () => {
  it('fails acquisition without a runtime URL', () => {
    const factory = createHttpFlowRunnerFactory({ FLOWQA_RUNNER_URL: undefined, FLOWQA_RUNNER_TIMEOUT_MS: 1000 });
    expect(() => factory()).toThrow('Flow runtime is not configured (FLOWQA_RUNNER_URL)');
  });

  it('hands out a fresh runner per acquisition', () => {
    const factory = createHttpFlowRunnerFactory({
      FLOWQA_RUNNER_URL: 'http://runtime.test',
      FLOWQA_RUNNER_TIMEOUT_MS: 1000,
    });
    const first = factory();
    expect(first).toBeInstanceOf(HttpFlowRunner);
    expect(factory()).not.toBe(first);
  });
});
