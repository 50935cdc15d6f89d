/**
 * JSON-over-HTTP helper shared by the flow runtime and chunk service clients.
 * Handles timeouts, caller cancellation, network errors and error bodies.
 */
import { createAbortError, linkAbortSignal } from './abort.js';
import { errorMessage, isRecord } from './records.js';

export class HttpCallError extends Error {
  constructor(
    message: string,
    public readonly code: 'TIMEOUT' | 'NETWORK_ERROR' | 'HTTP_ERROR' | 'INVALID_BODY',
    public readonly status: number | null,
  ) {
    super(message);
    this.name = 'HttpCallError';
  }
}

export interface JsonRequest {
  method?: 'GET' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  /** Caller cancellation; an abort rejects with an AbortError, not an HttpCallError. */
  signal?: AbortSignal;
}

export async function fetchJson(url: string, request: JsonRequest): Promise<unknown> {
  const { controller, unlink } = linkAbortSignal(request.signal);
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, request.timeoutMs);

  try {
    const response = await fetch(url, {
      method: request.method ?? 'GET',
      headers: {
        Accept: 'application/json',
        ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers,
      },
      ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
      signal: controller.signal,
    });

    if (!response.ok) {
      let detail = '';
      try {
        const body: unknown = await response.json();
        if (isRecord(body) && typeof body['message'] === 'string') {
          detail = `: ${body['message']}`;
        }
      } catch {
        detail = ' (non-JSON error body)';
      }
      throw new HttpCallError(`${url} returned HTTP ${response.status}${detail}`, 'HTTP_ERROR', response.status);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (err) {
      throw new HttpCallError(`${url} returned a non-JSON body: ${errorMessage(err)}`, 'INVALID_BODY', response.status);
    }
  } catch (err) {
    if (err instanceof HttpCallError) throw err;

    if (request.signal?.aborted) {
      throw createAbortError();
    }

    if (timedOut) {
      throw new HttpCallError(`${url} timed out after ${request.timeoutMs}ms`, 'TIMEOUT', null);
    }

    throw new HttpCallError(`Failed to reach ${url}: ${errorMessage(err)}`, 'NETWORK_ERROR', null);
  } finally {
    clearTimeout(timeout);
    unlink();
  }
}
