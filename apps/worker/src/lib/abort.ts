export function createAbortError(message = 'Operation aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

/**
 * Links an optional caller signal to a fresh controller.
 * Returns the controller and a function that detaches the listener.
 */
export function linkAbortSignal(signal: AbortSignal | undefined): {
  controller: AbortController;
  unlink: () => void;
} {
  const controller = new AbortController();
  if (!signal) {
    return { controller, unlink: () => {} };
  }

  const abort = () => controller.abort(createAbortError());
  if (signal.aborted) {
    abort();
    return { controller, unlink: () => {} };
  }

  signal.addEventListener('abort', abort, { once: true });
  return { controller, unlink: () => signal.removeEventListener('abort', abort) };
}
