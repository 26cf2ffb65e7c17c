import { CanceledError } from '../errors.js';

export function isAbortError(error: unknown): boolean {
  if (error instanceof CanceledError) {
    return true;
  }
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CanceledError('import was canceled', { cause: signal.reason });
  }
}

/**
 * Settles with `promise`, or rejects with {@link CanceledError} as soon as
 * `signal` aborts. The underlying work is not stopped.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CanceledError('import was canceled', { cause: signal.reason }));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CanceledError('import was canceled', { cause: signal.reason }));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Controller that aborts when `parent` does. Call `dispose` once done to
 * detach from the parent signal.
 */
export function createLinkedAbortController(parent: AbortSignal | undefined): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => undefined };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }

  const onAbort = (): void => {
    controller.abort(parent.reason);
  };
  parent.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort),
  };
}

/**
 * Resolves `timeoutMs` to a positive integer, or `undefined` for "no timeout"
 */
export function resolveTimeoutMs(timeoutMs: number | undefined): number | undefined {
  if (
    typeof timeoutMs === 'number' &&
    Number.isFinite(timeoutMs) &&
    Number.isInteger(timeoutMs) &&
    timeoutMs > 0
  ) {
    return timeoutMs;
  }
  return undefined;
}
