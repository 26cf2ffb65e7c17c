/**
 * Minimal JSON-over-HTTP access to a Kubernetes-style API server
 */

import { isPlainObject } from '@kubeimport/types';
import { CanceledError, describeCause } from '../errors.js';
import { createLinkedAbortController, resolveTimeoutMs } from '../utils/abort.js';

export interface KubeConnection {
  /** API server base URL, e.g. "https://127.0.0.1:6443" */
  server: string;
  /** Bearer token */
  token?: string;
  /** Per-request timeout */
  timeoutMs?: number;
}

/**
 * Non-success answer from the API server
 */
export class KubeApiError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(message: string, options: { status: number; url: string }) {
    super(message);
    this.name = 'KubeApiError';
    this.status = options.status;
    this.url = options.url;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type KubeGetResult = { found: true; body: unknown } | { found: false };

export function normalizeServerUrl(server: string): string {
  return server.endsWith('/') ? server.slice(0, -1) : server;
}

function createHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
  };

  if (token && token.length > 0) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  return headers;
}

/**
 * GETs `path` and parses the JSON body. A 404 resolves to `{ found: false }`;
 * other non-2xx statuses reject with {@link KubeApiError}.
 *
 * @throws CanceledError when `signal` aborts
 */
export async function getJson(
  connection: KubeConnection,
  path: string,
  signal?: AbortSignal,
): Promise<KubeGetResult> {
  const url = `${normalizeServerUrl(connection.server)}${path}`;
  const timeoutMs = resolveTimeoutMs(connection.timeoutMs);
  const { controller, dispose } = createLinkedAbortController(signal);
  let timedOut = false;
  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs);

  try {
    // Timeouts and caller aborts may land during the request or the body read
    const requestFailure = (error: unknown): Error => {
      if (timedOut) {
        return new Error(`GET ${url} timed out after ${timeoutMs}ms`, { cause: error });
      }
      if (signal?.aborted) {
        return new CanceledError('import was canceled', { cause: error });
      }
      return new Error(`GET ${url} failed: ${describeCause(error)}`, { cause: error });
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: createHeaders(connection.token),
        signal: controller.signal,
      });
    } catch (error) {
      throw requestFailure(error);
    }

    if (response.status === 404) {
      return { found: false };
    }

    if (!response.ok) {
      throw new KubeApiError(await readStatusMessage(response), { status: response.status, url });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw requestFailure(error);
    }
    return { found: true, body };
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    dispose();
  }
}

/**
 * Message of a `Status` error body, falling back to the HTTP status line
 */
async function readStatusMessage(response: Response): Promise<string> {
  const fallback = `${response.status} ${response.statusText}`.trim();
  try {
    const body: unknown = await response.json();
    const message = isPlainObject(body) ? body['message'] : undefined;
    if (typeof message === 'string' && message.length > 0) {
      return `${fallback}: ${message}`;
    }
  } catch {
    return fallback;
  }
  return fallback;
}
