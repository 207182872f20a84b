/**
 * HTTP plumbing for the local backends
 *
 * Posts JSON with a per-call timeout and maps transport failures onto the
 * backend error taxonomy.
 */

import {
  BackendRejectedError,
  BackendTimeoutError,
  BackendUnavailableError,
  MalformedOutputError,
  RequestCancelledError,
} from '../errors';
import type { BackendName } from '../types';
import type { FetchLike } from './types';

export interface PostJsonOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl: FetchLike;
}

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * 404 and 5xx mean the backend (or its model) is not there; 408 is a
 * timeout; other 4xx are rejections.
 */
export async function postJson(
  backend: BackendName,
  url: string,
  body: unknown,
  options: PostJsonOptions
): Promise<unknown> {
  if (options.signal?.aborted) {
    throw new RequestCancelledError();
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onCallerAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await options.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new BackendTimeoutError(backend, `No response within ${options.timeoutMs}ms`);
      }
      if (options.signal?.aborted) {
        throw new RequestCancelledError();
      }
      throw new BackendUnavailableError(
        backend,
        `Cannot reach ${url}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      const detail = `HTTP ${response.status} from ${url}`;
      if (response.status === 408) {
        throw new BackendTimeoutError(backend, detail);
      }
      if (response.status === 404 || response.status === 429 || response.status >= 500) {
        throw new BackendUnavailableError(backend, detail);
      }
      throw new BackendRejectedError(backend, detail);
    }

    try {
      return await response.json();
    } catch (error) {
      if (timedOut) {
        throw new BackendTimeoutError(backend, `Response body not received within ${options.timeoutMs}ms`);
      }
      throw new MalformedOutputError(
        backend,
        `Response body is not JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}
