/**
 * Extraction Backend Chain
 *
 * Tries backends strictly one after another in the configured order and
 * returns the first parsed result. Each backend gets exactly one attempt per
 * request. Backend failures are logged and the chain advances; when every
 * backend has failed the chain throws ExtractionUnavailableError with all
 * attempts attached.
 */

import {
  BackendError,
  BackendUnavailableError,
  ConfigurationError,
  ExtractionUnavailableError,
  RequestCancelledError,
  isAbortError,
} from '../errors';
import { logger } from '../logger';
import { backendAttemptsCounter, backendRequestDurationHistogram } from '../metrics';
import { buildPrompt, type PromptTemplateSet } from '../templates';
import type { BackendAttempt, DocumentType, ExtractedData } from '../types';
import { parseBackendJson } from './json-response';
import type { ExtractionBackend } from './types';

export interface ChainRequest {
  text: string;
  documentType: DocumentType;
  templates: PromptTemplateSet;
  signal?: AbortSignal;
}

export interface ChainResult {
  data: ExtractedData;
  backend: ExtractionBackend;
  attempts: BackendAttempt[];
}

/**
 * Settle with the call, or reject as soon as the request is cancelled.
 * A call that finishes after cancellation is ignored.
 */
function abandonOnAbort<T>(call: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return call;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestCancelledError());
    call.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

function toBackendError(backend: ExtractionBackend, error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  // Anything else a backend throws still only takes that backend out
  return new BackendUnavailableError(
    backend.name,
    error instanceof Error ? error.message : String(error)
  );
}

export async function runBackendChain(
  backends: readonly ExtractionBackend[],
  request: ChainRequest
): Promise<ChainResult> {
  if (backends.length === 0) {
    throw new ConfigurationError('No extraction backends configured');
  }

  const attempts: BackendAttempt[] = [];

  for (const backend of backends) {
    if (request.signal?.aborted) {
      throw new RequestCancelledError();
    }

    const prompt = buildPrompt(request.templates, request.documentType, backend.name, request.text);
    const start = Date.now();

    try {
      const completion = await abandonOnAbort(
        backend.complete(prompt, { signal: request.signal }),
        request.signal
      );
      const data = parseBackendJson(backend.name, completion);
      const durationMs = Date.now() - start;

      attempts.push({ backend: backend.name, success: true, duration_ms: durationMs });
      backendAttemptsCounter.inc({ backend: backend.name, outcome: 'success' });
      backendRequestDurationHistogram.observe({ backend: backend.name }, durationMs / 1000);

      logger.info('Extraction backend succeeded', {
        backend: backend.name,
        model: backend.model,
        document_type: request.documentType,
        duration_ms: durationMs,
        field_count: Object.keys(data).length,
        prior_failures: attempts.length - 1,
      });

      return { data, backend, attempts };
    } catch (error) {
      if (error instanceof RequestCancelledError || isAbortError(error)) {
        logger.info('Extraction cancelled by caller', { backend: backend.name });
        throw new RequestCancelledError();
      }

      const failure = toBackendError(backend, error);
      const durationMs = Date.now() - start;

      attempts.push({
        backend: backend.name,
        success: false,
        failure: failure.kind,
        detail: failure.message,
        duration_ms: durationMs,
      });
      backendAttemptsCounter.inc({ backend: backend.name, outcome: failure.kind });
      backendRequestDurationHistogram.observe({ backend: backend.name }, durationMs / 1000);

      logger.warn('Extraction backend failed, trying next', {
        backend: backend.name,
        model: backend.model,
        failure: failure.kind,
        detail: failure.message,
        duration_ms: durationMs,
      });
    }
  }

  const unavailable = new ExtractionUnavailableError(attempts);
  logger.error('All extraction backends failed', unavailable, {
    attempts: attempts.map((a) => ({ backend: a.backend, failure: a.failure })),
  });
  throw unavailable;
}
