/**
 * Error Taxonomy
 *
 * Every error carries a stable `code` and the HTTP status the API maps it to.
 * Backend errors are recovered by the fallback chain; the rest surface to callers.
 */

import type { BackendAttempt, BackendName, FailureKind } from './types';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Invalid or missing configuration. Fatal at start-up.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, message, 'configuration_error');
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedFileError extends AppError {
  constructor(message: string) {
    super(400, message, 'invalid_request');
    this.name = 'UnsupportedFileError';
  }
}

export class InvalidRequestError extends AppError {
  constructor(message: string) {
    super(400, message, 'invalid_request');
    this.name = 'InvalidRequestError';
  }
}

/**
 * The file was readable but no text came out of it.
 */
export class EmptyDocumentError extends AppError {
  constructor(message: string) {
    super(422, message, 'empty_document');
    this.name = 'EmptyDocumentError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, 'not_found');
    this.name = 'NotFoundError';
  }
}

/**
 * The caller went away before extraction finished.
 */
export class RequestCancelledError extends AppError {
  constructor(message = 'Request cancelled') {
    super(499, message, 'request_cancelled');
    this.name = 'RequestCancelledError';
  }
}

// ============================================================================
// Backend Failures
// ============================================================================

export abstract class BackendError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    public readonly backend: BackendName,
    message: string
  ) {
    super(message);
  }
}

/** Connection refused, HTTP 5xx or 404, or the backend is not configured. */
export class BackendUnavailableError extends BackendError {
  readonly kind = 'unavailable' as const;

  constructor(backend: BackendName, message: string) {
    super(backend, message);
    this.name = 'BackendUnavailableError';
  }
}

export class BackendTimeoutError extends BackendError {
  readonly kind = 'timeout' as const;

  constructor(backend: BackendName, message: string) {
    super(backend, message);
    this.name = 'BackendTimeoutError';
  }
}

/** The backend answered with a 4xx-class refusal (bad request, auth). */
export class BackendRejectedError extends BackendError {
  readonly kind = 'rejected' as const;

  constructor(backend: BackendName, message: string) {
    super(backend, message);
    this.name = 'BackendRejectedError';
  }
}

/** The response could not be parsed as a non-empty JSON object. */
export class MalformedOutputError extends BackendError {
  readonly kind = 'malformed_output' as const;

  constructor(backend: BackendName, message: string) {
    super(backend, message);
    this.name = 'MalformedOutputError';
  }
}

/**
 * Every backend in the chain failed.
 */
export class ExtractionUnavailableError extends AppError {
  constructor(public readonly attempts: BackendAttempt[]) {
    super(
      503,
      `All extraction backends failed (${attempts.map((a) => `${a.backend}: ${a.failure ?? 'unknown'}`).join(', ')})`,
      'extraction_unavailable'
    );
    this.name = 'ExtractionUnavailableError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error instanceof RequestCancelledError);
}
