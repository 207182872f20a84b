/**
 * Extraction Backend Types
 *
 * One implementation per text-completion provider. The chain only sees this
 * uniform call-and-parse contract.
 */

import type { BackendName } from '../types';

export interface CompletionOptions {
  /** Aborted when the surrounding request is cancelled */
  signal?: AbortSignal;
}

export interface ExtractionBackend {
  readonly name: BackendName;

  /** Model identifier sent to the provider */
  readonly model: string;

  /** Human-readable model name shown in results */
  readonly displayName: string;

  /**
   * Send a prompt and return the raw completion text.
   * Failures are reported as BackendError subclasses.
   */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
