/**
 * Local daemon backend (Ollama)
 *
 * POST {OLLAMA_URL}/api/generate with streaming off; the completion is the
 * `response` field.
 */

import { MalformedOutputError } from '../errors';
import { postJson } from './http';
import { modelDisplayName } from './models';
import type { CompletionOptions, ExtractionBackend, FetchLike } from './types';

export interface OllamaBackendOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export class OllamaBackend implements ExtractionBackend {
  readonly name = 'ollama' as const;
  readonly model: string;
  readonly displayName: string;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OllamaBackendOptions) {
    this.baseUrl = options.baseUrl;
    this.model = options.model;
    this.displayName = modelDisplayName(options.model);
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const body = await postJson(
      this.name,
      `${this.baseUrl}/api/generate`,
      {
        model: this.model,
        prompt,
        stream: false,
        options: { temperature: 0.1, top_p: 0.9 },
      },
      { timeoutMs: this.timeoutMs, signal: options.signal, fetchImpl: this.fetchImpl }
    );

    if (typeof body !== 'object' || body === null || !('response' in body) || typeof body.response !== 'string') {
      throw new MalformedOutputError(this.name, 'Ollama response has no "response" text');
    }
    return body.response;
  }
}
