/**
 * Local model backend (Hugging Face)
 *
 * Talks to a locally served Text Generation Inference endpoint:
 * POST {HF_URL}/generate with { inputs, parameters } and read `generated_text`.
 * Prompts for this backend use the short text preview.
 */

import { MalformedOutputError } from '../errors';
import { postJson } from './http';
import { modelDisplayName } from './models';
import type { CompletionOptions, ExtractionBackend, FetchLike } from './types';

export interface HuggingFaceBackendOptions {
  baseUrl: string;
  model: string;
  maxNewTokens: number;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

function generatedText(body: unknown): string | undefined {
  // TGI answers with an object; some servers wrap it in a one-element array
  const first: unknown = Array.isArray(body) ? body[0] : body;
  if (typeof first === 'object' && first !== null && 'generated_text' in first) {
    return typeof first.generated_text === 'string' ? first.generated_text : undefined;
  }
  return undefined;
}

export class HuggingFaceBackend implements ExtractionBackend {
  readonly name = 'huggingface' as const;
  readonly model: string;
  readonly displayName: string;

  private readonly baseUrl: string;
  private readonly maxNewTokens: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HuggingFaceBackendOptions) {
    this.baseUrl = options.baseUrl;
    this.model = options.model;
    this.displayName = modelDisplayName(options.model);
    this.maxNewTokens = options.maxNewTokens;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const body = await postJson(
      this.name,
      `${this.baseUrl}/generate`,
      {
        inputs: prompt,
        parameters: {
          max_new_tokens: this.maxNewTokens,
          temperature: 0.1,
          do_sample: true,
          return_full_text: false,
        },
      },
      { timeoutMs: this.timeoutMs, signal: options.signal, fetchImpl: this.fetchImpl }
    );

    const text = generatedText(body);
    if (text === undefined) {
      throw new MalformedOutputError(this.name, 'Generation response has no "generated_text"');
    }
    return text;
  }
}
