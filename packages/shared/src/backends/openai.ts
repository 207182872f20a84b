/**
 * Hosted API backend (OpenAI)
 *
 * Chat completion with temperature 0. SDK retries are turned off: the chain
 * makes exactly one attempt per backend.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  BackendRejectedError,
  BackendTimeoutError,
  BackendUnavailableError,
  MalformedOutputError,
  RequestCancelledError,
} from '../errors';
import { modelDisplayName } from './models';
import type { CompletionOptions, ExtractionBackend } from './types';

const SYSTEM_PROMPT =
  'You extract structured data from business documents. Answer with a single JSON object and nothing else.';

/**
 * The slice of the OpenAI client this backend uses.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAiBackendOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Supplied by tests; built from apiKey otherwise */
  client?: ChatCompletionClient;
}

export class OpenAiBackend implements ExtractionBackend {
  readonly name = 'openai' as const;
  readonly model: string;
  readonly displayName: string;

  private readonly client: ChatCompletionClient | null;

  constructor(options: OpenAiBackendOptions) {
    this.model = options.model;
    this.displayName = modelDisplayName(options.model);

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = new OpenAI({
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
    } else {
      this.client = null;
    }
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (!this.client) {
      throw new BackendUnavailableError(this.name, 'OPENAI_API_KEY is not configured');
    }

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          temperature: 0,
        },
        { signal: options.signal }
      );
      content = response.choices[0]?.message.content;
    } catch (error) {
      throw this.classifyError(error);
    }

    if (!content) {
      throw new MalformedOutputError(this.name, 'Empty completion from OpenAI');
    }
    return content;
  }

  private classifyError(error: unknown): Error {
    if (error instanceof OpenAI.APIUserAbortError) {
      return new RequestCancelledError();
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new BackendTimeoutError(this.name, error.message);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new BackendUnavailableError(this.name, error.message);
    }
    if (error instanceof OpenAI.APIError) {
      const status = error.status ?? 0;
      if (status === 408) {
        return new BackendTimeoutError(this.name, error.message);
      }
      if (status === 429 || status >= 500) {
        return new BackendUnavailableError(this.name, error.message);
      }
      return new BackendRejectedError(this.name, error.message);
    }
    return new BackendUnavailableError(
      this.name,
      error instanceof Error ? error.message : String(error)
    );
  }
}
