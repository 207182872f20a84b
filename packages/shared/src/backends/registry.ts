/**
 * Backend Registry
 *
 * Registry of extraction backends by name, and resolution of the configured
 * fallback order into the list the chain iterates.
 */

import type { Config } from '../config';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import type { BackendName } from '../types';
import { HuggingFaceBackend } from './huggingface';
import { OllamaBackend } from './ollama';
import { OpenAiBackend } from './openai';
import type { ExtractionBackend } from './types';

export class BackendRegistry {
  private readonly backends = new Map<BackendName, ExtractionBackend>();

  /**
   * Register a backend. Overwrites any existing backend with the same name.
   */
  register(backend: ExtractionBackend): this {
    this.backends.set(backend.name, backend);
    logger.debug('Registered extraction backend', {
      backend: backend.name,
      model: backend.model,
    });
    return this;
  }

  get(name: BackendName): ExtractionBackend | undefined {
    return this.backends.get(name);
  }

  /**
   * @throws ConfigurationError if no backend is registered under that name
   */
  getOrThrow(name: BackendName): ExtractionBackend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw new ConfigurationError(`No extraction backend registered for "${name}"`);
    }
    return backend;
  }

  has(name: BackendName): boolean {
    return this.backends.has(name);
  }

  names(): BackendName[] {
    return Array.from(this.backends.keys());
  }

  /**
   * Backends in fallback order.
   */
  resolve(order: readonly BackendName[]): ExtractionBackend[] {
    return order.map((name) => this.getOrThrow(name));
  }
}

/**
 * Registry with the three production backends, configured from Config.
 */
export function createDefaultRegistry(
  config: Pick<
    Config,
    | 'ollamaUrl'
    | 'ollamaModel'
    | 'hfUrl'
    | 'hfModel'
    | 'hfMaxNewTokens'
    | 'openaiApiKey'
    | 'openaiModel'
    | 'llmRequestTimeoutMs'
  >
): BackendRegistry {
  return new BackendRegistry()
    .register(
      new OllamaBackend({
        baseUrl: config.ollamaUrl,
        model: config.ollamaModel,
        timeoutMs: config.llmRequestTimeoutMs,
      })
    )
    .register(
      new HuggingFaceBackend({
        baseUrl: config.hfUrl,
        model: config.hfModel,
        maxNewTokens: config.hfMaxNewTokens,
        timeoutMs: config.llmRequestTimeoutMs,
      })
    )
    .register(
      new OpenAiBackend({
        apiKey: config.openaiApiKey,
        model: config.openaiModel,
        timeoutMs: config.llmRequestTimeoutMs,
      })
    );
}
