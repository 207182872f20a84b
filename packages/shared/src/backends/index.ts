/**
 * Extraction Backends
 */

export type { CompletionOptions, ExtractionBackend, FetchLike } from './types';
export { OllamaBackend, type OllamaBackendOptions } from './ollama';
export { HuggingFaceBackend, type HuggingFaceBackendOptions } from './huggingface';
export { OpenAiBackend, type OpenAiBackendOptions, type ChatCompletionClient } from './openai';
export { BackendRegistry, createDefaultRegistry } from './registry';
export { runBackendChain, type ChainRequest, type ChainResult } from './chain';
export { parseBackendJson } from './json-response';
export { modelDisplayName } from './models';
