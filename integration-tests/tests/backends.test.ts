/**
 * Extraction backends: request shapes, output parsing and failure mapping
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import {
  BackendRegistry,
  BackendRejectedError,
  BackendTimeoutError,
  BackendUnavailableError,
  ConfigurationError,
  HuggingFaceBackend,
  MalformedOutputError,
  OllamaBackend,
  OpenAiBackend,
  RequestCancelledError,
  config,
  createDefaultRegistry,
  modelDisplayName,
  parseBackendJson,
  type FetchLike,
} from '@docintake/shared';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(response: () => Response) {
  return jest.fn<Promise<Response>, [string, RequestInit]>(async () => response());
}

/** Never answers; rejects once its signal aborts */
const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => {
      const error = new Error('The operation was aborted');
      error.name = 'AbortError';
      reject(error);
    });
  });

function ollama(fetchImpl: FetchLike, timeoutMs = 1000): OllamaBackend {
  return new OllamaBackend({ baseUrl: 'http://ollama.test', model: 'llama2', timeoutMs, fetchImpl });
}

describe('Backend JSON parsing', () => {
  it('takes the object between the first and last brace', () => {
    const completion = 'Sure! Here it is:\n```json\n{"vendor": "Acme", "lines": [{"qty": 2}]}\n```';

    expect(parseBackendJson('ollama', completion)).toEqual({ vendor: 'Acme', lines: [{ qty: 2 }] });
  });

  it.each([
    ['no braces at all', 'Response contains no JSON object'],
    ['} backwards {', 'Response contains no JSON object'],
    ['{}', 'Response JSON object has no fields'],
  ])('rejects %p', (completion, message) => {
    expect(() => parseBackendJson('openai', completion)).toThrow(message);
  });

  it('rejects invalid JSON as malformed output', () => {
    let caught: unknown;
    try {
      parseBackendJson('huggingface', '{"vendor": Acme}');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedOutputError);
    expect(caught).toMatchObject({ backend: 'huggingface', kind: 'malformed_output' });
  });
});

describe('Ollama backend', () => {
  it('posts a non-streaming generate request and returns the response text', async () => {
    const fetchImpl = stubFetch(() => jsonResponse({ response: '{"a": 1}', done: true }));

    await expect(ollama(fetchImpl).complete('PROMPT')).resolves.toBe('{"a": 1}');

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://ollama.test/api/generate');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'llama2',
      prompt: 'PROMPT',
      stream: false,
      options: { temperature: 0.1, top_p: 0.9 },
    });
  });

  it('reports a body without response text as malformed', async () => {
    const fetchImpl = stubFetch(() => jsonResponse({ error: 'model not loaded' }));

    await expect(ollama(fetchImpl).complete('PROMPT')).rejects.toThrow(
      'Ollama response has no "response" text'
    );
  });

  it.each([
    [500, BackendUnavailableError],
    [503, BackendUnavailableError],
    [404, BackendUnavailableError],
    [429, BackendUnavailableError],
    [408, BackendTimeoutError],
    [400, BackendRejectedError],
    [401, BackendRejectedError],
  ])('maps HTTP %p to %p', async (status, errorClass) => {
    const fetchImpl = stubFetch(() => jsonResponse({ error: 'nope' }, status));

    await expect(ollama(fetchImpl).complete('PROMPT')).rejects.toBeInstanceOf(errorClass);
  });

  it('reports a refused connection as unavailable', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError('fetch failed');
    };

    await expect(ollama(fetchImpl).complete('PROMPT')).rejects.toThrow(
      'Cannot reach http://ollama.test/api/generate: fetch failed'
    );
  });

  it('times out a call that never answers', async () => {
    await expect(ollama(hangingFetch, 20).complete('PROMPT')).rejects.toThrow(
      new BackendTimeoutError('ollama', 'No response within 20ms')
    );
  });

  it('reports a caller abort as cancellation', async () => {
    const controller = new AbortController();
    const call = ollama(hangingFetch, 5000).complete('PROMPT', { signal: controller.signal });
    controller.abort();

    await expect(call).rejects.toBeInstanceOf(RequestCancelledError);
  });

  it('does not call a backend for an already aborted request', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchImpl = stubFetch(() => jsonResponse({ response: '{}' }));

    await expect(ollama(fetchImpl).complete('PROMPT', { signal: controller.signal })).rejects.toBeInstanceOf(
      RequestCancelledError
    );
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('Hugging Face backend', () => {
  function huggingface(fetchImpl: FetchLike): HuggingFaceBackend {
    return new HuggingFaceBackend({
      baseUrl: 'http://tgi.test',
      model: 'microsoft/DialoGPT-small',
      maxNewTokens: 200,
      timeoutMs: 1000,
      fetchImpl,
    });
  }

  it('posts a generate request without the prompt echoed back', async () => {
    const fetchImpl = stubFetch(() => jsonResponse({ generated_text: '{"total": "9.99"}' }));
    const backend = huggingface(fetchImpl);

    await expect(backend.complete('PROMPT')).resolves.toBe('{"total": "9.99"}');
    expect(backend.displayName).toBe('DialoGPT Small');

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://tgi.test/generate');
    expect(JSON.parse(String(init.body))).toEqual({
      inputs: 'PROMPT',
      parameters: { max_new_tokens: 200, temperature: 0.1, do_sample: true, return_full_text: false },
    });
  });

  it('accepts the list form of the response', async () => {
    const fetchImpl = stubFetch(() => jsonResponse([{ generated_text: '{"a": 1}' }]));

    await expect(huggingface(fetchImpl).complete('PROMPT')).resolves.toBe('{"a": 1}');
  });

  it('reports a response without generated text as malformed', async () => {
    const fetchImpl = stubFetch(() => jsonResponse({ details: null }));

    await expect(huggingface(fetchImpl).complete('PROMPT')).rejects.toBeInstanceOf(MalformedOutputError);
  });

  it('reports a non-JSON body as malformed', async () => {
    const fetchImpl = stubFetch(() => new Response('<html>oops</html>', { status: 200 }));

    await expect(huggingface(fetchImpl).complete('PROMPT')).rejects.toBeInstanceOf(MalformedOutputError);
  });
});

describe('OpenAI backend', () => {
  function openai(create: (body: ChatCompletionCreateParamsNonStreaming) => Promise<{
    choices: Array<{ message: { content: string | null } }>;
  }>): OpenAiBackend {
    return new OpenAiBackend({
      apiKey: 'test-secret',
      model: 'gpt-4',
      timeoutMs: 1000,
      client: { chat: { completions: { create } } },
    });
  }

  it('sends one chat completion at temperature 0', async () => {
    const create = jest.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => ({
      choices: [{ message: { content: '{"a": 1}' } }],
    }));
    const backend = openai(create);

    await expect(backend.complete('PROMPT')).resolves.toBe('{"a": 1}');
    expect(backend.displayName).toBe('GPT-4');
    expect(create.mock.calls[0][0]).toEqual({
      model: 'gpt-4',
      messages: [
        { role: 'system', content: expect.stringContaining('JSON object') },
        { role: 'user', content: 'PROMPT' },
      ],
      temperature: 0,
    });
  });

  it('is unavailable without an API key', async () => {
    const backend = new OpenAiBackend({ apiKey: '', model: 'gpt-4', timeoutMs: 1000 });

    await expect(backend.complete('PROMPT')).rejects.toThrow(
      new BackendUnavailableError('openai', 'OPENAI_API_KEY is not configured')
    );
  });

  it('reports an empty completion as malformed', async () => {
    const backend = openai(async () => ({ choices: [{ message: { content: null } }] }));

    await expect(backend.complete('PROMPT')).rejects.toThrow('Empty completion from OpenAI');
  });

  it.each([
    ['an auth error', () => new OpenAI.APIError(401, undefined, 'Incorrect API key', {}), BackendRejectedError],
    ['a rate limit', () => new OpenAI.APIError(429, undefined, 'Rate limited', {}), BackendUnavailableError],
    ['a server error', () => new OpenAI.APIError(502, undefined, 'Bad gateway', {}), BackendUnavailableError],
    ['a request timeout', () => new OpenAI.APIConnectionTimeoutError(), BackendTimeoutError],
    ['a connection error', () => new OpenAI.APIConnectionError({ message: 'ECONNRESET' }), BackendUnavailableError],
    ['a user abort', () => new OpenAI.APIUserAbortError(), RequestCancelledError],
  ])('maps %s', async (_label, makeError, errorClass) => {
    const backend = openai(async () => {
      throw makeError();
    });

    await expect(backend.complete('PROMPT')).rejects.toBeInstanceOf(errorClass);
  });
});

describe('Model display names', () => {
  it.each([
    ['llama2', 'Llama 2'],
    ['llama2:13b', 'Llama 2'],
    ['codellama', 'Code Llama'],
    ['microsoft/DialoGPT-medium', 'DialoGPT Medium'],
    ['gpt-3.5-turbo', 'GPT-3.5 Turbo'],
    ['gpt-4o-mini', 'GPT-4o mini'],
    ['org/custom-model', 'custom-model'],
    ['constructor', 'constructor'],
    ['toString:latest', 'toString:latest'],
  ])('%s is shown as %s', (model, name) => {
    expect(modelDisplayName(model)).toBe(name);
  });
});

describe('Backend registry', () => {
  it('resolves the configured order', () => {
    const registry = createDefaultRegistry(config);

    expect(registry.names()).toEqual(['ollama', 'huggingface', 'openai']);
    expect(registry.resolve(['openai', 'ollama']).map((b) => b.name)).toEqual(['openai', 'ollama']);
  });

  it('rejects an unregistered backend', () => {
    expect(() => new BackendRegistry().resolve(['ollama'])).toThrow(ConfigurationError);
  });
});
