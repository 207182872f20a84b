/**
 * Fallback chain across extraction backends
 */

import {
  BackendRejectedError,
  BackendTimeoutError,
  BackendUnavailableError,
  ConfigurationError,
  ExtractionUnavailableError,
  RequestCancelledError,
  parsePromptTemplates,
  runBackendChain,
} from '@docintake/shared';
import { FakeBackend, shippedTemplates } from './helpers';

const templates = shippedTemplates();

function request(signal?: AbortSignal) {
  return { text: 'Invoice 7', documentType: 'invoice' as const, templates, signal };
}

describe('Backend chain', () => {
  it('stops at the first backend that succeeds', async () => {
    const ollama = new FakeBackend('ollama', ['{"invoice_number": "7"}']);
    const huggingface = new FakeBackend('huggingface', ['{"other": true}']);

    const result = await runBackendChain([ollama, huggingface], request());

    expect(result.data).toEqual({ invoice_number: '7' });
    expect(result.backend).toBe(ollama);
    expect(result.attempts).toEqual([{ backend: 'ollama', success: true, duration_ms: expect.any(Number) }]);
    expect(huggingface.calls).toBe(0);
  });

  it('falls through unavailable and malformed backends in order', async () => {
    const ollama = new FakeBackend('ollama', [new BackendUnavailableError('ollama', 'Cannot reach daemon')]);
    const huggingface = new FakeBackend('huggingface', ['I could not find any JSON, sorry']);
    const openai = new FakeBackend('openai', ['{"invoice_number": "7"}']);

    const result = await runBackendChain([ollama, huggingface, openai], request());

    expect(result.backend.name).toBe('openai');
    expect(result.attempts.map((a) => [a.backend, a.success, a.failure])).toEqual([
      ['ollama', false, 'unavailable'],
      ['huggingface', false, 'malformed_output'],
      ['openai', true, undefined],
    ]);
    expect([ollama.calls, huggingface.calls, openai.calls]).toEqual([1, 1, 1]);
  });

  it('sends each backend the prompt built for it', async () => {
    const ollama = new FakeBackend('ollama', [new BackendTimeoutError('ollama', 'slow')]);
    const huggingface = new FakeBackend('huggingface', ['{"a": 1}']);

    await runBackendChain([ollama, huggingface], request());

    expect(ollama.prompts[0]).toContain('Text: Invoice 7');
    expect(huggingface.prompts[0]).toBe('Extract invoice information as JSON from: Invoice 7...\nJSON:');
  });

  it('throws ExtractionUnavailable with every attempt when all backends fail', async () => {
    const backends = [
      new FakeBackend('ollama', [new BackendUnavailableError('ollama', 'down')]),
      new FakeBackend('huggingface', [new BackendTimeoutError('huggingface', 'slow')]),
      new FakeBackend('openai', [new BackendRejectedError('openai', 'bad key')]),
    ];

    let caught: unknown;
    try {
      await runBackendChain(backends, request());
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExtractionUnavailableError);
    if (!(caught instanceof ExtractionUnavailableError)) {
      return;
    }
    expect(caught.message).toBe(
      'All extraction backends failed (ollama: unavailable, huggingface: timeout, openai: rejected)'
    );
    expect(caught.statusCode).toBe(503);
    expect(caught.attempts.map((a) => a.detail)).toEqual(['down', 'slow', 'bad key']);
  });

  it('treats an unexpected error as that backend being unavailable', async () => {
    const ollama = new FakeBackend('ollama', [new Error('socket hang up')]);
    const openai = new FakeBackend('openai', ['{"a": 1}']);

    const result = await runBackendChain([ollama, openai], request());

    expect(result.attempts[0]).toMatchObject({ failure: 'unavailable', detail: 'socket hang up' });
  });

  it('abandons the in-flight call and stops when the request is cancelled', async () => {
    const controller = new AbortController();
    const ollama = new FakeBackend('ollama', [
      () => {
        controller.abort();
        return new Promise<string>(() => undefined);
      },
    ]);
    const openai = new FakeBackend('openai', ['{"a": 1}']);

    await expect(runBackendChain([ollama, openai], request(controller.signal))).rejects.toBeInstanceOf(
      RequestCancelledError
    );
    expect(openai.calls).toBe(0);
  });

  it('requires at least one backend', async () => {
    await expect(runBackendChain([], request())).rejects.toThrow('No extraction backends configured');
  });

  it('does not treat a missing template as a backend failure', async () => {
    const partial = parsePromptTemplates({ document_types: {}, default: { ollama: '{{text}}' } }, ['ollama']);
    const openai = new FakeBackend('openai', ['{"a": 1}']);

    await expect(
      runBackendChain([openai], { text: 'x', documentType: 'invoice', templates: partial })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(openai.calls).toBe(0);
  });
});
