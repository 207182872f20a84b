/**
 * Document processor: classification, chain, scoring and result shape
 */

import {
  BackendRejectedError,
  BackendUnavailableError,
  ExtractionUnavailableError,
  RequestCancelledError,
  createFailedResult,
  formatItemFields,
  parseExtractionResult,
  parseFileInfo,
  validateExtractionResult,
} from '@docintake/shared';
import { FakeBackend, INVOICE_REPLY, INVOICE_TEXT, createTestProcessor } from './helpers';

describe('Document processor', () => {
  it('produces one frozen high-confidence result for a complete invoice', async () => {
    const processor = createTestProcessor([new FakeBackend('ollama', [INVOICE_REPLY], 'llama2')]);

    const result = await processor.process(INVOICE_TEXT);

    expect(result).toEqual({
      document_type: 'invoice',
      extracted_data: {
        vendor_name: 'Example Supplies',
        invoice_number: 'INV-1001',
        total_amount: '250.00',
        invoice_date: '2024-02-01',
      },
      confidence_score: 1,
      confidence_level: 'high',
      needs_human_review: false,
      extraction_method: 'ollama',
      model_display_name: 'Llama 2',
      classification_confidence: 1,
      processing_time_ms: expect.any(Number),
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(validateExtractionResult(result)).toEqual({ valid: true });
  });

  it('survives a JSON round trip field for field', async () => {
    const processor = createTestProcessor([new FakeBackend('ollama', [INVOICE_REPLY], 'llama2')]);
    const result = await processor.process(INVOICE_TEXT, { includeRawText: true });

    expect(parseExtractionResult(JSON.stringify(result))).toEqual(result);
  });

  it('refuses to parse a result without a confidence level', () => {
    const { confidence_level: _dropped, ...partial } = createFailedResult('boom');

    expect(() => parseExtractionResult(JSON.stringify(partial))).toThrow(TypeError);
  });

  it('checks stored file details against the result contract', () => {
    const file = { filename: 'a.pdf', size_bytes: 2048, file_type: '.pdf', is_camera_capture: false };

    expect(parseFileInfo(file)).toEqual(file);
    expect(() => parseFileInfo({ filename: 'a.pdf', size_bytes: 2048, file_type: '.pdf' })).toThrow(
      TypeError
    );
  });

  it('attributes the result to the backend that answered', async () => {
    const processor = createTestProcessor([
      new FakeBackend('ollama', [new BackendUnavailableError('ollama', 'down')]),
      new FakeBackend('openai', [INVOICE_REPLY], 'gpt-4'),
    ]);

    const result = await processor.process(INVOICE_TEXT);

    expect(result.extraction_method).toBe('openai');
    expect(result.model_display_name).toBe('GPT-4');
    expect(result.failures).toBeUndefined();
  });

  it('uses a forced document type and flags partial results for review', async () => {
    const backend = new FakeBackend('ollama', ['{"store_name": "Corner Shop", "total": ""}']);
    const processor = createTestProcessor([backend]);

    const result = await processor.process('hello there', { forcedType: 'receipt' });

    // 0.4 × 1 + 0.6 × 0.5
    expect(result.document_type).toBe('receipt');
    expect(result.classification_confidence).toBe(1);
    expect(result.confidence_score).toBe(0.7);
    expect(result.confidence_level).toBe('medium');
    expect(result.needs_human_review).toBe(true);
    expect(backend.prompts[0]).toContain('Extract receipt information');
  });

  it('never rates a forced unknown type as high confidence', async () => {
    const processor = createTestProcessor([new FakeBackend('ollama', ['{"a": "x", "b": "y"}'])]);

    const result = await processor.process('gibberish text', { forcedType: 'unknown' });

    // 0.4 × 0 + 0.6 × 1
    expect(result.document_type).toBe('unknown');
    expect(result.classification_confidence).toBe(0);
    expect(result.confidence_score).toBe(0.6);
    expect(result.confidence_level).toBe('medium');
    expect(result.needs_human_review).toBe(true);
  });

  it('takes the document type from the backend when the text gives no hint', async () => {
    const backend = new FakeBackend('ollama', ['{"document_type": "contract", "parties": "A and B"}']);
    const processor = createTestProcessor([backend]);

    const result = await processor.process('hello there');

    expect(result.document_type).toBe('contract');
    expect(result.classification_confidence).toBe(0);
    expect(result.confidence_score).toBe(0.6);
    expect(result.confidence_level).toBe('medium');
    expect(backend.prompts[0]).toContain('document_type');
  });

  it('attaches file details and raw text on request', async () => {
    const processor = createTestProcessor([new FakeBackend('ollama', [INVOICE_REPLY])]);
    const file = { filename: 'a.txt', size_bytes: 10, file_type: '.txt', is_camera_capture: false };

    const result = await processor.process(INVOICE_TEXT, { file, includeRawText: true });

    expect(result.file).toEqual(file);
    expect(result.raw_text).toBe(INVOICE_TEXT);
    expect(validateExtractionResult(result)).toEqual({ valid: true });
  });

  it('fails with ExtractionUnavailable when every backend fails', async () => {
    const processor = createTestProcessor([
      new FakeBackend('ollama', [new BackendUnavailableError('ollama', 'down')]),
      new FakeBackend('openai', ['not json']),
    ]);

    await expect(processor.process(INVOICE_TEXT)).rejects.toBeInstanceOf(ExtractionUnavailableError);
  });

  it('turns a total failure into a flagged fallback result', async () => {
    const processor = createTestProcessor([
      new FakeBackend('ollama', [new BackendUnavailableError('ollama', 'down')]),
      new FakeBackend('huggingface', ['not json']),
      new FakeBackend('openai', [new BackendRejectedError('openai', 'bad key')]),
    ]);

    const result = await processor.processOrFallback(INVOICE_TEXT);

    expect(result).toMatchObject({
      document_type: 'invoice',
      confidence_score: 0,
      confidence_level: 'low',
      needs_human_review: true,
      extraction_method: 'none',
      model_display_name: 'None',
      classification_confidence: 1,
    });
    expect(result.extracted_data).toEqual({
      error: 'All extraction backends failed (ollama: unavailable, huggingface: malformed_output, openai: rejected)',
      failures: [
        { backend: 'ollama', failure: 'unavailable', detail: 'down' },
        { backend: 'huggingface', failure: 'malformed_output', detail: 'Response contains no JSON object' },
        { backend: 'openai', failure: 'rejected', detail: 'bad key' },
      ],
    });
    expect(result.failures).toHaveLength(3);
    expect(validateExtractionResult(result)).toEqual({ valid: true });
  });

  it('does not turn cancellation into a fallback result', async () => {
    const controller = new AbortController();
    controller.abort();
    const processor = createTestProcessor([new FakeBackend('ollama', [INVOICE_REPLY])]);

    await expect(
      processor.processOrFallback(INVOICE_TEXT, { signal: controller.signal })
    ).rejects.toBeInstanceOf(RequestCancelledError);
  });

  it('names the first backend as the primary model', () => {
    const processor = createTestProcessor([
      new FakeBackend('huggingface', [INVOICE_REPLY], 'microsoft/DialoGPT-medium'),
      new FakeBackend('openai', [INVOICE_REPLY], 'gpt-4'),
    ]);

    expect(processor.primaryModelName).toBe('DialoGPT Medium');
  });
});

describe('Item list formatting', () => {
  it('renders a JSON array of items as bullet lines and keeps the original', () => {
    const raw =
      '[{"description": "Coffee", "quantity": 2, "unit_price": "3.50", "total": "7.00"}, {"name": "Bagel", "price": "2.25"}]';

    expect(formatItemFields({ items_purchased: raw, total: '9.25' })).toEqual({
      items_purchased: '• Coffee (Qty: 2) @ 3.50 = 7.00\n• Bagel @ 2.25',
      items_purchased_raw: raw,
      total: '9.25',
    });
  });

  it('flattens a short bracketed list that is not JSON', () => {
    expect(formatItemFields({ line_items: "[Widget, 'Gadget']" })).toEqual({
      line_items: '• Widget\n• Gadget',
    });
  });

  it('leaves other values alone', () => {
    const data = { items: 'none listed', products: ['already', 'a list'] };

    expect(formatItemFields(data)).toEqual(data);
  });
});

describe('Failed results', () => {
  it('is always low confidence and flagged for review', () => {
    const result = createFailedResult('No text could be extracted from blank.txt');

    expect(result).toEqual({
      document_type: 'unknown',
      extracted_data: { error: 'No text could be extracted from blank.txt', failures: [] },
      confidence_score: 0,
      confidence_level: 'low',
      needs_human_review: true,
      extraction_method: 'none',
      model_display_name: 'None',
      classification_confidence: 0,
      processing_time_ms: 0,
    });
    expect(validateExtractionResult(result)).toEqual({ valid: true });
  });
});
