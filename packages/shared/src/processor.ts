/**
 * Document Processor
 *
 * The per-request pipeline: classify the text, run the backend chain with the
 * prompt for that type, tidy up list fields, score the result and apply the
 * review policy. Produces exactly one frozen ExtractionResult per call.
 */

import type { ExtractionBackend } from './backends';
import { runBackendChain } from './backends';
import {
  classifyDocument,
  forceDocumentType,
  reconcileWithBackendLabel,
  type Classification,
  type ClassifierKeywords,
} from './classifier';
import type { ConfidenceThresholds } from './config';
import { applyConfidencePolicy, scoreConfidence } from './confidence';
import { ExtractionUnavailableError } from './errors';
import { logger } from './logger';
import { extractionDurationHistogram, extractionsCounter } from './metrics';
import type { PromptTemplateSet } from './templates';
import type { DocumentType, ExtractedData, ExtractionResult, FileInfo } from './types';

export interface ProcessorDependencies {
  backends: readonly ExtractionBackend[];
  templates: PromptTemplateSet;
  keywords: ClassifierKeywords;
  thresholds: ConfidenceThresholds;
  classificationMinConfidence: number;
}

export interface ProcessOptions {
  /** Caller-forced document type; skips the keyword heuristic */
  forcedType?: DocumentType;
  signal?: AbortSignal;
  file?: FileInfo;
  /** Include the extracted text in the result */
  includeRawText?: boolean;
}

/** Fields that models tend to fill with a JSON array of line items */
const ITEM_FIELDS = ['items_purchased', 'line_items', 'items', 'products'] as const;

/** Bracketed lists that fail to parse are only flattened when this short */
const MAX_LOOSE_ITEMS = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '' && value !== 0;
}

function describeItem(item: unknown): string {
  if (!isRecord(item)) {
    return String(item);
  }
  const desc = item.description ?? item.name ?? 'Item';
  const qty = item.quantity ?? item.qty ?? 1;
  const price = item.unit_price ?? item.price;
  const total = item.total ?? item.amount;

  let line = String(desc);
  if (present(qty) && qty !== 1 && qty !== '1') {
    line += ` (Qty: ${String(qty)})`;
  }
  if (present(price)) {
    line += ` @ ${String(price)}`;
  }
  if (present(total)) {
    line += ` = ${String(total)}`;
  }
  return line;
}

function bullets(lines: string[]): string {
  return lines.map((line) => `• ${line}`).join('\n');
}

/**
 * Render item-list fields that hold a JSON array (as a string) into bullet
 * lines. The original string is kept under `<field>_raw`.
 */
export function formatItemFields(data: ExtractedData): ExtractedData {
  const result: ExtractedData = { ...data };

  for (const field of ITEM_FIELDS) {
    const raw = result[field];
    if (typeof raw !== 'string') {
      continue;
    }

    const match = /\[[\s\S]*\]/.exec(raw);
    if (!match) {
      continue;
    }

    let items: unknown;
    try {
      items = JSON.parse(match[0]);
    } catch {
      const trimmed = raw.trim();
      if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
        const loose = trimmed
          .slice(1, -1)
          .replace(/["']/g, '')
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s !== '');
        if (loose.length > 0 && loose.length <= MAX_LOOSE_ITEMS) {
          result[field] = bullets(loose);
        }
      }
      continue;
    }

    if (Array.isArray(items) && items.length > 0) {
      result[field] = bullets(items.map(describeItem));
      result[`${field}_raw`] = raw;
    }
  }

  return result;
}

export class DocumentProcessor {
  constructor(private readonly deps: ProcessorDependencies) {}

  /**
   * Name of the model that would answer first, for display before any call
   */
  get primaryModelName(): string {
    return this.deps.backends[0]?.displayName ?? 'None';
  }

  classify(text: string, forcedType?: DocumentType): Classification {
    if (forcedType) {
      return forceDocumentType(forcedType);
    }
    return classifyDocument(text, this.deps.keywords, this.deps.classificationMinConfidence);
  }

  /**
   * Run the full pipeline.
   *
   * @throws ExtractionUnavailableError when every backend fails
   * @throws RequestCancelledError when options.signal aborts
   */
  async process(text: string, options: ProcessOptions = {}): Promise<ExtractionResult> {
    const start = Date.now();
    const initial = this.classify(text, options.forcedType);

    logger.info('Document classified', {
      document_type: initial.document_type,
      confidence: initial.confidence,
      forced: Boolean(options.forcedType),
      matched_keywords: initial.matched_keywords,
    });

    const chain = await runBackendChain(this.deps.backends, {
      text,
      documentType: initial.document_type,
      templates: this.deps.templates,
      signal: options.signal,
    });

    const data = formatItemFields(chain.data);
    const classification = reconcileWithBackendLabel(initial, data);
    const score = scoreConfidence(classification.confidence, data);
    const decision = applyConfidencePolicy(score, this.deps.thresholds);
    const processingTimeMs = Date.now() - start;

    const result: ExtractionResult = {
      document_type: classification.document_type,
      extracted_data: data,
      confidence_score: score,
      confidence_level: decision.confidence_level,
      needs_human_review: decision.needs_human_review,
      extraction_method: chain.backend.name,
      model_display_name: chain.backend.displayName,
      classification_confidence: classification.confidence,
      processing_time_ms: processingTimeMs,
      ...(options.file ? { file: options.file } : {}),
      ...(options.includeRawText ? { raw_text: text } : {}),
    };

    extractionsCounter.inc({
      document_type: result.document_type,
      extraction_method: result.extraction_method,
      confidence_level: result.confidence_level,
    });
    extractionDurationHistogram.observe({ extraction_method: result.extraction_method }, processingTimeMs / 1000);

    logger.info('Extraction complete', {
      document_type: result.document_type,
      extraction_method: result.extraction_method,
      confidence_score: result.confidence_score,
      confidence_level: result.confidence_level,
      needs_human_review: result.needs_human_review,
      processing_time_ms: processingTimeMs,
    });

    return Object.freeze(result);
  }

  /**
   * Like process(), but a chain failure becomes a well-formed result that is
   * flagged for review instead of an error. Used where a workflow always
   * shows output.
   */
  async processOrFallback(text: string, options: ProcessOptions = {}): Promise<ExtractionResult> {
    const start = Date.now();
    try {
      return await this.process(text, options);
    } catch (error) {
      if (!(error instanceof ExtractionUnavailableError)) {
        throw error;
      }
      const classification = this.classify(text, options.forcedType);
      extractionsCounter.inc({
        document_type: classification.document_type,
        extraction_method: 'none',
        confidence_level: 'low',
      });
      return createFailedResult(error.message, {
        documentType: classification.document_type,
        classificationConfidence: classification.confidence,
        processingTimeMs: Date.now() - start,
        failures: error.attempts,
        file: options.file,
      });
    }
  }
}

export interface FailedResultOptions {
  documentType?: DocumentType;
  classificationConfidence?: number;
  processingTimeMs?: number;
  failures?: ExtractionResult['failures'];
  file?: FileInfo;
}

/**
 * Result for a document no backend could extract: confidence 0, level low,
 * always flagged for review, attributed to no backend.
 */
export function createFailedResult(message: string, options: FailedResultOptions = {}): ExtractionResult {
  const failures = options.failures ?? [];
  const result: ExtractionResult = {
    document_type: options.documentType ?? 'unknown',
    extracted_data: {
      error: message,
      failures: failures.map((f) => ({ backend: f.backend, failure: f.failure, detail: f.detail })),
    },
    confidence_score: 0,
    confidence_level: 'low',
    needs_human_review: true,
    extraction_method: 'none',
    model_display_name: 'None',
    classification_confidence: options.classificationConfidence ?? 0,
    processing_time_ms: options.processingTimeMs ?? 0,
    ...(options.failures ? { failures } : {}),
    ...(options.file ? { file: options.file } : {}),
  };
  return Object.freeze(result);
}
