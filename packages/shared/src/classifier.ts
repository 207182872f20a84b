/**
 * Document Classifier
 *
 * Keyword heuristic over the raw text. Each document type scores the number
 * of its keyword phrases found in the text; the best type wins when it is
 * unambiguous and confident enough, otherwise the document is `unknown`.
 */

import fs from 'fs';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import { classifierKeywordsErrors, validateClassifierKeywords } from './schemas';
import { isDocumentType, type DocumentType, type ExtractedData } from './types';
import type { ClassifiedDocumentType } from './templates';

export type ClassifierKeywords = Readonly<Record<ClassifiedDocumentType, readonly string[]>>;

export interface Classification {
  document_type: DocumentType;
  confidence: number;
  matched_keywords: string[];
}

/** Hits needed before the winning type gets full confidence */
const SATURATION_HITS = 3;

const CLASSIFIED_TYPES: readonly ClassifiedDocumentType[] = ['invoice', 'contract', 'form', 'receipt'];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Word-bounded, case-insensitive matcher. Boundaries only apply on sides of
 * the phrase that end in a word character, so "invoice #" matches "Invoice #12".
 */
function keywordPattern(keyword: string): RegExp {
  const trimmed = keyword.trim().toLowerCase();
  const start = /^\w/.test(trimmed) ? '(?<![\\w])' : '';
  const end = /\w$/.test(trimmed) ? '(?![\\w])' : '';
  return new RegExp(`${start}${escapeRegExp(trimmed)}${end}`, 'i');
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Classify a document from its text.
 *
 * confidence = (top hits / all hits) × min(1, top hits / 3). Ties, zero hits
 * and confidence under `minConfidence` give `unknown`.
 */
export function classifyDocument(
  text: string,
  keywords: ClassifierKeywords,
  minConfidence: number
): Classification {
  const scores = CLASSIFIED_TYPES.map((documentType) => {
    const matched = keywords[documentType].filter((keyword) => keywordPattern(keyword).test(text));
    return { documentType, hits: matched.length, matched };
  });

  const total = scores.reduce((sum, s) => sum + s.hits, 0);
  const ranked = [...scores].sort((a, b) => b.hits - a.hits);
  const top = ranked[0];
  const runnerUp = ranked[1];

  if (total === 0 || top.hits === runnerUp.hits) {
    return { document_type: 'unknown', confidence: 0, matched_keywords: [] };
  }

  const confidence = round2((top.hits / total) * Math.min(1, top.hits / SATURATION_HITS));

  if (confidence < minConfidence) {
    logger.debug('Classification below minimum confidence', {
      best_type: top.documentType,
      confidence,
      min_confidence: minConfidence,
    });
    return { document_type: 'unknown', confidence, matched_keywords: top.matched };
  }

  return { document_type: top.documentType, confidence, matched_keywords: top.matched };
}

/**
 * Apply a caller-forced document type. A forced type always wins; forcing
 * `unknown` carries no classification confidence.
 */
export function forceDocumentType(documentType: DocumentType): Classification {
  const confidence = documentType === 'unknown' ? 0 : 1;
  return { document_type: documentType, confidence, matched_keywords: [] };
}

/**
 * When the heuristic said `unknown`, take a valid `document_type` label the
 * backend put in its output.
 */
export function reconcileWithBackendLabel(
  classification: Classification,
  extractedData: ExtractedData
): Classification {
  if (classification.document_type !== 'unknown') {
    return classification;
  }
  const label = extractedData.document_type;
  if (typeof label !== 'string') {
    return classification;
  }
  const normalized = label.trim().toLowerCase();
  if (!isDocumentType(normalized) || normalized === 'unknown') {
    return classification;
  }
  return { ...classification, document_type: normalized };
}

/**
 * Load classifier keywords from config/classifier-keywords.json.
 */
export function loadClassifierKeywords(filePath: string): ClassifierKeywords {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot load classifier keywords ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseClassifierKeywords(data, filePath);
}

export function parseClassifierKeywords(data: unknown, source = 'classifier keywords'): ClassifierKeywords {
  if (!validateClassifierKeywords(data)) {
    throw new ConfigurationError(`Invalid ${source}: ${classifierKeywordsErrors().join('; ')}`);
  }
  const { keywords } = data;

  return Object.freeze({
    invoice: Object.freeze([...keywords.invoice]),
    contract: Object.freeze([...keywords.contract]),
    form: Object.freeze([...keywords.form]),
    receipt: Object.freeze([...keywords.receipt]),
  });
}
