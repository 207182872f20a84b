/**
 * Prompt Template Types
 *
 * Templates are keyed by document type, then by backend name. Each template
 * holds exactly one placeholder:
 * - {{text}}: the full extracted text
 * - {{text_preview}}: a fixed-length prefix, for backends with small context windows
 */

import type { BackendName, DocumentType } from '../types';

export type BackendTemplates = Readonly<Partial<Record<BackendName, string>>>;

export type ClassifiedDocumentType = Exclude<DocumentType, 'unknown'>;

/**
 * Immutable prompt configuration, shared by all requests.
 */
export interface PromptTemplateSet {
  readonly documentTypes: Readonly<Partial<Record<ClassifiedDocumentType, BackendTemplates>>>;
  /** Used for `unknown` and for any document type without a template for the backend */
  readonly defaults: BackendTemplates;
}

export const PLACEHOLDERS = ['text', 'text_preview'] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];
