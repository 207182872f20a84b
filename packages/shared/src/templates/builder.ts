/**
 * Prompt Builder
 *
 * Selects the template for (document type, backend) and interpolates the
 * document text into it.
 */

import { ConfigurationError } from '../errors';
import type { BackendName, DocumentType } from '../types';
import type { Placeholder, PromptTemplateSet } from './types';

/** Characters of document text given to backends through {{text_preview}} */
export const TEXT_PREVIEW_LENGTH = 300;

const PLACEHOLDER_PATTERN = /\{\{(text|text_preview)\}\}/g;

/**
 * Find the template for a document type and backend, falling back to the
 * default set when the type has no template for that backend.
 *
 * @throws ConfigurationError if neither lookup finds a template
 */
export function getTemplate(
  templates: PromptTemplateSet,
  documentType: DocumentType,
  backend: BackendName
): string {
  const specific = documentType === 'unknown' ? undefined : templates.documentTypes[documentType]?.[backend];
  const template = specific ?? templates.defaults[backend];

  if (template === undefined) {
    throw new ConfigurationError(
      `No prompt template for document type "${documentType}" and backend "${backend}", and no default`
    );
  }
  return template;
}

function interpolate(placeholder: Placeholder, text: string): string {
  return placeholder === 'text_preview' ? text.slice(0, TEXT_PREVIEW_LENGTH) : text;
}

/**
 * Build the prompt for one backend attempt.
 *
 * Interpolation is a single pass, so placeholder syntax or `$` sequences
 * inside the document text are inserted verbatim.
 */
export function buildPrompt(
  templates: PromptTemplateSet,
  documentType: DocumentType,
  backend: BackendName,
  text: string
): string {
  const template = getTemplate(templates, documentType, backend);
  return template.replace(PLACEHOLDER_PATTERN, (_match: string, name: Placeholder) =>
    interpolate(name, text)
  );
}
