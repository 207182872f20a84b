/**
 * Prompt Templates
 *
 * Loading, validation and rendering of per-document-type, per-backend prompts.
 */

export type {
  BackendTemplates,
  ClassifiedDocumentType,
  Placeholder,
  PromptTemplateSet,
} from './types';
export { PLACEHOLDERS } from './types';
export { loadPromptTemplates, parsePromptTemplates } from './loader';
export { buildPrompt, getTemplate, TEXT_PREVIEW_LENGTH } from './builder';
