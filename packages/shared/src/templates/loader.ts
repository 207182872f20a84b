/**
 * Prompt Configuration Loader
 *
 * Reads config/prompts.json once at start-up. Anything wrong with the file
 * (unreadable, not JSON, schema violation, bad placeholder, missing default
 * for a configured backend) is a ConfigurationError, so the service never
 * starts with a template it cannot render.
 */

import fs from 'fs';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import { promptConfigErrors, validatePromptConfig } from '../schemas';
import { isBackendName, isDocumentType, type BackendName } from '../types';
import {
  PLACEHOLDERS,
  type BackendTemplates,
  type ClassifiedDocumentType,
  type PromptTemplateSet,
} from './types';

const ANY_PLACEHOLDER = /\{\{([^{}]*)\}\}/g;

function isPlaceholder(name: string): boolean {
  return PLACEHOLDERS.some((item) => item === name);
}

function checkTemplate(template: string, where: string): void {
  const names = Array.from(template.matchAll(ANY_PLACEHOLDER), (m) => m[1]);

  const unknown = names.filter((name) => !isPlaceholder(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Prompt template ${where} uses unknown placeholder(s): ${unknown.map((n) => `{{${n}}}`).join(', ')}`
    );
  }
  if (names.length !== 1) {
    throw new ConfigurationError(
      `Prompt template ${where} must contain exactly one of {{text}} or {{text_preview}}, found ${names.length}`
    );
  }
}

function toBackendTemplates(raw: Record<string, string>, where: string): BackendTemplates {
  const templates: Partial<Record<BackendName, string>> = {};
  for (const [backend, template] of Object.entries(raw)) {
    if (!isBackendName(backend)) {
      throw new ConfigurationError(`Prompt templates ${where} name unknown backend "${backend}"`);
    }
    checkTemplate(template, `${where}.${backend}`);
    templates[backend] = template;
  }
  return Object.freeze(templates);
}

/**
 * Validate already-parsed prompt configuration and build the template set.
 *
 * @param requiredBackends - backends that must have a default template
 */
export function parsePromptTemplates(
  data: unknown,
  requiredBackends: readonly BackendName[],
  source = 'prompt configuration'
): PromptTemplateSet {
  if (!validatePromptConfig(data)) {
    throw new ConfigurationError(`Invalid ${source}: ${promptConfigErrors().join('; ')}`);
  }

  const documentTypes: Partial<Record<ClassifiedDocumentType, BackendTemplates>> = {};
  for (const [documentType, raw] of Object.entries(data.document_types)) {
    if (!isDocumentType(documentType) || documentType === 'unknown') {
      throw new ConfigurationError(`Invalid ${source}: unknown document type "${documentType}"`);
    }
    documentTypes[documentType] = toBackendTemplates(raw, `document_types.${documentType}`);
  }

  const defaults = toBackendTemplates(data.default, 'default');
  const missing = requiredBackends.filter((backend) => defaults[backend] === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Invalid ${source}: no default template for backend(s) ${missing.join(', ')}`
    );
  }

  return Object.freeze({
    documentTypes: Object.freeze(documentTypes),
    defaults,
  });
}

/**
 * Load and validate the prompt configuration file.
 */
export function loadPromptTemplates(
  filePath: string,
  requiredBackends: readonly BackendName[]
): PromptTemplateSet {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read prompt configuration ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Prompt configuration ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const templates = parsePromptTemplates(data, requiredBackends, `prompt configuration ${filePath}`);

  logger.info('Prompt templates loaded', {
    path: filePath,
    document_types: Object.keys(templates.documentTypes),
    default_backends: Object.keys(templates.defaults),
  });

  return templates;
}
