/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the prompt configuration, classifier
 * keywords and extraction results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError } from './errors';
import { logger } from './logger';
import type { ClassifiedDocumentType } from './templates';
import type { ExtractionResult, FileInfo } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});
addFormats(ajv);

/** Raw prompt configuration, before placeholder checks. */
export interface PromptConfigFile {
  document_types: Record<string, Record<string, string>>;
  default: Record<string, string>;
}

/** Raw classifier keyword file */
export interface ClassifierKeywordsFile {
  keywords: Record<ClassifiedDocumentType, string[]>;
}

const EXTRACTION_RESULT_SCHEMA_ID = 'https://docintake.local/contracts/extraction_result.schema.json';

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  throw new ConfigurationError(`Schema file not found: ${schemaName}`);
}

let promptConfigValidator: ValidateFunction<PromptConfigFile> | null = null;
let extractionResultValidator: ValidateFunction<ExtractionResult> | null = null;
let classifierKeywordsValidator: ValidateFunction<ClassifierKeywordsFile> | null = null;
let fileInfoValidator: ValidateFunction<FileInfo> | null = null;

function getPromptConfigValidator(): ValidateFunction<PromptConfigFile> {
  if (!promptConfigValidator) {
    promptConfigValidator = ajv.compile<PromptConfigFile>(loadSchema('prompt_config.schema.json'));
  }
  return promptConfigValidator;
}

function getExtractionResultValidator(): ValidateFunction<ExtractionResult> {
  if (!extractionResultValidator) {
    extractionResultValidator = ajv.compile<ExtractionResult>(
      loadSchema('extraction_result.schema.json')
    );
  }
  return extractionResultValidator;
}

function getClassifierKeywordsValidator(): ValidateFunction<ClassifierKeywordsFile> {
  if (!classifierKeywordsValidator) {
    classifierKeywordsValidator = ajv.compile<ClassifierKeywordsFile>(
      loadSchema('classifier_keywords.schema.json')
    );
  }
  return classifierKeywordsValidator;
}

// file_info lives under $defs of the ExtractionResult schema, which must be registered first
function getFileInfoValidator(): ValidateFunction<FileInfo> {
  if (!fileInfoValidator) {
    getExtractionResultValidator();
    fileInfoValidator = ajv.compile<FileInfo>({ $ref: `${EXTRACTION_RESULT_SCHEMA_ID}#/$defs/file_info` });
  }
  return fileInfoValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function describeErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate a parsed prompt configuration file against prompt_config.schema.json
 */
export function validatePromptConfig(data: unknown): data is PromptConfigFile {
  return getPromptConfigValidator()(data);
}

/**
 * Schema errors from the last validatePromptConfig call
 */
export function promptConfigErrors(): string[] {
  return describeErrors(getPromptConfigValidator());
}

/**
 * Validate a parsed classifier keyword file against classifier_keywords.schema.json
 */
export function validateClassifierKeywords(data: unknown): data is ClassifierKeywordsFile {
  return getClassifierKeywordsValidator()(data);
}

/**
 * Schema errors from the last validateClassifierKeywords call
 */
export function classifierKeywordsErrors(): string[] {
  return describeErrors(getClassifierKeywordsValidator());
}

/**
 * Validate an ExtractionResult against extraction_result.schema.json
 */
export function validateExtractionResult(data: unknown): ValidationResult {
  const validate = getExtractionResultValidator();

  if (!validate(data)) {
    const errors = describeErrors(validate);
    logger.warn('ExtractionResult validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Parse a serialized ExtractionResult, rejecting anything that does not
 * match the schema.
 */
export function parseExtractionResult(json: unknown): ExtractionResult {
  const data: unknown = typeof json === 'string' ? JSON.parse(json) : json;
  const validate = getExtractionResultValidator();

  if (!validate(data)) {
    throw new TypeError(`Invalid ExtractionResult: ${describeErrors(validate).join('; ')}`);
  }
  return data;
}

/**
 * Check stored file details against the file_info definition of the
 * ExtractionResult schema.
 */
export function parseFileInfo(data: unknown): FileInfo {
  const validate = getFileInfoValidator();
  if (!validate(data)) {
    throw new TypeError(`Invalid file_info: ${describeErrors(validate).join('; ')}`);
  }
  return data;
}
