/**
 * Backend Output Parsing
 *
 * Models often wrap JSON in prose or code fences, so the object is taken from
 * the first "{" to the last "}" of the completion.
 */

import { MalformedOutputError } from '../errors';
import type { BackendName, ExtractedData } from '../types';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a completion into a non-empty field mapping.
 *
 * @throws MalformedOutputError when there is no JSON object, it does not
 *   parse, or it has no fields
 */
export function parseBackendJson(backend: BackendName, completion: string): ExtractedData {
  const start = completion.indexOf('{');
  const end = completion.lastIndexOf('}');

  if (start === -1 || end <= start) {
    throw new MalformedOutputError(backend, 'Response contains no JSON object');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(completion.slice(start, end + 1));
  } catch (error) {
    throw new MalformedOutputError(
      backend,
      `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isPlainObject(parsed)) {
    throw new MalformedOutputError(backend, 'Response JSON is not an object');
  }
  if (Object.keys(parsed).length === 0) {
    throw new MalformedOutputError(backend, 'Response JSON object has no fields');
  }

  return parsed;
}
