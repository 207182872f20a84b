/**
 * Confidence & Review Policy
 *
 * One confidence score per result, blended from classifier confidence and
 * field completeness, then bucketed into a level. Anything short of `high`
 * goes to human review.
 */

import type { ConfidenceThresholds } from './config';
import type { ConfidenceLevel, ExtractedData } from './types';

export interface ConfidenceDecision {
  confidence_level: ConfidenceLevel;
  needs_human_review: boolean;
}

const CLASSIFICATION_WEIGHT = 0.4;
const COMPLETENESS_WEIGHT = 0.6;

/** Completeness assumed for an empty field mapping */
const EMPTY_COMPLETENESS = 0.5;

function isFilled(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim() !== '';
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * Share of fields in the mapping that hold a non-empty value.
 * `*_raw` copies made during post-processing are not counted.
 */
export function fieldCompleteness(data: ExtractedData): number {
  const keys = Object.keys(data).filter((key) => !key.endsWith('_raw'));
  if (keys.length === 0) {
    return EMPTY_COMPLETENESS;
  }
  const filled = keys.filter((key) => isFilled(data[key])).length;
  return filled / keys.length;
}

/**
 * Blend classifier confidence with field completeness into [0, 1],
 * rounded to four decimals.
 */
export function scoreConfidence(classificationConfidence: number, data: ExtractedData): number {
  const raw =
    CLASSIFICATION_WEIGHT * classificationConfidence + COMPLETENESS_WEIGHT * fieldCompleteness(data);
  const clamped = Math.min(1, Math.max(0, raw));
  return Math.round(clamped * 10000) / 10000;
}

/**
 * Map a score to a level and review flag.
 *
 * @throws RangeError when the score is outside [0, 1] or not a number
 */
export function applyConfidencePolicy(
  score: number,
  thresholds: ConfidenceThresholds
): ConfidenceDecision {
  if (!Number.isFinite(score) || score < 0 || score > 1) {
    throw new RangeError(`Confidence score must be within [0, 1], got ${score}`);
  }

  let level: ConfidenceLevel;
  if (score >= thresholds.high) {
    level = 'high';
  } else if (score >= thresholds.medium) {
    level = 'medium';
  } else {
    level = 'low';
  }

  return { confidence_level: level, needs_human_review: level !== 'high' };
}
