/**
 * Workflow Output Shapes
 *
 * PipelineData for downstream webhooks and batch summaries.
 */

import { ulid } from 'ulid';
import type {
  BatchResult,
  ExtractionResult,
  PipelineData,
  WorkflowType,
} from './types';

export interface PipelineSource {
  workflowId: string;
  workflowType: WorkflowType;
  filename: string;
  documentId?: string;
  storageLocation?: string;
}

/**
 * Flatten an extraction result for a downstream pipeline.
 */
export function toPipelineData(source: PipelineSource, result: ExtractionResult): PipelineData {
  return {
    workflow_id: source.workflowId,
    workflow_type: source.workflowType,
    document_id: source.documentId ?? null,
    filename: source.filename,
    document_type: result.document_type,
    extracted_fields: result.extracted_data,
    confidence_score: result.confidence_score,
    confidence_level: result.confidence_level,
    needs_human_review: result.needs_human_review,
    extraction_method: result.extraction_method,
    model_display_name: result.model_display_name,
    storage_location: source.storageLocation ?? null,
    processed_at: new Date().toISOString(),
  };
}

/**
 * Summarize a batch. An item counts as failed when its result came from no
 * backend (extraction_method `none`).
 */
export function buildBatchResult<T>(
  results: T[],
  resultOf: (item: T) => ExtractionResult
): BatchResult<T> {
  const failed = results.filter((item) => resultOf(item).extraction_method === 'none').length;
  return {
    batch_id: ulid(),
    total_documents: results.length,
    successful: results.length - failed,
    failed,
    results,
    processed_at: new Date().toISOString(),
  };
}
