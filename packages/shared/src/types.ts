/**
 * Shared Types
 *
 * Wire and domain types shared by the web API, the webhook worker and tests.
 * Field names are snake_case because these objects are returned as JSON as-is.
 */

// ============================================================================
// Document Types & Backends
// ============================================================================

export const DOCUMENT_TYPES = ['invoice', 'contract', 'form', 'receipt', 'unknown'] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export function isDocumentType(value: unknown): value is DocumentType {
  return typeof value === 'string' && DOCUMENT_TYPES.some((item) => item === value);
}

/**
 * Text-completion backends, in their default fallback order:
 * local daemon, local model, hosted API.
 */
export const BACKEND_NAMES = ['ollama', 'huggingface', 'openai'] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

export function isBackendName(value: unknown): value is BackendName {
  return typeof value === 'string' && BACKEND_NAMES.some((item) => item === value);
}

/** `none` marks a fallback result where no backend succeeded. */
export type ExtractionMethod = BackendName | 'none';

export type ConfidenceLevel = 'low' | 'medium' | 'high';

// ============================================================================
// Extraction
// ============================================================================

/**
 * Field mapping produced by a backend. Values are whatever JSON the model
 * returned; list fields may be rendered into bullet text during post-processing.
 */
export type ExtractedData = Record<string, unknown>;

export type FailureKind = 'unavailable' | 'malformed_output' | 'timeout' | 'rejected';

/**
 * One backend attempt inside a fallback chain run. Used for control flow,
 * logging and diagnostics only; never persisted.
 */
export interface BackendAttempt {
  backend: BackendName;
  success: boolean;
  failure?: FailureKind;
  detail?: string;
  duration_ms: number;
}

export interface FileInfo {
  filename: string;
  size_bytes: number;
  file_type: string;
  is_camera_capture: boolean;
}

export interface ExtractionResult {
  document_type: DocumentType;
  extracted_data: ExtractedData;
  confidence_score: number;
  confidence_level: ConfidenceLevel;
  needs_human_review: boolean;
  extraction_method: ExtractionMethod;
  model_display_name: string;
  classification_confidence: number;
  processing_time_ms: number;
  file?: FileInfo;
  raw_text?: string;
  failures?: BackendAttempt[];
}

// ============================================================================
// Storage & Workflows
// ============================================================================

export interface StoredDocument {
  document_id: string;
  original_filename: string;
  storage_location: string;
  access_url: string;
  processing_result: ExtractionResult;
  file_info: FileInfo;
  uploaded_at: string;
}

export interface DocumentListResponse {
  documents: StoredDocument[];
  total: number;
  limit: number;
  skip: number;
  has_more: boolean;
}

export interface WorkflowResponse {
  document_id: string;
  processing_result: ExtractionResult;
  storage_location: string;
  access_url: string;
}

export interface BatchResult<T> {
  batch_id: string;
  total_documents: number;
  successful: number;
  failed: number;
  results: T[];
  processed_at: string;
}

export const WORKFLOW_TYPES = ['quick_scan', 'document_workflow'] as const;

export type WorkflowType = (typeof WORKFLOW_TYPES)[number];

export function isWorkflowType(value: unknown): value is WorkflowType {
  return typeof value === 'string' && WORKFLOW_TYPES.some((item) => item === value);
}

export type WorkflowState = 'processing' | 'completed' | 'failed';

export interface WorkflowStatus {
  workflow_id: string;
  workflow_type: WorkflowType;
  status: WorkflowState;
  filename: string;
  started_at: string;
  completed_at?: string;
  document_id?: string;
  error?: string;
  webhook_url?: string;
}

/**
 * Flattened extraction result forwarded to downstream webhooks.
 */
export interface PipelineData {
  workflow_id: string;
  workflow_type: WorkflowType;
  document_id: string | null;
  filename: string;
  document_type: DocumentType;
  extracted_fields: ExtractedData;
  confidence_score: number;
  confidence_level: ConfidenceLevel;
  needs_human_review: boolean;
  extraction_method: ExtractionMethod;
  model_display_name: string;
  storage_location: string | null;
  processed_at: string;
}

// ============================================================================
// API Responses
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
    details?: unknown;
  };
}
