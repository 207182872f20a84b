/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  setContextDocumentId,
  setContextWorkflowType,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext, type LogLevel } from './logger';

// Config
export { config, loadConfig, type Config, type ConfidenceThresholds } from './config';

// Types
export * from './types';

// Errors
export {
  AppError,
  ConfigurationError,
  UnsupportedFileError,
  InvalidRequestError,
  EmptyDocumentError,
  NotFoundError,
  RequestCancelledError,
  BackendError,
  BackendUnavailableError,
  BackendTimeoutError,
  BackendRejectedError,
  MalformedOutputError,
  ExtractionUnavailableError,
  isAbortError,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type WebhookDeliveryJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  jobsProcessedCounter,
  backendAttemptsCounter,
  backendRequestDurationHistogram,
  extractionsCounter,
  extractionDurationHistogram,
  documentsProcessedCounter,
  webhookDeliveriesCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validatePromptConfig,
  validateClassifierKeywords,
  validateExtractionResult,
  parseExtractionResult,
  parseFileInfo,
  type ClassifierKeywordsFile,
  type PromptConfigFile,
  type ValidationResult,
} from './schemas';

// Prompt templates
export {
  loadPromptTemplates,
  parsePromptTemplates,
  buildPrompt,
  getTemplate,
  TEXT_PREVIEW_LENGTH,
  PLACEHOLDERS,
  type BackendTemplates,
  type ClassifiedDocumentType,
  type Placeholder,
  type PromptTemplateSet,
} from './templates';

// Classifier
export {
  classifyDocument,
  forceDocumentType,
  reconcileWithBackendLabel,
  loadClassifierKeywords,
  parseClassifierKeywords,
  type Classification,
  type ClassifierKeywords,
} from './classifier';

// Confidence policy
export {
  applyConfidencePolicy,
  scoreConfidence,
  fieldCompleteness,
  type ConfidenceDecision,
} from './confidence';

// Backends
export {
  OllamaBackend,
  HuggingFaceBackend,
  OpenAiBackend,
  BackendRegistry,
  createDefaultRegistry,
  runBackendChain,
  parseBackendJson,
  modelDisplayName,
  type CompletionOptions,
  type ExtractionBackend,
  type FetchLike,
  type ChatCompletionClient,
  type ChainRequest,
  type ChainResult,
} from './backends';

// Uploads & text extraction
export {
  SUPPORTED_EXTENSIONS,
  IMAGE_EXTENSIONS,
  resolveFileType,
  validateUpload,
  type SupportedExtension,
  type UploadedFile,
} from './files';
export {
  DefaultTextExtractor,
  extractTextFromPdf,
  recognizeImage,
  resolveLangPath,
  type TextExtractor,
  type DefaultTextExtractorOptions,
  type OcrOptions,
} from './text-extraction';

// Processing
export {
  DocumentProcessor,
  createFailedResult,
  formatItemFields,
  type ProcessorDependencies,
  type ProcessOptions,
} from './processor';

// Export & pipeline output
export {
  EXPORT_FORMATS,
  exportDocument,
  isExportFormat,
  toCsv,
  toXml,
  toExportRecord,
  type ExportFormat,
  type ExportedFile,
} from './export';
export { toPipelineData, buildBatchResult, type PipelineSource } from './pipeline';
