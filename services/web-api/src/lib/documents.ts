/**
 * Document Service
 *
 * The two end-user workflows: quick scan (upload → process → discard) and
 * document workflow (upload → process → store), single and batched, plus
 * reads and deletes of stored documents.
 */

import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import {
  InvalidRequestError,
  NotFoundError,
  RequestCancelledError,
  buildBatchResult,
  createFailedResult,
  documentsProcessedCounter,
  logger,
  setContextDocumentId,
  validateUpload,
  type BatchResult,
  type DocumentListResponse,
  type DocumentProcessor,
  type DocumentType,
  type ExtractionResult,
  type StoredDocument,
  type TextExtractor,
  type UploadedFile,
  type WorkflowResponse,
} from '@docintake/shared';
import { documentKey, type ObjectStore } from './object-store';
import type { DocumentRepository } from './repository';

export interface DocumentSettings {
  maxFileSizeBytes: number;
  maxBatchFiles: number;
  batchConcurrency: number;
  publicBaseUrl: string;
}

export interface DocumentServiceDependencies {
  processor: DocumentProcessor;
  textExtractor: TextExtractor;
  objectStore: ObjectStore;
  repository: DocumentRepository;
  settings: DocumentSettings;
}

export interface ScanOptions {
  forcedType?: DocumentType;
  signal?: AbortSignal;
  /** Turn an all-backends failure into a flagged result instead of an error */
  fallback?: boolean;
  includeRawText?: boolean;
}

/**
 * One entry of a batch workflow. Documents that failed before storage carry
 * null storage fields.
 */
export interface BatchWorkflowItem {
  filename: string;
  document_id: string | null;
  processing_result: ExtractionResult;
  storage_location: string | null;
  access_url: string | null;
}

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

export class DocumentService {
  constructor(private readonly deps: DocumentServiceDependencies) {}

  get settings(): DocumentSettings {
    return this.deps.settings;
  }

  /**
   * Upload → process → discard. Nothing is stored.
   */
  async quickScan(file: UploadedFile, options: ScanOptions = {}): Promise<ExtractionResult> {
    const fileInfo = validateUpload(file, this.deps.settings.maxFileSizeBytes);
    const text = await this.deps.textExtractor.extract(file);
    throwIfAborted(options.signal);

    const processOptions = {
      forcedType: options.forcedType,
      signal: options.signal,
      file: fileInfo,
      includeRawText: options.includeRawText,
    };
    try {
      const result = options.fallback
        ? await this.deps.processor.processOrFallback(text, processOptions)
        : await this.deps.processor.process(text, processOptions);
      documentsProcessedCounter.inc({ workflow: 'quick_scan', status: statusOf(result) });
      return result;
    } catch (error) {
      documentsProcessedCounter.inc({ workflow: 'quick_scan', status: 'failed' });
      throw error;
    }
  }

  /**
   * Upload → process → store. The original goes to the object store and the
   * result to the repository under a fresh document id.
   */
  async documentWorkflow(file: UploadedFile, options: ScanOptions = {}): Promise<WorkflowResponse> {
    const documentId = uuidv4();
    setContextDocumentId(documentId);

    const fileInfo = validateUpload(file, this.deps.settings.maxFileSizeBytes);
    const text = await this.deps.textExtractor.extract(file);
    throwIfAborted(options.signal);

    const processOptions = { forcedType: options.forcedType, signal: options.signal, file: fileInfo };
    let result: ExtractionResult;
    try {
      result = options.fallback
        ? await this.deps.processor.processOrFallback(text, processOptions)
        : await this.deps.processor.process(text, processOptions);
    } catch (error) {
      documentsProcessedCounter.inc({ workflow: 'document_workflow', status: 'failed' });
      throw error;
    }

    const storageLocation = await this.deps.objectStore.put(
      documentKey(documentId, file.originalname),
      file.buffer
    );
    const document: StoredDocument = {
      document_id: documentId,
      original_filename: file.originalname,
      storage_location: storageLocation,
      access_url: `${this.deps.settings.publicBaseUrl}/api/documents/${documentId}/file`,
      processing_result: result,
      file_info: fileInfo,
      uploaded_at: new Date().toISOString(),
    };

    try {
      await this.deps.repository.save(document);
    } catch (error) {
      logger.error('Failed to store document metadata, removing upload', error, {
        document_id: documentId,
      });
      await this.deps.objectStore.delete(storageLocation);
      throw error;
    }

    documentsProcessedCounter.inc({ workflow: 'document_workflow', status: statusOf(result) });
    logger.info('Document workflow complete', {
      document_id: documentId,
      document_type: result.document_type,
      needs_human_review: result.needs_human_review,
    });

    return {
      document_id: documentId,
      processing_result: result,
      storage_location: storageLocation,
      access_url: document.access_url,
    };
  }

  async batchQuickScan(
    files: UploadedFile[],
    options: Omit<ScanOptions, 'fallback'> = {}
  ): Promise<BatchResult<ExtractionResult>> {
    const results = await this.runBatch(files, async (file) => {
      try {
        return await this.quickScan(file, { ...options, fallback: true });
      } catch (error) {
        return failedItemResult(file, error);
      }
    });
    return buildBatchResult(results, (result) => result);
  }

  async batchDocumentWorkflow(
    files: UploadedFile[],
    options: Omit<ScanOptions, 'fallback' | 'includeRawText'> = {}
  ): Promise<BatchResult<BatchWorkflowItem>> {
    const results = await this.runBatch(files, async (file): Promise<BatchWorkflowItem> => {
      try {
        const response = await this.documentWorkflow(file, { ...options, fallback: true });
        return { filename: file.originalname, ...response };
      } catch (error) {
        return {
          filename: file.originalname,
          document_id: null,
          processing_result: failedItemResult(file, error),
          storage_location: null,
          access_url: null,
        };
      }
    });
    return buildBatchResult(results, (item) => item.processing_result);
  }

  /**
   * @throws NotFoundError
   */
  async getDocument(documentId: string): Promise<StoredDocument> {
    const document = await this.deps.repository.get(documentId);
    if (!document) {
      throw new NotFoundError('Document not found');
    }
    return document;
  }

  async getOriginal(documentId: string): Promise<{ document: StoredDocument; data: Buffer }> {
    const document = await this.getDocument(documentId);
    const data = await this.deps.objectStore.get(document.storage_location);
    return { document, data };
  }

  async listDocuments(limit = DEFAULT_LIST_LIMIT, skip = 0): Promise<DocumentListResponse> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw new InvalidRequestError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
    }
    if (!Number.isInteger(skip) || skip < 0) {
      throw new InvalidRequestError('skip must be a non-negative integer');
    }

    const page = await this.deps.repository.list(limit, skip);
    return {
      documents: page.documents,
      total: page.total,
      limit,
      skip,
      has_more: skip + page.documents.length < page.total,
    };
  }

  /**
   * Remove the original and its metadata.
   *
   * @throws NotFoundError
   */
  async deleteDocument(documentId: string): Promise<void> {
    const document = await this.getDocument(documentId);
    await this.deps.objectStore.delete(document.storage_location);
    await this.deps.repository.delete(documentId);
    logger.info('Document deleted', { document_id: documentId });
  }

  private async runBatch<T>(files: UploadedFile[], run: (file: UploadedFile) => Promise<T>): Promise<T[]> {
    if (files.length === 0) {
      throw new InvalidRequestError('No files uploaded');
    }
    if (files.length > this.deps.settings.maxBatchFiles) {
      throw new InvalidRequestError(`Maximum ${this.deps.settings.maxBatchFiles} files per batch`);
    }

    const limit = pLimit(this.deps.settings.batchConcurrency);
    const results = await Promise.all(files.map((file) => limit(() => run(file))));

    logger.info('Batch processed', { total_documents: files.length });
    return results;
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}

function statusOf(result: ExtractionResult): 'completed' | 'failed' {
  return result.extraction_method === 'none' ? 'failed' : 'completed';
}

/**
 * Batch items never fail the batch; anything but cancellation becomes a
 * flagged result for that file.
 */
function failedItemResult(file: UploadedFile, error: unknown): ExtractionResult {
  if (error instanceof RequestCancelledError) {
    throw error;
  }
  const message = error instanceof Error ? error.message : String(error);
  logger.warn('Batch item failed', { filename: file.originalname, error: message });
  return createFailedResult(message);
}
