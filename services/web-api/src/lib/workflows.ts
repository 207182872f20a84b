/**
 * Workflow Service
 *
 * Runs a workflow for integrations, tracks its status, and hands the
 * flattened result to the webhook queue when the caller asked for one.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  InvalidRequestError,
  NotFoundError,
  RequestCancelledError,
  exportDocument,
  getCorrelationId,
  logger,
  setContextWorkflowType,
  toPipelineData,
  type ExportFormat,
  type ExportedFile,
  type ExtractionResult,
  type UploadedFile,
  type WebhookDeliveryJob,
  type WorkflowStatus,
  type WorkflowType,
} from '@docintake/shared';
import type { DocumentService } from './documents';
import type { DocumentRepository } from './repository';
import { parseWebhookUrl, type WebhookDispatcher } from './webhooks';

export interface WorkflowRunResponse {
  workflow_id: string;
  workflow_type: WorkflowType;
  processing_result: ExtractionResult;
  document_id?: string;
  storage_location?: string;
  access_url?: string;
  webhook_queued: boolean;
}

export interface WorkflowTypeInfo {
  type: WorkflowType;
  description: string;
}

export const WORKFLOW_TYPE_INFO: readonly WorkflowTypeInfo[] = [
  { type: 'quick_scan', description: 'Upload → Process → Remove (temporary processing)' },
  { type: 'document_workflow', description: 'Upload → Process → Store (persistent storage)' },
];

/** Oldest statuses are dropped beyond this many */
const MAX_TRACKED_WORKFLOWS = 1000;

export interface WorkflowServiceDependencies {
  documents: DocumentService;
  repository: DocumentRepository;
  dispatcher: WebhookDispatcher;
}

export interface RunWorkflowRequest {
  file: UploadedFile;
  workflowType: WorkflowType;
  webhookUrl?: string;
  signal?: AbortSignal;
}

export class WorkflowService {
  private readonly statuses = new Map<string, WorkflowStatus>();

  constructor(private readonly deps: WorkflowServiceDependencies) {}

  async run(request: RunWorkflowRequest): Promise<WorkflowRunResponse> {
    const webhookUrl = request.webhookUrl ? parseWebhookUrl(request.webhookUrl) : null;
    if (request.webhookUrl && !webhookUrl) {
      throw new InvalidRequestError('webhook_url must be an absolute http(s) URL');
    }

    setContextWorkflowType(request.workflowType);
    const workflowId = uuidv4();
    const status: WorkflowStatus = {
      workflow_id: workflowId,
      workflow_type: request.workflowType,
      status: 'processing',
      filename: request.file.originalname,
      started_at: new Date().toISOString(),
      ...(webhookUrl ? { webhook_url: webhookUrl } : {}),
    };
    this.track(status);

    let response: WorkflowRunResponse;
    try {
      response = await this.execute(workflowId, request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.finish(workflowId, { status: 'failed', error: message });
      if (webhookUrl && !(error instanceof RequestCancelledError)) {
        await this.queueWebhook({
          event_type: 'workflow.failed',
          correlation_id: getCorrelationId(),
          workflow_id: workflowId,
          webhook_url: webhookUrl,
          payload: { workflow_id: workflowId, error: message },
        });
      }
      throw error;
    }

    if (webhookUrl) {
      response.webhook_queued = await this.queueWebhook({
        event_type: 'workflow.completed',
        correlation_id: getCorrelationId(),
        workflow_id: workflowId,
        webhook_url: webhookUrl,
        payload: toPipelineData(
          {
            workflowId,
            workflowType: request.workflowType,
            filename: request.file.originalname,
            documentId: response.document_id,
            storageLocation: response.storage_location,
          },
          response.processing_result
        ),
      });
    }

    this.finish(workflowId, {
      status: 'completed',
      ...(response.document_id ? { document_id: response.document_id } : {}),
    });
    logger.info('Workflow complete', {
      workflow_id: workflowId,
      workflow_type: request.workflowType,
      webhook_queued: response.webhook_queued,
    });
    return response;
  }

  /**
   * @throws NotFoundError for unknown or expired workflow ids
   */
  getStatus(workflowId: string): WorkflowStatus {
    const status = this.statuses.get(workflowId);
    if (!status) {
      throw new NotFoundError('Workflow not found');
    }
    return status;
  }

  types(): readonly WorkflowTypeInfo[] {
    return WORKFLOW_TYPE_INFO;
  }

  async configure(workflowConfig: Record<string, unknown>): Promise<string> {
    const configId = uuidv4();
    await this.deps.repository.saveWorkflowConfig(configId, workflowConfig);
    logger.info('Workflow configured', { config_id: configId });
    return configId;
  }

  /**
   * Export a stored document.
   *
   * @throws NotFoundError
   */
  async export(documentId: string, format: ExportFormat): Promise<ExportedFile> {
    const document = await this.deps.documents.getDocument(documentId);
    return exportDocument(document, format);
  }

  private async execute(workflowId: string, request: RunWorkflowRequest): Promise<WorkflowRunResponse> {
    const options = { signal: request.signal, fallback: true };

    if (request.workflowType === 'quick_scan') {
      const result = await this.deps.documents.quickScan(request.file, options);
      return {
        workflow_id: workflowId,
        workflow_type: request.workflowType,
        processing_result: result,
        webhook_queued: false,
      };
    }

    const stored = await this.deps.documents.documentWorkflow(request.file, options);
    return {
      workflow_id: workflowId,
      workflow_type: request.workflowType,
      document_id: stored.document_id,
      processing_result: stored.processing_result,
      storage_location: stored.storage_location,
      access_url: stored.access_url,
      webhook_queued: false,
    };
  }

  /**
   * Hand a job to the dispatcher. A queue outage is logged and reported as
   * not queued; it never changes the workflow outcome.
   */
  private async queueWebhook(job: WebhookDeliveryJob): Promise<boolean> {
    try {
      await this.deps.dispatcher.dispatch(job);
      return true;
    } catch (error) {
      logger.error('Webhook dispatch failed', error, {
        workflow_id: job.workflow_id,
        event_type: job.event_type,
      });
      return false;
    }
  }

  private track(status: WorkflowStatus): void {
    this.statuses.set(status.workflow_id, status);
    while (this.statuses.size > MAX_TRACKED_WORKFLOWS) {
      const oldest = this.statuses.keys().next();
      if (oldest.done) {
        break;
      }
      this.statuses.delete(oldest.value);
    }
  }

  private finish(
    workflowId: string,
    update: Pick<WorkflowStatus, 'status'> & Partial<Pick<WorkflowStatus, 'error' | 'document_id'>>
  ): void {
    const current = this.statuses.get(workflowId);
    if (!current) {
      return;
    }
    this.statuses.set(workflowId, {
      ...current,
      ...update,
      completed_at: new Date().toISOString(),
    });
  }
}
