/**
 * Test Helpers
 *
 * In-process stand-ins for the backends, storage and webhook queue, and an
 * app wired from them.
 */

import type { Express } from 'express';
import {
  BACKEND_NAMES,
  DefaultTextExtractor,
  DocumentProcessor,
  config,
  loadClassifierKeywords,
  loadPromptTemplates,
  modelDisplayName,
  type BackendName,
  type ClassifierKeywords,
  type CompletionOptions,
  type ExtractionBackend,
  type PromptTemplateSet,
  type StoredDocument,
  type WebhookDeliveryJob,
} from '@docintake/shared';
import { createApp } from '../../services/web-api/src/app';
import { DocumentService, type DocumentSettings } from '../../services/web-api/src/lib/documents';
import type { ObjectStore } from '../../services/web-api/src/lib/object-store';
import type { DocumentPage, DocumentRepository } from '../../services/web-api/src/lib/repository';
import type { WebhookDispatcher } from '../../services/web-api/src/lib/webhooks';
import { WorkflowService } from '../../services/web-api/src/lib/workflows';

export const TEST_THRESHOLDS = { high: 0.8, medium: 0.6 };

export function shippedTemplates(): PromptTemplateSet {
  return loadPromptTemplates(config.promptsPath, BACKEND_NAMES);
}

export function shippedKeywords(): ClassifierKeywords {
  return loadClassifierKeywords(config.classifierKeywordsPath);
}

export type ScriptedReply = string | Error | ((prompt: string, options: CompletionOptions) => Promise<string>);

/**
 * Backend that answers from a script, one reply per call. The last reply
 * repeats once the script runs out.
 */
export class FakeBackend implements ExtractionBackend {
  readonly model: string;
  readonly displayName: string;
  readonly prompts: string[] = [];

  constructor(
    readonly name: BackendName,
    private readonly replies: ScriptedReply[],
    model = `${name}-test`
  ) {
    this.model = model;
    this.displayName = modelDisplayName(model);
  }

  get calls(): number {
    return this.prompts.length;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const reply = this.replies[Math.min(this.prompts.length, this.replies.length - 1)];
    this.prompts.push(prompt);
    if (reply === undefined) {
      throw new Error(`${this.name} has no scripted reply`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === 'function') {
      return reply(prompt, options);
    }
    return reply;
  }
}

export class InMemoryDocumentRepository implements DocumentRepository {
  readonly documents = new Map<string, StoredDocument>();
  readonly workflowConfigs = new Map<string, Record<string, unknown>>();
  failSave = false;

  async save(document: StoredDocument): Promise<void> {
    if (this.failSave) {
      throw new Error('database unavailable');
    }
    this.documents.set(document.document_id, document);
  }

  async get(documentId: string): Promise<StoredDocument | null> {
    return this.documents.get(documentId) ?? null;
  }

  async list(limit: number, skip: number): Promise<DocumentPage> {
    const all = Array.from(this.documents.values()).sort((a, b) =>
      b.uploaded_at.localeCompare(a.uploaded_at)
    );
    return { documents: all.slice(skip, skip + limit), total: all.length };
  }

  async delete(documentId: string): Promise<boolean> {
    return this.documents.delete(documentId);
  }

  async saveWorkflowConfig(configId: string, workflowConfig: Record<string, unknown>): Promise<void> {
    this.workflowConfigs.set(configId, workflowConfig);
  }

  async ping(): Promise<void> {
    // always reachable
  }
}

export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Buffer>();

  async put(key: string, data: Buffer): Promise<string> {
    const location = `memory://${key}`;
    this.objects.set(location, data);
    return location;
  }

  async get(location: string): Promise<Buffer> {
    const data = this.objects.get(location);
    if (!data) {
      throw new Error(`No object at ${location}`);
    }
    return data;
  }

  async delete(location: string): Promise<void> {
    this.objects.delete(location);
  }
}

/** Records every job handed to it, including ones it then refuses */
export class RecordingDispatcher implements WebhookDispatcher {
  readonly jobs: WebhookDeliveryJob[] = [];
  failDispatch = false;

  async dispatch(job: WebhookDeliveryJob): Promise<void> {
    this.jobs.push(job);
    if (this.failDispatch) {
      throw new Error('redis down');
    }
  }

  async reportMetrics(): Promise<void> {
    // no queue to measure
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

export function createTestProcessor(backends: ExtractionBackend[]): DocumentProcessor {
  return new DocumentProcessor({
    backends,
    templates: shippedTemplates(),
    keywords: shippedKeywords(),
    thresholds: TEST_THRESHOLDS,
    classificationMinConfidence: 0.3,
  });
}

export const TEST_SETTINGS: DocumentSettings = {
  maxFileSizeBytes: 10 * 1024 * 1024,
  maxBatchFiles: 50,
  batchConcurrency: 2,
  publicBaseUrl: 'http://docs.test',
};

export interface TestHarness {
  app: Express;
  repository: InMemoryDocumentRepository;
  objectStore: InMemoryObjectStore;
  dispatcher: RecordingDispatcher;
  documents: DocumentService;
  workflows: WorkflowService;
}

/**
 * App wired to fake backends and in-memory storage. PDFs read as
 * "pdf text layer" and images as "ocr text" unless overridden.
 */
export function createTestHarness(
  backends: ExtractionBackend[],
  overrides: { readPdf?: (data: Uint8Array) => Promise<string>; settings?: Partial<DocumentSettings> } = {}
): TestHarness {
  const processor = createTestProcessor(backends);
  const repository = new InMemoryDocumentRepository();
  const objectStore = new InMemoryObjectStore();
  const dispatcher = new RecordingDispatcher();

  const documents = new DocumentService({
    processor,
    textExtractor: new DefaultTextExtractor({
      ocr: { language: 'eng' },
      readPdf: overrides.readPdf ?? (async () => 'pdf text layer'),
      recognize: async () => 'ocr text',
    }),
    objectStore,
    repository,
    settings: { ...TEST_SETTINGS, ...overrides.settings },
  });
  const workflows = new WorkflowService({ documents, repository, dispatcher });

  const app = createApp({
    documents,
    workflows,
    repository,
    dispatcher,
    allowedOrigins: ['http://app.test'],
    title: 'Test Documents',
    backendOrder: backends.map((b) => b.name),
    modelName: () => processor.primaryModelName,
  });

  return { app, repository, objectStore, dispatcher, documents, workflows };
}

export const INVOICE_TEXT = [
  'INVOICE',
  'Invoice Number: INV-1001',
  'Bill To: Example Customer Ltd',
  'Amount Due: $250.00',
  'Due Date: 2024-03-01',
].join('\n');

export const INVOICE_REPLY = JSON.stringify({
  vendor_name: 'Example Supplies',
  invoice_number: 'INV-1001',
  total_amount: '250.00',
  invoice_date: '2024-02-01',
});
