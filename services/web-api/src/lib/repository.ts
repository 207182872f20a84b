/**
 * Document Repository
 *
 * Persistence seam for stored documents and workflow configurations.
 */

import type { StoredDocument } from '@docintake/shared';

export interface DocumentPage {
  documents: StoredDocument[];
  total: number;
}

export interface DocumentRepository {
  save(document: StoredDocument): Promise<void>;
  get(documentId: string): Promise<StoredDocument | null>;
  /** Newest first */
  list(limit: number, skip: number): Promise<DocumentPage>;
  /** @returns false when nothing was deleted */
  delete(documentId: string): Promise<boolean>;
  saveWorkflowConfig(configId: string, workflowConfig: Record<string, unknown>): Promise<void>;
  /** Throws when the store is unreachable */
  ping(): Promise<void>;
}
