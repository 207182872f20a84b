/**
 * Database Operations
 *
 * Postgres-backed DocumentRepository. Results are stored as JSONB and
 * validated against the ExtractionResult contract when read back.
 */

import { Pool } from 'pg';
import {
  dbQueryDurationHistogram,
  logger,
  parseExtractionResult,
  parseFileInfo,
  type StoredDocument,
} from '@docintake/shared';
import type { DocumentPage, DocumentRepository } from './repository';

interface DocumentRow {
  document_id: string;
  original_filename: string;
  storage_location: string;
  access_url: string;
  processing_result: unknown;
  file_info: unknown;
  uploaded_at: Date;
}

interface CountRow {
  total: string;
}

const DOCUMENT_COLUMNS =
  'document_id, original_filename, storage_location, access_url, processing_result, file_info, uploaded_at';

export function createPool(databaseUrl: string): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

function rowToDocument(row: DocumentRow): StoredDocument {
  return {
    document_id: row.document_id,
    original_filename: row.original_filename,
    storage_location: row.storage_location,
    access_url: row.access_url,
    processing_result: parseExtractionResult(row.processing_result),
    file_info: parseFileInfo(row.file_info),
    uploaded_at: row.uploaded_at.toISOString(),
  };
}

export class PgDocumentRepository implements DocumentRepository {
  constructor(private readonly pool: Pool) {}

  async save(document: StoredDocument): Promise<void> {
    const result = document.processing_result;
    await this.timed('insert_document', () =>
      this.pool.query(
        `INSERT INTO documents (
           document_id, original_filename, storage_location, access_url,
           document_type, confidence_level, needs_human_review,
           processing_result, file_info, uploaded_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (document_id) DO UPDATE SET
           processing_result = EXCLUDED.processing_result,
           document_type = EXCLUDED.document_type,
           confidence_level = EXCLUDED.confidence_level,
           needs_human_review = EXCLUDED.needs_human_review`,
        [
          document.document_id,
          document.original_filename,
          document.storage_location,
          document.access_url,
          result.document_type,
          result.confidence_level,
          result.needs_human_review,
          JSON.stringify(result),
          JSON.stringify(document.file_info),
          document.uploaded_at,
        ]
      )
    );
    logger.info('Document stored', { document_id: document.document_id });
  }

  async get(documentId: string): Promise<StoredDocument | null> {
    const result = await this.timed('get_document', () =>
      this.pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE document_id = $1`,
        [documentId]
      )
    );
    const row = result.rows[0];
    return row ? rowToDocument(row) : null;
  }

  async list(limit: number, skip: number): Promise<DocumentPage> {
    const [rows, count] = await Promise.all([
      this.timed('list_documents', () =>
        this.pool.query<DocumentRow>(
          `SELECT ${DOCUMENT_COLUMNS} FROM documents
           ORDER BY uploaded_at DESC, document_id
           LIMIT $1 OFFSET $2`,
          [limit, skip]
        )
      ),
      this.timed('count_documents', () =>
        this.pool.query<CountRow>('SELECT COUNT(*) AS total FROM documents')
      ),
    ]);
    return {
      documents: rows.rows.map(rowToDocument),
      total: parseInt(count.rows[0]?.total ?? '0', 10),
    };
  }

  async delete(documentId: string): Promise<boolean> {
    const result = await this.timed('delete_document', () =>
      this.pool.query('DELETE FROM documents WHERE document_id = $1', [documentId])
    );
    return (result.rowCount ?? 0) > 0;
  }

  async saveWorkflowConfig(configId: string, workflowConfig: Record<string, unknown>): Promise<void> {
    await this.timed('insert_workflow_config', () =>
      this.pool.query('INSERT INTO workflow_configs (config_id, config) VALUES ($1, $2)', [
        configId,
        JSON.stringify(workflowConfig),
      ])
    );
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  private async timed<T>(operation: string, query: () => Promise<T>): Promise<T> {
    const end = dbQueryDurationHistogram.startTimer({ operation });
    try {
      return await query();
    } finally {
      end();
    }
  }
}
