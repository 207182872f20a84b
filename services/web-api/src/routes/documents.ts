/**
 * Document API
 *
 * Quick scan and document workflow, single and batched, plus reads and
 * deletes of stored documents.
 */

import path from 'path';
import { Router, type Request, type Response } from 'express';
import { InvalidRequestError } from '@docintake/shared';
import { DEFAULT_LIST_LIMIT, type DocumentService } from '../lib/documents';
import { parseUpload, uploadedFiles, type UploadHandlers, type UploadLimits } from '../lib/upload';
import { asyncHandler, bodyField, parseForcedType, queryField, requestSignal } from '../http';

export interface DocumentRouterOptions {
  documents: DocumentService;
  uploads: UploadHandlers;
  limits: UploadLimits;
}

const CONTENT_TYPES: Record<string, string> = {
  '.txt': 'text/plain',
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

function parseInteger(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    throw new InvalidRequestError(`${name} must be a non-negative integer`);
  }
  return parseInt(value, 10);
}

export function createDocumentRouter(options: DocumentRouterOptions): Router {
  const router = Router();
  const { documents, uploads, limits } = options;

  /**
   * POST /api/documents/scan
   * Upload → process → discard
   */
  router.post(
    '/scan',
    asyncHandler(async (req: Request, res: Response) => {
      const signal = requestSignal(res);
      await parseUpload(uploads.single, req, res, limits);
      if (!req.file) {
        throw new InvalidRequestError('No file selected');
      }

      const result = await documents.quickScan(req.file, {
        forcedType: parseForcedType(bodyField(req, 'document_type')),
        includeRawText: bodyField(req, 'include_raw_text') === 'true',
        signal,
      });
      res.json(result);
    })
  );

  /**
   * POST /api/documents/workflow
   * Upload → process → store
   */
  router.post(
    '/workflow',
    asyncHandler(async (req: Request, res: Response) => {
      const signal = requestSignal(res);
      await parseUpload(uploads.single, req, res, limits);
      if (!req.file) {
        throw new InvalidRequestError('No file selected');
      }

      const response = await documents.documentWorkflow(req.file, {
        forcedType: parseForcedType(bodyField(req, 'document_type')),
        signal,
      });
      res.status(201).json(response);
    })
  );

  router.post(
    '/batch-scan',
    asyncHandler(async (req: Request, res: Response) => {
      const signal = requestSignal(res);
      await parseUpload(uploads.array, req, res, limits);
      res.json(await documents.batchQuickScan(uploadedFiles(req), { signal }));
    })
  );

  router.post(
    '/batch-workflow',
    asyncHandler(async (req: Request, res: Response) => {
      const signal = requestSignal(res);
      await parseUpload(uploads.array, req, res, limits);
      res.json(await documents.batchDocumentWorkflow(uploadedFiles(req), { signal }));
    })
  );

  /**
   * GET /api/documents?limit&skip
   * Newest first
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const limit = parseInteger(queryField(req, 'limit'), 'limit', DEFAULT_LIST_LIMIT);
      const skip = parseInteger(queryField(req, 'skip'), 'skip', 0);
      res.json(await documents.listDocuments(limit, skip));
    })
  );

  router.get(
    '/:documentId',
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await documents.getDocument(req.params.documentId));
    })
  );

  /**
   * GET /api/documents/:documentId/file
   * The stored original
   */
  router.get(
    '/:documentId/file',
    asyncHandler(async (req: Request, res: Response) => {
      const { document, data } = await documents.getOriginal(req.params.documentId);
      const extension = path.extname(document.original_filename).toLowerCase();
      res.setHeader('Content-Type', CONTENT_TYPES[extension] ?? 'application/octet-stream');
      res.setHeader(
        'Content-Disposition',
        `inline; filename="${document.original_filename.replace(/["\\\r\n]/g, '_')}"`
      );
      res.send(data);
    })
  );

  router.delete(
    '/:documentId',
    asyncHandler(async (req: Request, res: Response) => {
      await documents.deleteDocument(req.params.documentId);
      res.json({ message: 'Document deleted successfully' });
    })
  );

  return router;
}
