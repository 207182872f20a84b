/**
 * Web Routes
 *
 * Upload form and results page. Failures render the form again with the
 * error instead of a JSON envelope.
 */

import { Router, type Request, type Response } from 'express';
import { RequestCancelledError, logger } from '@docintake/shared';
import type { DocumentService } from '../lib/documents';
import { parseUpload, type UploadHandlers, type UploadLimits } from '../lib/upload';
import { asyncHandler, bodyField, errorEnvelope, parseForcedType, requestSignal } from '../http';
import { renderResultsPage, renderUploadPage } from '../views';

export interface WebRouterOptions {
  documents: DocumentService;
  uploads: UploadHandlers;
  limits: UploadLimits;
  title: string;
  modelName: () => string;
}

export function createWebRouter(options: WebRouterOptions): Router {
  const router = Router();
  const { documents, title } = options;

  router.get('/', (req: Request, res: Response) => {
    res.type('html').send(renderUploadPage({ title, modelName: options.modelName() }));
  });

  router.post(
    '/upload',
    asyncHandler(async (req: Request, res: Response) => {
      const signal = requestSignal(res);
      try {
        await parseUpload(options.uploads.single, req, res, options.limits);
        if (!req.file) {
          res.status(400).type('html').send(
            renderUploadPage({ title, modelName: options.modelName(), error: 'No file selected' })
          );
          return;
        }

        const result = await documents.quickScan(req.file, {
          forcedType: parseForcedType(bodyField(req, 'document_type')),
          signal,
          fallback: true,
        });
        res.type('html').send(renderResultsPage({ title, filename: req.file.originalname, result }));
      } catch (error) {
        if (error instanceof RequestCancelledError) {
          return;
        }
        const { status, body } = errorEnvelope(error);
        if (status >= 500) {
          logger.error('Upload failed', error);
        }
        res.status(status).type('html').send(
          renderUploadPage({ title, modelName: options.modelName(), error: body.error.message })
        );
      }
    })
  );

  return router;
}
