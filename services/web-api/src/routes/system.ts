/**
 * System API
 *
 * Capabilities and readiness for clients of the document API.
 */

import { Router, type Request, type Response } from 'express';
import {
  DOCUMENT_TYPES,
  EXPORT_FORMATS,
  SUPPORTED_EXTENSIONS,
  type BackendName,
} from '@docintake/shared';
import type { UploadLimits } from '../lib/upload';

/** Advertised to clients; not enforced by this service */
const RATE_LIMITS = {
  requests_per_minute: 60,
  batch_requests_per_hour: 100,
};

export interface SystemRouterOptions {
  limits: UploadLimits;
  backendOrder: readonly BackendName[];
  modelName: () => string;
}

export function createSystemRouter(options: SystemRouterOptions): Router {
  const router = Router();
  const maxFileSizeMb = options.limits.maxFileSizeBytes / 1024 / 1024;

  router.get('/supported-formats', (req: Request, res: Response) => {
    res.json({
      supported_formats: SUPPORTED_EXTENSIONS,
      max_file_size_mb: maxFileSizeMb,
      export_formats: EXPORT_FORMATS,
    });
  });

  router.get('/limits', (req: Request, res: Response) => {
    res.json({
      max_file_size_mb: maxFileSizeMb,
      max_batch_files: options.limits.maxBatchFiles,
      supported_formats: SUPPORTED_EXTENSIONS,
      rate_limits: RATE_LIMITS,
    });
  });

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      processor_ready: options.backendOrder.length > 0,
      available_document_types: DOCUMENT_TYPES,
      available_model: options.modelName(),
      backends: options.backendOrder,
    });
  });

  return router;
}
