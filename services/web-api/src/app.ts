/**
 * Web API Application
 *
 * Builds the Express app from its collaborators so tests can run it against
 * in-process fakes.
 */

import express, { type Express, type Request, type Response } from 'express';
import {
  getMetrics,
  getMetricsContentType,
  type BackendName,
} from '@docintake/shared';
import type { DocumentService } from './lib/documents';
import type { DocumentRepository } from './lib/repository';
import { createUploadHandlers, type UploadLimits } from './lib/upload';
import type { WebhookDispatcher } from './lib/webhooks';
import type { WorkflowService } from './lib/workflows';
import {
  asyncHandler,
  correlationMiddleware,
  createCorsMiddleware,
  errorMiddleware,
  timingMiddleware,
} from './http';
import { createDocumentRouter } from './routes/documents';
import { createSystemRouter } from './routes/system';
import { createWebRouter } from './routes/web';
import { createWorkflowRouter } from './routes/workflow';

export interface AppDependencies {
  documents: DocumentService;
  workflows: WorkflowService;
  repository: DocumentRepository;
  dispatcher: WebhookDispatcher;
  /** Browser origins allowed by CORS */
  allowedOrigins: readonly string[];
  title: string;
  backendOrder: readonly BackendName[];
  /** Display name of the first backend in the chain */
  modelName: () => string;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const limits: UploadLimits = {
    maxFileSizeBytes: deps.documents.settings.maxFileSizeBytes,
    maxBatchFiles: deps.documents.settings.maxBatchFiles,
  };
  const uploads = createUploadHandlers(limits);

  // Middleware
  app.use(createCorsMiddleware(deps.allowedOrigins));
  app.use(express.json());
  app.use(correlationMiddleware);
  app.use(timingMiddleware);

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await deps.repository.ping();

      res.json({
        status: 'healthy',
        service: 'web-api',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'web-api',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get(
    '/metrics',
    asyncHandler(async (req: Request, res: Response) => {
      await deps.dispatcher.reportMetrics();
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    })
  );

  app.use(
    '/',
    createWebRouter({
      documents: deps.documents,
      uploads,
      limits,
      title: deps.title,
      modelName: deps.modelName,
    })
  );
  app.use('/api/documents', createDocumentRouter({ documents: deps.documents, uploads, limits }));
  app.use('/api/workflow', createWorkflowRouter({ workflows: deps.workflows, uploads, limits }));
  app.use(
    '/api',
    createSystemRouter({ limits, backendOrder: deps.backendOrder, modelName: deps.modelName })
  );

  app.use(errorMiddleware);

  return app;
}
