/**
 * Workflow API
 *
 * Integration endpoints: run a workflow with optional webhook delivery,
 * export stored results, workflow status and configuration.
 */

import { Router, type Request, type Response } from 'express';
import {
  EXPORT_FORMATS,
  InvalidRequestError,
  isExportFormat,
  isWorkflowType,
  WORKFLOW_TYPES,
} from '@docintake/shared';
import { parseUpload, type UploadHandlers, type UploadLimits } from '../lib/upload';
import type { WorkflowService } from '../lib/workflows';
import { asyncHandler, bodyField, queryField, requestSignal } from '../http';

export interface WorkflowRouterOptions {
  workflows: WorkflowService;
  uploads: UploadHandlers;
  limits: UploadLimits;
}

export function createWorkflowRouter(options: WorkflowRouterOptions): Router {
  const router = Router();
  const { workflows, uploads, limits } = options;

  /**
   * POST /api/workflow/webhook
   * Multipart: file, workflow_type, webhook_url?
   */
  router.post(
    '/webhook',
    asyncHandler(async (req: Request, res: Response) => {
      const signal = requestSignal(res);
      await parseUpload(uploads.single, req, res, limits);
      if (!req.file) {
        throw new InvalidRequestError('No file selected');
      }

      const workflowType = bodyField(req, 'workflow_type') ?? 'quick_scan';
      if (!isWorkflowType(workflowType)) {
        throw new InvalidRequestError(`workflow_type must be one of: ${WORKFLOW_TYPES.join(', ')}`);
      }

      const webhookUrl = bodyField(req, 'webhook_url');
      const response = await workflows.run({
        file: req.file,
        workflowType,
        webhookUrl: webhookUrl || undefined,
        signal,
      });
      res.json(response);
    })
  );

  /**
   * GET /api/workflow/export/:documentId?format=json|csv|xml
   */
  router.get(
    '/export/:documentId',
    asyncHandler(async (req: Request, res: Response) => {
      const format = queryField(req, 'format') ?? 'json';
      if (!isExportFormat(format)) {
        throw new InvalidRequestError(`format must be one of: ${EXPORT_FORMATS.join(', ')}`);
      }

      const exported = await workflows.export(req.params.documentId, format);
      res.setHeader('Content-Type', exported.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${exported.filename}"`);
      res.send(exported.body);
    })
  );

  router.get('/status/:workflowId', (req: Request, res: Response) => {
    res.json(workflows.getStatus(req.params.workflowId));
  });

  router.get('/types', (req: Request, res: Response) => {
    res.json({ workflow_types: workflows.types() });
  });

  /**
   * POST /api/workflow/configure
   * JSON body: any workflow settings object
   */
  router.post(
    '/configure',
    asyncHandler(async (req: Request, res: Response) => {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new InvalidRequestError('Workflow configuration must be a JSON object');
      }
      const workflowConfig: Record<string, unknown> = { ...body };
      const configurationId = await workflows.configure(workflowConfig);
      res.status(201).json({ configuration_id: configurationId, status: 'configured' });
    })
  );

  return router;
}
