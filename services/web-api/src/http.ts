/**
 * HTTP Helpers
 *
 * Middleware and request helpers shared by the route modules.
 */

import cors from 'cors';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ulid } from 'ulid';
import {
  AppError,
  ExtractionUnavailableError,
  InvalidRequestError,
  getCorrelationId,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isDocumentType,
  logger,
  runWithContext,
  type DocumentType,
  type ErrorEnvelope,
} from '@docintake/shared';

/**
 * Express 4 does not route rejected promises to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * CORS for browser front ends. Origins come from ALLOWED_ORIGINS; a `*`
 * entry allows any origin without credentials.
 */
export function createCorsMiddleware(allowedOrigins: readonly string[]): RequestHandler {
  const anyOrigin = allowedOrigins.includes('*');
  return cors({
    origin: anyOrigin ? '*' : [...allowedOrigins],
    credentials: !anyOrigin,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: [
      'Accept',
      'Accept-Language',
      'Content-Language',
      'Content-Type',
      'Authorization',
      'X-Requested-With',
      'X-Correlation-Id',
    ],
    exposedHeaders: ['Content-Disposition', 'X-Correlation-Id'],
    maxAge: 86400,
  });
}

export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-correlation-id'];
  const correlationId = (typeof header === 'string' && header) || ulid();
  res.setHeader('X-Correlation-Id', correlationId);

  runWithContext({ correlationId }, () => {
    next();
  });
}

export function timingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const duration = (Date.now() - start) / 1000;
    const routePath: unknown = req.route?.path;
    const path = `${req.baseUrl}${typeof routePath === 'string' ? routePath : req.path}`;

    httpRequestDurationHistogram.observe(
      { method: req.method, path, status: res.statusCode.toString() },
      duration
    );
    httpRequestsCounter.inc({
      method: req.method,
      path,
      status: res.statusCode.toString(),
    });

    logger.info('Request completed', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      duration_ms: Math.round(duration * 1000),
    });
  });

  next();
}

/**
 * Signal that aborts when the client disconnects before the response is sent.
 */
export function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      logger.info('Client disconnected, cancelling request');
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * A text field of a multipart or JSON body.
 */
export function bodyField(req: Request, name: string): string | undefined {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Object.getOwnPropertyDescriptor(body, name)?.value;
  return typeof value === 'string' ? value : undefined;
}

export function queryField(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Optional caller-forced document type. Empty, `auto` and `unknown` mean detect.
 */
export function parseForcedType(value: string | undefined): DocumentType | undefined {
  if (value === undefined || value === '' || value === 'auto' || value === 'unknown') {
    return undefined;
  }
  if (!isDocumentType(value)) {
    throw new InvalidRequestError(`Unknown document_type "${value}"`);
  }
  return value;
}

export function errorEnvelope(
  error: unknown,
  correlationId: string = getCorrelationId()
): { status: number; body: ErrorEnvelope } {
  if (error instanceof AppError) {
    return {
      status: error.statusCode,
      body: {
        error: {
          code: error.code,
          message: error.message,
          correlation_id: correlationId,
          ...(error instanceof ExtractionUnavailableError ? { details: { attempts: error.attempts } } : {}),
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: 'internal_error',
        message: 'Internal server error',
        correlation_id: correlationId,
      },
    },
  };
}

// Express recognizes error middleware by its four parameters
export function errorMiddleware(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const header = res.getHeader('X-Correlation-Id');
  const { status, body } = errorEnvelope(error, typeof header === 'string' ? header : undefined);

  if (status >= 500) {
    logger.error('Request failed', error, { method: req.method, path: req.originalUrl });
  } else {
    logger.warn('Request rejected', {
      method: req.method,
      path: req.originalUrl,
      code: body.error.code,
      error: body.error.message,
    });
  }

  if (res.headersSent || !res.writable) {
    return;
  }
  res.status(status).json(body);
}
