/**
 * Multipart Uploads
 *
 * Files are held in memory; size and count limits come from config.
 */

import type { Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { InvalidRequestError, UnsupportedFileError } from '@docintake/shared';

export interface UploadLimits {
  maxFileSizeBytes: number;
  maxBatchFiles: number;
}

export interface UploadHandlers {
  single: RequestHandler;
  array: RequestHandler;
}

export function createUploadHandlers(limits: UploadLimits): UploadHandlers {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: limits.maxFileSizeBytes, files: limits.maxBatchFiles },
  });
  return {
    single: upload.single('file'),
    array: upload.array('files', limits.maxBatchFiles),
  };
}

/**
 * Run a multer handler as a promise, translating its limit errors.
 */
export function parseUpload(
  handler: RequestHandler,
  req: Request,
  res: Response,
  limits: UploadLimits
): Promise<void> {
  return new Promise((resolve, reject) => {
    handler(req, res, (error?: unknown) => {
      if (error) {
        reject(translateMulterError(error, limits));
      } else {
        resolve();
      }
    });
  });
}

function translateMulterError(error: unknown, limits: UploadLimits): unknown {
  if (!(error instanceof multer.MulterError)) {
    return error;
  }
  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      return new UnsupportedFileError(
        `File exceeds limit of ${limits.maxFileSizeBytes / 1024 / 1024}MB`
      );
    case 'LIMIT_FILE_COUNT':
    case 'LIMIT_UNEXPECTED_FILE':
      return new InvalidRequestError(
        error.code === 'LIMIT_FILE_COUNT'
          ? `Maximum ${limits.maxBatchFiles} files per batch`
          : `Unexpected file field "${error.field ?? ''}"`
      );
    default:
      return new InvalidRequestError(error.message);
  }
}

/**
 * Files from an `array` upload, in request order.
 */
export function uploadedFiles(req: Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : [];
}
