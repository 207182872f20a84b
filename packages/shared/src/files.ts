/**
 * Upload Validation
 *
 * File type and size checks for uploaded documents.
 */

import path from 'path';
import { UnsupportedFileError } from './errors';
import type { FileInfo } from './types';

export const SUPPORTED_EXTENSIONS = ['.txt', '.pdf', '.png', '.jpg', '.jpeg'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const IMAGE_EXTENSIONS: readonly SupportedExtension[] = ['.png', '.jpg', '.jpeg'];

/** Browser camera uploads arrive as "captured_image" with no extension */
const CAMERA_CAPTURE_PREFIX = 'captured_image';

export interface UploadedFile {
  originalname: string;
  size: number;
  buffer: Buffer;
}

function isSupportedExtension(value: string): value is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((item) => item === value);
}

/**
 * Resolve the effective extension of an uploaded file name.
 */
export function resolveFileType(filename: string): { fileType: string; isCameraCapture: boolean } {
  const isCameraCapture = filename.startsWith(CAMERA_CAPTURE_PREFIX);
  let fileType = path.extname(filename).toLowerCase();
  if (isCameraCapture && fileType === '') {
    fileType = '.jpg';
  }
  return { fileType, isCameraCapture };
}

/**
 * Check an upload against the supported types and size limit.
 *
 * @throws UnsupportedFileError on a missing name, unsupported type or oversized file
 */
export function validateUpload(
  file: Pick<UploadedFile, 'originalname' | 'size'>,
  maxFileSizeBytes: number
): FileInfo & { file_type: SupportedExtension } {
  if (!file.originalname) {
    throw new UnsupportedFileError('No file selected');
  }

  const { fileType, isCameraCapture } = resolveFileType(file.originalname);
  if (!isSupportedExtension(fileType)) {
    throw new UnsupportedFileError(
      `File type ${fileType || '(none)'} not supported. Use: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }

  if (file.size > maxFileSizeBytes) {
    const sizeMb = (file.size / 1024 / 1024).toFixed(1);
    const limitMb = maxFileSizeBytes / 1024 / 1024;
    throw new UnsupportedFileError(`File size ${sizeMb}MB exceeds limit of ${limitMb}MB`);
  }

  return {
    filename: file.originalname,
    size_bytes: file.size,
    file_type: fileType,
    is_camera_capture: isCameraCapture,
  };
}
