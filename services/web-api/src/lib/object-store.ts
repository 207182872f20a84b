/**
 * Object Store
 *
 * Uploaded originals, addressed by key and located by `file://` URI.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { InvalidRequestError, logger } from '@docintake/shared';

export interface ObjectStore {
  /** Store the bytes under key; returns the storage location */
  put(key: string, data: Buffer): Promise<string>;
  get(location: string): Promise<Buffer>;
  delete(location: string): Promise<void>;
}

/**
 * Key for an uploaded original: `documents/<document_id>/<filename>`.
 * Path separators in the filename are replaced.
 */
export function documentKey(documentId: string, filename: string): string {
  const safeName = path.basename(filename).replace(/[\\/]/g, '_') || 'upload';
  return `documents/${documentId}/${safeName}`;
}

export class FileSystemObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(rootPath: string) {
    this.root = path.resolve(rootPath);
  }

  async put(key: string, data: Buffer): Promise<string> {
    const filePath = this.resolveKey(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, data);

    logger.debug('Object stored', { key, size_bytes: data.length });
    return pathToFileURL(filePath).href;
  }

  async get(location: string): Promise<Buffer> {
    return fs.readFile(this.resolveLocation(location));
  }

  async delete(location: string): Promise<void> {
    const filePath = this.resolveLocation(location);
    await fs.rm(filePath, { force: true });
    await fs.rm(path.dirname(filePath), { recursive: true, force: true });
    logger.debug('Object deleted', { location });
  }

  private resolveKey(key: string): string {
    const filePath = path.resolve(this.root, key);
    if (!filePath.startsWith(this.root + path.sep)) {
      throw new InvalidRequestError(`Object key escapes the store: ${key}`);
    }
    return filePath;
  }

  private resolveLocation(location: string): string {
    if (!location.startsWith('file://')) {
      throw new InvalidRequestError(`Not a file location: ${location}`);
    }
    return this.resolveKey(path.relative(this.root, fileURLToPath(location)));
  }
}
