/**
 * Upload request construction
 * @module media-uploader/upload/request
 */

import { basename } from 'node:path';
import { DEFAULT_FOLDER } from '../config/index.js';
import { resolveContentType } from '../mime/index.js';
import type { FileSource } from '../source/index.js';
import type { UploadRequest } from '../types/index.js';

export interface UploadRequestOptions {
  /** Defaults to the last segment of the source path */
  filename?: string;
  /** Destination folder on the backend */
  folder?: string;
}

/**
 * Builds a frozen request for `source`, sizing it and deriving its
 * content type from the filename
 *
 * @throws {IoError} If the source cannot be sized
 */
export async function createUploadRequest(
  source: FileSource,
  options: UploadRequestOptions = {}
): Promise<UploadRequest> {
  const filename = options.filename ?? basename(source.path);
  const sizeBytes = await source.size();

  return Object.freeze({
    source,
    filename,
    contentType: resolveContentType(filename),
    sizeBytes,
    destinationFolder: options.folder ?? DEFAULT_FOLDER,
  });
}
