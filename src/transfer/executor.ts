/**
 * Storage PUT of an in-memory buffer
 * @module media-uploader/transfer/executor
 */

import { CancelledError, TransferError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import {
  bodyText,
  getETag,
  isSuccessResponse,
  withoutHeader,
  type HttpMethod,
  type HttpResponse,
  type HttpTransport,
} from '../transport/index.js';

/**
 * Where a buffer is PUT: a presigned object URL or a part URL
 */
export interface StorageTarget {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
}

export interface PutBytesOptions {
  /**
   * Receives bytes written and the body length
   */
  onProgress?: (sent: number, total: number) => void;

  /**
   * Treat a response without an ETag as a failure
   */
  requirePartETag?: boolean;

  /**
   * Part being uploaded, for error messages
   */
  partNumber?: number;

  signal?: AbortSignal;
}

export interface PutBytesResult {
  /** Quotes stripped */
  readonly eTag?: string;
}

/**
 * Issues single PUTs against presigned storage URLs.
 *
 * The target's headers are sent as given except `Content-Length`, which
 * is always the buffer length.
 */
export class TransferExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly transport: HttpTransport,
    logger?: Logger
  ) {
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * PUTs `bytes` to `target`
   *
   * @throws {TransferError} On a non-2xx status, a connectivity failure,
   * or a missing ETag when `requirePartETag` is set
   * @throws {CancelledError} If the signal fires mid-request
   */
  putBytes(
    target: StorageTarget,
    bytes: Uint8Array,
    options: PutBytesOptions & { requirePartETag: true }
  ): Promise<{ readonly eTag: string }>;
  putBytes(
    target: StorageTarget,
    bytes: Uint8Array,
    options?: PutBytesOptions
  ): Promise<PutBytesResult>;
  async putBytes(
    target: StorageTarget,
    bytes: Uint8Array,
    options: PutBytesOptions = {}
  ): Promise<PutBytesResult> {
    const { onProgress, requirePartETag = false, partNumber, signal } = options;

    const headers = {
      ...withoutHeader(target.headers, 'content-length'),
      'content-length': String(bytes.length),
    };

    this.logger.debug('Storage PUT', {
      url: target.url,
      method: target.method,
      bytes: bytes.length,
      partNumber,
    });

    let response: HttpResponse;
    try {
      response = await this.transport.send(
        { method: target.method, url: target.url, headers, body: bytes },
        {
          signal,
          onUploadProgress: onProgress
            ? (sent, total) => onProgress(sent, total > 0 ? total : bytes.length)
            : undefined,
        }
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      throw TransferError.network(error, partNumber);
    }

    if (!isSuccessResponse(response)) {
      throw TransferError.httpFailure(response.status, bodyText(response), partNumber);
    }

    const eTag = getETag(response.headers);
    if (requirePartETag && eTag === undefined) {
      throw TransferError.missingETag(partNumber);
    }

    return { eTag };
  }
}
