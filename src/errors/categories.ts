/**
 * Specific error categories for the media uploader
 * @module media-uploader/errors/categories
 */

import { UploadError, type UploadErrorParams } from './error.js';

type CategoryParams = Omit<UploadErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Configuration and initialization errors
 */
export class ConfigError extends UploadError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'config_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }
}

/**
 * Connectivity errors raised by the HTTP transport.
 *
 * Never surfaced on their own: the backend client and the transfer
 * executor wrap them in the category of the stage that saw them.
 */
export class NetworkError extends UploadError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
      cause,
    });
  }

  static connectionFailed(message: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Connection failed: ${message}`,
      code: 'CONNECTION_FAILED',
      cause,
    });
  }

  static connectionReset(cause?: unknown): NetworkError {
    return new NetworkError({
      message: 'Connection was reset by peer',
      code: 'CONNECTION_RESET',
      cause,
    });
  }

  static dnsError(url: string, cause?: unknown): NetworkError {
    let host = url;
    try {
      host = new URL(url).host;
    } catch {
      // keep the raw value
    }
    return new NetworkError({
      message: `Failed to resolve host: ${host}`,
      code: 'DNS_ERROR',
      details: { host },
      cause,
    });
  }
}

/**
 * Backend rejected, or returned a malformed answer to, a presign,
 * multipart start, part URL, or multipart complete call
 */
export class PresignError extends UploadError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'presign_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'PresignError';
    Object.setPrototypeOf(this, PresignError.prototype);
  }

  static rejected(endpoint: string, status: number, detail?: string): PresignError {
    return new PresignError({
      message: `${endpoint} failed: ${detail ?? `HTTP ${status}`}`,
      code: 'BACKEND_REJECTED',
      status,
      isRetryable: status >= 500,
      details: { endpoint },
    });
  }

  static malformed(endpoint: string, reason: string): PresignError {
    return new PresignError({
      message: `${endpoint} returned a malformed response: ${reason}`,
      code: 'MALFORMED_RESPONSE',
      details: { endpoint },
    });
  }

  static unreachable(endpoint: string, cause: unknown): PresignError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new PresignError({
      message: `${endpoint} failed: ${reason}`,
      code: 'BACKEND_UNREACHABLE',
      isRetryable: true,
      details: { endpoint },
      cause,
    });
  }
}

/**
 * Storage PUT returned a non-success status, failed on the wire, or
 * lacked the ETag a multipart part needs
 */
export class TransferError extends UploadError {
  /**
   * Status returned by storage, when a response was received
   */
  readonly httpStatus?: number;

  /**
   * Response body text returned by storage, when a response was received
   */
  readonly body?: string;

  constructor(params: CategoryParams & { readonly httpStatus?: number; readonly body?: string }) {
    const { httpStatus, body, ...rest } = params;
    super({
      ...rest,
      type: 'transfer_error',
      status: rest.status ?? httpStatus,
      isRetryable: rest.isRetryable ?? (httpStatus === undefined || httpStatus >= 500),
    });
    this.name = 'TransferError';
    this.httpStatus = httpStatus;
    this.body = body;
    Object.setPrototypeOf(this, TransferError.prototype);
  }

  static httpFailure(httpStatus: number, body: string, partNumber?: number): TransferError {
    const target = partNumber !== undefined ? `Part ${partNumber} upload` : 'Upload';
    return new TransferError({
      message: `${target} failed with HTTP ${httpStatus}${body ? `: ${truncate(body)}` : ''}`,
      code: 'HTTP_FAILURE',
      httpStatus,
      body,
      details: partNumber !== undefined ? { partNumber } : undefined,
    });
  }

  static missingETag(partNumber?: number): TransferError {
    return new TransferError({
      message:
        partNumber !== undefined
          ? `Storage returned no ETag for part ${partNumber}`
          : 'Storage returned no ETag',
      code: 'MISSING_ETAG',
      isRetryable: false,
      details: partNumber !== undefined ? { partNumber } : undefined,
    });
  }

  static network(cause: unknown, partNumber?: number): TransferError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const target = partNumber !== undefined ? `Part ${partNumber} upload` : 'Upload';
    return new TransferError({
      message: `${target} failed: ${reason}`,
      code: 'NETWORK_FAILURE',
      isRetryable: true,
      details: partNumber !== undefined ? { partNumber } : undefined,
      cause,
    });
  }
}

/**
 * Local file could not be opened or read, or its length changed
 * while the upload was running
 */
export class IoError extends UploadError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'io_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'IoError';
    Object.setPrototypeOf(this, IoError.prototype);
  }

  static openFailed(path: string, cause: unknown): IoError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new IoError({
      message: `Could not open ${path}: ${reason}`,
      code: 'OPEN_FAILED',
      details: { path },
      cause,
    });
  }

  static readFailed(path: string, cause: unknown): IoError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new IoError({
      message: `Could not read ${path}: ${reason}`,
      code: 'READ_FAILED',
      details: { path },
      cause,
    });
  }

  static shortRead(path: string, offset: number, expected: number, actual: number): IoError {
    return new IoError({
      message: `${path} ended early: expected ${expected} bytes at offset ${offset}, read ${actual}`,
      code: 'SHORT_READ',
      details: { path, offset, expected, actual },
    });
  }

  static sizeChanged(path: string, expected: number, actual: number): IoError {
    return new IoError({
      message: `${path} changed size during upload (expected ${expected} bytes, found ${actual})`,
      code: 'SIZE_CHANGED',
      details: { path, expected, actual },
    });
  }
}

/**
 * Internal sequencing invariant violated, such as completing a
 * multipart session with non-contiguous part numbers
 */
export class ProtocolInvariantError extends UploadError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'protocol_invariant_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ProtocolInvariantError';
    Object.setPrototypeOf(this, ProtocolInvariantError.prototype);
  }
}

/**
 * The caller abandoned the upload through its abort signal
 */
export class CancelledError extends UploadError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'cancelled',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, CancelledError.prototype);
  }

  static aborted(reason?: unknown): CancelledError {
    return new CancelledError({
      message:
        reason instanceof Error ? `Upload cancelled: ${reason.message}` : 'Upload cancelled',
      code: 'ABORTED',
      cause: reason,
    });
  }
}

function truncate(text: string, max = 256): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
