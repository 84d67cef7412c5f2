/**
 * Configuration type definitions for the media uploader
 * @module media-uploader/config/types
 */

/**
 * Uploader configuration supplied by the caller.
 */
export interface UploadConfig {
  /**
   * Base URL of the upload backend (the presign endpoints live under it).
   */
  baseUrl: string;

  /**
   * Connect timeout in milliseconds.
   * @default 30000
   */
  connectTimeout?: number;

  /**
   * Files of this size in bytes or larger use multipart upload.
   * @default 83886080 (80 MiB)
   */
  multipartThreshold?: number;

  /**
   * Time allowed for response headers and between body chunks, in milliseconds.
   * @default 300000 (5 minutes)
   */
  requestTimeout?: number;

  /**
   * License/API key sent to the backend as `X-API-Key`.
   */
  apiKey?: string;

  /**
   * Requested lifetime of presigned URLs in seconds. Left to the backend when unset.
   */
  presignTtlSeconds?: number;

  /**
   * Destination folder used when a request does not name one.
   * @default 'raw'
   */
  defaultFolder?: string;

  /**
   * User-Agent header for backend calls.
   */
  userAgent?: string;
}

/**
 * Configuration with defaults applied.
 */
export interface NormalizedUploadConfig {
  /** Without trailing slash */
  readonly baseUrl: string;
  readonly connectTimeout: number;
  readonly multipartThreshold: number;
  readonly requestTimeout: number;
  readonly apiKey?: string;
  readonly presignTtlSeconds?: number;
  readonly defaultFolder: string;
  readonly userAgent: string;
}
