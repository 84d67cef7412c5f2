/**
 * Backend presign client interface
 * @module media-uploader/presign/interface
 */

import type {
  MultipartCompletion,
  MultipartSession,
  PartResult,
  PartTarget,
  PresignedTarget,
} from '../types/index.js';

/**
 * Per-call options
 */
export interface PresignCallOptions {
  /**
   * Aborts the call in flight
   */
  signal?: AbortSignal;
}

/**
 * Round trips to the upload backend.
 *
 * Every call is a single attempt. Failures surface as `PresignError`,
 * or `CancelledError` when the signal fires.
 */
export interface PresignClient {
  /**
   * Requests a presigned PUT for a whole object
   */
  presignSimple(
    filename: string,
    contentType: string,
    folder: string,
    options?: PresignCallOptions
  ): Promise<PresignedTarget>;

  /**
   * Opens a multipart session; the backend chooses the part size
   */
  presignMultipartStart(
    filename: string,
    contentType: string,
    folder: string,
    options?: PresignCallOptions
  ): Promise<MultipartSession>;

  /**
   * Requests a one-time PUT URL for a single part
   */
  presignMultipartPart(
    session: MultipartSession,
    partNumber: number,
    options?: PresignCallOptions
  ): Promise<PartTarget>;

  /**
   * Assembles the stored parts into the final object
   */
  completeMultipart(
    session: MultipartSession,
    parts: readonly PartResult[],
    options?: PresignCallOptions
  ): Promise<MultipartCompletion>;
}
