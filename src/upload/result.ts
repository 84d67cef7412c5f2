/**
 * Terminal results
 * @module media-uploader/upload/result
 */

import { toFailureStage, type UploadError } from '../errors/index.js';
import type { UploadFailure, UploadState } from '../types/index.js';

/**
 * Builds the failure result for an error raised while in `state`
 */
export function toFailureResult(
  error: UploadError,
  state: UploadState,
  partNumber?: number
): UploadFailure {
  return {
    ok: false,
    stage: toFailureStage(error) ?? 'ProtocolInvariantError',
    message: error.message,
    state,
    partNumber,
    error,
  };
}
