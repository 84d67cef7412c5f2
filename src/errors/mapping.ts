/**
 * Error mapping utilities for the media uploader
 * @module media-uploader/errors/mapping
 */

import type { FailureStage } from '../types/index.js';
import { UploadError } from './error.js';
import {
  CancelledError,
  IoError,
  PresignError,
  ProtocolInvariantError,
  TransferError,
} from './categories.js';

/**
 * Type guard for errors raised by this package
 */
export function isUploadError(error: unknown): error is UploadError {
  return error instanceof UploadError;
}

/**
 * Returns the failure stage an error belongs to, or undefined for
 * errors outside the upload taxonomy (config, bare network errors,
 * foreign errors)
 */
export function toFailureStage(error: unknown): FailureStage | undefined {
  if (error instanceof PresignError) return 'PresignError';
  if (error instanceof TransferError) return 'TransferError';
  if (error instanceof IoError) return 'IoError';
  if (error instanceof ProtocolInvariantError) return 'ProtocolInvariantError';
  if (error instanceof CancelledError) return 'Cancelled';
  return undefined;
}

/**
 * Wraps any thrown value into an error that carries a failure stage.
 *
 * Errors that already map to a stage pass through unchanged; anything
 * else is handed to `fallback`, which decides the category from the
 * state the upload was in when it failed.
 */
export function wrapError(
  error: unknown,
  fallback: (cause: unknown) => UploadError
): UploadError {
  if (toFailureStage(error) !== undefined && error instanceof UploadError) {
    return error;
  }
  return fallback(error);
}

/**
 * Extracts a readable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
