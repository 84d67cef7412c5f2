/**
 * Error system for the media uploader
 * @module media-uploader/errors
 */

// Base error class
export { UploadError, type UploadErrorParams } from './error.js';

// Error categories
export {
  CancelledError,
  ConfigError,
  IoError,
  NetworkError,
  PresignError,
  ProtocolInvariantError,
  TransferError,
} from './categories.js';

// Error mapping utilities
export { isUploadError, toFailureStage, wrapError, errorMessage } from './mapping.js';
