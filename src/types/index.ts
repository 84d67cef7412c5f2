/**
 * Type definitions for the media uploader
 * @module media-uploader/types
 */

export type {
  UploadMode,
  UploadState,
  UploadPhase,
  FailureStage,
  UploadRequest,
  PresignedTarget,
  PartTarget,
  MultipartSession,
  PartResult,
  MultipartCompletion,
  UploadProgress,
  ProgressCallback,
  UploadSuccess,
  UploadFailure,
  UploadResult,
} from './common.js';
