/**
 * Upload orchestration
 * @module media-uploader/upload
 */

export {
  UploadOrchestrator,
  type UploadOrchestratorDeps,
  type RunOptions,
} from './orchestrator.js';
export { ProgressTracker, IN_FLIGHT_CAP, type ProgressUpdate } from './progress.js';
export { createUploadRequest, type UploadRequestOptions } from './request.js';
export { toFailureResult } from './result.js';
