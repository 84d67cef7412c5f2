/**
 * Media Uploader
 *
 * Uploads locally captured audio and video to object storage through a
 * presigned-URL handshake with an upload backend:
 * - Single presigned PUT below the multipart threshold
 * - Sequential multipart upload above it, one part in memory at a time
 * - Monotonic progress reporting with per-part status
 * - Typed failure results tagged with the stage that failed
 *
 * @module media-uploader
 * @example
 * ```typescript
 * import { createUploadClient } from 'media-uploader';
 *
 * const client = createUploadClient({ baseUrl: 'https://api.example.com' });
 *
 * const result = await client.uploadFile('/recordings/standup.m4a', {
 *   folder: 'raw',
 *   onProgress: (progress) => console.log(progress.message),
 * });
 *
 * if (result.ok) {
 *   console.log(result.objectKey, result.publicUrl);
 * } else {
 *   console.error(result.stage, result.message);
 * }
 *
 * await client.close();
 * ```
 */

// ============================================================================
// Client API
// ============================================================================

export {
  UploadClient,
  createUploadClient,
  createUploadClientFromEnv,
  type UploadClientOptions,
  type StartUploadOptions,
  type UploadFileOptions,
} from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export type { UploadConfig, NormalizedUploadConfig } from './config/index.js';

export {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_MULTIPART_THRESHOLD,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_FOLDER,
  DEFAULT_USER_AGENT,
  validateConfig,
  normalizeConfig,
  createConfigFromEnv,
  ENV_VARS,
} from './config/index.js';

// ============================================================================
// Types
// ============================================================================

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
} from './types/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  UploadError,
  CancelledError,
  ConfigError,
  IoError,
  NetworkError,
  PresignError,
  ProtocolInvariantError,
  TransferError,
  isUploadError,
  toFailureStage,
  wrapError,
  type UploadErrorParams,
} from './errors/index.js';

// ============================================================================
// Upload pipeline
// ============================================================================

export {
  UploadOrchestrator,
  ProgressTracker,
  IN_FLIGHT_CAP,
  createUploadRequest,
  type UploadOrchestratorDeps,
  type RunOptions,
  type UploadRequestOptions,
} from './upload/index.js';

export {
  BackendPresignClient,
  createPresignClient,
  ENDPOINTS,
  type PresignClient,
  type PresignCallOptions,
} from './presign/index.js';

export {
  ChunkReader,
  countParts,
  validatePartsSequence,
  toCompletionPayload,
  type ChunkRange,
  type CompletedPartPayload,
} from './multipart/index.js';

export {
  TransferExecutor,
  type StorageTarget,
  type PutBytesOptions,
  type PutBytesResult,
} from './transfer/index.js';

export {
  resolveContentType,
  isSupportedMediaFile,
  supportedExtensions,
  DEFAULT_CONTENT_TYPE,
} from './mime/index.js';

// ============================================================================
// Sources & Transport
// ============================================================================

export { LocalFileSource, type FileSource, type SourceHandle } from './source/index.js';

export {
  UndiciTransport,
  createUndiciTransport,
  getHeader,
  getETag,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type SendOptions,
  type UndiciTransportOptions,
} from './transport/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  type Logger,
  type LogEntry,
} from './observability/index.js';
