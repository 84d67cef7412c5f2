/**
 * Upload state machine
 * @module media-uploader/upload/orchestrator
 */

import type { NormalizedUploadConfig } from '../config/index.js';
import {
  CancelledError,
  IoError,
  PresignError,
  ProtocolInvariantError,
  TransferError,
  errorMessage,
  wrapError,
  type UploadError,
} from '../errors/index.js';
import { ChunkReader, validatePartsSequence } from '../multipart/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { PresignClient } from '../presign/index.js';
import type { SourceHandle } from '../source/index.js';
import type { TransferExecutor } from '../transfer/index.js';
import type {
  PartResult,
  ProgressCallback,
  UploadMode,
  UploadRequest,
  UploadResult,
  UploadState,
  UploadSuccess,
} from '../types/index.js';
import { ProgressTracker } from './progress.js';
import { toFailureResult } from './result.js';

export interface UploadOrchestratorDeps {
  readonly config: NormalizedUploadConfig;
  readonly presign: PresignClient;
  readonly executor: TransferExecutor;
  readonly logger?: Logger;
}

export interface RunOptions {
  onProgress?: ProgressCallback;

  /**
   * Stops the upload before its next network call or chunk read, and
   * aborts the call in flight
   */
  signal?: AbortSignal;
}

/**
 * Drives one upload from sizing to a terminal result.
 *
 * Files at or above `multipartThreshold` go through a multipart session,
 * everything else through a single presigned PUT. Calls are strictly
 * sequential. Any failure ends the upload: nothing is retried, rolled
 * back or aborted on the backend, and the session is dropped.
 *
 * An instance runs a single upload.
 *
 * @example
 * ```typescript
 * const orchestrator = new UploadOrchestrator({ config, presign, executor });
 * const result = await orchestrator.run(request, {
 *   onProgress: (p) => console.log(p.message),
 * });
 * ```
 */
export class UploadOrchestrator {
  private readonly logger: Logger;
  private currentState: UploadState = 'Idle';
  private currentPart: number | undefined;
  private started = false;

  constructor(private readonly deps: UploadOrchestratorDeps) {
    this.logger = deps.logger ?? new NoopLogger();
  }

  get state(): UploadState {
    return this.currentState;
  }

  /**
   * Runs the upload. Upload failures resolve as a failure result.
   *
   * @throws {ProtocolInvariantError} If this instance already ran
   */
  async run(request: UploadRequest, options: RunOptions = {}): Promise<UploadResult> {
    if (this.started) {
      throw new ProtocolInvariantError({
        message: 'An orchestrator runs a single upload',
        code: 'ALREADY_STARTED',
      });
    }
    this.started = true;

    const { signal } = options;
    const logger = this.logger.child({
      filename: request.filename,
      folder: request.destinationFolder,
    });
    const tracker = new ProgressTracker(request.sizeBytes, options.onProgress, logger);
    let handle: SourceHandle | undefined;

    try {
      checkAborted(signal);
      handle = await request.source.open();

      this.transition('SizingDecision', logger);
      const mode: UploadMode =
        request.sizeBytes >= this.deps.config.multipartThreshold ? 'multipart' : 'simple';
      logger.info('Upload path selected', {
        mode,
        bytes: request.sizeBytes,
        threshold: this.deps.config.multipartThreshold,
      });

      const result =
        mode === 'simple'
          ? await this.runSimple(request, handle, tracker, logger, signal)
          : await this.runMultipart(request, handle, tracker, logger, signal);

      this.transition('Done', logger);
      tracker.done(`Uploaded (${mode})`);
      logger.info('Upload complete', {
        mode,
        objectKey: result.objectKey,
        bytes: result.bytes,
        parts: result.parts.length,
      });
      return result;
    } catch (error) {
      const failedIn = this.currentState;
      const partNumber = this.currentPart;
      const uploadError = wrapError(error, (cause) =>
        unexpectedError(failedIn, request.source.path, cause, partNumber)
      );

      this.transition('Failed', logger);
      tracker.fail(`Upload failed: ${uploadError.message}`);
      logger.error('Upload failed', {
        state: failedIn,
        partNumber,
        error: uploadError.message,
        code: uploadError.code,
      });
      return toFailureResult(uploadError, failedIn, partNumber);
    } finally {
      if (handle) {
        await closeQuietly(handle, logger);
      }
    }
  }

  private async runSimple(
    request: UploadRequest,
    handle: SourceHandle,
    tracker: ProgressTracker,
    logger: Logger,
    signal?: AbortSignal
  ): Promise<UploadSuccess> {
    this.transition('SimplePresign', logger);
    tracker.update({ phase: 'presigning', message: 'Requesting upload URL…' });
    checkAborted(signal);
    const target = await this.deps.presign.presignSimple(
      request.filename,
      request.contentType,
      request.destinationFolder,
      { signal }
    );

    this.transition('SimpleUpload', logger);
    checkAborted(signal);
    const bytes = await handle.readAll();
    if (bytes.length !== request.sizeBytes) {
      throw IoError.sizeChanged(request.source.path, request.sizeBytes, bytes.length);
    }

    tracker.update({ phase: 'uploading', bytesSent: 0, message: 'Uploading…' });
    checkAborted(signal);
    await this.deps.executor.putBytes(
      { url: target.putUrl, method: target.method, headers: target.requiredHeaders },
      bytes,
      {
        signal,
        onProgress: (sent) =>
          tracker.update({ phase: 'uploading', bytesSent: sent, message: 'Uploading…' }),
      }
    );

    return {
      ok: true,
      objectKey: target.objectKey,
      publicUrl: target.publicUrl,
      mode: 'simple',
      bytes: bytes.length,
      parts: [],
    };
  }

  private async runMultipart(
    request: UploadRequest,
    handle: SourceHandle,
    tracker: ProgressTracker,
    logger: Logger,
    signal?: AbortSignal
  ): Promise<UploadSuccess> {
    this.transition('MultipartStart', logger);
    tracker.update({ phase: 'presigning', message: 'Starting multipart…' });
    checkAborted(signal);
    const session = await this.deps.presign.presignMultipartStart(
      request.filename,
      request.contentType,
      request.destinationFolder,
      { signal }
    );

    const reader = new ChunkReader(
      handle,
      request.sizeBytes,
      session.partSizeBytes,
      request.source.path
    );
    const totalParts = reader.partCount;
    logger.debug('Multipart session opened', {
      objectKey: session.objectKey,
      partSize: session.partSizeBytes,
      totalParts,
    });

    const parts: PartResult[] = [];
    let uploaded = 0;

    for (const range of reader.ranges()) {
      const { partNumber } = range;
      this.currentPart = partNumber;

      this.transition('PartPresign', logger);
      tracker.update({
        phase: 'part',
        partNumber,
        totalParts,
        bytesSent: uploaded,
        message: `Part ${partNumber} presign…`,
      });
      checkAborted(signal);
      const target = await this.deps.presign.presignMultipartPart(session, partNumber, {
        signal,
      });

      this.transition('PartRead', logger);
      checkAborted(signal);
      const bytes = await reader.read(range);

      this.transition('PartUpload', logger);
      const message = `Part ${partNumber} uploading…`;
      tracker.update({ phase: 'part', partNumber, totalParts, bytesSent: uploaded, message });
      checkAborted(signal);
      const partStart = uploaded;
      const { eTag } = await this.deps.executor.putBytes(target, bytes, {
        requirePartETag: true,
        partNumber,
        signal,
        onProgress: (sent) =>
          tracker.update({
            phase: 'part',
            partNumber,
            totalParts,
            bytesSent: partStart + Math.min(sent, bytes.length),
            message,
          }),
      });

      parts.push({ partNumber, eTag });
      uploaded += bytes.length;
      tracker.update({
        phase: 'part',
        partNumber,
        totalParts,
        bytesSent: uploaded,
        message: `Part ${partNumber} uploaded`,
      });
    }
    this.currentPart = undefined;

    this.transition('MultipartComplete', logger);
    const finalSize = await handle.size();
    if (finalSize !== request.sizeBytes) {
      throw IoError.sizeChanged(request.source.path, request.sizeBytes, finalSize);
    }
    validatePartsSequence(parts, totalParts);

    tracker.update({
      phase: 'completing',
      totalParts,
      bytesSent: uploaded,
      message: 'Completing multipart…',
    });
    checkAborted(signal);
    const completion = await this.deps.presign.completeMultipart(session, parts, { signal });

    return {
      ok: true,
      objectKey: session.objectKey,
      publicUrl: completion.publicUrl,
      mode: 'multipart',
      bytes: uploaded,
      parts,
      location: completion.location,
      versionId: completion.versionId,
    };
  }

  private transition(next: UploadState, logger: Logger): void {
    logger.debug('State transition', {
      from: this.currentState,
      to: next,
      partNumber: this.currentPart,
    });
    this.currentState = next;
  }
}

function checkAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw CancelledError.aborted(signal.reason);
  }
}

async function closeQuietly(handle: SourceHandle, logger: Logger): Promise<void> {
  try {
    await handle.close();
  } catch (error) {
    logger.warn('Failed to close source', { error: errorMessage(error) });
  }
}

/**
 * Categorises an error from outside the upload taxonomy by the state
 * it was raised in
 */
function unexpectedError(
  state: UploadState,
  path: string,
  cause: unknown,
  partNumber?: number
): UploadError {
  switch (state) {
    case 'SimplePresign':
    case 'MultipartStart':
    case 'PartPresign':
    case 'MultipartComplete':
      return new PresignError({ message: errorMessage(cause), code: 'UNEXPECTED', cause });
    case 'SimpleUpload':
    case 'PartUpload':
      return TransferError.network(cause, partNumber);
    case 'Idle':
    case 'PartRead':
      return IoError.readFailed(path, cause);
    default:
      return new ProtocolInvariantError({
        message: errorMessage(cause),
        code: 'UNEXPECTED',
        cause,
      });
  }
}
