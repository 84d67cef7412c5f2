/**
 * Caller-facing upload client
 * @module media-uploader/client/client
 */

import type { NormalizedUploadConfig } from '../config/index.js';
import { IoError, wrapError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { BackendPresignClient, type PresignClient } from '../presign/index.js';
import { LocalFileSource, type FileSource } from '../source/index.js';
import { TransferExecutor } from '../transfer/index.js';
import { UndiciTransport, type HttpTransport } from '../transport/index.js';
import type { ProgressCallback, UploadRequest, UploadResult } from '../types/index.js';
import { UploadOrchestrator, createUploadRequest, toFailureResult } from '../upload/index.js';

/**
 * Collaborators that replace the defaults, mainly for tests
 */
export interface UploadClientOptions {
  /** Defaults to an undici transport built from the config timeouts */
  transport?: HttpTransport;
  /** Defaults to a backend client over the transport */
  presign?: PresignClient;
  logger?: Logger;
}

export interface StartUploadOptions {
  signal?: AbortSignal;
}

export interface UploadFileOptions {
  /** Defaults to the configured default folder */
  folder?: string;
  /** Defaults to the last path segment */
  filename?: string;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

/**
 * Entry point for uploading media files.
 *
 * Each upload gets its own orchestrator; nothing from one upload is
 * reused by the next.
 */
export class UploadClient {
  private readonly transport: HttpTransport;
  private readonly ownsTransport: boolean;
  private readonly presign: PresignClient;
  private readonly executor: TransferExecutor;
  private readonly logger: Logger;

  constructor(
    readonly config: NormalizedUploadConfig,
    options: UploadClientOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.ownsTransport = options.transport === undefined;
    this.transport =
      options.transport ??
      new UndiciTransport({
        connectTimeout: config.connectTimeout,
        requestTimeout: config.requestTimeout,
      });
    this.presign =
      options.presign ??
      new BackendPresignClient(config, this.transport, this.logger.child({ component: 'presign' }));
    this.executor = new TransferExecutor(
      this.transport,
      this.logger.child({ component: 'transfer' })
    );
  }

  /**
   * Uploads `request`. Resolves with a failure result instead of
   * rejecting when the upload fails.
   */
  async startUpload(
    request: UploadRequest,
    onProgress?: ProgressCallback,
    options: StartUploadOptions = {}
  ): Promise<UploadResult> {
    const orchestrator = new UploadOrchestrator({
      config: this.config,
      presign: this.presign,
      executor: this.executor,
      logger: this.logger.child({ component: 'orchestrator' }),
    });
    return orchestrator.run(request, { onProgress, signal: options.signal });
  }

  /**
   * Uploads a file from the local disk
   */
  async uploadFile(path: string, options: UploadFileOptions = {}): Promise<UploadResult> {
    return this.uploadSource(new LocalFileSource(path), options);
  }

  /**
   * Uploads any {@link FileSource}
   */
  async uploadSource(source: FileSource, options: UploadFileOptions = {}): Promise<UploadResult> {
    let request: UploadRequest;
    try {
      request = await createUploadRequest(source, {
        filename: options.filename,
        folder: options.folder ?? this.config.defaultFolder,
      });
    } catch (error) {
      const uploadError = wrapError(error, (cause) => IoError.openFailed(source.path, cause));
      this.logger.error('Could not prepare upload', { path: source.path, error: uploadError.message });
      return toFailureResult(uploadError, 'Idle');
    }

    return this.startUpload(request, options.onProgress, { signal: options.signal });
  }

  /**
   * Releases the transport when the client created it
   */
  async close(): Promise<void> {
    if (this.ownsTransport) {
      await this.transport.close();
    }
  }
}
