/**
 * Progress aggregation for a single upload attempt
 * @module media-uploader/upload/progress
 */

import { errorMessage } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { ProgressCallback, UploadPhase, UploadProgress } from '../types/index.js';

/**
 * Highest fraction reported before the upload is done
 */
export const IN_FLIGHT_CAP = 0.99;

export interface ProgressUpdate {
  readonly phase: Exclude<UploadPhase, 'done' | 'failed'>;
  readonly message: string;
  readonly bytesSent?: number;
  readonly partNumber?: number;
  readonly totalParts?: number;
}

/**
 * Tracks one attempt's progress and forwards snapshots to the caller.
 *
 * The fraction never goes down. In-flight updates stay at or below
 * {@link IN_FLIGHT_CAP}; only {@link ProgressTracker.done} reports 1.
 * After `done` or `fail` further updates are ignored.
 */
export class ProgressTracker {
  private current: UploadProgress;
  private finished = false;

  constructor(
    readonly totalBytes: number,
    private readonly listener?: ProgressCallback,
    private readonly logger: Logger = new NoopLogger()
  ) {
    this.current = {
      fractionComplete: 0,
      phase: 'idle',
      bytesSent: 0,
      totalBytes,
      message: 'Waiting…',
    };
  }

  get snapshot(): UploadProgress {
    return this.current;
  }

  update(update: ProgressUpdate): void {
    if (this.finished) return;

    const bytesSent = Math.min(
      this.totalBytes,
      Math.max(this.current.bytesSent, update.bytesSent ?? this.current.bytesSent)
    );
    const raw = this.totalBytes > 0 ? bytesSent / this.totalBytes : 0;

    this.emit({
      fractionComplete: Math.max(this.current.fractionComplete, Math.min(raw, IN_FLIGHT_CAP)),
      phase: update.phase,
      partNumber: update.partNumber,
      totalParts: update.totalParts,
      bytesSent,
      totalBytes: this.totalBytes,
      message: update.message,
    });
  }

  done(message: string): void {
    if (this.finished) return;
    this.finished = true;

    this.emit({
      fractionComplete: 1,
      phase: 'done',
      totalParts: this.current.totalParts,
      bytesSent: this.totalBytes,
      totalBytes: this.totalBytes,
      message,
    });
  }

  /**
   * Reports the failure; the fraction stays where it was
   */
  fail(message: string): void {
    if (this.finished) return;
    this.finished = true;

    this.emit({
      ...this.current,
      phase: 'failed',
      message,
    });
  }

  private emit(progress: UploadProgress): void {
    this.current = progress;
    if (!this.listener) return;

    try {
      this.listener(progress);
    } catch (error) {
      this.logger.warn('Progress listener threw', { error: errorMessage(error) });
    }
  }
}
