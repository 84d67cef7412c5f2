/**
 * Core data model for the media uploader
 * @module media-uploader/types/common
 */

import type { UploadError } from '../errors/index.js';
import type { FileSource } from '../source/index.js';
import type { HttpMethod } from '../transport/index.js';

/**
 * Transfer strategy chosen once per request from its size
 */
export type UploadMode = 'simple' | 'multipart';

/**
 * States of the upload state machine
 */
export type UploadState =
  | 'Idle'
  | 'SizingDecision'
  | 'SimplePresign'
  | 'SimpleUpload'
  | 'MultipartStart'
  | 'PartPresign'
  | 'PartRead'
  | 'PartUpload'
  | 'MultipartComplete'
  | 'Done'
  | 'Failed';

/**
 * Coarse phase reported to the caller. `part` carries the part number
 * in {@link UploadProgress.partNumber}.
 */
export type UploadPhase =
  | 'idle'
  | 'presigning'
  | 'uploading'
  | 'part'
  | 'completing'
  | 'done'
  | 'failed';

/**
 * Category of a failed upload
 */
export type FailureStage =
  | 'PresignError'
  | 'TransferError'
  | 'IoError'
  | 'ProtocolInvariantError'
  | 'Cancelled';

/**
 * A single media file to upload. Created through `createUploadRequest`
 * and frozen afterwards.
 */
export interface UploadRequest {
  readonly source: FileSource;
  readonly filename: string;
  /** Derived from the filename, never supplied by the user */
  readonly contentType: string;
  readonly sizeBytes: number;
  readonly destinationFolder: string;
}

/**
 * Credentials for a single-object PUT
 */
export interface PresignedTarget {
  readonly putUrl: string;
  readonly objectKey: string;
  readonly method: HttpMethod;
  readonly requiredHeaders: Readonly<Record<string, string>>;
  readonly publicUrl?: string;
}

/**
 * One-time PUT URL for a single multipart part
 */
export interface PartTarget {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Backend-side multipart session
 */
export interface MultipartSession {
  readonly objectKey: string;
  readonly uploadId: string;
  readonly partSizeBytes: number;
}

/**
 * A stored part, as submitted to multipart completion
 */
export interface PartResult {
  readonly partNumber: number;
  /** Quotes stripped */
  readonly eTag: string;
}

/**
 * Backend answer to multipart completion
 */
export interface MultipartCompletion {
  readonly publicUrl?: string;
  readonly location?: string;
  readonly versionId?: string;
}

/**
 * Progress snapshot delivered to the caller
 */
export interface UploadProgress {
  /** In [0, 1], non-decreasing, exactly 1 only in the final `done` report */
  readonly fractionComplete: number;
  readonly phase: UploadPhase;
  readonly partNumber?: number;
  readonly totalParts?: number;
  readonly bytesSent: number;
  readonly totalBytes: number;
  /** Human-readable status line */
  readonly message: string;
}

export type ProgressCallback = (progress: UploadProgress) => void;

export interface UploadSuccess {
  readonly ok: true;
  readonly objectKey: string;
  readonly publicUrl?: string;
  readonly mode: UploadMode;
  readonly bytes: number;
  /** Parts submitted to completion; empty for simple uploads */
  readonly parts: readonly PartResult[];
  readonly location?: string;
  readonly versionId?: string;
}

export interface UploadFailure {
  readonly ok: false;
  readonly stage: FailureStage;
  readonly message: string;
  /** State the machine was in when the failure happened */
  readonly state: UploadState;
  readonly partNumber?: number;
  readonly error: UploadError;
}

/**
 * Terminal value of one upload attempt
 */
export type UploadResult = UploadSuccess | UploadFailure;
