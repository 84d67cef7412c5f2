/**
 * Base error class for the media uploader
 * @module media-uploader/errors/error
 */

/**
 * Parameters for creating an UploadError
 */
export interface UploadErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether repeating the same call could succeed
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, if this one wraps another
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all upload operations
 *
 * Carries a category for programmatic handling, the HTTP status and a
 * code where one exists, and structured details for logging.
 */
export class UploadError extends Error {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether repeating the same call could succeed
   */
  readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(params: UploadErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, UploadError.prototype);

    this.name = 'UploadError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UploadError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
