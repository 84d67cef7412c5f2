/**
 * Backend presign client over an HttpTransport
 * @module media-uploader/presign/service
 */

import type { z } from 'zod';
import type { NormalizedUploadConfig } from '../config/index.js';
import { CancelledError, PresignError } from '../errors/index.js';
import { toCompletionPayload } from '../multipart/parts.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import {
  bodyText,
  isSuccessResponse,
  type HttpResponse,
  type HttpTransport,
} from '../transport/index.js';
import type {
  MultipartCompletion,
  MultipartSession,
  PartResult,
  PartTarget,
  PresignedTarget,
} from '../types/index.js';
import type { PresignCallOptions, PresignClient } from './interface.js';
import {
  CompleteResponseSchema,
  ErrorBodySchema,
  MultipartStartResponseSchema,
  PartUrlResponseSchema,
  SimplePresignResponseSchema,
} from './schemas.js';

/**
 * Backend endpoints, relative to the configured base URL
 */
export const ENDPOINTS = {
  PRESIGN: '/uploads/presign',
  MULTIPART_START: '/uploads/multipart/start',
  MULTIPART_PART_URL: '/uploads/multipart/part-url',
  MULTIPART_COMPLETE: '/uploads/multipart/complete',
} as const;

interface Endpoint {
  readonly label: string;
  readonly path: string;
}

const PRESIGN: Endpoint = { label: 'Presign', path: ENDPOINTS.PRESIGN };
const MULTIPART_START: Endpoint = { label: 'Multipart start', path: ENDPOINTS.MULTIPART_START };
const PART_URL: Endpoint = { label: 'Part URL', path: ENDPOINTS.MULTIPART_PART_URL };
const MULTIPART_COMPLETE: Endpoint = {
  label: 'Multipart complete',
  path: ENDPOINTS.MULTIPART_COMPLETE,
};

/**
 * Presign client talking JSON to the upload backend
 *
 * Each call is one POST. Responses are decoded against strict schemas,
 * and any rejection, malformed answer or connectivity failure becomes a
 * `PresignError`.
 */
export class BackendPresignClient implements PresignClient {
  private readonly logger: Logger;

  constructor(
    private readonly config: NormalizedUploadConfig,
    private readonly transport: HttpTransport,
    logger?: Logger
  ) {
    this.logger = logger ?? new NoopLogger();
  }

  async presignSimple(
    filename: string,
    contentType: string,
    folder: string,
    options: PresignCallOptions = {}
  ): Promise<PresignedTarget> {
    const response = await this.post(
      PRESIGN,
      this.withTtl({ filename, content_type: contentType, folder }),
      SimplePresignResponseSchema,
      options
    );

    return {
      putUrl: response.url,
      objectKey: response.key,
      method: response.method,
      requiredHeaders: response.headers,
      publicUrl: response.public_url,
    };
  }

  async presignMultipartStart(
    filename: string,
    contentType: string,
    folder: string,
    options: PresignCallOptions = {}
  ): Promise<MultipartSession> {
    const response = await this.post(
      MULTIPART_START,
      { filename, content_type: contentType, folder },
      MultipartStartResponseSchema,
      options
    );

    return {
      objectKey: response.key,
      uploadId: response.upload_id,
      partSizeBytes: response.part_size,
    };
  }

  async presignMultipartPart(
    session: MultipartSession,
    partNumber: number,
    options: PresignCallOptions = {}
  ): Promise<PartTarget> {
    const response = await this.post(
      PART_URL,
      this.withTtl({
        key: session.objectKey,
        upload_id: session.uploadId,
        part_number: partNumber,
      }),
      PartUrlResponseSchema,
      options
    );

    return {
      url: response.url,
      method: response.method,
      headers: response.headers,
    };
  }

  async completeMultipart(
    session: MultipartSession,
    parts: readonly PartResult[],
    options: PresignCallOptions = {}
  ): Promise<MultipartCompletion> {
    const response = await this.post(
      MULTIPART_COMPLETE,
      {
        key: session.objectKey,
        upload_id: session.uploadId,
        parts: toCompletionPayload(parts),
      },
      CompleteResponseSchema,
      options
    );

    return {
      publicUrl: response.public_url,
      location: response.location,
      versionId: response.version_id,
    };
  }

  private withTtl(payload: Record<string, unknown>): Record<string, unknown> {
    return this.config.presignTtlSeconds !== undefined
      ? { ...payload, ttl_seconds: this.config.presignTtlSeconds }
      : payload;
  }

  private async post<T>(
    endpoint: Endpoint,
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: PresignCallOptions
  ): Promise<T> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      accept: 'application/json',
      'user-agent': this.config.userAgent,
    };
    if (this.config.apiKey) {
      headers['x-api-key'] = this.config.apiKey;
    }

    const url = `${this.config.baseUrl}${endpoint.path}`;
    this.logger.debug('Backend request', { endpoint: endpoint.path });

    let response: HttpResponse;
    try {
      response = await this.transport.send(
        {
          method: 'POST',
          url,
          headers,
          body: new TextEncoder().encode(JSON.stringify(payload)),
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      throw PresignError.unreachable(endpoint.label, error);
    }

    const text = bodyText(response);

    if (!isSuccessResponse(response)) {
      this.logger.debug('Backend rejected request', {
        endpoint: endpoint.path,
        status: response.status,
      });
      throw PresignError.rejected(endpoint.label, response.status, extractDetail(text));
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw PresignError.malformed(endpoint.label, 'body is not valid JSON');
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const reason = issue
        ? `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`
        : 'unexpected shape';
      throw PresignError.malformed(endpoint.label, reason);
    }

    return result.data;
  }
}

/**
 * Pulls the backend's `detail` out of an error body, if there is one
 */
function extractDetail(text: string): string | undefined {
  if (!text) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }

  const parsed = ErrorBodySchema.safeParse(json);
  if (!parsed.success || parsed.data.detail === undefined || parsed.data.detail === null) {
    return undefined;
  }

  const { detail } = parsed.data;
  return typeof detail === 'string' ? detail : JSON.stringify(detail);
}

/**
 * Creates a backend presign client
 */
export function createPresignClient(
  config: NormalizedUploadConfig,
  transport: HttpTransport,
  logger?: Logger
): PresignClient {
  return new BackendPresignClient(config, transport, logger);
}
