/**
 * undici-based HTTP transport implementation
 */

import { Readable } from 'node:stream';
import { Agent, request, type Dispatcher } from 'undici';
import { CancelledError, NetworkError } from '../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport, SendOptions } from './types.js';

/**
 * Default size of the slices a metered body is written in (64 KiB)
 */
export const DEFAULT_UPLOAD_SLICE_SIZE = 64 * 1024;

/**
 * undici transport options
 */
export interface UndiciTransportOptions {
  /** Connect timeout in milliseconds */
  connectTimeout: number;
  /** Header and body timeout in milliseconds */
  requestTimeout: number;
  /** Slice size used when upload progress is requested */
  uploadSliceSize?: number;
  /** Dispatcher to use instead of a private Agent */
  dispatcher?: Dispatcher;
}

/**
 * Yields `bytes` in slices of at most `sliceSize`, reporting the running
 * total after each slice is taken by the consumer.
 */
export function* meterBody(
  bytes: Uint8Array,
  sliceSize: number,
  onProgress: (sent: number, total: number) => void
): Generator<Uint8Array, void, undefined> {
  const total = bytes.length;
  let sent = 0;
  while (sent < total) {
    const end = Math.min(sent + sliceSize, total);
    yield bytes.subarray(sent, end);
    sent = end;
    onProgress(sent, total);
  }
}

/**
 * HTTP transport on undici's `request`.
 *
 * Bodies are always in-memory buffers and the caller's Content-Length
 * header is sent as given. When upload progress is requested the buffer
 * is written in fixed slices under that same Content-Length, so the
 * request stays a fixed-length request.
 */
export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly sliceSize: number;

  constructor(private readonly options: UndiciTransportOptions) {
    this.dispatcher =
      options.dispatcher ?? new Agent({ connect: { timeout: options.connectTimeout } });
    this.ownsDispatcher = options.dispatcher === undefined;
    this.sliceSize = options.uploadSliceSize ?? DEFAULT_UPLOAD_SLICE_SIZE;
  }

  async send(httpRequest: HttpRequest, options: SendOptions = {}): Promise<HttpResponse> {
    const { onUploadProgress, signal } = options;
    const bytes = httpRequest.body;

    let body: Uint8Array | Readable | undefined = bytes;
    if (bytes && onUploadProgress) {
      body = Readable.from(meterBody(bytes, this.sliceSize, onUploadProgress), {
        objectMode: false,
      });
    }

    try {
      const response = await request(httpRequest.url, {
        method: httpRequest.method,
        headers: httpRequest.headers,
        body,
        dispatcher: this.dispatcher,
        headersTimeout: this.options.requestTimeout,
        bodyTimeout: this.options.requestTimeout,
        signal,
      });

      const payload = new Uint8Array(await response.body.arrayBuffer());

      return {
        status: response.statusCode,
        headers: convertHeaders(response.headers),
        body: payload,
      };
    } catch (error) {
      throw this.handleError(error, httpRequest, signal);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private handleError(error: unknown, httpRequest: HttpRequest, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return CancelledError.aborted(signal.reason);
    }

    const code = errorCode(error);
    const message = error instanceof Error ? error.message : String(error);

    switch (code) {
      case 'UND_ERR_CONNECT_TIMEOUT':
        return NetworkError.timeout(this.options.connectTimeout, error);
      case 'UND_ERR_HEADERS_TIMEOUT':
      case 'UND_ERR_BODY_TIMEOUT':
        return NetworkError.timeout(this.options.requestTimeout, error);
      case 'ENOTFOUND':
      case 'EAI_AGAIN':
        return NetworkError.dnsError(httpRequest.url, error);
      case 'ECONNRESET':
      case 'UND_ERR_SOCKET':
        return NetworkError.connectionReset(error);
      default:
        return NetworkError.connectionFailed(message, error);
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Flattens undici response headers into lower-cased single values
 */
function convertHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}

/**
 * Creates an undici transport
 */
export function createUndiciTransport(options: UndiciTransportOptions): HttpTransport {
  return new UndiciTransport(options);
}
