/**
 * HTTP transport type definitions for the media uploader
 */

/**
 * HTTP methods the uploader issues
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * HTTP request
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  headers: Record<string, string>;
  /** Buffered body; bodies are never streamed from disk */
  body?: Uint8Array;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  status: number;
  /** Header names lower-cased */
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * Per-request options
 */
export interface SendOptions {
  /**
   * Called as request body bytes are handed to the connection
   * @param sent - Bytes written so far
   * @param total - Body length
   */
  onUploadProgress?: (sent: number, total: number) => void;

  /**
   * Aborts the request in flight
   */
  signal?: AbortSignal;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends a request and returns the buffered response. Non-2xx statuses
   * resolve normally; only connectivity failures reject.
   */
  send(request: HttpRequest, options?: SendOptions): Promise<HttpResponse>;

  /**
   * Closes the transport and releases pooled connections
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(
  headers: Readonly<Record<string, string>>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Returns a copy of `headers` without `name`, compared case-insensitively
 */
export function withoutHeader(
  headers: Readonly<Record<string, string>>,
  name: string
): Record<string, string> {
  const lowerName = name.toLowerCase();
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== lowerName) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Helper to check if response is successful (2xx status)
 */
export function isSuccessResponse(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Helper to extract ETag from response headers, surrounding quotes removed
 */
export function getETag(headers: Readonly<Record<string, string>>): string | undefined {
  const value = getHeader(headers, 'etag')?.trim().replace(/^"+|"+$/g, '');
  return value ? value : undefined;
}

/**
 * Decodes a response body as UTF-8 text
 */
export function bodyText(response: HttpResponse): string {
  return new TextDecoder().decode(response.body);
}
