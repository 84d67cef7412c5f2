/**
 * HTTP transport layer for the media uploader
 */

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  SendOptions,
} from './types.js';

export {
  getHeader,
  withoutHeader,
  isSuccessResponse,
  getETag,
  bodyText,
} from './types.js';

export {
  UndiciTransport,
  createUndiciTransport,
  meterBody,
  DEFAULT_UPLOAD_SLICE_SIZE,
  type UndiciTransportOptions,
} from './undici-transport.js';
