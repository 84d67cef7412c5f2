/**
 * Backend round trips: presign, multipart start, part URL, multipart complete
 * @module media-uploader/presign
 */

export type { PresignClient, PresignCallOptions } from './interface.js';
export { BackendPresignClient, createPresignClient, ENDPOINTS } from './service.js';
