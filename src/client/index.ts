/**
 * Upload client
 * @module media-uploader/client
 */

export {
  UploadClient,
  type UploadClientOptions,
  type StartUploadOptions,
  type UploadFileOptions,
} from './client.js';
export { createUploadClient, createUploadClientFromEnv } from './factory.js';
