/**
 * Upload client factories
 * @module media-uploader/client/factory
 */

import { createConfigFromEnv, normalizeConfig, type UploadConfig } from '../config/index.js';
import { UploadClient, type UploadClientOptions } from './client.js';

/**
 * Creates a client from explicit configuration
 *
 * @throws {ConfigError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createUploadClient({ baseUrl: 'https://api.example.com' });
 * const result = await client.uploadFile('/tmp/meeting.m4a', {
 *   onProgress: (p) => console.log(`${Math.round(p.fractionComplete * 100)}% ${p.message}`),
 * });
 * if (result.ok) console.log(result.publicUrl);
 * await client.close();
 * ```
 */
export function createUploadClient(
  config: UploadConfig,
  options?: UploadClientOptions
): UploadClient {
  return new UploadClient(normalizeConfig(config), options);
}

/**
 * Creates a client from `MEDIA_UPLOAD_*` environment variables
 *
 * @throws {ConfigError} If the base URL is missing or a value is invalid
 */
export function createUploadClientFromEnv(
  env?: Readonly<Record<string, string | undefined>>,
  options?: UploadClientOptions
): UploadClient {
  return new UploadClient(createConfigFromEnv(env), options);
}
