/**
 * Configuration module for the media uploader
 * @module media-uploader/config
 */

export type { UploadConfig, NormalizedUploadConfig } from './types.js';

export {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_MULTIPART_THRESHOLD,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_FOLDER,
  DEFAULT_USER_AGENT,
} from './defaults.js';

export { validateConfig, normalizeConfig } from './validation.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
