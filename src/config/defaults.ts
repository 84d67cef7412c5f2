/**
 * Default configuration values for the media uploader
 * @module media-uploader/config/defaults
 */

/**
 * Default connect timeout in milliseconds (30 seconds).
 */
export const DEFAULT_CONNECT_TIMEOUT = 30000;

/**
 * Default multipart threshold in bytes (80 MiB).
 * Files of this size or larger are uploaded in parts.
 */
export const DEFAULT_MULTIPART_THRESHOLD = 80 * 1024 * 1024;

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_REQUEST_TIMEOUT = 300000;

/**
 * Default destination folder.
 */
export const DEFAULT_FOLDER = 'raw';

/**
 * Default user agent string.
 */
export const DEFAULT_USER_AGENT = 'media-uploader/0.1.0';
