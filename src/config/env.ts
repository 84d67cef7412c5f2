/**
 * Environment variable configuration loading for the media uploader
 * @module media-uploader/config/env
 */

import { ConfigError } from '../errors/index.js';
import type { UploadConfig, NormalizedUploadConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names for uploader configuration.
 */
export const ENV_VARS = {
  BASE_URL: 'MEDIA_UPLOAD_BASE_URL',
  CONNECT_TIMEOUT_MS: 'MEDIA_UPLOAD_CONNECT_TIMEOUT_MS',
  MULTIPART_THRESHOLD_BYTES: 'MEDIA_UPLOAD_MULTIPART_THRESHOLD_BYTES',
  REQUEST_TIMEOUT_MS: 'MEDIA_UPLOAD_REQUEST_TIMEOUT_MS',
  API_KEY: 'MEDIA_UPLOAD_API_KEY',
} as const;

type Env = Readonly<Record<string, string | undefined>>;

function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
      details: { name },
    });
  }

  return parseInt(value, 10);
}

/**
 * Builds a normalized configuration from environment variables.
 *
 * The result is a plain value for the caller to inject; nothing inside
 * the uploader reads the environment.
 *
 * Environment variables:
 * - MEDIA_UPLOAD_BASE_URL (required): backend base URL
 * - MEDIA_UPLOAD_CONNECT_TIMEOUT_MS (optional)
 * - MEDIA_UPLOAD_MULTIPART_THRESHOLD_BYTES (optional)
 * - MEDIA_UPLOAD_REQUEST_TIMEOUT_MS (optional)
 * - MEDIA_UPLOAD_API_KEY (optional)
 *
 * @throws {ConfigError} If the base URL is missing or a value is invalid
 */
export function createConfigFromEnv(env: Env = process.env): NormalizedUploadConfig {
  const baseUrl = env[ENV_VARS.BASE_URL];
  if (!baseUrl) {
    throw new ConfigError({
      message: `${ENV_VARS.BASE_URL} is required`,
      code: 'MISSING_BASE_URL',
    });
  }

  const config: UploadConfig = {
    baseUrl,
    connectTimeout: parseIntEnv(env[ENV_VARS.CONNECT_TIMEOUT_MS], ENV_VARS.CONNECT_TIMEOUT_MS),
    multipartThreshold: parseIntEnv(
      env[ENV_VARS.MULTIPART_THRESHOLD_BYTES],
      ENV_VARS.MULTIPART_THRESHOLD_BYTES
    ),
    requestTimeout: parseIntEnv(env[ENV_VARS.REQUEST_TIMEOUT_MS], ENV_VARS.REQUEST_TIMEOUT_MS),
    apiKey: env[ENV_VARS.API_KEY] || undefined,
  };

  return normalizeConfig(config);
}
