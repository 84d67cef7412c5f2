/**
 * Configuration validation and normalization for the media uploader
 * @module media-uploader/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { UploadConfig, NormalizedUploadConfig } from './types.js';
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_FOLDER,
  DEFAULT_MULTIPART_THRESHOLD,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_USER_AGENT,
} from './defaults.js';

/**
 * Zod schema for uploader configuration.
 */
const UploadConfigSchema = z.object({
  baseUrl: z
    .string()
    .url('baseUrl must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), {
      message: 'baseUrl must use http or https protocol',
    }),
  connectTimeout: z.number().int().positive().optional(),
  multipartThreshold: z.number().int().positive().optional(),
  requestTimeout: z.number().int().positive().optional(),
  apiKey: z.string().min(1).optional(),
  presignTtlSeconds: z.number().int().positive().optional(),
  defaultFolder: z.string().min(1).optional(),
  userAgent: z.string().min(1).optional(),
});

/**
 * Validates uploader configuration.
 *
 * @throws {ConfigError} If configuration is invalid; the zod issues are
 * listed under `details.issues`
 */
export function validateConfig(config: UploadConfig): void {
  const result = UploadConfigSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    throw new ConfigError({
      message: first
        ? `Invalid upload configuration: ${first.path ? `${first.path}: ` : ''}${first.message}`
        : 'Invalid upload configuration',
      code: 'INVALID_CONFIG',
      details: { issues },
    });
  }
}

/**
 * Validates configuration and fills in defaults.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: UploadConfig): NormalizedUploadConfig {
  validateConfig(config);

  return {
    baseUrl: config.baseUrl.replace(/\/+$/, ''),
    connectTimeout: config.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
    multipartThreshold: config.multipartThreshold ?? DEFAULT_MULTIPART_THRESHOLD,
    requestTimeout: config.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
    apiKey: config.apiKey,
    presignTtlSeconds: config.presignTtlSeconds,
    defaultFolder: config.defaultFolder ?? DEFAULT_FOLDER,
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
  };
}
