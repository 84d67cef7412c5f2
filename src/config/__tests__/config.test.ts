/**
 * Tests for configuration validation, normalization and env loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../errors/index.js';
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_FOLDER,
  DEFAULT_MULTIPART_THRESHOLD,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_USER_AGENT,
  ENV_VARS,
  createConfigFromEnv,
  normalizeConfig,
  validateConfig,
} from '../index.js';

describe('normalizeConfig', () => {
  it('should apply defaults', () => {
    const config = normalizeConfig({ baseUrl: 'https://api.example.com' });

    expect(config).toEqual({
      baseUrl: 'https://api.example.com',
      connectTimeout: DEFAULT_CONNECT_TIMEOUT,
      multipartThreshold: DEFAULT_MULTIPART_THRESHOLD,
      requestTimeout: DEFAULT_REQUEST_TIMEOUT,
      apiKey: undefined,
      presignTtlSeconds: undefined,
      defaultFolder: DEFAULT_FOLDER,
      userAgent: DEFAULT_USER_AGENT,
    });
  });

  it('should use 80 MiB as the default threshold', () => {
    expect(DEFAULT_MULTIPART_THRESHOLD).toBe(83886080);
    expect(DEFAULT_CONNECT_TIMEOUT).toBe(30000);
    expect(DEFAULT_REQUEST_TIMEOUT).toBe(300000);
    expect(DEFAULT_FOLDER).toBe('raw');
  });

  it('should strip trailing slashes from the base URL', () => {
    expect(normalizeConfig({ baseUrl: 'http://localhost:8000///' }).baseUrl).toBe(
      'http://localhost:8000'
    );
  });

  it('should keep explicit values', () => {
    const config = normalizeConfig({
      baseUrl: 'https://api.example.com/v1',
      multipartThreshold: 1024,
      apiKey: 'test-key',
      presignTtlSeconds: 600,
      defaultFolder: 'uploads',
    });

    expect(config.baseUrl).toBe('https://api.example.com/v1');
    expect(config.multipartThreshold).toBe(1024);
    expect(config.apiKey).toBe('test-key');
    expect(config.presignTtlSeconds).toBe(600);
    expect(config.defaultFolder).toBe('uploads');
  });
});

describe('validateConfig', () => {
  it('should reject a non-URL base', () => {
    expect(() => validateConfig({ baseUrl: 'not a url' })).toThrow(
      'Invalid upload configuration: baseUrl: baseUrl must be a valid URL'
    );
  });

  it('should reject non-http protocols', () => {
    expect(() => validateConfig({ baseUrl: 'ftp://files.example.com' })).toThrow(
      'Invalid upload configuration: baseUrl: baseUrl must use http or https protocol'
    );
  });

  it('should reject non-positive numbers', () => {
    let caught: unknown;
    try {
      validateConfig({ baseUrl: 'https://api.example.com', multipartThreshold: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.code).toBe('INVALID_CONFIG');
    expect(caught.details?.issues).toEqual([
      { path: 'multipartThreshold', message: 'Number must be greater than 0' },
    ]);
  });

  it('should reject fractional timeouts', () => {
    expect(() =>
      validateConfig({ baseUrl: 'https://api.example.com', connectTimeout: 1.5 })
    ).toThrow(ConfigError);
  });
});

describe('createConfigFromEnv', () => {
  it('should read every variable', () => {
    const config = createConfigFromEnv({
      [ENV_VARS.BASE_URL]: 'https://api.example.com/',
      [ENV_VARS.CONNECT_TIMEOUT_MS]: '5000',
      [ENV_VARS.MULTIPART_THRESHOLD_BYTES]: '1048576',
      [ENV_VARS.REQUEST_TIMEOUT_MS]: '60000',
      [ENV_VARS.API_KEY]: 'test-key',
    });

    expect(config.baseUrl).toBe('https://api.example.com');
    expect(config.connectTimeout).toBe(5000);
    expect(config.multipartThreshold).toBe(1048576);
    expect(config.requestTimeout).toBe(60000);
    expect(config.apiKey).toBe('test-key');
  });

  it('should use defaults for unset variables', () => {
    const config = createConfigFromEnv({ MEDIA_UPLOAD_BASE_URL: 'http://localhost:8000' });

    expect(config.connectTimeout).toBe(DEFAULT_CONNECT_TIMEOUT);
    expect(config.multipartThreshold).toBe(DEFAULT_MULTIPART_THRESHOLD);
    expect(config.apiKey).toBeUndefined();
  });

  it('should treat an empty API key as unset', () => {
    const config = createConfigFromEnv({
      MEDIA_UPLOAD_BASE_URL: 'http://localhost:8000',
      MEDIA_UPLOAD_API_KEY: '',
    });
    expect(config.apiKey).toBeUndefined();
  });

  it('should require the base URL', () => {
    expect(() => createConfigFromEnv({})).toThrow('MEDIA_UPLOAD_BASE_URL is required');
  });

  it('should reject non-integer values', () => {
    expect(() =>
      createConfigFromEnv({
        MEDIA_UPLOAD_BASE_URL: 'http://localhost:8000',
        MEDIA_UPLOAD_CONNECT_TIMEOUT_MS: '30s',
      })
    ).toThrow('MEDIA_UPLOAD_CONNECT_TIMEOUT_MS must be a valid integer, got: 30s');
  });
});
