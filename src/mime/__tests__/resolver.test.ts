/**
 * Tests for content type resolution
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONTENT_TYPE,
  isSupportedMediaFile,
  resolveContentType,
  supportedExtensions,
} from '../resolver.js';

describe('resolveContentType', () => {
  it.each([
    ['song.mp3', 'audio/mpeg'],
    ['memo.m4a', 'audio/mp4'],
    ['take.wav', 'audio/wav'],
    ['clip.mp4', 'video/mp4'],
  ])('should map %s to %s', (filename, contentType) => {
    expect(resolveContentType(filename)).toBe(contentType);
  });

  it('should match suffixes case-insensitively', () => {
    expect(resolveContentType('MEETING.M4A')).toBe('audio/mp4');
    expect(resolveContentType('Intro.Mp3')).toBe('audio/mpeg');
  });

  it('should fall back to application/octet-stream', () => {
    expect(resolveContentType('notes.xyz')).toBe('application/octet-stream');
    expect(resolveContentType('noextension')).toBe(DEFAULT_CONTENT_TYPE);
    expect(resolveContentType('')).toBe(DEFAULT_CONTENT_TYPE);
  });

  it('should only look at the final suffix', () => {
    expect(resolveContentType('archive.mp3.zip')).toBe(DEFAULT_CONTENT_TYPE);
    expect(resolveContentType('video.mov.mp4')).toBe('video/mp4');
  });

  it('should require the dot', () => {
    expect(resolveContentType('mp3')).toBe(DEFAULT_CONTENT_TYPE);
  });
});

describe('isSupportedMediaFile', () => {
  it('should accept the four media extensions', () => {
    expect(isSupportedMediaFile('a.mp3')).toBe(true);
    expect(isSupportedMediaFile('a.WAV')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isSupportedMediaFile('a.ogg')).toBe(false);
  });
});

describe('supportedExtensions', () => {
  it('should list extensions without dots', () => {
    expect(supportedExtensions()).toEqual(['mp3', 'm4a', 'wav', 'mp4']);
  });
});
