/**
 * Tests for part ranges and chunk reads
 */

import { describe, it, expect } from 'vitest';
import { IoError, ProtocolInvariantError } from '../../errors/index.js';
import { SyntheticFileSource } from '../../testing/index.js';
import { ChunkReader, countParts } from '../chunk-reader.js';

const MiB = 1024 * 1024;

describe('countParts', () => {
  it('should round up', () => {
    expect(countParts(200 * MiB, 50 * MiB)).toBe(4);
    expect(countParts(200 * MiB + 1, 50 * MiB)).toBe(5);
    expect(countParts(1, 50 * MiB)).toBe(1);
    expect(countParts(0, 10)).toBe(0);
  });

  it('should reject non-positive part sizes', () => {
    expect(() => countParts(10, 0)).toThrow(ProtocolInvariantError);
    expect(() => countParts(10, 2.5)).toThrow('Part size must be a positive integer, got 2.5');
  });
});

describe('ChunkReader', () => {
  it('should cover the file exactly', async () => {
    const source = new SyntheticFileSource('/a.mp4', 25);
    const reader = new ChunkReader(await source.open(), 25, 10);

    expect([...reader.ranges()]).toEqual([
      { partNumber: 1, offset: 0, length: 10 },
      { partNumber: 2, offset: 10, length: 10 },
      { partNumber: 3, offset: 20, length: 5 },
    ]);
    expect(reader.partCount).toBe(3);
  });

  it('should produce equal parts when the size divides evenly', () => {
    const reader = new ChunkReader(
      {
        size: async () => 200 * MiB,
        read: async () => new Uint8Array(0),
        readAll: async () => new Uint8Array(0),
        close: async () => undefined,
      },
      200 * MiB,
      50 * MiB
    );

    const ranges = [...reader.ranges()];
    expect(ranges.map((range) => range.partNumber)).toEqual([1, 2, 3, 4]);
    expect(ranges.every((range) => range.length === 50 * MiB)).toBe(true);
    const last = ranges[ranges.length - 1];
    expect(last ? last.offset + last.length : 0).toBe(200 * MiB);
  });

  it('should yield nothing for an empty file', async () => {
    const source = new SyntheticFileSource('/empty.wav', 0);
    const reader = new ChunkReader(await source.open(), 0, 10);

    expect([...reader.ranges()]).toEqual([]);
  });

  it('should read the bytes of a range', async () => {
    const source = new SyntheticFileSource('/a.mp4', 25, 3);
    const reader = new ChunkReader(await source.open(), 25, 10);
    const ranges = [...reader.ranges()];
    const third = ranges[2];
    if (!third) throw new Error('expected three ranges');

    const bytes = await reader.read(third);

    expect(bytes).toEqual(source.expectedBytes(20, 5));
    expect(source.reads).toEqual([{ position: 20, length: 5 }]);
  });

  it('should fail a short read with an IoError', async () => {
    const source = new SyntheticFileSource('/shrinking.mp4', 25);
    const reader = new ChunkReader(await source.open(), 25, 10, '/shrinking.mp4');
    source.resize(15);

    const ranges = [...reader.ranges()];
    const second = ranges[1];
    if (!second) throw new Error('expected a second range');

    await expect(reader.read(second)).rejects.toThrow(
      '/shrinking.mp4 ended early: expected 10 bytes at offset 10, read 5'
    );
    await expect(reader.read(second)).rejects.toBeInstanceOf(IoError);
  });

  it('should reject an invalid part size', async () => {
    const source = new SyntheticFileSource('/a.mp4', 25);
    const handle = await source.open();

    expect(() => new ChunkReader(handle, 25, 0)).toThrow(ProtocolInvariantError);
  });
});
