/**
 * Forward-only part ranges over an open file
 * @module media-uploader/multipart/chunk-reader
 */

import { IoError, ProtocolInvariantError } from '../errors/index.js';
import type { SourceHandle } from '../source/index.js';

/**
 * Byte range of one part
 */
export interface ChunkRange {
  /** 1-based */
  readonly partNumber: number;
  readonly offset: number;
  readonly length: number;
}

/**
 * Number of parts a file of `totalSize` bytes splits into
 */
export function countParts(totalSize: number, partSize: number): number {
  assertPartSize(partSize);
  return Math.ceil(totalSize / partSize);
}

function assertPartSize(partSize: number): void {
  if (!Number.isSafeInteger(partSize) || partSize <= 0) {
    throw new ProtocolInvariantError({
      message: `Part size must be a positive integer, got ${partSize}`,
      code: 'INVALID_PART_SIZE',
      details: { partSize },
    });
  }
}

/**
 * Reads a file one part at a time.
 *
 * Ranges start at offset 0, each spans `min(partSize, remaining)` bytes,
 * and the last one ends exactly at `totalSize`. Each `read` returns a
 * fresh buffer, so callers holding one part at a time never keep more
 * than a single part in memory.
 */
export class ChunkReader {
  constructor(
    private readonly handle: SourceHandle,
    readonly totalSize: number,
    readonly partSize: number,
    private readonly path = 'source'
  ) {
    assertPartSize(partSize);
    if (!Number.isSafeInteger(totalSize) || totalSize < 0) {
      throw new ProtocolInvariantError({
        message: `Total size must be a non-negative integer, got ${totalSize}`,
        code: 'INVALID_TOTAL_SIZE',
        details: { totalSize },
      });
    }
  }

  get partCount(): number {
    return countParts(this.totalSize, this.partSize);
  }

  *ranges(): Generator<ChunkRange, void, undefined> {
    let offset = 0;
    let partNumber = 1;
    while (offset < this.totalSize) {
      const length = Math.min(this.partSize, this.totalSize - offset);
      yield { partNumber, offset, length };
      offset += length;
      partNumber++;
    }
  }

  /**
   * Reads exactly `range.length` bytes at `range.offset`
   *
   * @throws {IoError} If the file ends before the range does
   */
  async read(range: ChunkRange): Promise<Uint8Array> {
    const bytes = await this.handle.read(range.offset, range.length);
    if (bytes.length !== range.length) {
      throw IoError.shortRead(this.path, range.offset, range.length, bytes.length);
    }
    return bytes;
  }
}
