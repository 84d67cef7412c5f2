/**
 * File sources that never touch the disk
 * @module media-uploader/testing/sources
 */

import { IoError } from '../errors/index.js';
import type { FileSource, SourceHandle } from '../source/index.js';

/**
 * Deterministic byte at `position` for a given seed
 */
export function syntheticByte(position: number, seed = 0): number {
  return (position * 31 + seed * 7 + (position >>> 8)) & 0xff;
}

/**
 * Produces `length` synthetic bytes starting at `position`
 */
export function syntheticBytes(position: number, length: number, seed = 0): Uint8Array {
  const bytes = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = syntheticByte(position + i, seed);
  }
  return bytes;
}

/**
 * Shared bookkeeping for in-memory sources
 */
abstract class TrackedSource implements FileSource {
  openCount = 0;
  closeCount = 0;
  readonly reads: Array<{ position: number; length: number }> = [];
  failOpen?: Error;

  constructor(readonly path: string) {}

  /** Handles opened and not yet closed */
  get openHandles(): number {
    return this.openCount - this.closeCount;
  }

  abstract size(): Promise<number>;

  protected abstract bytesAt(position: number, length: number): Uint8Array;

  async open(): Promise<SourceHandle> {
    if (this.failOpen) {
      throw IoError.openFailed(this.path, this.failOpen);
    }
    this.openCount++;

    let closed = false;
    return {
      size: () => this.size(),
      read: async (position, length) => {
        this.reads.push({ position, length });
        const total = await this.size();
        const end = Math.min(total, position + length);
        return this.bytesAt(position, Math.max(0, end - position));
      },
      readAll: async () => this.bytesAt(0, await this.size()),
      close: async () => {
        if (closed) return;
        closed = true;
        this.closeCount++;
      },
    };
  }
}

/**
 * Source of any size whose content is computed on demand.
 * `resize` changes the reported size, as if the file were being written.
 */
export class SyntheticFileSource extends TrackedSource {
  private currentSize: number;

  constructor(
    path: string,
    size: number,
    private readonly seed = 0
  ) {
    super(path);
    this.currentSize = size;
  }

  resize(size: number): void {
    this.currentSize = size;
  }

  async size(): Promise<number> {
    return this.currentSize;
  }

  /** The content this source serves */
  expectedBytes(position = 0, length = this.currentSize - position): Uint8Array {
    return syntheticBytes(position, length, this.seed);
  }

  protected bytesAt(position: number, length: number): Uint8Array {
    return syntheticBytes(position, length, this.seed);
  }
}

/**
 * Source backed by a buffer
 */
export class MemoryFileSource extends TrackedSource {
  constructor(
    path: string,
    private readonly data: Uint8Array
  ) {
    super(path);
  }

  async size(): Promise<number> {
    return this.data.length;
  }

  protected bytesAt(position: number, length: number): Uint8Array {
    return this.data.slice(position, position + length);
  }
}
