/**
 * Local filesystem source backed by node:fs/promises
 * @module media-uploader/source/local
 */

import { open, stat, type FileHandle } from 'node:fs/promises';
import { IoError } from '../errors/index.js';
import type { FileSource, SourceHandle } from './types.js';

/**
 * A file on the local disk
 */
export class LocalFileSource implements FileSource {
  constructor(readonly path: string) {}

  async size(): Promise<number> {
    try {
      const stats = await stat(this.path);
      return stats.size;
    } catch (error) {
      throw IoError.openFailed(this.path, error);
    }
  }

  async open(): Promise<SourceHandle> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'r');
    } catch (error) {
      throw IoError.openFailed(this.path, error);
    }
    return new LocalSourceHandle(this.path, handle);
  }
}

class LocalSourceHandle implements SourceHandle {
  private closed = false;

  constructor(
    private readonly path: string,
    private readonly handle: FileHandle
  ) {}

  async size(): Promise<number> {
    try {
      const stats = await this.handle.stat();
      return stats.size;
    } catch (error) {
      throw IoError.readFailed(this.path, error);
    }
  }

  async read(position: number, length: number): Promise<Uint8Array> {
    const buffer = Buffer.alloc(length);
    let filled = 0;

    try {
      while (filled < length) {
        const { bytesRead } = await this.handle.read(buffer, filled, length - filled, position + filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
    } catch (error) {
      throw IoError.readFailed(this.path, error);
    }

    return filled === length ? buffer : buffer.subarray(0, filled);
  }

  async readAll(): Promise<Uint8Array> {
    try {
      return await this.handle.readFile();
    } catch (error) {
      throw IoError.readFailed(this.path, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
