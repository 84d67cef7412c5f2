/**
 * Opaque file references consumed by the uploader
 * @module media-uploader/source/types
 */

/**
 * A file the uploader can size and open. The uploader opens it once per
 * upload and always closes the handle it gets back.
 */
export interface FileSource {
  /** Path or other identifier, used for naming and messages */
  readonly path: string;

  /** Current size in bytes */
  size(): Promise<number>;

  /** Acquires an exclusive read handle */
  open(): Promise<SourceHandle>;
}

/**
 * Open read handle on a {@link FileSource}
 */
export interface SourceHandle {
  /** Current size in bytes */
  size(): Promise<number>;

  /**
   * Reads up to `length` bytes at `position`. Returns fewer bytes only
   * when the end of the file is reached first.
   */
  read(position: number, length: number): Promise<Uint8Array>;

  /** Reads the whole file */
  readAll(): Promise<Uint8Array>;

  close(): Promise<void>;
}
