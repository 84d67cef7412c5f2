/**
 * Content type resolution from media filenames
 * @module media-uploader/mime/resolver
 */

/**
 * Fallback for anything outside the media table
 */
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Extensions accepted by the upload backend and the content type it
 * stores them under. `.m4a` is stored as `audio/mp4`.
 */
const MEDIA_TYPES: ReadonlyArray<readonly [suffix: string, contentType: string]> = [
  ['.mp3', 'audio/mpeg'],
  ['.m4a', 'audio/mp4'],
  ['.wav', 'audio/wav'],
  ['.mp4', 'video/mp4'],
];

/**
 * Maps a filename to its content type by case-insensitive suffix match.
 *
 * @example
 * ```typescript
 * resolveContentType('clip.M4A'); // 'audio/mp4'
 * resolveContentType('notes.xyz'); // 'application/octet-stream'
 * ```
 */
export function resolveContentType(filename: string): string {
  const lower = filename.toLowerCase();
  for (const [suffix, contentType] of MEDIA_TYPES) {
    if (lower.endsWith(suffix)) {
      return contentType;
    }
  }
  return DEFAULT_CONTENT_TYPE;
}

/**
 * Whether the backend will accept this file (it answers 415 otherwise)
 */
export function isSupportedMediaFile(filename: string): boolean {
  return resolveContentType(filename) !== DEFAULT_CONTENT_TYPE;
}

/**
 * Suffixes in the media table, for file pickers
 */
export function supportedExtensions(): string[] {
  return MEDIA_TYPES.map(([suffix]) => suffix.slice(1));
}
