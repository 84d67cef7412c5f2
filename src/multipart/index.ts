/**
 * Multipart helpers: part ranges and part bookkeeping
 * @module media-uploader/multipart
 */

export { ChunkReader, countParts, type ChunkRange } from './chunk-reader.js';
export {
  validatePartsSequence,
  toCompletionPayload,
  type CompletedPartPayload,
} from './parts.js';
