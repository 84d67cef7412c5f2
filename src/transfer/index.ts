/**
 * Storage transfers
 * @module media-uploader/transfer
 */

export {
  TransferExecutor,
  type StorageTarget,
  type PutBytesOptions,
  type PutBytesResult,
} from './executor.js';
