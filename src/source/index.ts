/**
 * File sources for the media uploader
 * @module media-uploader/source
 */

export type { FileSource, SourceHandle } from './types.js';
export { LocalFileSource } from './local.js';
