export {
  DEFAULT_CONTENT_TYPE,
  resolveContentType,
  isSupportedMediaFile,
  supportedExtensions,
} from './resolver.js';
