/**
 * Observability components for the media uploader
 */

export {
  LogLevel,
  type Logger,
  type LogEntry,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  redactSensitive,
} from './logging.js';
