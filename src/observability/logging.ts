/**
 * Logging for the media uploader.
 *
 * A small structured logger interface with console, no-op and in-memory
 * implementations. Presigned URLs carry signatures in their query
 * strings, so URL-valued context is logged without the query.
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Sensitive fields to redact from logs.
 */
const SENSITIVE_FIELDS = new Set([
  'apikey',
  'api_key',
  'x-api-key',
  'authorization',
  'secret',
  'password',
  'token',
]);

function stripQuery(value: string): string {
  if (!/^https?:\/\//i.test(value)) return value;
  const index = value.indexOf('?');
  return index === -1 ? value : `${value.slice(0, index)}?[REDACTED]`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields and presigned query strings from an object.
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      result[key] = stripQuery(value);
    } else if (isRecord(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly format: 'json' | 'pretty';

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    format?: 'json' | 'pretty';
  } = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = redactSensitive({ ...this.context, ...context });
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();

    if (this.format === 'json') {
      console.log(JSON.stringify({ timestamp, level: levelName, message, ...mergedContext }));
    } else {
      const contextStr = Object.keys(mergedContext).length > 0
        ? ` ${JSON.stringify(mergedContext)}`
        : '';
      console.log(`[${timestamp}] ${levelName}: ${message}${contextStr}`);
    }
  }
}

/**
 * No-op logger, the default when none is configured.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(_context: Record<string, unknown>): Logger { return this; }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

/**
 * In-memory logger for testing. Children share the parent's entries.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.addLog(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }

  private addLog(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.entries.push({
      level,
      message,
      context: redactSensitive({ ...this.context, ...context }),
      timestamp: new Date(),
    });
  }
}
