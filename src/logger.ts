/**
 * @zlframe/core — structured logging
 *
 * Sessions and compressors log lifecycle events and engine failures through
 * a Logger. The default is a no-op logger; pass a StructuredLogger (or
 * anything implementing Logger) in the session/compressor options to see them.
 */

// ─── Levels ───────────────────────────────────────────────────────────────────

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export type LogContext = Record<string, unknown>;

export const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  silent: 0,
  error:  1,
  warn:   2,
  info:   3,
  debug:  4,
};

export function isLogLevelEnabled(configured: LogLevel, candidate: LogLevel): boolean {
  if (configured === 'silent' || candidate === 'silent') {
    return false;
  }
  return LOG_LEVEL_PRIORITY[candidate] <= LOG_LEVEL_PRIORITY[configured];
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/** Parse a level name; anything unrecognised yields `fallback`. */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return fallback;
}

// ─── Logger ───────────────────────────────────────────────────────────────────

export interface Logger {
  readonly level: LogLevel;
  child(bindings: LogContext): Logger;
  isLevelEnabled(level: LogLevel): boolean;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export interface LogRecord {
  readonly timestamp: string;
  readonly level:     Exclude<LogLevel, 'silent'>;
  readonly message:   string;
  readonly context?:  LogContext;
}

export interface StructuredLoggerConfig {
  level:     LogLevel;
  sink:      (record: LogRecord) => void;
  bindings?: LogContext;
  nowIso?:   () => string;
}

export class StructuredLogger implements Logger {
  readonly level: LogLevel;
  private readonly bindings: LogContext;
  private readonly sink:     (record: LogRecord) => void;
  private readonly nowIso:   () => string;

  constructor(config: StructuredLoggerConfig) {
    this.level    = config.level;
    this.bindings = { ...(config.bindings ?? {}) };
    this.sink     = config.sink;
    this.nowIso   = config.nowIso ?? (() => new Date().toISOString());
  }

  child(bindings: LogContext): Logger {
    return new StructuredLogger({
      level:    this.level,
      sink:     this.sink,
      nowIso:   this.nowIso,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return isLogLevelEnabled(this.level, level);
  }

  error(message: string, context?: LogContext): void { this.emit('error', message, context); }
  warn(message: string, context?: LogContext): void  { this.emit('warn',  message, context); }
  info(message: string, context?: LogContext): void  { this.emit('info',  message, context); }
  debug(message: string, context?: LogContext): void { this.emit('debug', message, context); }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const merged = { ...this.bindings, ...(context ?? {}) };
    this.sink({
      timestamp: this.nowIso(),
      level,
      message,
      context: Object.keys(merged).length > 0 ? merged : undefined,
    });
  }
}

// ─── No-op ────────────────────────────────────────────────────────────────────

class NoopLogger implements Logger {
  readonly level: LogLevel = 'silent';

  child(): Logger {
    return this;
  }

  isLevelEnabled(): boolean {
    return false;
  }

  error(): void {
    // noop
  }

  warn(): void {
    // noop
  }

  info(): void {
    // noop
  }

  debug(): void {
    // noop
  }
}

const noopLogger = new NoopLogger();

export function createNoopLogger(): Logger {
  return noopLogger;
}

// ─── Stream logger ────────────────────────────────────────────────────────────

export type LogFormat = 'pretty' | 'json';

export interface StreamLoggerConfig {
  /** Defaults to ZLFRAME_LOG_LEVEL, then 'warn'. */
  level?:  LogLevel;
  /** Defaults to ZLFRAME_LOG_FORMAT, then 'pretty'. */
  format?: LogFormat;
  stream?: NodeJS.WritableStream;
  nowIso?: () => string;
}

export function createStreamLogger(config: StreamLoggerConfig = {}): Logger {
  const level = config.level ?? resolveLogLevel(process.env.ZLFRAME_LOG_LEVEL, 'warn');
  if (level === 'silent') {
    return createNoopLogger();
  }

  const format = config.format ?? resolveLogFormat(process.env.ZLFRAME_LOG_FORMAT);
  const stream = config.stream ?? process.stderr;

  return new StructuredLogger({
    level,
    nowIso: config.nowIso,
    sink:   (record) => {
      stream.write(renderRecord(record, format));
    },
  });
}

function resolveLogFormat(value: string | undefined): LogFormat {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'json' ? 'json' : 'pretty';
}

/** One line per record. `scope` is lifted out of the context in pretty mode. */
export function renderRecord(record: LogRecord, format: LogFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(record)}\n`;
  }

  const { scope, ...rest } = record.context ?? {};
  const scopeText = typeof scope === 'string' && scope.length > 0 ? ` ${scope}` : '';
  const details   = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const level     = record.level.toUpperCase().padEnd(5, ' ');
  return `[${record.timestamp}] ${level}${scopeText} ${record.message}${details}\n`;
}
