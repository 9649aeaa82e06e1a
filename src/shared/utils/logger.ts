/**
 * Structured Logging Utility
 * Colorized console logger with JSON metadata
 *
 * `logger.child({ callId })` returns a logger that stamps that context on
 * every line, so per-call code never repeats the call id.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogMeta = Record<string, unknown>;

const RESET = '\x1b[0m';
const GRAY = '\x1b[90m';

const levels: Record<LogLevel, { priority: number; color: string; write: (line: string) => void }> = {
  [LogLevel.DEBUG]: { priority: 0, color: GRAY, write: (line) => console.debug(line) },
  [LogLevel.INFO]: { priority: 1, color: '\x1b[34m', write: (line) => console.log(line) },
  [LogLevel.WARN]: { priority: 2, color: '\x1b[33m', write: (line) => console.warn(line) },
  [LogLevel.ERROR]: { priority: 3, color: '\x1b[31m', write: (line) => console.error(line) },
};

interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
}

/**
 * Parse a level name, falling back to INFO for anything unknown
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? LogLevel.INFO;
}

export function serializeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Errors anywhere at the top level of the metadata become plain objects
 */
function serializeErrors(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

export interface LogSink {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error | LogMeta): void;
  child(context: LogMeta): LogSink;
}

class Logger implements LogSink {
  private config: LoggerConfig = {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enableColors: process.env.NODE_ENV !== 'production',
    enableTimestamp: true,
  };

  private colorize(text: string, color: string): string {
    return this.config.enableColors ? `${color}${text}${RESET}` : text;
  }

  format(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(new Date().toISOString(), GRAY));
    }
    parts.push(this.colorize(level.toUpperCase().padEnd(5), levels[level].color));
    parts.push(message);
    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.colorize(JSON.stringify(meta), GRAY));
    }

    return parts.join(' ');
  }

  /**
   * Write one line; context keys come first and call-site keys win on clashes
   */
  write(level: LogLevel, message: string, context: LogMeta, meta?: LogMeta): void {
    if (levels[level].priority < levels[this.config.level].priority) {
      return;
    }
    levels[level].write(this.format(level, message, serializeErrors({ ...context, ...meta })));
  }

  debug(message: string, meta?: LogMeta): void {
    this.write(LogLevel.DEBUG, message, {}, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write(LogLevel.INFO, message, {}, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(LogLevel.WARN, message, {}, meta);
  }

  /**
   * Accepts either an Error or a metadata object
   */
  error(message: string, error?: Error | LogMeta): void {
    this.write(LogLevel.ERROR, message, {}, error instanceof Error ? { error } : error);
  }

  child(context: LogMeta): LogSink {
    return new ContextLogger(this, context);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setColors(enabled: boolean): void {
    this.config.enableColors = enabled;
  }

  setTimestamps(enabled: boolean): void {
    this.config.enableTimestamp = enabled;
  }
}

class ContextLogger implements LogSink {
  constructor(
    private readonly root: Logger,
    private readonly context: LogMeta
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.root.write(LogLevel.DEBUG, message, this.context, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.root.write(LogLevel.INFO, message, this.context, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.root.write(LogLevel.WARN, message, this.context, meta);
  }

  error(message: string, error?: Error | LogMeta): void {
    this.root.write(LogLevel.ERROR, message, this.context, error instanceof Error ? { error } : error);
  }

  child(context: LogMeta): LogSink {
    return new ContextLogger(this.root, { ...this.context, ...context });
  }
}

// Export singleton instance
export const logger = new Logger();

export { Logger };
