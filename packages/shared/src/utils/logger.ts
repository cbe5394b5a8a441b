/**
 * Logger utility
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  homeserver?: string;
  roomId?: string;
  transactionId?: string;
  [key: string]: unknown;
}

/**
 * Receives one serialized log entry per call
 */
export type LogSink = (line: string) => void;

// stdout is reserved for the single OK line
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  private level: LogLevel;
  private context: LogContext;
  private sink: LogSink;

  constructor(context: LogContext = {}, level: LogLevel = LogLevel.WARN, sink: LogSink = stderrSink) {
    this.context = context;
    this.level = level;
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    const levels = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
    return levels.indexOf(level) >= levels.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const logEntry = {
      timestamp,
      level,
      message,
      ...this.context,
      ...meta,
    };
    return JSON.stringify(logEntry);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(level, message, meta));
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context }, this.level, this.sink);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export function createLogger(context?: LogContext, level?: LogLevel, sink?: LogSink): Logger {
  return new Logger(context, level, sink);
}
