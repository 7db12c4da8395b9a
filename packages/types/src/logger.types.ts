/**
 * Interface describing the public contract of a Logger instance.
 */
export interface ILogger {
  debug: (message: string, metadata?: LogMetadata) => void;
  info: (message: string, metadata?: LogMetadata) => void;
  warn: (message: string, metadata?: LogMetadata) => void;
  error: (message: string | Error, metadata?: LogMetadata) => void;
}

/**
 * Logging levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * A structured log record handed to every configured sink.
 */
export interface LogRecord {
  level: LogLevel;
  message: string;
  metadata?: LogMetadata;
  timestamp: string;
}

/**
 * External collaborator receiving log records. It never feeds anything back into the bridge.
 */
export type LogSink = (record: LogRecord) => void;

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole: boolean;
  sinks: LogSink[];
}

/**
 * Interface for log entry metadata
 */
export interface LogMetadata {
  [key: string]: unknown;
}
