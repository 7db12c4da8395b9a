import { LogLevel } from "@hostbridge/types";
import type { ILogger, LoggerConfig, LogMetadata, LogRecord, LogSink } from "@hostbridge/types";

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

// Looked up per call so console spies installed after import still see the output
function consoleMethod(level: LogLevel): (...args: unknown[]) => void {
  switch (level) {
    case LogLevel.DEBUG:
      return console.debug;
    case LogLevel.INFO:
      return console.info;
    case LogLevel.WARN:
      return console.warn;
    case LogLevel.ERROR:
      return console.error;
  }
}

/**
 * Logging service shared by every bridge instance in the process
 */
export class Logger implements ILogger {
  private static instance: Logger;
  private config: LoggerConfig;

  private constructor() {
    // Default configuration
    this.config = {
      minLevel: LogLevel.INFO,
      enableConsole: true,
      sinks: [],
    };
  }

  /**
   * Get the singleton instance of the logger
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Configure the logger
   */
  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /**
   * Attach a sink and return a function that detaches it again
   */
  public addSink(sink: LogSink): () => void {
    this.config = { ...this.config, sinks: [...this.config.sinks, sink] };
    return () => {
      this.config = { ...this.config, sinks: this.config.sinks.filter((s) => s !== sink) };
    };
  }

  /**
   * Check if the given log level should be logged
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.minLevel);
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const timestamp = new Date().toISOString();

    if (this.config.enableConsole) {
      const line = `[${timestamp}] ${message}`;
      // Pass metadata object separately if it exists
      const print = consoleMethod(level);
      if (metadata) {
        print(line, metadata);
      } else {
        print(line);
      }
    }

    if (this.config.sinks.length === 0) return;

    const record: LogRecord = metadata
      ? { level, message, metadata, timestamp }
      : { level, message, timestamp };
    for (const sink of this.config.sinks) {
      try {
        sink(record);
      } catch (error) {
        // A broken sink must not take the others (or the caller) down with it
        if (this.config.enableConsole) {
          console.error(`[${timestamp}] [Logger] Sink threw while handling a record`, { error });
        }
      }
    }
  }

  /**
   * Log a debug message
   */
  public debug(message: string, metadata?: LogMetadata): void {
    this.write(LogLevel.DEBUG, message, metadata);
  }

  /**
   * Log an info message
   */
  public info(message: string, metadata?: LogMetadata): void {
    this.write(LogLevel.INFO, message, metadata);
  }

  /**
   * Log a warning message
   */
  public warn(message: string, metadata?: LogMetadata): void {
    this.write(LogLevel.WARN, message, metadata);
  }

  /**
   * Log an error message
   */
  public error(message: string | Error, metadata?: LogMetadata): void {
    if (message instanceof Error) {
      this.write(LogLevel.ERROR, message.message, { ...metadata, stack: message.stack });
      return;
    }
    this.write(LogLevel.ERROR, message, metadata);
  }
}

// Export a singleton instance
export const logger = Logger.getInstance();
