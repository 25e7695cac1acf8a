/**
 * Logger abstraction for the descriptor compiler
 * Provides consistent logging interface across the pipeline stages
 */

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  VERBOSE = 4
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'verbose';

/**
 * Map string log level to LogLevel enum
 */
export const LOG_LEVEL_MAP: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  verbose: LogLevel.VERBOSE
};

/**
 * Console-shaped destination for log lines (a build tool's reporter, or `console`)
 */
export interface LogSink {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  log(message: string): void;
}

export interface LogContext {
  file?: string;
  fullName?: string;
  stage?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Logger class for consistent logging
 */
export class Logger {
  private sink: LogSink | null = null;
  private level: LogLevel = LogLevel.WARN;
  private verboseLogging: boolean = false;

  /**
   * Initialize the logger with a sink
   * @param sink - Destination for log lines; `console` when null
   * @param level - The log level to use
   * @param verboseLogging - Log every stage step regardless of level
   */
  initialize(sink: LogSink | null, level: LogLevel = LogLevel.WARN, verboseLogging: boolean = false): void {
    this.sink = sink;
    this.level = level;
    this.verboseLogging = verboseLogging;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setVerboseLogging(enabled: boolean): void {
    this.verboseLogging = enabled;
    if (enabled) {
      this.info('Verbose logging enabled - every pipeline step will be logged');
    }
  }

  isVerboseLoggingEnabled(): boolean {
    return this.verboseLogging;
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.error(formatted);
      } else {
        console.error(formatted);
      }
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.warn(formatted);
      } else {
        console.warn(formatted);
      }
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.info(formatted);
      } else {
        console.info(formatted);
      }
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.log(formatted);
      } else {
        console.debug(formatted);
      }
    }
  }

  /**
   * Verbose messages are only shown when verbose logging is enabled
   */
  verbose(message: string, ...args: unknown[]): void {
    if (this.verboseLogging || this.level >= LogLevel.VERBOSE) {
      const formatted = this.format(message, args);
      if (this.sink) {
        this.sink.log(`[VERBOSE] ${formatted}`);
      } else {
        console.log(`[VERBOSE] ${formatted}`);
      }
    }
  }

  /**
   * Log a verbose message with stage context
   */
  verboseWithContext(message: string, context: LogContext): void {
    if (!this.verboseLogging && this.level < LogLevel.VERBOSE) {
      return;
    }

    const parts: string[] = [`[VERBOSE] ${message}`, ...this.describeContext(context)];

    for (const [key, value] of Object.entries(context)) {
      if (!['file', 'fullName', 'stage', 'duration'].includes(key)) {
        try {
          parts.push(`${key}: ${typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
        } catch {
          parts.push(`${key}: [unserializable]`);
        }
      }
    }

    const formatted = parts.join(' | ');
    if (this.sink) {
      this.sink.log(formatted);
    } else {
      console.log(formatted);
    }
  }

  /**
   * Log an error with context
   */
  errorWithContext(message: string, context: LogContext & { error?: unknown }): void {
    const parts: string[] = [message, ...this.describeContext(context)];

    if (context.error) {
      const errorMessage = context.error instanceof Error
        ? context.error.message
        : String(context.error);
      parts.push(`Error: ${errorMessage}`);
      if (this.verboseLogging && context.error instanceof Error && context.error.stack) {
        parts.push(`Stack: ${context.error.stack}`);
      }
    }

    this.error(parts.join(' | '));
  }

  private describeContext(context: LogContext): string[] {
    const parts: string[] = [];
    if (context.stage) {
      parts.push(`Stage: ${context.stage}`);
    }
    if (context.fullName) {
      parts.push(`Name: ${context.fullName}`);
    }
    if (context.file) {
      parts.push(`File: ${context.file}`);
    }
    if (context.duration !== undefined) {
      parts.push(`Duration: ${context.duration}ms`);
    }
    return parts;
  }

  private format(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }
    try {
      return `${message} ${args.map(arg =>
        typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
      ).join(' ')}`;
    } catch {
      return `${message} [Error formatting arguments]`;
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
