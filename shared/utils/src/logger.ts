/**
 * Logger used across the operator packages
 * Writes through the console; no transport dependency
 */

/**
 * Log levels
 */
export enum LogLevel {
  SILLY = 0,
  VERBOSE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  NONE = 6, // Silent mode - no output
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  useStderr?: boolean;
}

/**
 * Logger implementation with Component Interface Standardization pattern
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: string | undefined;
  private readonly useStderr: boolean;

  private constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context ?? undefined;
    this.useStderr = options.useStderr ?? false;
  }

  /**
   * Create a logger instance
   */
  public static createFresh(options?: LoggerOptions): Logger {
    return new Logger(options);
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  private formatMessage(message: string): string {
    const timestamp = new Date().toISOString();
    return this.context
      ? `[${timestamp}] [${this.context}] ${message}`
      : `[${timestamp}] ${message}`;
  }

  /**
   * Route a message to the console. With useStderr every level goes to
   * stderr, keeping stdout free for rendered output.
   */
  private write(
    method: "debug" | "info" | "warn" | "error",
    message: string,
    args: unknown[],
  ): void {
    const formatted = this.formatMessage(message);
    if (this.useStderr) {
      console.error(formatted, ...args);
      return;
    }
    console[method](formatted, ...args);
  }

  public silly(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.SILLY) {
      this.write("debug", message, args);
    }
  }

  public verbose(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.VERBOSE) {
      this.write("debug", message, args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write("debug", message, args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      this.write("info", message, args);
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      this.write("warn", message, args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      this.write("error", message, args);
    }
  }

  /**
   * Create a child logger with a specific context
   */
  public child(context: string): Logger {
    return Logger.createFresh({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      useStderr: this.useStderr,
    });
  }
}

/**
 * Parse a level name as given to --log-level
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.toLowerCase()) {
    case "silly":
      return LogLevel.SILLY;
    case "verbose":
      return LogLevel.VERBOSE;
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    case "none":
      return LogLevel.NONE;
    default:
      return undefined;
  }
}
