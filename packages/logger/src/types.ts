/**
 * Logging function type that supports both structured and simple logging.
 * Can be called with an object for structured logging or just a message string.
 *
 * @example
 * ```typescript
 * // Structured logging with context object
 * logger.info({ host: '10.0.0.1', keyspace: 'shop' }, 'Connected');
 *
 * // Simple string logging
 * logger.info('Session closed');
 * ```
 */
export type LogFn = {
  /** Structured logging with context object, optional message, and additional arguments */
  <T extends object>(obj: T, msg?: string, ...args: unknown[]): void;
  /** Simple string logging */
  (msg: string): void;
};

/**
 * Standard logger interface with multiple log levels and child logger support.
 * Both the console logger and pino satisfy it.
 */
export interface Logger {
  /** Debug level logging - verbose information for debugging */
  debug: LogFn;
  /** Info level logging - general informational messages */
  info: LogFn;
  /** Warning level logging - potentially harmful situations */
  warn: LogFn;
  /** Error level logging - error events that might still allow the application to continue */
  error: LogFn;
  /** Fatal level logging - severe errors that will likely cause the application to abort */
  fatal: LogFn;
  /** Trace level logging - most detailed information */
  trace: LogFn;
  /**
   * Creates a child logger with additional context.
   * Child loggers inherit parent context and add their own.
   */
  child(obj: object): Logger;
}

export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Fatal = 'fatal',
  Silent = 'silent',
}

/**
 * Numeric severity of each level; a message is emitted when its severity is
 * at least the logger's threshold.
 */
export const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Trace]: 10,
  [LogLevel.Debug]: 20,
  [LogLevel.Info]: 30,
  [LogLevel.Warn]: 40,
  [LogLevel.Error]: 50,
  [LogLevel.Fatal]: 60,
  [LogLevel.Silent]: Number.POSITIVE_INFINITY,
};

/**
 * Redaction settings for the pino logger.
 *
 * `resolution: 'merge'` (the default) adds `paths` to the default paths,
 * `resolution: 'override'` uses `paths` alone.
 */
export type RedactOptions =
  | string[]
  | {
      paths: string[];
      censor?: string | ((value: unknown, path: string[]) => unknown);
      remove?: boolean;
      resolution?: 'merge' | 'override';
    };

export type CreateLoggerOptions = {
  /** Pretty print through pino-pretty; ignored in production and with a destination */
  pretty?: boolean;
  /** @default LogLevel.Info */
  level?: LogLevel;
  /** Credential redaction, on unless set to `false` */
  redact?: boolean | RedactOptions;
  /** Stream receiving the JSON lines instead of stdout */
  destination?: { write(msg: string): void };
};
