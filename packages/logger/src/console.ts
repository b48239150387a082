import {
  type LogFn,
  type Logger,
  LOG_LEVEL_SEVERITY,
  LogLevel,
} from './types';

type ConsoleMethod = (...args: unknown[]) => void;

export class ConsoleLogger implements Logger {
  /**
   * Creates a new ConsoleLogger instance.
   *
   * @param data - Initial context data to include in all log messages
   * @param level - Minimum level that reaches the console
   */
  constructor(
    readonly data: object = {},
    readonly level: LogLevel = LogLevel.Info,
  ) {}

  /**
   * Creates a logging function that merges context data and adds timestamps.
   * Messages below the logger's level are dropped.
   */
  private createLogFn(level: LogLevel, logMethod: ConsoleMethod): LogFn {
    return <T extends object>(
      objOrMsg: T | string,
      msg?: string,
      ...args: unknown[]
    ): void => {
      if (LOG_LEVEL_SEVERITY[level] < LOG_LEVEL_SEVERITY[this.level]) {
        return;
      }

      const ts = Date.now();

      if (typeof objOrMsg === 'string') {
        logMethod({ ...this.data, ts }, objOrMsg, ...args);
        return;
      }

      const mergedData = { ...this.data, ...objOrMsg, ts };
      if (msg) {
        logMethod(mergedData, msg, ...args);
      } else {
        logMethod(mergedData, ...args);
      }
    };
  }

  debug: LogFn = this.createLogFn(LogLevel.Debug, console.debug.bind(console));
  info: LogFn = this.createLogFn(LogLevel.Info, console.info.bind(console));
  warn: LogFn = this.createLogFn(LogLevel.Warn, console.warn.bind(console));
  error: LogFn = this.createLogFn(LogLevel.Error, console.error.bind(console));
  /** Uses console.error */
  fatal: LogFn = this.createLogFn(LogLevel.Fatal, console.error.bind(console));
  trace: LogFn = this.createLogFn(LogLevel.Trace, console.trace.bind(console));

  /**
   * Creates a child logger with additional context data.
   * The child keeps the parent's level.
   *
   * @example
   * ```typescript
   * const parentLogger = new ConsoleLogger({ app: 'orders' });
   * const childLogger = parentLogger.child({ module: 'cassandra' });
   * childLogger.info({ keyspace: 'shop' }, 'Session opened');
   * // Context includes both { app: 'orders' } and { module: 'cassandra' }
   * ```
   */
  child(obj: object): Logger {
    return new ConsoleLogger(
      {
        ...this.data,
        ...obj,
      },
      this.level,
    );
  }
}

export const DEFAULT_LOGGER: Logger = new ConsoleLogger();
