/**
 * Pino logger that keeps Cassandra credentials out of log lines.
 *
 * Redaction is on by default: passwords, auth providers and the credentials
 * of client options are censored wherever they are logged.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@cqltrace/logger/pino';
 *
 * const logger = createLogger({ level: LogLevel.Debug });
 *
 * logger.debug({ options: { credentials: { username: 'app', password: 'test-secret' } } }, 'Client options');
 * // {"level":"DEBUG","options":{"credentials":"[Redacted]"},"msg":"Client options"}
 * ```
 *
 * @module
 */
import { type LoggerOptions, type Logger as PinoLogger, pino } from 'pino';
import { DEFAULT_REDACT_PATHS } from './redact-paths';
import { type CreateLoggerOptions, LogLevel, type RedactOptions } from './types';

export { DEFAULT_REDACT_PATHS };

export const REDACTION_CENSOR = '[Redacted]';

export interface ResolvedRedaction {
  paths: string[];
  censor: string | ((value: unknown, path: string[]) => unknown);
  remove?: boolean;
}

function withDefaults(paths: readonly string[]): string[] {
  return [...new Set([...DEFAULT_REDACT_PATHS, ...paths])];
}

/**
 * Turns the `redact` option into pino's redaction settings. Anything but
 * `false` keeps the credential paths unless `resolution: 'override'` asks
 * for the given paths alone.
 */
export function resolveRedactConfig(
  redact: boolean | RedactOptions = true,
): ResolvedRedaction | undefined {
  if (redact === false) {
    return undefined;
  }
  if (redact === true) {
    return { paths: withDefaults([]), censor: REDACTION_CENSOR };
  }
  if (Array.isArray(redact)) {
    return { paths: withDefaults(redact), censor: REDACTION_CENSOR };
  }

  return {
    paths:
      redact.resolution === 'override'
        ? [...redact.paths]
        : withDefaults(redact.paths),
    censor: redact.censor ?? REDACTION_CENSOR,
    remove: redact.remove,
  };
}

/**
 * Creates a pino logger for the driver and the instrumentation.
 *
 * @example
 * ```typescript
 * const cluster = new Cluster({
 *   hosts: ['127.0.0.1'],
 *   logger: createLogger({ pretty: true }),
 * });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): PinoLogger {
  const { destination, level = LogLevel.Info, pretty = false } = options;

  const loggerOptions: LoggerOptions = {
    level,
    redact: resolveRedactConfig(options.redact),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
  };

  if (pretty && !destination && process.env.NODE_ENV !== 'production') {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true, ignore: 'pid,hostname' },
    };
  }

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}
