export { ConsoleLogger, DEFAULT_LOGGER } from './console';
export { DEFAULT_REDACT_PATHS } from './redact-paths';
export {
  type CreateLoggerOptions,
  type LogFn,
  type Logger,
  LOG_LEVEL_SEVERITY,
  LogLevel,
  type RedactOptions,
} from './types';
