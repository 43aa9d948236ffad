export type { Logger, LogLevel, LogContext, LoggableFailure } from './logging.js';
export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  logOperation,
  logFailure,
  logCancellation,
} from './logging.js';
