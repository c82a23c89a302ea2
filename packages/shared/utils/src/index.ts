// Shared utilities for memsift

export {
  ConsoleLogger,
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './logger.js';
