/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
  withLogging,
} from './logger';
export type {
  LogContext,
  LoggerConfig,
  DomainLogMethods,
  StructuredLogger,
} from './logger';
