/**
 * Logging Module
 * @module logging
 *
 * Structured pino logging for the configuration pipeline.
 */

export {
  createLogger,
  createModuleLogger,
  extendWithDomainMethods,
  getLogger,
  resetLogger,
  sanitizeUrl,
  withLogging,
  type LogContext,
  type LoggerConfig,
  type StructuredLogger,
} from './logger';
