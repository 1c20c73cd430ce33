/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the configuration pipeline.
 * Includes domain-specific logging methods for sources, parsing,
 * scope resolution, expansion, and graph construction.
 */

import pino, { DestinationStream, LogFn, Logger, LoggerOptions } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  runId?: string;
  module?: string;
  stage?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Pino logger with pipeline-specific event methods
 */
export interface StructuredLogger {
  readonly pino: Logger;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child(bindings: LogContext): StructuredLogger;

  // Source methods
  sourceFetchStarted(locator: string, ref?: string | null): void;
  sourceFetchCompleted(locator: string, duration: number): void;
  sourceFetchFailed(locator: string, error: Error): void;
  sourceLoaded(locator: string, moduleCount: number, fileCount: number): void;

  // Parser methods
  parserCompleted(filePath: string, duration: number, blockCount: number): void;
  parserFailed(filePath: string, error: Error): void;

  // Resolution methods
  resolutionPass(pass: number, changedModules: readonly string[]): void;
  scopeResolved(modulePath: string, variableCount: number, localCount: number): void;

  // Expansion and graph methods
  instancesExpanded(resourceCount: number, instanceCount: number): void;
  graphBuilt(nodeCount: number, edgeCount: number, duration?: number): void;
  pipelineCompleted(duration: number, instanceCount: number, diagnosticCount: number): void;

  // Performance methods
  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

// ============================================================================
// Default Configuration
// ============================================================================

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.LOG_PRETTY === 'true',
  redact: [
    'password',
    'token',
    'authorization',
    'secret',
    'accessToken',
    'access_token',
    'privateKey',
    'private_key',
  ],
  service: process.env.SERVICE_NAME || 'infragraph',
  version: process.env.SERVICE_VERSION || '0.1.0',
  environment: process.env.NODE_ENV || 'development',
};

// ============================================================================
// Redaction Utilities
// ============================================================================

function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

/**
 * Sanitizes a URL by removing credentials
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      parsed.username = '[REDACTED]';
      parsed.password = '';
    }
    return parsed.toString();
  } catch {
    // Not a URL (scp-style git address or local path)
    return url.replace(/\/\/[^:/@]+:[^@]+@/, '//[REDACTED]@');
  }
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Wraps a Pino logger with pipeline-specific methods
 */
export function extendWithDomainMethods(logger: Logger): StructuredLogger {
  return {
    pino: logger,
    trace: logger.trace.bind(logger),
    debug: logger.debug.bind(logger),
    info: logger.info.bind(logger),
    warn: logger.warn.bind(logger),
    error: logger.error.bind(logger),

    child(bindings: LogContext): StructuredLogger {
      return extendWithDomainMethods(logger.child(bindings));
    },

    sourceFetchStarted(locator, ref) {
      logger.info(
        { event: 'source_fetch_started', locator: sanitizeUrl(locator), ref },
        `Fetching source${ref ? ` at ${ref}` : ''}`
      );
    },

    sourceFetchCompleted(locator, duration) {
      logger.info(
        { event: 'source_fetch_completed', locator: sanitizeUrl(locator), durationMs: duration },
        `Source fetched in ${duration}ms`
      );
    },

    sourceFetchFailed(locator, error) {
      logger.error(
        {
          event: 'source_fetch_failed',
          locator: sanitizeUrl(locator),
          err: error,
          errorCode: errorCode(error),
        },
        `Source fetch failed: ${error.message}`
      );
    },

    sourceLoaded(locator, moduleCount, fileCount) {
      logger.info(
        { event: 'source_loaded', locator: sanitizeUrl(locator), moduleCount, fileCount },
        `Loaded ${fileCount} files in ${moduleCount} modules`
      );
    },

    parserCompleted(filePath, duration, blockCount) {
      logger.debug(
        { event: 'parser_completed', filePath, durationMs: duration, blockCount },
        `Parsed ${filePath}: ${blockCount} blocks in ${duration.toFixed(2)}ms`
      );
    },

    parserFailed(filePath, error) {
      logger.warn(
        { event: 'parser_failed', filePath, err: error, errorCode: errorCode(error) },
        `Parser failed for ${filePath}: ${error.message}`
      );
    },

    resolutionPass(pass, changedModules) {
      logger.debug(
        { event: 'resolution_pass', pass, changedModules, changedCount: changedModules.length },
        `Resolution pass ${pass}: ${changedModules.length} scopes changed`
      );
    },

    scopeResolved(modulePath, variableCount, localCount) {
      logger.debug(
        { event: 'scope_resolved', modulePath, variableCount, localCount },
        `Scope '${modulePath || '<root>'}' resolved`
      );
    },

    instancesExpanded(resourceCount, instanceCount) {
      logger.debug(
        { event: 'instances_expanded', resourceCount, instanceCount },
        `Expanded ${resourceCount} resources into ${instanceCount} instances`
      );
    },

    graphBuilt(nodeCount, edgeCount, duration) {
      logger.info(
        {
          event: 'graph_built',
          nodeCount,
          edgeCount,
          durationMs: duration,
          avgEdgesPerNode: nodeCount > 0 ? (edgeCount / nodeCount).toFixed(2) : 0,
        },
        `Graph built: ${nodeCount} nodes, ${edgeCount} edges`
      );
    },

    pipelineCompleted(duration, instanceCount, diagnosticCount) {
      logger.info(
        { event: 'pipeline_completed', durationMs: duration, instanceCount, diagnosticCount },
        `Pipeline completed in ${duration}ms`
      );
    },

    performanceMetric(operation, duration, metadata) {
      logger.debug(
        { event: 'performance_metric', operation, durationMs: duration, ...metadata },
        `${operation}: ${duration}ms`
      );
    },
  };
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<Pick<LoggerConfig, 'level' | 'pretty'>> = {}
): StructuredLogger {
  const config = { ...defaultConfig };

  if (process.env.LOG_LEVEL) {
    config.level = process.env.LOG_LEVEL;
  }
  Object.assign(config, overrides);

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    try {
      destination = pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          messageFormat: '{msg}',
        },
      });
    } catch {
      // pino-pretty not resolvable, fall back to JSON lines
      destination = undefined;
    }
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('infragraph');
  }
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}

/**
 * Wraps an async function with timing and logging
 */
export function withLogging<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  return fn()
    .then((result) => {
      logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
      return result;
    })
    .catch((error: unknown) => {
      logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
      throw error;
    });
}
