/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Pipeline error taxonomy. Source and parse failures are fatal for the
 * whole run; cyclic locals are scoped to one module and are turned into
 * diagnostics by the resolver.
 */

import { BaseError, ErrorContext } from './base';
import {
  ConfigErrorCodes,
  ErrorCode,
  ParserErrorCodes,
  ResolutionErrorCodes,
  SourceErrorCodes,
} from './codes';

// ============================================================================
// Source Errors
// ============================================================================

/**
 * A source locator or variable file could not be fetched or read
 */
export class SourceUnavailableError extends BaseError {
  public readonly locator: string;

  constructor(
    locator: string,
    reason: string,
    code: ErrorCode = SourceErrorCodes.SOURCE_UNAVAILABLE,
    context: ErrorContext = {}
  ) {
    super(`Source unavailable: ${locator}: ${reason}`, code, {
      ...context,
      details: { ...context.details, locator },
    });
    this.name = 'SourceUnavailableError';
    this.locator = locator;
  }

  static timeout(locator: string, timeoutMs: number): SourceUnavailableError {
    return new SourceUnavailableError(
      locator,
      `fetch timed out after ${timeoutMs}ms`,
      SourceErrorCodes.SOURCE_TIMEOUT,
      { details: { timeoutMs } }
    );
  }

  static notFound(locator: string): SourceUnavailableError {
    return new SourceUnavailableError(
      locator,
      'no such file or directory',
      SourceErrorCodes.SOURCE_NOT_FOUND
    );
  }
}

// ============================================================================
// Parser Errors
// ============================================================================

/**
 * Position inside a configuration file
 */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * A configuration file cannot be parsed into blocks at all
 */
export class MalformedConfigError extends BaseError {
  public readonly file: string;
  public readonly position: SourcePosition;

  constructor(
    file: string,
    position: SourcePosition,
    reason: string,
    context: ErrorContext = {}
  ) {
    super(
      `Malformed configuration in ${file}:${position.line}:${position.column}: ${reason}`,
      ParserErrorCodes.MALFORMED_CONFIG,
      { ...context, details: { ...context.details, file, position, reason } }
    );
    this.name = 'MalformedConfigError';
    this.file = file;
    this.position = position;
  }
}

// ============================================================================
// Resolution Errors
// ============================================================================

/**
 * Locals of one module reference each other in a cycle
 */
export class CyclicLocalsError extends BaseError {
  public readonly module: string;
  public readonly names: readonly string[];

  constructor(module: string, names: readonly string[], context: ErrorContext = {}) {
    super(
      `Cyclic locals in module '${module || '<root>'}': ${names.join(' -> ')}`,
      ResolutionErrorCodes.CYCLIC_LOCALS,
      { ...context, module, details: { ...context.details, names: [...names] } }
    );
    this.name = 'CyclicLocalsError';
    this.module = module;
    this.names = names;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid library configuration
 */
export class ConfigurationError extends BaseError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], context: ErrorContext = {}) {
    super(message, ConfigErrorCodes.CONFIGURATION_ERROR, {
      ...context,
      details: { ...context.details, issues: [...issues] },
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Invalid annotation overlay document
 */
export class AnnotationError extends BaseError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], context: ErrorContext = {}) {
    super(message, ConfigErrorCodes.INVALID_ANNOTATIONS, {
      ...context,
      details: { ...context.details, issues: [...issues] },
    });
    this.name = 'AnnotationError';
    this.issues = issues;
  }
}
