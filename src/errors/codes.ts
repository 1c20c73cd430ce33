/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the configuration interpretation pipeline.
 * Provides typed error codes for consistent error handling across stages.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Source loading error codes
 */
export const SourceErrorCodes = {
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  SOURCE_TIMEOUT: 'SOURCE_TIMEOUT',
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
} as const;

export type SourceErrorCode = typeof SourceErrorCodes[keyof typeof SourceErrorCodes];

/**
 * Parser error codes
 */
export const ParserErrorCodes = {
  MALFORMED_CONFIG: 'MALFORMED_CONFIG',
  UNKNOWN_BLOCK_KIND: 'UNKNOWN_BLOCK_KIND',
} as const;

export type ParserErrorCode = typeof ParserErrorCodes[keyof typeof ParserErrorCodes];

/**
 * Resolution error codes
 */
export const ResolutionErrorCodes = {
  CYCLIC_LOCALS: 'CYCLIC_LOCALS',
  UNRESOLVED_REFERENCE: 'UNRESOLVED_REFERENCE',
  FIXPOINT_NOT_REACHED: 'FIXPOINT_NOT_REACHED',
  UNKNOWN_COUNT: 'UNKNOWN_COUNT',
  UNDECLARED_MODULE_INPUT: 'UNDECLARED_MODULE_INPUT',
} as const;

export type ResolutionErrorCode = typeof ResolutionErrorCodes[keyof typeof ResolutionErrorCodes];

/**
 * Configuration and overlay error codes
 */
export const ConfigErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_ANNOTATIONS: 'INVALID_ANNOTATIONS',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

/**
 * Generic error codes
 */
export const GeneralErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

export type ErrorCode =
  | SourceErrorCode
  | ParserErrorCode
  | ResolutionErrorCode
  | ConfigErrorCode
  | GeneralErrorCode;

// ============================================================================
// Fatality
// ============================================================================

/**
 * Codes that abort a whole pipeline run
 */
const FATAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  SourceErrorCodes.SOURCE_UNAVAILABLE,
  SourceErrorCodes.SOURCE_TIMEOUT,
  SourceErrorCodes.SOURCE_NOT_FOUND,
  SourceErrorCodes.FILE_TOO_LARGE,
  SourceErrorCodes.FILE_READ_ERROR,
  ParserErrorCodes.MALFORMED_CONFIG,
  ConfigErrorCodes.CONFIGURATION_ERROR,
  ConfigErrorCodes.INVALID_ANNOTATIONS,
  GeneralErrorCodes.INTERNAL_ERROR,
]);

/**
 * Check whether an error code aborts the pipeline
 */
export function isFatalCode(code: ErrorCode): boolean {
  return FATAL_CODES.has(code);
}
