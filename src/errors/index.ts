/**
 * Error Handling Module
 * @module errors
 *
 * @example
 * ```typescript
 * import { MalformedConfigError, isBaseError } from './errors';
 *
 * throw new MalformedConfigError('main.tf', { line: 3, column: 1 }, "expected '{'");
 * ```
 */

export {
  SourceErrorCodes,
  ParserErrorCodes,
  ResolutionErrorCodes,
  ConfigErrorCodes,
  GeneralErrorCodes,
  isFatalCode,
  type ErrorCode,
  type SourceErrorCode,
  type ParserErrorCode,
  type ResolutionErrorCode,
  type ConfigErrorCode,
} from './codes';

export {
  BaseError,
  isBaseError,
  hasErrorCode,
  getErrorMessage,
  wrapError,
  type ErrorContext,
  type SerializedError,
} from './base';

export {
  SourceUnavailableError,
  MalformedConfigError,
  CyclicLocalsError,
  ConfigurationError,
  AnnotationError,
  type SourcePosition,
} from './domain';
