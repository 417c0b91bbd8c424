/**
 * Error Handling Module
 * @module errors
 */

export {
  BaseError,
  isBaseError,
  hasErrorCode,
  getErrorMessage,
  getErrnoCode,
} from './base';
export type { ErrorContext, SerializedError } from './base';

export {
  ErrorCodes,
  AnalysisErrorCodes,
  GraphErrorCodes,
  ExportErrorCodes,
  ConfigErrorCodes,
  isFatalCode,
} from './codes';
export type { ErrorCode } from './codes';

export {
  RootNotFoundError,
  UnsupportedFamilyError,
  AnalysisCancelledError,
  NodeNotFoundError,
  GraphInvariantError,
  InvalidGraphDocumentError,
  UnsupportedExportFormatError,
  ConfigurationError,
  ConfigValidationError,
} from './domain';
