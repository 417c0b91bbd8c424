/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the dependency graph analysis engine.
 * Provides typed error codes for consistent error handling across the engine.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Analysis pipeline error codes
 */
export const AnalysisErrorCodes = {
  ROOT_NOT_FOUND: 'ROOT_NOT_FOUND',
  UNSUPPORTED_FAMILY: 'UNSUPPORTED_FAMILY',
  ANALYSIS_CANCELLED: 'ANALYSIS_CANCELLED',
} as const;

export type AnalysisErrorCode = typeof AnalysisErrorCodes[keyof typeof AnalysisErrorCodes];

/**
 * Graph error codes
 */
export const GraphErrorCodes = {
  NODE_NOT_FOUND: 'NODE_NOT_FOUND',
  GRAPH_INVARIANT_VIOLATION: 'GRAPH_INVARIANT_VIOLATION',
  INVALID_GRAPH_DOCUMENT: 'INVALID_GRAPH_DOCUMENT',
} as const;

export type GraphErrorCode = typeof GraphErrorCodes[keyof typeof GraphErrorCodes];

/**
 * Export error codes
 */
export const ExportErrorCodes = {
  UNSUPPORTED_EXPORT_FORMAT: 'UNSUPPORTED_EXPORT_FORMAT',
} as const;

export type ExportErrorCode = typeof ExportErrorCodes[keyof typeof ExportErrorCodes];

/**
 * Configuration error codes
 */
export const ConfigErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

/**
 * All error codes in the system
 */
export const ErrorCodes = {
  ...AnalysisErrorCodes,
  ...GraphErrorCodes,
  ...ExportErrorCodes,
  ...ConfigErrorCodes,
} as const;

export type ErrorCode =
  | AnalysisErrorCode
  | GraphErrorCode
  | ExportErrorCode
  | ConfigErrorCode;

/**
 * Codes that abort a whole analysis run
 */
const FATAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCodes.ROOT_NOT_FOUND,
  ErrorCodes.UNSUPPORTED_FAMILY,
  ErrorCodes.ANALYSIS_CANCELLED,
  ErrorCodes.CONFIGURATION_ERROR,
  ErrorCodes.CONFIG_VALIDATION_ERROR,
]);

/**
 * Whether an error code aborts an analysis run
 */
export function isFatalCode(code: ErrorCode): boolean {
  return FATAL_CODES.has(code);
}
