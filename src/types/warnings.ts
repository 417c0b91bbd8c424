/**
 * Analysis Warning Types
 * @module types/warnings
 *
 * Non-fatal diagnostics collected during an analysis run and returned next to
 * the result. Uses a discriminated union on `type` so callers can narrow.
 */

import type { ArtifactId } from './artifact';

/**
 * Warning codes for non-fatal diagnostics
 */
export const WarningCodes = {
  // Reader
  FILE_READ_ERROR: 'FILE_READ_ERROR',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',

  // Extraction
  INVALID_IMPORT: 'INVALID_IMPORT',
  RELATIVE_IMPORT_BEYOND_ROOT: 'RELATIVE_IMPORT_BEYOND_ROOT',
  MALFORMED_BLOCK: 'MALFORMED_BLOCK',
  MALFORMED_REFERENCE: 'MALFORMED_REFERENCE',
  UNTERMINATED_STRING: 'UNTERMINATED_STRING',
  UNTERMINATED_INTERPOLATION: 'UNTERMINATED_INTERPOLATION',
  UNTERMINATED_HEREDOC: 'UNTERMINATED_HEREDOC',
  UNTERMINATED_COMMENT: 'UNTERMINATED_COMMENT',
  UNCLOSED_BLOCK: 'UNCLOSED_BLOCK',

  // Resolution
  DUPLICATE_ARTIFACT: 'DUPLICATE_ARTIFACT',
  CONDITIONAL_SELF_REFERENCE: 'CONDITIONAL_SELF_REFERENCE',
} as const;

export type WarningCode = typeof WarningCodes[keyof typeof WarningCodes];

/**
 * A file could not be read and was skipped
 */
export interface ArtifactReadWarning {
  readonly type: 'artifact-read';
  readonly code: WarningCode;
  readonly message: string;
  /** Root-relative file path */
  readonly path: string;
}

/**
 * Malformed syntax inside one artifact; its other references are kept
 */
export interface ExtractionWarning {
  readonly type: 'extraction';
  readonly code: WarningCode;
  readonly message: string;
  readonly path: string;
  /** Null when the problem prevented the artifact from being identified */
  readonly artifactId: ArtifactId | null;
  /** 1-based line within the file, when known */
  readonly line: number | null;
}

/**
 * Something the graph builder dropped or de-duplicated
 */
export interface ResolutionWarning {
  readonly type: 'resolution';
  readonly code: WarningCode;
  readonly message: string;
  readonly artifactId: ArtifactId;
}

export type AnalysisWarning = ArtifactReadWarning | ExtractionWarning | ResolutionWarning;
