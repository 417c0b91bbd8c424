/**
 * Base Extractor Infrastructure
 * @module parsers/base/extractor
 *
 * Strategy interface implemented once per artifact family. A strategy knows
 * how to cut a file into artifacts, how to pull raw references out of one
 * artifact, and how to resolve a specifier that has no exact artifact match.
 */

import type {
  ArtifactFamily,
  ArtifactId,
  Reference,
  SourceArtifact,
  SourceFile,
} from '../../types/artifact';
import type { ExtractionWarning, WarningCode } from '../../types/warnings';

// ============================================================================
// Result Types
// ============================================================================

/**
 * Artifacts cut from one file
 */
export interface SegmentResult {
  readonly artifacts: SourceArtifact[];
  readonly warnings: ExtractionWarning[];
}

/**
 * References pulled from one artifact
 */
export interface ExtractionResult {
  readonly references: Reference[];
  readonly warnings: ExtractionWarning[];
}

// ============================================================================
// Extractor Interface
// ============================================================================

/**
 * Per-family extraction strategy.
 * `segment` and `extract` are pure: no I/O and no state carried between calls.
 */
export interface ReferenceExtractor {
  readonly family: ArtifactFamily;

  /** Unique extractor identifier */
  readonly name: string;

  /** Semantic version of the extractor */
  readonly version: string;

  /** File extensions this extractor handles, lower-case with leading dot */
  readonly supportedExtensions: readonly string[];

  /** Whether a file belongs to this family */
  canExtract(filePath: string): boolean;

  /** Split a file into artifacts and assign their ids */
  segment(file: SourceFile): SegmentResult;

  /** Extract raw references from one artifact */
  extract(artifact: SourceArtifact): ExtractionResult;

  /**
   * Family-specific resolution used when a specifier matches no artifact id
   * exactly. Returns null when the specifier is external.
   */
  resolveFallback(specifier: string, knownIds: ReadonlySet<ArtifactId>): ArtifactId | null;
}

// ============================================================================
// Base Extractor
// ============================================================================

/**
 * Shared behaviour for extractor strategies
 */
export abstract class BaseExtractor implements ReferenceExtractor {
  abstract readonly family: ArtifactFamily;
  abstract readonly name: string;
  abstract readonly version: string;

  readonly supportedExtensions: readonly string[];

  protected constructor(extensions: readonly string[]) {
    this.supportedExtensions = extensions.map(ext => ext.toLowerCase());
  }

  canExtract(filePath: string): boolean {
    const lower = filePath.toLowerCase();
    return this.supportedExtensions.some(ext => lower.endsWith(ext));
  }

  abstract segment(file: SourceFile): SegmentResult;

  abstract extract(artifact: SourceArtifact): ExtractionResult;

  resolveFallback(_specifier: string, _knownIds: ReadonlySet<ArtifactId>): ArtifactId | null {
    return null;
  }

  /**
   * Create an extraction warning
   */
  protected warning(
    code: WarningCode,
    message: string,
    path: string,
    artifactId: ArtifactId | null,
    line: number | null
  ): ExtractionWarning {
    return { type: 'extraction', code, message, path, artifactId, line };
  }
}

// ============================================================================
// Text Helpers
// ============================================================================

/**
 * Maps character offsets to 1-based line numbers
 */
export type LineLocator = (offset: number) => number;

/**
 * Build a line locator for a text. Lookups are a binary search over line starts.
 */
export function createLineLocator(text: string): LineLocator {
  const starts: number[] = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      starts.push(i + 1);
    }
  }

  return (offset: number): number => {
    let low = 0;
    let high = starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (starts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  };
}
