/**
 * Artifact and Reference Types
 * @module types/artifact
 *
 * Core type definitions for parsed source units and the raw dependency
 * mentions extracted from them, before any resolution against the graph.
 */

// ============================================================================
// Families
// ============================================================================

/**
 * Artifact families with a registered extractor strategy
 */
export const ARTIFACT_FAMILIES = ['import-style', 'resource-style'] as const;

/**
 * Supported artifact family selectors
 */
export type ArtifactFamily = typeof ARTIFACT_FAMILIES[number];

/**
 * Type guard for family selectors received from outside (CLI flags, documents)
 */
export function isArtifactFamily(value: string): value is ArtifactFamily {
  return ARTIFACT_FAMILIES.some(family => family === value);
}

// ============================================================================
// Artifacts
// ============================================================================

/**
 * Globally unique artifact key.
 * Dotted module path for import-style families, Terraform address for
 * resource-style families.
 */
export type ArtifactId = string;

/**
 * A file discovered under the analysis root, before segmentation
 */
export interface SourceFile {
  /** Path relative to the analysis root, POSIX separators */
  readonly path: string;
  /** Absolute path on disk */
  readonly absolutePath: string;
  /** Full file content */
  readonly text: string;
}

/**
 * One parsed unit: a module file or a single resource block
 */
export interface SourceArtifact {
  readonly id: ArtifactId;
  readonly family: ArtifactFamily;
  /** File location relative to the analysis root */
  readonly path: string;
  /** 1-based line in its file where `text` begins */
  readonly line: number;
  /** Raw artifact text (whole module, or block body for resources) */
  readonly text: string;
}

/**
 * Derived artifact categories. Never stored on nodes; see categorizeArtifact.
 */
export type ArtifactCategory =
  | 'module'
  | 'package'
  | 'resource'
  | 'data'
  | 'module-call'
  | 'variable'
  | 'local'
  | 'output'
  | 'provider';

// ============================================================================
// References
// ============================================================================

/**
 * How a reference was written.
 * - direct: plain import / attribute reference
 * - wildcard: blanket import of everything a module exports
 * - conditional: index, count or splat access on the referenced address
 */
export type ReferenceKind = 'direct' | 'wildcard' | 'conditional';

/**
 * Ordering used wherever edges or references are sorted by kind
 */
export const REFERENCE_KIND_ORDER: Readonly<Record<ReferenceKind, number>> = {
  direct: 0,
  wildcard: 1,
  conditional: 2,
};

/**
 * Unresolved dependency mention extracted from one artifact
 */
export interface Reference {
  readonly sourceId: ArtifactId;
  /** Raw (but normalized) target text, e.g. a dotted import path */
  readonly targetSpecifier: string;
  readonly kind: ReferenceKind;
  /** 1-based line in the artifact's file */
  readonly line: number;
}

/**
 * Create an immutable reference
 */
export function createReference(
  sourceId: ArtifactId,
  targetSpecifier: string,
  kind: ReferenceKind,
  line: number
): Reference {
  return Object.freeze({ sourceId, targetSpecifier, kind, line });
}

/**
 * Compare two references by specifier, then kind
 */
export function compareReferences(a: Reference, b: Reference): number {
  if (a.targetSpecifier !== b.targetSpecifier) {
    return a.targetSpecifier < b.targetSpecifier ? -1 : 1;
  }
  return REFERENCE_KIND_ORDER[a.kind] - REFERENCE_KIND_ORDER[b.kind];
}

/**
 * An artifact together with everything extracted from it; the unit handed
 * from the extraction phase to the graph builder.
 */
export interface ExtractedArtifact {
  readonly artifact: SourceArtifact;
  readonly references: readonly Reference[];
}
