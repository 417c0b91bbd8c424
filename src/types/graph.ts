/**
 * Graph Type Definitions
 * @module types/graph
 *
 * Node, edge and analysis shapes shared by the builder, analyzer and
 * exporters. All values are read-only once created.
 */

import type { ArtifactFamily, ArtifactId, ReferenceKind } from './artifact';

// ============================================================================
// Graph Elements
// ============================================================================

/**
 * One resolved artifact present in the analyzed set
 */
export interface GraphNode {
  readonly id: ArtifactId;
  readonly family: ArtifactFamily;
  /** File location relative to the analysis root */
  readonly path: string;
}

/**
 * Resolved dependency between two known artifacts
 */
export interface GraphEdge {
  /** Deterministic identifier: `source->target:kind` */
  readonly id: string;
  readonly source: ArtifactId;
  readonly target: ArtifactId;
  readonly kind: ReferenceKind;
}

/**
 * Reference whose specifier matched no known artifact
 */
export interface ExternalReference {
  readonly source: ArtifactId;
  readonly specifier: string;
}

// ============================================================================
// Analysis Results
// ============================================================================

/**
 * Members of one strongly connected component (size >= 2) or a self-loop
 */
export type Cycle = readonly ArtifactId[];

/**
 * Degree centrality entry
 */
export interface CentralityEntry {
  readonly id: ArtifactId;
  /** (inDegree + outDegree) / total edge count */
  readonly score: number;
}

/**
 * Derived, read-only view over a graph
 */
export interface AnalysisResult {
  /** Sorted by the smallest id in each cycle */
  readonly cycles: readonly Cycle[];
  /** Ranked by score descending, ties by id ascending */
  readonly centrality: readonly CentralityEntry[];
}

/**
 * Options for dependency / dependent closure queries
 */
export interface ClosureOptions {
  /** Follow edges until fixpoint instead of one hop */
  readonly transitive: boolean;
  /** Maximum hops when transitive; unbounded when omitted */
  readonly maxDepth?: number;
}

/**
 * Create a deterministic edge identifier
 */
export function edgeId(source: ArtifactId, target: ArtifactId, kind: ReferenceKind): string {
  return `${source}->${target}:${kind}`;
}
