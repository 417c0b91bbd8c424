/**
 * Graph Builder Implementation
 * @module graph/graph-builder
 *
 * Resolves extracted references against the set of known artifacts and
 * assembles the immutable dependency graph. Unresolvable specifiers become
 * external references and never create nodes.
 */

import {
  compareReferences,
  type ArtifactFamily,
  type ArtifactId,
  type ExtractedArtifact,
} from '../types/artifact';
import type { ExternalReference, GraphNode } from '../types/graph';
import { edgeId } from '../types/graph';
import { WarningCodes, type ResolutionWarning } from '../types/warnings';
import { GraphInvariantError } from '../errors/domain';
import type { ReferenceExtractor } from '../parsers/base/extractor';
import { createModuleLogger, type StructuredLogger } from '../logging/logger';
import { compareStrings } from '../utils/sort';
import { DependencyGraph, type EdgeInput } from './dependency-graph';

// ============================================================================
// Incremental Builder
// ============================================================================

/**
 * Collects nodes and edges, then freezes them into a DependencyGraph
 */
export class GraphBuilder {
  private readonly nodes: Map<ArtifactId, GraphNode> = new Map();
  private readonly edges: Map<string, EdgeInput> = new Map();

  /**
   * @throws GraphInvariantError if a node with the same id exists
   */
  addNode(node: GraphNode): void {
    if (this.nodes.has(node.id)) {
      throw new GraphInvariantError(`Duplicate node '${node.id}'`, { nodeId: node.id });
    }
    this.nodes.set(node.id, node);
  }

  hasNode(id: ArtifactId): boolean {
    return this.nodes.has(id);
  }

  getNode(id: ArtifactId): GraphNode | undefined {
    return this.nodes.get(id);
  }

  nodeIds(): ReadonlySet<ArtifactId> {
    return new Set(this.nodes.keys());
  }

  /**
   * Add an edge. Returns false when an identical edge already exists.
   *
   * @throws GraphInvariantError for a missing endpoint or a self edge
   */
  addEdge(edge: EdgeInput): boolean {
    const id = edgeId(edge.source, edge.target, edge.kind);

    if (!this.nodes.has(edge.source)) {
      throw new GraphInvariantError(`Source node not found: ${edge.source}`, { edgeId: id });
    }
    if (!this.nodes.has(edge.target)) {
      throw new GraphInvariantError(`Target node not found: ${edge.target}`, { edgeId: id });
    }
    if (edge.source === edge.target) {
      throw new GraphInvariantError(`Self edge on '${edge.source}'`, { edgeId: id });
    }
    if (this.edges.has(id)) {
      return false;
    }

    this.edges.set(id, edge);
    return true;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  build(): DependencyGraph {
    return DependencyGraph.create(this.nodes.values(), this.edges.values());
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Family-specific fallback used when a specifier matches no id exactly
 */
export type FallbackResolvers = Partial<Record<ArtifactFamily, Pick<ReferenceExtractor, 'resolveFallback'>>>;

export interface BuildGraphOptions {
  resolvers?: FallbackResolvers;
  logger?: StructuredLogger;
}

export interface BuildResult {
  readonly graph: DependencyGraph;
  /** Sorted by source, then specifier */
  readonly externalReferences: readonly ExternalReference[];
  readonly warnings: readonly ResolutionWarning[];
}

function compareArtifacts(a: ExtractedArtifact, b: ExtractedArtifact): number {
  return compareStrings(a.artifact.id, b.artifact.id) || compareStrings(a.artifact.path, b.artifact.path);
}

/**
 * Build a dependency graph from extracted artifacts.
 * Input order does not matter: artifacts and references are re-sorted first.
 */
export function buildGraph(
  extracted: Iterable<ExtractedArtifact>,
  options: BuildGraphOptions = {}
): BuildResult {
  const logger = options.logger ?? createModuleLogger('graph-builder');
  const resolvers = options.resolvers ?? {};
  const startTime = performance.now();

  const builder = new GraphBuilder();
  const accepted: ExtractedArtifact[] = [];
  const warnings: ResolutionWarning[] = [];

  for (const entry of [...extracted].sort(compareArtifacts)) {
    const { artifact } = entry;
    const existing = builder.getNode(artifact.id);

    if (existing) {
      warnings.push({
        type: 'resolution',
        code: WarningCodes.DUPLICATE_ARTIFACT,
        message: `Artifact '${artifact.id}' in ${artifact.path} duplicates the one in ${existing.path}; keeping the first`,
        artifactId: artifact.id,
      });
      continue;
    }

    builder.addNode({ id: artifact.id, family: artifact.family, path: artifact.path });
    accepted.push(entry);
  }

  const knownIds = builder.nodeIds();
  const externals = new Map<string, ExternalReference>();

  for (const { artifact, references } of accepted) {
    const resolver = resolvers[artifact.family];

    for (const reference of [...references].sort(compareReferences)) {
      const specifier = reference.targetSpecifier;
      const target = knownIds.has(specifier)
        ? specifier
        : resolver?.resolveFallback(specifier, knownIds) ?? null;

      if (target === null) {
        const key = `${artifact.id}\u0000${specifier}`;
        if (!externals.has(key)) {
          externals.set(key, Object.freeze({ source: artifact.id, specifier }));
        }
        continue;
      }

      if (target === artifact.id) {
        if (reference.kind === 'conditional') {
          warnings.push({
            type: 'resolution',
            code: WarningCodes.CONDITIONAL_SELF_REFERENCE,
            message: `Artifact '${artifact.id}' refers to itself through an indexed reference on line ${reference.line}; dropped`,
            artifactId: artifact.id,
          });
        }
        continue;
      }

      builder.addEdge({ source: artifact.id, target, kind: reference.kind });
    }
  }

  const graph = builder.build();
  const externalReferences = [...externals.values()].sort(
    (a, b) => compareStrings(a.source, b.source) || compareStrings(a.specifier, b.specifier)
  );

  logger.graphBuilt(graph.nodeCount, graph.edgeCount, externalReferences.length, Math.round(performance.now() - startTime));

  return { graph, externalReferences, warnings };
}
