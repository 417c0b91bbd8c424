/**
 * Dependency Graph
 * @module graph/dependency-graph
 *
 * Immutable directed graph of artifacts. Nodes and edges are validated,
 * sorted and frozen at construction; the outgoing and incoming adjacency
 * indices are built once from the edge list and never mutated afterwards.
 */

import type { ArtifactId, ReferenceKind } from '../types/artifact';
import { REFERENCE_KIND_ORDER } from '../types/artifact';
import { edgeId, type GraphEdge, type GraphNode } from '../types/graph';
import { GraphInvariantError, NodeNotFoundError } from '../errors/domain';
import { compareStrings } from '../utils/sort';

/**
 * Edge as supplied to the graph; the id is derived
 */
export interface EdgeInput {
  readonly source: ArtifactId;
  readonly target: ArtifactId;
  readonly kind: ReferenceKind;
}

/**
 * Edge order: source, then target, then kind (direct < wildcard < conditional)
 */
export function compareEdges(a: EdgeInput, b: EdgeInput): number {
  return (
    compareStrings(a.source, b.source) ||
    compareStrings(a.target, b.target) ||
    REFERENCE_KIND_ORDER[a.kind] - REFERENCE_KIND_ORDER[b.kind]
  );
}

const EMPTY_EDGES: readonly GraphEdge[] = Object.freeze([]);

export class DependencyGraph {
  /** Nodes sorted by id */
  readonly nodes: readonly GraphNode[];
  /** Edges sorted by source, target, kind */
  readonly edges: readonly GraphEdge[];

  private readonly nodeIndex: ReadonlyMap<ArtifactId, GraphNode>;
  private readonly outgoingIndex: ReadonlyMap<ArtifactId, readonly GraphEdge[]>;
  private readonly incomingIndex: ReadonlyMap<ArtifactId, readonly GraphEdge[]>;

  private constructor(nodes: readonly GraphNode[], edges: readonly GraphEdge[]) {
    this.nodes = nodes;
    this.edges = edges;

    const nodeIndex = new Map<ArtifactId, GraphNode>();
    const outgoing = new Map<ArtifactId, GraphEdge[]>();
    const incoming = new Map<ArtifactId, GraphEdge[]>();

    for (const node of nodes) {
      nodeIndex.set(node.id, node);
      outgoing.set(node.id, []);
      incoming.set(node.id, []);
    }
    for (const edge of edges) {
      outgoing.get(edge.source)?.push(edge);
      incoming.get(edge.target)?.push(edge);
    }

    this.nodeIndex = nodeIndex;
    this.outgoingIndex = freezeIndex(outgoing);
    this.incomingIndex = freezeIndex(incoming);
    Object.freeze(this);
  }

  /**
   * Build a graph, enforcing its invariants.
   *
   * @throws GraphInvariantError on a duplicate node, a dangling or self edge,
   * or a duplicate (source, target, kind) edge
   */
  static create(nodes: Iterable<GraphNode>, edges: Iterable<EdgeInput>): DependencyGraph {
    const byId = new Map<ArtifactId, GraphNode>();

    for (const node of nodes) {
      if (byId.has(node.id)) {
        throw new GraphInvariantError(`Duplicate node '${node.id}'`, { nodeId: node.id });
      }
      byId.set(node.id, Object.freeze({ id: node.id, family: node.family, path: node.path }));
    }

    const edgeById = new Map<string, GraphEdge>();
    for (const edge of edges) {
      const id = edgeId(edge.source, edge.target, edge.kind);

      if (!byId.has(edge.source) || !byId.has(edge.target)) {
        throw new GraphInvariantError(`Edge '${id}' references a missing node`, {
          edgeId: id,
          source: edge.source,
          target: edge.target,
        });
      }
      if (edge.source === edge.target) {
        throw new GraphInvariantError(`Self edge on '${edge.source}'`, { edgeId: id });
      }
      if (edgeById.has(id)) {
        throw new GraphInvariantError(`Duplicate edge '${id}'`, { edgeId: id });
      }

      edgeById.set(id, Object.freeze({ id, source: edge.source, target: edge.target, kind: edge.kind }));
    }

    const sortedNodes = [...byId.values()].sort((a, b) => compareStrings(a.id, b.id));
    const sortedEdges = [...edgeById.values()].sort(compareEdges);

    return new DependencyGraph(Object.freeze(sortedNodes), Object.freeze(sortedEdges));
  }

  static empty(): DependencyGraph {
    return DependencyGraph.create([], []);
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  hasNode(id: ArtifactId): boolean {
    return this.nodeIndex.has(id);
  }

  getNode(id: ArtifactId): GraphNode | undefined {
    return this.nodeIndex.get(id);
  }

  /**
   * @throws NodeNotFoundError for an unknown id
   */
  requireNode(id: ArtifactId): GraphNode {
    const node = this.nodeIndex.get(id);
    if (!node) {
      throw new NodeNotFoundError(id);
    }
    return node;
  }

  /**
   * Outgoing edges in target order
   */
  outgoingEdges(id: ArtifactId): readonly GraphEdge[] {
    return this.outgoingIndex.get(id) ?? EMPTY_EDGES;
  }

  /**
   * Incoming edges in source order
   */
  incomingEdges(id: ArtifactId): readonly GraphEdge[] {
    return this.incomingIndex.get(id) ?? EMPTY_EDGES;
  }

  outgoingEdgeIds(id: ArtifactId): string[] {
    return this.outgoingEdges(id).map(edge => edge.id);
  }

  incomingEdgeIds(id: ArtifactId): string[] {
    return this.incomingEdges(id).map(edge => edge.id);
  }

  /**
   * Distinct targets of a node's outgoing edges, sorted
   */
  successors(id: ArtifactId): ArtifactId[] {
    return distinctInOrder(this.outgoingEdges(id).map(edge => edge.target));
  }

  /**
   * Distinct sources of a node's incoming edges, sorted
   */
  predecessors(id: ArtifactId): ArtifactId[] {
    return distinctInOrder(this.incomingEdges(id).map(edge => edge.source));
  }

  nodeIds(): ArtifactId[] {
    return this.nodes.map(node => node.id);
  }
}

function freezeIndex(index: Map<ArtifactId, GraphEdge[]>): ReadonlyMap<ArtifactId, readonly GraphEdge[]> {
  const frozen = new Map<ArtifactId, readonly GraphEdge[]>();
  for (const [id, list] of index) {
    frozen.set(id, Object.freeze(list));
  }
  return frozen;
}

/**
 * Drop adjacent repeats from an already sorted list
 */
function distinctInOrder(sorted: readonly string[]): string[] {
  return sorted.filter((value, index) => index === 0 || sorted[index - 1] !== value);
}
