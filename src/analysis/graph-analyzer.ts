/**
 * Graph Analyzer
 * @module analysis/graph-analyzer
 *
 * Cycle detection, centrality ranking and dependency closures. Every function
 * here is a pure function of the graph: recomputing gives the same result.
 */

import type { ArtifactId } from '../types/artifact';
import type {
  AnalysisResult,
  CentralityEntry,
  ClosureOptions,
  Cycle,
} from '../types/graph';
import type { DependencyGraph } from '../graph/dependency-graph';
import { compareStrings } from '../utils/sort';
import {
  findNodesThatReach,
  findReachableNodes,
  orderComponent,
  tarjanSCC,
} from './algorithms';

const ONE_HOP: ClosureOptions = { transitive: false };

// ============================================================================
// Cycles
// ============================================================================

/**
 * Strongly connected components with two or more members, plus self-loops.
 * Cycles are sorted by their smallest member, which is also their first.
 */
export function findCycles(graph: DependencyGraph): Cycle[] {
  return tarjanSCC(graph)
    .filter(scc => scc.isCycle)
    .map(scc => Object.freeze(orderComponent(graph, scc.nodes)))
    .sort((a, b) => compareStrings(a[0], b[0]));
}

// ============================================================================
// Centrality
// ============================================================================

/**
 * Degree centrality: (in-degree + out-degree) / total edge count.
 * This is a degree approximation, not betweenness or eigenvector centrality.
 * Every score is 0 on a graph without edges. Ranked by score descending,
 * ties by id ascending.
 */
export function computeCentrality(graph: DependencyGraph): CentralityEntry[] {
  const total = graph.edgeCount;

  return graph.nodes
    .map(node => {
      const degree = graph.outgoingEdges(node.id).length + graph.incomingEdges(node.id).length;
      return Object.freeze({ id: node.id, score: total === 0 ? 0 : degree / total });
    })
    .sort((a, b) => b.score - a.score || compareStrings(a.id, b.id));
}

// ============================================================================
// Closures
// ============================================================================

function depthLimit(options: ClosureOptions): number {
  return options.transitive ? options.maxDepth ?? Infinity : 1;
}

/**
 * Artifacts a node depends on, sorted, excluding the node itself
 *
 * @throws NodeNotFoundError for an unknown id
 */
export function dependenciesOf(graph: DependencyGraph, id: ArtifactId, options: ClosureOptions = ONE_HOP): ArtifactId[] {
  graph.requireNode(id);
  return findReachableNodes(graph, id, depthLimit(options));
}

/**
 * Artifacts that depend on a node, sorted, excluding the node itself
 *
 * @throws NodeNotFoundError for an unknown id
 */
export function dependentsOf(graph: DependencyGraph, id: ArtifactId, options: ClosureOptions = ONE_HOP): ArtifactId[] {
  graph.requireNode(id);
  return findNodesThatReach(graph, id, depthLimit(options));
}

// ============================================================================
// Analysis
// ============================================================================

/**
 * Full analysis of a graph
 */
export function analyzeGraph(graph: DependencyGraph): AnalysisResult {
  return Object.freeze({
    cycles: Object.freeze(findCycles(graph)),
    centrality: Object.freeze(computeCentrality(graph)),
  });
}

/**
 * Analyzer bound to one graph
 */
export class GraphAnalyzer {
  constructor(readonly graph: DependencyGraph) {}

  analyze(): AnalysisResult {
    return analyzeGraph(this.graph);
  }

  findCycles(): Cycle[] {
    return findCycles(this.graph);
  }

  hasCycles(): boolean {
    return this.findCycles().length > 0;
  }

  computeCentrality(): CentralityEntry[] {
    return computeCentrality(this.graph);
  }

  dependenciesOf(id: ArtifactId, options?: ClosureOptions): ArtifactId[] {
    return dependenciesOf(this.graph, id, options);
  }

  dependentsOf(id: ArtifactId, options?: ClosureOptions): ArtifactId[] {
    return dependentsOf(this.graph, id, options);
  }
}
