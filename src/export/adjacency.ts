/**
 * Adjacency Exporter
 * @module export/adjacency
 *
 * `{ "<id>": ["<target>", ...] }` with every node present, targets distinct
 * and sorted. Edge kinds are not represented.
 */

import type { ArtifactId } from '../types/artifact';
import type { DependencyGraph } from '../graph/dependency-graph';

export type AdjacencyList = Record<ArtifactId, ArtifactId[]>;

export function toAdjacencyList(graph: DependencyGraph): AdjacencyList {
  const adjacency: AdjacencyList = {};
  for (const id of graph.nodeIds()) {
    adjacency[id] = graph.successors(id);
  }
  return adjacency;
}

export function exportAdjacency(graph: DependencyGraph, indent = 2): string {
  return `${JSON.stringify(toAdjacencyList(graph), null, indent)}\n`;
}
