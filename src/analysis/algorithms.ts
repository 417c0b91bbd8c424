/**
 * Graph Algorithms
 * @module analysis/algorithms
 *
 * O(V+E) traversals over a DependencyGraph:
 * - Tarjan's strongly connected components (iterative, no recursion limit)
 * - Breadth-first reachability with an optional depth bound
 */

import type { ArtifactId } from '../types/artifact';
import type { DependencyGraph } from '../graph/dependency-graph';
import { compareStrings } from '../utils/sort';

// ============================================================================
// Types
// ============================================================================

/**
 * Strongly connected component
 */
export interface StronglyConnectedComponent {
  /** Members in discovery order */
  readonly nodes: ArtifactId[];
  /** More than one member, or a node with an edge to itself */
  readonly isCycle: boolean;
}

type Step = (id: ArtifactId) => readonly ArtifactId[];

// ============================================================================
// Strongly Connected Components
// ============================================================================

/**
 * Tarjan's algorithm. Nodes are visited in id order and successors in
 * target order, so the output is deterministic for a given graph.
 */
export function tarjanSCC(graph: DependencyGraph): StronglyConnectedComponent[] {
  const ids = graph.nodeIds();
  const position = new Map<ArtifactId, number>();
  ids.forEach((id, i) => position.set(id, i));

  const adjacency: number[][] = ids.map(id =>
    graph.successors(id).flatMap(target => {
      const index = position.get(target);
      return index === undefined ? [] : [index];
    })
  );

  const n = ids.length;
  const index = new Int32Array(n).fill(-1);
  const lowlink = new Int32Array(n);
  const onStack = new Uint8Array(n);
  const stack: number[] = [];
  const sccs: StronglyConnectedComponent[] = [];
  let counter = 0;

  const visit = (v: number): void => {
    index[v] = counter;
    lowlink[v] = counter;
    counter++;
    stack.push(v);
    onStack[v] = 1;
  };

  for (let root = 0; root < n; root++) {
    if (index[root] !== -1) continue;

    const work: Array<{ v: number; next: number }> = [{ v: root, next: 0 }];
    visit(root);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      const v = frame.v;

      if (frame.next < adjacency[v].length) {
        const w = adjacency[v][frame.next++];
        if (index[w] === -1) {
          visit(w);
          work.push({ v: w, next: 0 });
        } else if (onStack[w] === 1) {
          lowlink[v] = Math.min(lowlink[v], index[w]);
        }
        continue;
      }

      work.pop();
      if (work.length > 0) {
        const parent = work[work.length - 1].v;
        lowlink[parent] = Math.min(lowlink[parent], lowlink[v]);
      }

      // Root of a component: pop its members
      if (lowlink[v] === index[v]) {
        const members: ArtifactId[] = [];
        for (;;) {
          const w = stack.pop();
          if (w === undefined) break;
          onStack[w] = 0;
          members.push(ids[w]);
          if (w === v) break;
        }
        sccs.push({
          nodes: members,
          isCycle: members.length > 1 || adjacency[v].includes(v),
        });
      }
    }
  }

  return sccs;
}

/**
 * Order the members of a component by a depth-first walk that starts at the
 * smallest id and follows successors in id order, staying inside the component
 */
export function orderComponent(graph: DependencyGraph, members: readonly ArtifactId[]): ArtifactId[] {
  const inside = new Set(members);
  const start = [...members].sort(compareStrings)[0];
  if (start === undefined) return [];

  const ordered: ArtifactId[] = [start];
  const seen = new Set<ArtifactId>([start]);
  const work: Array<{ successors: ArtifactId[]; next: number }> = [
    { successors: graph.successors(start), next: 0 },
  ];

  while (work.length > 0) {
    const frame = work[work.length - 1];
    if (frame.next >= frame.successors.length) {
      work.pop();
      continue;
    }

    const target = frame.successors[frame.next++];
    if (inside.has(target) && !seen.has(target)) {
      seen.add(target);
      ordered.push(target);
      work.push({ successors: graph.successors(target), next: 0 });
    }
  }

  return ordered;
}

// ============================================================================
// Reachability
// ============================================================================

/**
 * Nodes reachable from `origin` by repeatedly applying `step`, at most
 * `maxDepth` hops away. The origin itself is never part of the result.
 */
export function breadthFirstClosure(origin: ArtifactId, step: Step, maxDepth = Infinity): ArtifactId[] {
  const visited = new Set<ArtifactId>([origin]);
  const reached: ArtifactId[] = [];
  let frontier: ArtifactId[] = [origin];
  let depth = 0;

  while (frontier.length > 0 && depth < maxDepth) {
    depth++;
    const next: ArtifactId[] = [];

    for (const id of frontier) {
      for (const neighbor of step(id)) {
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          reached.push(neighbor);
          next.push(neighbor);
        }
      }
    }

    frontier = next;
  }

  return reached.sort(compareStrings);
}

/**
 * Nodes reachable from a node following edges forward
 */
export function findReachableNodes(graph: DependencyGraph, origin: ArtifactId, maxDepth?: number): ArtifactId[] {
  return breadthFirstClosure(origin, id => graph.successors(id), maxDepth);
}

/**
 * Nodes from which a node can be reached
 */
export function findNodesThatReach(graph: DependencyGraph, origin: ArtifactId, maxDepth?: number): ArtifactId[] {
  return breadthFirstClosure(origin, id => graph.predecessors(id), maxDepth);
}
