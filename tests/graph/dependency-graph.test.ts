/**
 * Dependency Graph Tests
 * @module tests/graph/dependency-graph
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph } from '@/graph/dependency-graph';
import { GraphInvariantError, NodeNotFoundError } from '@/errors/domain';
import { createEdge, createGraph, createNode } from '../factories';

describe('DependencyGraph', () => {
  describe('create', () => {
    it('should sort nodes by id and edges by source, target and kind', () => {
      const graph = DependencyGraph.create(
        [createNode('c'), createNode('a'), createNode('b')],
        [
          createEdge('b', 'c'),
          createEdge('a', 'c', 'conditional'),
          createEdge('a', 'c', 'direct'),
          createEdge('a', 'b', 'wildcard'),
        ]
      );

      expect(graph.nodeIds()).toEqual(['a', 'b', 'c']);
      expect(graph.edges.map(edge => edge.id)).toEqual([
        'a->b:wildcard',
        'a->c:direct',
        'a->c:conditional',
        'b->c:direct',
      ]);
    });

    it('should reject a duplicate node', () => {
      expect(() => DependencyGraph.create([createNode('a'), createNode('a')], [])).toThrow(
        new GraphInvariantError("Duplicate node 'a'")
      );
    });

    it('should reject an edge to a missing node', () => {
      expect(() => DependencyGraph.create([createNode('a')], [createEdge('a', 'b')])).toThrow(
        "Edge 'a->b:direct' references a missing node"
      );
    });

    it('should reject a self edge', () => {
      expect(() => DependencyGraph.create([createNode('a')], [createEdge('a', 'a')])).toThrow(
        GraphInvariantError
      );
    });

    it('should reject a duplicate edge of the same kind', () => {
      expect(() =>
        DependencyGraph.create([createNode('a'), createNode('b')], [createEdge('a', 'b'), createEdge('a', 'b')])
      ).toThrow("Duplicate edge 'a->b:direct'");
    });

    it('should produce a frozen graph', () => {
      const graph = createGraph([['a', 'b']]);

      expect(Object.isFrozen(graph)).toBe(true);
      expect(Object.isFrozen(graph.nodes)).toBe(true);
      expect(Object.isFrozen(graph.edges)).toBe(true);
      expect(Object.isFrozen(graph.nodes[0])).toBe(true);
      expect(Object.isFrozen(graph.outgoingEdges('a'))).toBe(true);
    });

    it('should not be affected by later changes to its input', () => {
      const nodes = [createNode('a'), createNode('b')];
      const graph = DependencyGraph.create(nodes, [createEdge('a', 'b')]);
      nodes.push(createNode('c'));

      expect(graph.nodeCount).toBe(2);
    });
  });

  describe('queries', () => {
    const graph = DependencyGraph.create(
      [createNode('a'), createNode('b'), createNode('c'), createNode('d')],
      [
        createEdge('a', 'c'),
        createEdge('a', 'b', 'conditional'),
        createEdge('a', 'b'),
        createEdge('d', 'b'),
      ]
    );

    it('should count nodes and edges', () => {
      expect(graph.nodeCount).toBe(4);
      expect(graph.edgeCount).toBe(4);
      expect(graph.isEmpty()).toBe(false);
    });

    it('should index outgoing and incoming edges', () => {
      expect(graph.outgoingEdgeIds('a')).toEqual(['a->b:direct', 'a->b:conditional', 'a->c:direct']);
      expect(graph.incomingEdgeIds('b')).toEqual(['a->b:direct', 'a->b:conditional', 'd->b:direct']);
      expect(graph.outgoingEdges('c')).toEqual([]);
    });

    it('should list distinct successors and predecessors', () => {
      expect(graph.successors('a')).toEqual(['b', 'c']);
      expect(graph.predecessors('b')).toEqual(['a', 'd']);
      expect(graph.predecessors('a')).toEqual([]);
    });

    it('should return empty adjacency for unknown ids', () => {
      expect(graph.outgoingEdges('zzz')).toEqual([]);
      expect(graph.successors('zzz')).toEqual([]);
    });

    it('should look up nodes', () => {
      expect(graph.hasNode('a')).toBe(true);
      expect(graph.getNode('zzz')).toBeUndefined();
      expect(graph.requireNode('c')).toEqual({ id: 'c', family: 'import-style', path: 'c.py' });
      expect(() => graph.requireNode('zzz')).toThrow(NodeNotFoundError);
    });
  });

  it('should create an empty graph', () => {
    const graph = DependencyGraph.empty();

    expect(graph.isEmpty()).toBe(true);
    expect(graph.edgeCount).toBe(0);
  });
});
