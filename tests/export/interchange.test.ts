/**
 * Interchange Document Tests
 * @module tests/export/interchange
 */

import { describe, it, expect } from 'vitest';
import {
  parseInterchangeDocument,
  serializeInterchange,
  toInterchangeDocument,
} from '@/export/interchange';
import { analyzeGraph } from '@/analysis/graph-analyzer';
import { DependencyGraph } from '@/graph/dependency-graph';
import { InvalidGraphDocumentError } from '@/errors/domain';
import { createCyclicGraph, createEdge, createGraph, createNode } from '../factories';

function parseError(text: string): InvalidGraphDocumentError {
  try {
    parseInterchangeDocument(text);
  } catch (error) {
    if (error instanceof InvalidGraphDocumentError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the document to be rejected');
}

function validDocument(): Record<string, unknown> {
  return {
    schemaVersion: 1,
    nodes: [
      { id: 'a', family: 'import-style', path: 'a.py' },
      { id: 'b', family: 'import-style', path: 'b.py' },
    ],
    edges: [{ source: 'a', target: 'b', kind: 'direct' }],
    externalReferences: [{ source: 'a', specifier: 'os' }],
    cycles: [],
    centrality: [
      { id: 'a', score: 1 },
      { id: 'b', score: 1 },
    ],
  };
}

describe('toInterchangeDocument', () => {
  it('should describe the graph, its external references and its analysis', () => {
    const graph = createGraph([['a', 'b']]);

    expect(toInterchangeDocument(graph, analyzeGraph(graph), [{ source: 'a', specifier: 'os' }])).toEqual(
      validDocument()
    );
  });

  it('should sort external references by source, then specifier', () => {
    const graph = createGraph([], ['a', 'b']);
    const document = toInterchangeDocument(graph, undefined, [
      { source: 'b', specifier: 'x' },
      { source: 'a', specifier: 'z' },
      { source: 'a', specifier: 'y' },
    ]);

    expect(document.externalReferences).toEqual([
      { source: 'a', specifier: 'y' },
      { source: 'a', specifier: 'z' },
      { source: 'b', specifier: 'x' },
    ]);
  });
});

describe('serializeInterchange', () => {
  it('should write indented JSON with a trailing newline', () => {
    const graph = createGraph([['a', 'b']]);
    const text = serializeInterchange(graph, undefined, [{ source: 'a', specifier: 'os' }]);

    expect(text).toBe(`${JSON.stringify(validDocument(), null, 2)}\n`);
  });

  it('should honour the indent', () => {
    expect(serializeInterchange(DependencyGraph.empty(), undefined, [], 0)).toBe(
      '{"schemaVersion":1,"nodes":[],"edges":[],"externalReferences":[],"cycles":[],"centrality":[]}\n'
    );
  });

  it('should be byte-identical on repeat', () => {
    const graph = createCyclicGraph();

    expect(serializeInterchange(graph)).toBe(serializeInterchange(graph));
  });
});

describe('parseInterchangeDocument', () => {
  it('should rebuild an equivalent graph', () => {
    const graph = DependencyGraph.create(
      [createNode('a'), createNode('b'), createNode('c')],
      [createEdge('a', 'b'), createEdge('a', 'b', 'wildcard'), createEdge('b', 'c'), createEdge('c', 'a', 'conditional')]
    );
    const externals = [{ source: 'b', specifier: 'requests' }];
    const text = serializeInterchange(graph, analyzeGraph(graph), externals);

    const parsed = parseInterchangeDocument(text);

    expect(parsed.graph.nodes).toEqual(graph.nodes);
    expect(parsed.graph.edges).toEqual(graph.edges);
    expect(parsed.externalReferences).toEqual(externals);
    expect(parsed.analysis).toEqual(analyzeGraph(graph));
    expect(serializeInterchange(parsed.graph, parsed.analysis, parsed.externalReferences)).toBe(text);
  });

  it('should reject malformed JSON', () => {
    const error = parseError('{ not json');

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith('Malformed JSON: ')).toBe(true);
  });

  it('should reject an unknown schema version', () => {
    const error = parseError(JSON.stringify({ ...validDocument(), schemaVersion: 2 }));

    expect(error.issues.some(issue => issue.startsWith('/schemaVersion: '))).toBe(true);
  });

  it('should reject an unknown edge kind', () => {
    const error = parseError(
      JSON.stringify({ ...validDocument(), edges: [{ source: 'a', target: 'b', kind: 'optional' }] })
    );

    expect(error.issues.some(issue => issue.startsWith('/edges/0/kind: '))).toBe(true);
  });

  it('should reject edges to missing nodes', () => {
    const error = parseError(
      JSON.stringify({ ...validDocument(), edges: [{ source: 'a', target: 'z', kind: 'direct' }] })
    );

    expect(error.issues).toEqual(["Edge 'a->z:direct' references a missing node"]);
  });

  it('should reject self edges', () => {
    const error = parseError(
      JSON.stringify({ ...validDocument(), edges: [{ source: 'a', target: 'a', kind: 'direct' }] })
    );

    expect(error.issues).toEqual(["Self edge on 'a'"]);
  });

  it('should reject external references from unknown sources', () => {
    const error = parseError(
      JSON.stringify({ ...validDocument(), externalReferences: [{ source: 'zz', specifier: 'os' }] })
    );

    expect(error.issues).toEqual(["External reference 'os' has unknown source 'zz'"]);
  });
});
