/**
 * Renderer Tests
 * @module tests/export/renderers
 */

import { describe, it, expect } from 'vitest';
import { escapeDotString, exportDot } from '@/export/dot';
import { escapeXml, exportGraphML } from '@/export/graphml';
import { exportAdjacency, toAdjacencyList } from '@/export/adjacency';
import { analyzeGraph } from '@/analysis/graph-analyzer';
import { DependencyGraph } from '@/graph/dependency-graph';
import { createCyclicGraph, createEdge, createGraph, createLayeredGraph, createNode } from '../factories';

describe('exportDot', () => {
  it('should render shapes by category and styles by kind', () => {
    const graph = DependencyGraph.create(
      [createNode('a'), createNode('pkg', 'import-style', 'pkg/__init__.py')],
      [createEdge('a', 'pkg', 'wildcard'), createEdge('a', 'pkg', 'direct')]
    );

    expect(exportDot(graph)).toBe(
      [
        'digraph dependencies {',
        '  rankdir=LR;',
        '  node [fontname="Helvetica"];',
        '',
        '  "a" [label="a" shape=box];',
        '  "pkg" [label="pkg" shape=folder];',
        '',
        '  "a" -> "pkg" [style=solid];',
        '  "a" -> "pkg" [style=dotted];',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should use resource category shapes and dashed conditional edges', () => {
    const graph = DependencyGraph.create(
      [
        createNode('aws_instance.web', 'resource-style', 'main.tf'),
        createNode('data.aws_ami.ubuntu', 'resource-style', 'main.tf'),
        createNode('var.region', 'resource-style', 'variables.tf'),
      ],
      [
        createEdge('aws_instance.web', 'data.aws_ami.ubuntu', 'conditional'),
        createEdge('aws_instance.web', 'var.region'),
      ]
    );
    const lines = exportDot(graph, { rankdir: 'TB' }).split('\n');

    expect(lines).toContain('  rankdir=TB;');
    expect(lines).toContain('  "aws_instance.web" [label="aws_instance.web" shape=box];');
    expect(lines).toContain('  "data.aws_ami.ubuntu" [label="data.aws_ami.ubuntu" shape=cylinder];');
    expect(lines).toContain('  "var.region" [label="var.region" shape=ellipse];');
    expect(lines).toContain('  "aws_instance.web" -> "data.aws_ami.ubuntu" [style=dashed];');
  });

  it('should highlight cycle members when an analysis is supplied', () => {
    const graph = createGraph([['a', 'b'], ['b', 'a'], ['b', 'c']]);
    const lines = exportDot(graph, { analysis: analyzeGraph(graph) }).split('\n');

    expect(lines).toContain('  "a" [label="a" shape=box color=red penwidth=2];');
    expect(lines).toContain('  "b" [label="b" shape=box color=red penwidth=2];');
    expect(lines).toContain('  "c" [label="c" shape=box];');
  });

  it('should render an empty graph', () => {
    expect(exportDot(DependencyGraph.empty())).toBe(
      'digraph dependencies {\n  rankdir=LR;\n  node [fontname="Helvetica"];\n\n}\n'
    );
  });

  it('should escape quotes, backslashes and newlines', () => {
    expect(escapeDotString('a"b\\c\nd')).toBe('a\\"b\\\\c\\nd');
  });
});

describe('exportGraphML', () => {
  it('should render attributed nodes and edges', () => {
    const graph = createGraph([['a', 'b']]);

    expect(exportGraphML(graph)).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<graphml xmlns="http://graphml.graphdrawing.org/xmlns">',
        '  <key id="family" for="node" attr.name="family" attr.type="string"/>',
        '  <key id="category" for="node" attr.name="category" attr.type="string"/>',
        '  <key id="path" for="node" attr.name="path" attr.type="string"/>',
        '  <key id="centrality" for="node" attr.name="centrality" attr.type="double"/>',
        '  <key id="kind" for="edge" attr.name="kind" attr.type="string"/>',
        '  <graph id="dependencies" edgedefault="directed">',
        '    <node id="a">',
        '      <data key="family">import-style</data>',
        '      <data key="category">module</data>',
        '      <data key="path">a.py</data>',
        '      <data key="centrality">1</data>',
        '    </node>',
        '    <node id="b">',
        '      <data key="family">import-style</data>',
        '      <data key="category">module</data>',
        '      <data key="path">b.py</data>',
        '      <data key="centrality">1</data>',
        '    </node>',
        '    <edge id="e0" source="a" target="b">',
        '      <data key="kind">direct</data>',
        '    </edge>',
        '  </graph>',
        '</graphml>',
        '',
      ].join('\n')
    );
  });

  it('should escape XML special characters', () => {
    expect(escapeXml(`<a & "b" 'c'>`)).toBe('&lt;a &amp; &quot;b&quot; &apos;c&apos;&gt;');
  });

  it('should be byte-identical on repeat', () => {
    const graph = createCyclicGraph();

    expect(exportGraphML(graph)).toBe(exportGraphML(graph));
  });
});

describe('exportAdjacency', () => {
  it('should list sorted targets for every node', () => {
    expect(toAdjacencyList(createLayeredGraph())).toEqual({
      app: ['service', 'util'],
      db: [],
      repo: ['db'],
      service: ['repo'],
      util: [],
    });
  });

  it('should serialize in node order', () => {
    expect(exportAdjacency(createLayeredGraph(), 0)).toBe(
      '{"app":["service","util"],"db":[],"repo":["db"],"service":["repo"],"util":[]}\n'
    );
  });

  it('should list a target once across edge kinds', () => {
    const graph = DependencyGraph.create(
      [createNode('a'), createNode('b')],
      [createEdge('a', 'b'), createEdge('a', 'b', 'wildcard')]
    );

    expect(toAdjacencyList(graph)).toEqual({ a: ['b'], b: [] });
  });
});
