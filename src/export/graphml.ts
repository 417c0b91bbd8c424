/**
 * GraphML Exporter
 * @module export/graphml
 */

import type { AnalysisResult } from '../types/graph';
import type { DependencyGraph } from '../graph/dependency-graph';
import { categorizeArtifact } from '../graph/categories';
import { analyzeGraph } from '../analysis/graph-analyzer';

const XML_ENTITIES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, char => XML_ENTITIES[char] ?? char);
}

const KEYS = [
  '  <key id="family" for="node" attr.name="family" attr.type="string"/>',
  '  <key id="category" for="node" attr.name="category" attr.type="string"/>',
  '  <key id="path" for="node" attr.name="path" attr.type="string"/>',
  '  <key id="centrality" for="node" attr.name="centrality" attr.type="double"/>',
  '  <key id="kind" for="edge" attr.name="kind" attr.type="string"/>',
];

export function exportGraphML(graph: DependencyGraph, analysis: AnalysisResult = analyzeGraph(graph)): string {
  const scores = new Map(analysis.centrality.map(entry => [entry.id, entry.score]));
  const data = (key: string, value: string): string =>
    `      <data key="${key}">${escapeXml(value)}</data>`;

  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<graphml xmlns="http://graphml.graphdrawing.org/xmlns">',
    ...KEYS,
    '  <graph id="dependencies" edgedefault="directed">',
  ];

  for (const node of graph.nodes) {
    lines.push(
      `    <node id="${escapeXml(node.id)}">`,
      data('family', node.family),
      data('category', categorizeArtifact(node)),
      data('path', node.path),
      data('centrality', String(scores.get(node.id) ?? 0)),
      '    </node>'
    );
  }

  graph.edges.forEach((edge, i) => {
    lines.push(
      `    <edge id="e${i}" source="${escapeXml(edge.source)}" target="${escapeXml(edge.target)}">`,
      data('kind', edge.kind),
      '    </edge>'
    );
  });

  lines.push('  </graph>', '</graphml>');
  return `${lines.join('\n')}\n`;
}
