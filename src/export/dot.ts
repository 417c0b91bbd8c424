/**
 * DOT Exporter
 * @module export/dot
 *
 * Graphviz rendering. Node shape follows the artifact category, edge style
 * the reference kind; cycle members are outlined in red.
 */

import type { ArtifactCategory, ReferenceKind } from '../types/artifact';
import type { AnalysisResult } from '../types/graph';
import type { DependencyGraph } from '../graph/dependency-graph';
import { categorizeArtifact } from '../graph/categories';

export type RankDirection = 'TB' | 'LR' | 'BT' | 'RL';

export interface DotOptions {
  rankdir?: RankDirection;
  /** Highlights cycle members when supplied */
  analysis?: AnalysisResult;
}

const NODE_SHAPES: Readonly<Record<ArtifactCategory, string>> = {
  module: 'box',
  package: 'folder',
  resource: 'box',
  data: 'cylinder',
  'module-call': 'component',
  variable: 'ellipse',
  local: 'note',
  output: 'parallelogram',
  provider: 'hexagon',
};

const EDGE_STYLES: Readonly<Record<ReferenceKind, string>> = {
  direct: 'solid',
  wildcard: 'dotted',
  conditional: 'dashed',
};

/**
 * Escape a string for use inside a double-quoted DOT identifier
 */
export function escapeDotString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, '\\n');
}

export function exportDot(graph: DependencyGraph, options: DotOptions = {}): string {
  const inCycle = new Set(options.analysis?.cycles.flat() ?? []);

  const lines: string[] = [
    'digraph dependencies {',
    `  rankdir=${options.rankdir ?? 'LR'};`,
    '  node [fontname="Helvetica"];',
    '',
  ];

  for (const node of graph.nodes) {
    const id = escapeDotString(node.id);
    const shape = NODE_SHAPES[categorizeArtifact(node)];
    const highlight = inCycle.has(node.id) ? ' color=red penwidth=2' : '';
    lines.push(`  "${id}" [label="${id}" shape=${shape}${highlight}];`);
  }

  if (graph.edges.length > 0) {
    lines.push('');
  }

  for (const edge of graph.edges) {
    lines.push(
      `  "${escapeDotString(edge.source)}" -> "${escapeDotString(edge.target)}" [style=${EDGE_STYLES[edge.kind]}];`
    );
  }

  lines.push('}');
  return `${lines.join('\n')}\n`;
}
