/**
 * Graph Summary
 * @module export/summary
 *
 * Structured digest of an analyzed graph, and the markdown context document
 * rendered from it.
 */

import type { ArtifactCategory, ArtifactFamily, ArtifactId } from '../types/artifact';
import type { AnalysisResult, CentralityEntry, Cycle, ExternalReference } from '../types/graph';
import type { DependencyGraph } from '../graph/dependency-graph';
import { categorizeArtifact } from '../graph/categories';
import { analyzeGraph } from '../analysis/graph-analyzer';
import { compareStrings } from '../utils/sort';

// ============================================================================
// Types
// ============================================================================

export interface NodeSummary {
  readonly id: ArtifactId;
  readonly category: ArtifactCategory;
  readonly path: string;
  /** Direct dependencies */
  readonly dependencyCount: number;
  /** Direct dependents */
  readonly dependentCount: number;
}

export interface CategoryCount {
  readonly category: ArtifactCategory;
  readonly count: number;
}

export interface GraphSummary {
  /** Null for an empty graph analyzed without a family */
  readonly family: ArtifactFamily | null;
  readonly nodeCount: number;
  readonly edgeCount: number;
  readonly externalReferenceCount: number;
  readonly cycleCount: number;
  readonly cycles: readonly Cycle[];
  readonly mostCentral: readonly CentralityEntry[];
  /** Sorted by id */
  readonly nodes: readonly NodeSummary[];
  /** Sorted by category name */
  readonly categories: readonly CategoryCount[];
  readonly warningCount: number;
}

export interface SummaryInput {
  readonly graph: DependencyGraph;
  readonly analysis?: AnalysisResult;
  readonly externalReferences?: readonly ExternalReference[];
  readonly family?: ArtifactFamily;
  readonly warningCount?: number;
}

export const DEFAULT_TOP_N = 10;

// ============================================================================
// Summary
// ============================================================================

export function summarizeGraph(input: SummaryInput, topN = DEFAULT_TOP_N): GraphSummary {
  const { graph } = input;
  const analysis = input.analysis ?? analyzeGraph(graph);

  const nodes = graph.nodes.map(node => ({
    id: node.id,
    category: categorizeArtifact(node),
    path: node.path,
    dependencyCount: graph.successors(node.id).length,
    dependentCount: graph.predecessors(node.id).length,
  }));

  const counts = new Map<ArtifactCategory, number>();
  for (const node of nodes) {
    counts.set(node.category, (counts.get(node.category) ?? 0) + 1);
  }
  const categories = [...counts]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => compareStrings(a.category, b.category));

  return {
    family: input.family ?? graph.nodes[0]?.family ?? null,
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    externalReferenceCount: input.externalReferences?.length ?? 0,
    cycleCount: analysis.cycles.length,
    cycles: analysis.cycles,
    mostCentral: analysis.centrality.slice(0, Math.max(0, topN)),
    nodes,
    categories,
    warningCount: input.warningCount ?? 0,
  };
}

// ============================================================================
// Markdown
// ============================================================================

function code(value: string): string {
  return `\`${value.replace(/`/g, "'")}\``;
}

function table(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  return [
    `| ${header.join(' | ')} |`,
    `| ${header.map(() => '---').join(' | ')} |`,
    ...rows.map(row => `| ${row.join(' | ')} |`),
  ];
}

/**
 * Render a summary as a markdown context document
 */
export function renderContextMarkdown(summary: GraphSummary): string {
  const degrees = new Map(summary.nodes.map(node => [node.id, node]));
  const lines: string[] = [
    `# Dependency context${summary.family ? `: ${summary.family}` : ''}`,
    '',
    '## Overview',
    '',
    `- Artifacts: ${summary.nodeCount}`,
    `- Dependencies: ${summary.edgeCount}`,
    `- External references: ${summary.externalReferenceCount}`,
    `- Cycles: ${summary.cycleCount}`,
    `- Warnings: ${summary.warningCount}`,
  ];

  if (summary.categories.length > 0) {
    lines.push('', '## Categories', '');
    lines.push(...table(
      ['Category', 'Count'],
      summary.categories.map(({ category, count }) => [category, String(count)])
    ));
  }

  if (summary.mostCentral.length > 0) {
    lines.push('', '## Most central artifacts', '');
    lines.push(...table(
      ['Artifact', 'Score', 'Dependencies', 'Dependents'],
      summary.mostCentral.map(({ id, score }) => {
        const node = degrees.get(id);
        return [
          code(id),
          score.toFixed(3),
          String(node?.dependencyCount ?? 0),
          String(node?.dependentCount ?? 0),
        ];
      })
    ));
  }

  lines.push('', '## Cycles', '');
  if (summary.cycles.length === 0) {
    lines.push('No dependency cycles detected.');
  } else {
    summary.cycles.forEach((cycle, i) => {
      lines.push(`${i + 1}. ${[...cycle, cycle[0]].map(code).join(' -> ')}`);
    });
  }

  if (summary.nodes.length > 0) {
    lines.push('', '## Artifacts', '');
    lines.push(...table(
      ['Artifact', 'Category', 'Path', 'Dependencies', 'Dependents'],
      summary.nodes.map(node => [
        code(node.id),
        node.category,
        code(node.path),
        String(node.dependencyCount),
        String(node.dependentCount),
      ])
    ));
  }

  return `${lines.join('\n')}\n`;
}
