/**
 * Graph Exporter
 * @module export/exporter
 *
 * Dispatches a format name to its renderer and wraps the output in an
 * ExportResult. Every renderer is a pure function of its input: exporting
 * the same graph twice gives byte-identical content.
 *
 * @example
 * ```ts
 * const result = exportGraph('dot', { graph, analysis });
 * await writeFile(result.filename, result.content);
 * ```
 */

import type { ArtifactFamily } from '../types/artifact';
import type { AnalysisResult, ExternalReference } from '../types/graph';
import type { DependencyGraph } from '../graph/dependency-graph';
import { UnsupportedExportFormatError } from '../errors/domain';
import { analyzeGraph } from '../analysis/graph-analyzer';
import { serializeInterchange } from './interchange';
import { exportDot, type RankDirection } from './dot';
import { exportGraphML } from './graphml';
import { exportAdjacency } from './adjacency';
import { DEFAULT_TOP_N, renderContextMarkdown, summarizeGraph } from './summary';

// ============================================================================
// Types
// ============================================================================

export const EXPORT_FORMATS = ['json', 'dot', 'graphml', 'adjacency', 'context'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

/**
 * What an export is rendered from
 */
export interface ExportInput {
  readonly graph: DependencyGraph;
  /** Recomputed from the graph when omitted */
  readonly analysis?: AnalysisResult;
  readonly externalReferences?: readonly ExternalReference[];
  readonly family?: ArtifactFamily;
  readonly warningCount?: number;
}

export interface ExportOptions {
  /** File name without extension */
  fileName?: string;
  rankdir?: RankDirection;
  jsonIndent?: number;
  /** Central nodes listed in the context document */
  topN?: number;
}

export interface ExportResult {
  readonly format: ExportFormat;
  readonly content: string;
  /** Suggested filename */
  readonly filename: string;
  readonly mimeType: string;
  /** UTF-8 size in bytes */
  readonly size: number;
}

const FORMAT_FILES: Readonly<Record<ExportFormat, { extension: string; mimeType: string }>> = {
  json: { extension: 'json', mimeType: 'application/json' },
  dot: { extension: 'dot', mimeType: 'text/vnd.graphviz' },
  graphml: { extension: 'graphml', mimeType: 'application/graphml+xml' },
  adjacency: { extension: 'adjacency.json', mimeType: 'application/json' },
  context: { extension: 'md', mimeType: 'text/markdown' },
};

// ============================================================================
// Export
// ============================================================================

function render(format: ExportFormat, input: ExportInput, analysis: AnalysisResult, options: ExportOptions): string {
  switch (format) {
    case 'json':
      return serializeInterchange(input.graph, analysis, input.externalReferences, options.jsonIndent);
    case 'dot':
      return exportDot(input.graph, { analysis, rankdir: options.rankdir });
    case 'graphml':
      return exportGraphML(input.graph, analysis);
    case 'adjacency':
      return exportAdjacency(input.graph, options.jsonIndent);
    case 'context':
      return renderContextMarkdown(
        summarizeGraph({ ...input, analysis }, options.topN ?? DEFAULT_TOP_N)
      );
  }
}

/**
 * Render a graph in the named format
 *
 * @throws UnsupportedExportFormatError for an unknown format
 */
export function exportGraph(format: string, input: ExportInput, options: ExportOptions = {}): ExportResult {
  if (!isExportFormat(format)) {
    throw new UnsupportedExportFormatError(format, EXPORT_FORMATS);
  }

  const analysis = input.analysis ?? analyzeGraph(input.graph);
  const content = render(format, input, analysis, options);
  const { extension, mimeType } = FORMAT_FILES[format];

  return {
    format,
    content,
    filename: `${options.fileName ?? 'dependency-graph'}.${extension}`,
    mimeType,
    size: Buffer.byteLength(content, 'utf8'),
  };
}
