/**
 * Graph Export
 * @module export
 */

export { EXPORT_FORMATS, isExportFormat, exportGraph } from './exporter';
export type { ExportFormat, ExportInput, ExportOptions, ExportResult } from './exporter';

export {
  INTERCHANGE_SCHEMA_VERSION,
  InterchangeDocumentSchema,
  toInterchangeDocument,
  serializeInterchange,
  parseInterchangeDocument,
} from './interchange';
export type { InterchangeDocument, ParsedGraphDocument } from './interchange';

export { exportDot, escapeDotString } from './dot';
export type { DotOptions, RankDirection } from './dot';
export { exportGraphML, escapeXml } from './graphml';
export { exportAdjacency, toAdjacencyList } from './adjacency';
export type { AdjacencyList } from './adjacency';
export { DEFAULT_TOP_N, summarizeGraph, renderContextMarkdown } from './summary';
export type { GraphSummary, NodeSummary, CategoryCount, SummaryInput } from './summary';
