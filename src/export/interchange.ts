/**
 * Graph Interchange Document
 * @module export/interchange
 *
 * Versioned JSON document carrying a graph, its external references and the
 * derived analysis. Parsing validates the document against a TypeBox schema
 * and rebuilds the graph through the same invariant checks as a fresh build.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { AnalysisResult, ExternalReference } from '../types/graph';
import { DependencyGraph } from '../graph/dependency-graph';
import { analyzeGraph } from '../analysis/graph-analyzer';
import { GraphInvariantError, InvalidGraphDocumentError } from '../errors/domain';
import { getErrorMessage } from '../errors/base';
import { compareStrings } from '../utils/sort';

export const INTERCHANGE_SCHEMA_VERSION = 1;

// ============================================================================
// Schema
// ============================================================================

const FamilySchema = Type.Union([Type.Literal('import-style'), Type.Literal('resource-style')]);

const KindSchema = Type.Union([
  Type.Literal('direct'),
  Type.Literal('wildcard'),
  Type.Literal('conditional'),
]);

const IdSchema = Type.String({ minLength: 1 });

export const InterchangeDocumentSchema = Type.Object({
  schemaVersion: Type.Literal(INTERCHANGE_SCHEMA_VERSION),
  nodes: Type.Array(Type.Object({
    id: IdSchema,
    family: FamilySchema,
    path: Type.String(),
  })),
  edges: Type.Array(Type.Object({
    source: IdSchema,
    target: IdSchema,
    kind: KindSchema,
  })),
  externalReferences: Type.Array(Type.Object({
    source: IdSchema,
    specifier: Type.String({ minLength: 1 }),
  })),
  cycles: Type.Array(Type.Array(IdSchema, { minItems: 1 })),
  centrality: Type.Array(Type.Object({
    id: IdSchema,
    score: Type.Number({ minimum: 0, maximum: 1 }),
  })),
});

export type InterchangeDocument = Static<typeof InterchangeDocumentSchema>;

/**
 * Graph recovered from an interchange document
 */
export interface ParsedGraphDocument {
  readonly graph: DependencyGraph;
  readonly analysis: AnalysisResult;
  readonly externalReferences: readonly ExternalReference[];
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Build the interchange document. The analysis is recomputed when omitted.
 */
export function toInterchangeDocument(
  graph: DependencyGraph,
  analysis: AnalysisResult = analyzeGraph(graph),
  externalReferences: readonly ExternalReference[] = []
): InterchangeDocument {
  return {
    schemaVersion: INTERCHANGE_SCHEMA_VERSION,
    nodes: graph.nodes.map(({ id, family, path }) => ({ id, family, path })),
    edges: graph.edges.map(({ source, target, kind }) => ({ source, target, kind })),
    externalReferences: [...externalReferences]
      .sort((a, b) => compareStrings(a.source, b.source) || compareStrings(a.specifier, b.specifier))
      .map(({ source, specifier }) => ({ source, specifier })),
    cycles: analysis.cycles.map(cycle => [...cycle]),
    centrality: analysis.centrality.map(({ id, score }) => ({ id, score })),
  };
}

/**
 * Serialize a graph as interchange JSON, terminated by a newline
 */
export function serializeInterchange(
  graph: DependencyGraph,
  analysis?: AnalysisResult,
  externalReferences?: readonly ExternalReference[],
  indent = 2
): string {
  return `${JSON.stringify(toInterchangeDocument(graph, analysis, externalReferences), null, indent)}\n`;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse and validate an interchange document, rebuilding its graph
 *
 * @throws InvalidGraphDocumentError on malformed JSON, a schema violation or
 * a graph invariant violation
 */
export function parseInterchangeDocument(text: string): ParsedGraphDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidGraphDocumentError(
      [`Malformed JSON: ${getErrorMessage(error)}`],
      error instanceof Error ? error : undefined
    );
  }

  if (!Value.Check(InterchangeDocumentSchema, raw)) {
    const issues = [...Value.Errors(InterchangeDocumentSchema, raw)].map(
      error => `${error.path || '/'}: ${error.message}`
    );
    throw new InvalidGraphDocumentError(issues);
  }

  let graph: DependencyGraph;
  try {
    graph = DependencyGraph.create(raw.nodes, raw.edges);
  } catch (error) {
    if (error instanceof GraphInvariantError) {
      throw new InvalidGraphDocumentError([error.message], error);
    }
    throw error;
  }

  const unknownSources = raw.externalReferences
    .filter(reference => !graph.hasNode(reference.source))
    .map(reference => `External reference '${reference.specifier}' has unknown source '${reference.source}'`);
  if (unknownSources.length > 0) {
    throw new InvalidGraphDocumentError(unknownSources);
  }

  return {
    graph,
    analysis: analyzeGraph(graph),
    externalReferences: raw.externalReferences.map(reference => Object.freeze({ ...reference })),
  };
}
