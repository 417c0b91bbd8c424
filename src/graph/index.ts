/**
 * Dependency Graph
 * @module graph
 */

export { DependencyGraph, compareEdges } from './dependency-graph';
export type { EdgeInput } from './dependency-graph';
export { GraphBuilder, buildGraph } from './graph-builder';
export type { BuildGraphOptions, BuildResult, FallbackResolvers } from './graph-builder';
export { categorizeArtifact } from './categories';
