/**
 * Type Exports
 * @module types
 */

export {
  ARTIFACT_FAMILIES,
  REFERENCE_KIND_ORDER,
  isArtifactFamily,
  createReference,
  compareReferences,
} from './artifact';
export type {
  ArtifactFamily,
  ArtifactId,
  ArtifactCategory,
  SourceFile,
  SourceArtifact,
  ReferenceKind,
  Reference,
  ExtractedArtifact,
} from './artifact';

export { edgeId } from './graph';
export type {
  GraphNode,
  GraphEdge,
  ExternalReference,
  Cycle,
  CentralityEntry,
  AnalysisResult,
  ClosureOptions,
} from './graph';

export { WarningCodes } from './warnings';
export type {
  WarningCode,
  ArtifactReadWarning,
  ExtractionWarning,
  ResolutionWarning,
  AnalysisWarning,
} from './warnings';
