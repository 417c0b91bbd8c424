/**
 * Artifact Reader
 * @module reader
 */

export { ArtifactReader } from './artifact-reader';
export type { ArtifactReaderOptions, CandidateFile, LoadResult, ReadItem } from './artifact-reader';
