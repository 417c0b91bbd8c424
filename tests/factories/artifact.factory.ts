/**
 * Artifact Test Factories
 * @module tests/factories/artifact
 */

import type {
  ArtifactFamily,
  ArtifactId,
  ExtractedArtifact,
  Reference,
  ReferenceKind,
  SourceArtifact,
  SourceFile,
} from '@/types/artifact';
import { createReference } from '@/types/artifact';

export function createSourceFile(path: string, text: string): SourceFile {
  return { path, absolutePath: `/virtual/${path}`, text };
}

export function createArtifact(
  id: ArtifactId,
  text = '',
  overrides: Partial<SourceArtifact> = {}
): SourceArtifact {
  const family: ArtifactFamily = overrides.family ?? 'import-style';
  return {
    id,
    family,
    path: family === 'import-style' ? `${id.replace(/\./g, '/')}.py` : 'main.tf',
    line: 1,
    text,
    ...overrides,
  };
}

/**
 * Extracted artifact whose references are given as `[specifier, kind]`
 */
export function createExtracted(
  id: ArtifactId,
  references: ReadonlyArray<string | readonly [string, ReferenceKind]> = [],
  overrides: Partial<SourceArtifact> = {}
): ExtractedArtifact {
  const artifact = createArtifact(id, '', overrides);
  const refs: Reference[] = references.map((entry, index) =>
    typeof entry === 'string'
      ? createReference(id, entry, 'direct', index + 1)
      : createReference(id, entry[0], entry[1], index + 1)
  );
  return { artifact, references: refs };
}
