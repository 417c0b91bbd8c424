/**
 * Artifact Categories
 * @module graph/categories
 *
 * Categories are derived from a node's id and path rather than stored, so the
 * node schema stays `{ id, family, path }`.
 */

import type { ArtifactCategory, ArtifactFamily, ArtifactId } from '../types/artifact';

const RESOURCE_PREFIXES: ReadonlyArray<readonly [string, ArtifactCategory]> = [
  ['data.', 'data'],
  ['module.', 'module-call'],
  ['var.', 'variable'],
  ['local.', 'local'],
  ['output.', 'output'],
  ['provider.', 'provider'],
];

/**
 * Category of an artifact
 */
export function categorizeArtifact(node: {
  readonly id: ArtifactId;
  readonly family: ArtifactFamily;
  readonly path: string;
}): ArtifactCategory {
  switch (node.family) {
    case 'import-style': {
      const base = node.path.slice(node.path.lastIndexOf('/') + 1);
      return base.startsWith('__init__.') ? 'package' : 'module';
    }
    case 'resource-style': {
      const match = RESOURCE_PREFIXES.find(([prefix]) => node.id.startsWith(prefix));
      return match ? match[1] : 'resource';
    }
  }
}
