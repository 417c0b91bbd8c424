/**
 * Python Module Paths
 * @module parsers/python/module-path
 *
 * Maps root-relative file paths to dotted module ids and resolves relative
 * import levels against a module's package.
 */

import type { ArtifactId } from '../../types/artifact';

const INIT_MODULE = '__init__';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Strip the final extension from a POSIX path
 */
function stripExtension(path: string): string {
  const slash = path.lastIndexOf('/');
  const dot = path.lastIndexOf('.');
  return dot > slash + 1 ? path.slice(0, dot) : path;
}

/**
 * Whether a file is a package initializer
 */
export function isPackageInit(path: string): boolean {
  const segments = stripExtension(path).split('/');
  return segments[segments.length - 1] === INIT_MODULE;
}

/**
 * Dotted module id for a root-relative path.
 * `pkg/sub/__init__.py` is `pkg.sub`; a root-level `__init__.py` keeps the
 * id `__init__`.
 */
export function modulePathToId(path: string): ArtifactId {
  const segments = stripExtension(path).split('/').filter(s => s.length > 0);
  if (segments.length > 1 && segments[segments.length - 1] === INIT_MODULE) {
    segments.pop();
  }
  return segments.join('.');
}

/**
 * Segments of the package a module lives in. A package initializer is its
 * own package; the root-level initializer belongs to the root package.
 */
export function packageSegments(id: ArtifactId, path: string): string[] {
  const segments = id.split('.');
  if (isPackageInit(path)) {
    return id === INIT_MODULE && !path.includes('/') ? [] : segments;
  }
  return segments.slice(0, -1);
}

/**
 * Whether a string is a single identifier
 */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/**
 * Resolve a relative import level against a package.
 * Level 1 is the package itself; each extra level climbs one package.
 * Returns null when the import climbs above the analysis root.
 */
export function resolveRelativeBase(pkg: readonly string[], level: number): string[] | null {
  const climb = level - 1;
  if (climb > pkg.length) {
    return null;
  }
  return pkg.slice(0, pkg.length - climb);
}
