/**
 * Extractor Registry
 * @module parsers/registry/extractor-registry
 *
 * Strategy table mapping an artifact family to its extractor. Extractors are
 * created lazily on first use and reused afterwards.
 */

import type { ArtifactFamily } from '../../types/artifact';
import { UnsupportedFamilyError } from '../../errors/domain';
import type { ReferenceExtractor } from '../base/extractor';
import { PythonImportExtractor } from '../python/import-extractor';
import { TerraformReferenceExtractor } from '../terraform/reference-extractor';

/**
 * Factory function for extractor instances
 */
export type ExtractorFactory = () => ReferenceExtractor;

interface RegisteredExtractor {
  readonly factory: ExtractorFactory;
  instance?: ReferenceExtractor;
}

/**
 * File extensions per family, as found in configuration
 */
export interface FamilyExtensions {
  importStyle?: { extensions: readonly string[] };
  resourceStyle?: { extensions: readonly string[] };
}

/**
 * Central registry of extractor strategies
 *
 * @example
 * ```typescript
 * const registry = createDefaultRegistry();
 * const extractor = registry.get('import-style');
 * const { artifacts } = extractor.segment(file);
 * ```
 */
export class ExtractorRegistry {
  private readonly extractors: Map<string, RegisteredExtractor> = new Map();

  /**
   * Register an extractor for a family
   *
   * @throws Error if the family already has an extractor
   */
  register(family: ArtifactFamily, factory: ExtractorFactory): this {
    if (this.extractors.has(family)) {
      throw new Error(`Extractor for family '${family}' is already registered`);
    }
    this.extractors.set(family, { factory });
    return this;
  }

  unregister(family: string): boolean {
    return this.extractors.delete(family);
  }

  has(family: string): boolean {
    return this.extractors.has(family);
  }

  /**
   * Get the extractor for a family
   *
   * @throws UnsupportedFamilyError if no extractor is registered
   */
  get(family: string): ReferenceExtractor {
    const registered = this.extractors.get(family);
    if (!registered) {
      throw new UnsupportedFamilyError(family, this.families());
    }

    if (!registered.instance) {
      registered.instance = registered.factory();
    }
    return registered.instance;
  }

  /**
   * Registered family names in sorted order
   */
  families(): string[] {
    return [...this.extractors.keys()].sort();
  }

  /**
   * Extractors that have been registered, instantiating them as needed
   */
  all(): ReferenceExtractor[] {
    return this.families().map(family => this.get(family));
  }
}

/**
 * Registry with the built-in import-style and resource-style strategies
 */
export function createDefaultRegistry(extensions: FamilyExtensions = {}): ExtractorRegistry {
  return new ExtractorRegistry()
    .register('import-style', () => new PythonImportExtractor({ extensions: extensions.importStyle?.extensions }))
    .register('resource-style', () => new TerraformReferenceExtractor({ extensions: extensions.resourceStyle?.extensions }));
}
