/**
 * Reference Extractors
 * @module parsers
 */

export { BaseExtractor, createLineLocator } from './base/extractor';
export type {
  ReferenceExtractor,
  SegmentResult,
  ExtractionResult,
  LineLocator,
} from './base/extractor';

export { PythonImportExtractor, maskPythonSource } from './python/import-extractor';
export type { PythonImportExtractorOptions } from './python/import-extractor';
export { modulePathToId, isPackageInit, packageSegments } from './python/module-path';

export { TerraformReferenceExtractor } from './terraform/reference-extractor';
export type { TerraformReferenceExtractorOptions } from './terraform/reference-extractor';
export { maskHcl } from './terraform/hcl-scanner';
export type { MaskResult, ScanIssue } from './terraform/hcl-scanner';
export { segmentTerraformFile } from './terraform/block-segmenter';

export { ExtractorRegistry, createDefaultRegistry } from './registry/extractor-registry';
export type { ExtractorFactory, FamilyExtensions } from './registry/extractor-registry';
