/**
 * Terraform Reference Extractor
 * @module parsers/terraform/reference-extractor
 *
 * Resource-style strategy. Artifacts are addressable blocks; references are
 * traversals such as `var.region`, `module.vpc.id`, `data.aws_ami.ubuntu.id`
 * or `aws_subnet.public[0].id`, found anywhere in the body including inside
 * string templates.
 */

import {
  createReference,
  type Reference,
  type ReferenceKind,
  type SourceArtifact,
  type SourceFile,
} from '../../types/artifact';
import { WarningCodes, type ExtractionWarning } from '../../types/warnings';
import {
  BaseExtractor,
  createLineLocator,
  type ExtractionResult,
  type SegmentResult,
} from '../base/extractor';
import { findClosing, segmentTerraformFile } from './block-segmenter';
import { maskHcl } from './hcl-scanner';

// ============================================================================
// Traversals
// ============================================================================

/**
 * One step after a traversal root
 */
export type TraversalStep =
  | { readonly type: 'attr'; readonly name: string }
  | { readonly type: 'index' }
  | { readonly type: 'splat' };

export interface Traversal {
  readonly steps: TraversalStep[];
  /** A dot followed by nothing usable */
  readonly malformed: boolean;
  /** Offset just past the last step */
  readonly end: number;
}

/**
 * Roots that never name another artifact
 */
const IGNORED_ROOTS: ReadonlySet<string> = new Set(['each', 'count', 'self', 'path', 'terraform']);

const PREFIX_ROOTS: ReadonlySet<string> = new Set(['var', 'local', 'module']);

const TRAVERSAL_ROOT = /(?<![\w.])[A-Za-z_][\w-]*/g;
const IDENTIFIER = /[A-Za-z_][\w-]*/y;
const LEGACY_INDEX = /\d+/y;

const FOR_ITERATORS = /(?<![\w.])for\s+([A-Za-z_][\w-]*)(?:\s*,\s*([A-Za-z_][\w-]*))?\s+in\s/g;
const ITERATOR_ARGUMENT = /(?<![\w.])iterator\s*=\s*([A-Za-z_][\w-]*)/g;
const DYNAMIC_BLOCK = /(?<![\w.])dynamic\s+"/g;
const PROVIDER_ARGUMENT = /(?<![\w.])provider\s*=\s*([A-Za-z_][\w-]*)(?:\.([A-Za-z_][\w-]*))?/g;
const PROVIDERS_ARGUMENT = /(?<![\w.])providers\s*=\s*\{/g;
const PROVIDER_VALUE = /=\s*([A-Za-z_][\w-]*)(?:\.([A-Za-z_][\w-]*))?/g;

function sticky(pattern: RegExp, text: string, offset: number): string | null {
  pattern.lastIndex = offset;
  const match = pattern.exec(text);
  return match ? match[0] : null;
}

/**
 * Read the steps following a root identifier that ends at `pos`
 */
export function readTraversal(masked: string, pos: number): Traversal {
  const steps: TraversalStep[] = [];
  let malformed = false;

  for (;;) {
    const ch = masked[pos];

    if (ch === '.') {
      if (masked[pos + 1] === '*') {
        steps.push({ type: 'splat' });
        pos += 2;
        continue;
      }
      const name = sticky(IDENTIFIER, masked, pos + 1);
      if (name !== null) {
        steps.push({ type: 'attr', name });
        pos += 1 + name.length;
        continue;
      }
      const digits = sticky(LEGACY_INDEX, masked, pos + 1);
      if (digits !== null) {
        steps.push({ type: 'index' });
        pos += 1 + digits.length;
        continue;
      }
      malformed = true;
      break;
    }

    if (ch === '[') {
      const close = findClosing(masked, pos);
      if (close === -1) break;
      steps.push(masked.slice(pos + 1, close).trim() === '*' ? { type: 'splat' } : { type: 'index' });
      pos = close + 1;
      continue;
    }

    break;
  }

  return { steps, malformed, end: pos };
}

type AddressOutcome =
  | { readonly type: 'address'; readonly address: string; readonly kind: ReferenceKind }
  | { readonly type: 'malformed' }
  | { readonly type: 'none' };

function attrName(step: TraversalStep | undefined): string | null {
  return step !== undefined && step.type === 'attr' ? step.name : null;
}

/**
 * Interpret a traversal as an artifact address
 */
export function resolveAddress(root: string, traversal: Traversal): AddressOutcome {
  const { steps } = traversal;
  let address: string | null = null;
  let consumed = 0;

  if (PREFIX_ROOTS.has(root)) {
    const name = attrName(steps[0]);
    if (name === null) {
      return traversal.malformed && steps.length === 0 ? { type: 'malformed' } : { type: 'none' };
    }
    address = `${root}.${name}`;
    consumed = 1;
  } else if (root === 'data') {
    const type = attrName(steps[0]);
    const name = attrName(steps[1]);
    if (type === null) {
      return traversal.malformed && steps.length === 0 ? { type: 'malformed' } : { type: 'none' };
    }
    if (name === null) {
      return { type: 'malformed' };
    }
    address = `data.${type}.${name}`;
    consumed = 2;
  } else if (root.includes('_')) {
    const name = attrName(steps[0]);
    if (name === null) {
      return traversal.malformed && steps.length === 0 ? { type: 'malformed' } : { type: 'none' };
    }
    address = `${root}.${name}`;
    consumed = 1;
  } else {
    return { type: 'none' };
  }

  if (traversal.malformed) {
    return { type: 'malformed' };
  }

  const next = steps[consumed];
  const kind: ReferenceKind = next !== undefined && next.type !== 'attr' ? 'conditional' : 'direct';
  return { type: 'address', address, kind };
}

/**
 * Names bound by `for` expressions, `dynamic` blocks and `iterator =`
 */
export function collectIteratorNames(text: string, masked: string): Set<string> {
  const names = new Set<string>();

  for (const match of masked.matchAll(FOR_ITERATORS)) {
    names.add(match[1]);
    if (match[2] !== undefined) {
      names.add(match[2]);
    }
  }

  for (const match of masked.matchAll(ITERATOR_ARGUMENT)) {
    names.add(match[1]);
  }

  for (const match of masked.matchAll(DYNAMIC_BLOCK)) {
    const open = (match.index ?? 0) + match[0].length - 1;
    const close = masked.indexOf('"', open + 1);
    if (close !== -1) {
      names.add(text.slice(open + 1, close));
    }
  }

  return names;
}

// ============================================================================
// Extractor
// ============================================================================

interface Candidate {
  readonly offset: number;
  readonly specifier: string;
  readonly kind: ReferenceKind;
}

export interface TerraformReferenceExtractorOptions {
  /** Accepted file extensions (default: ['.tf']) */
  extensions?: readonly string[];
}

/**
 * Resource-style reference extractor for Terraform configuration.
 * Addresses resolve exactly or not at all, so the base fallback applies.
 */
export class TerraformReferenceExtractor extends BaseExtractor {
  readonly family = 'resource-style' as const;
  readonly name = 'terraform-references';
  readonly version = '1.0.0';

  constructor(options: TerraformReferenceExtractorOptions = {}) {
    super(options.extensions ?? ['.tf']);
  }

  segment(file: SourceFile): SegmentResult {
    return segmentTerraformFile(file);
  }

  extract(artifact: SourceArtifact): ExtractionResult {
    const text = artifact.text;
    // Scan issues were reported when the file was segmented
    const { masked } = maskHcl(text);
    const lineOf = createLineLocator(text);
    const fileLine = (offset: number): number => artifact.line + lineOf(offset) - 1;

    const ignored = new Set([...IGNORED_ROOTS, ...collectIteratorNames(text, masked)]);
    const candidates: Candidate[] = [];
    const warnings: ExtractionWarning[] = [];
    const skipped: Array<readonly [number, number]> = [];

    const addProvider = (offset: number, name: string, alias: string | undefined): void => {
      candidates.push({
        offset,
        specifier: alias === undefined ? `provider.${name}` : `provider.${name}.${alias}`,
        kind: 'direct',
      });
    };

    for (const match of masked.matchAll(PROVIDER_ARGUMENT)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      addProvider(start, match[1], match[2]);
      skipped.push([start, end]);
    }

    for (const match of masked.matchAll(PROVIDERS_ARGUMENT)) {
      const start = match.index ?? 0;
      const open = start + match[0].length - 1;
      const close = findClosing(masked, open);
      const end = close === -1 ? masked.length : close + 1;
      const body = masked.slice(open + 1, end);

      for (const value of body.matchAll(PROVIDER_VALUE)) {
        addProvider(open + 1 + (value.index ?? 0), value[1], value[2]);
      }
      skipped.push([start, end]);
    }

    const isSkipped = (offset: number): boolean =>
      skipped.some(([start, end]) => offset >= start && offset < end);

    for (const match of masked.matchAll(TRAVERSAL_ROOT)) {
      const root = match[0];
      const offset = match.index ?? 0;
      if (ignored.has(root) || isSkipped(offset)) {
        continue;
      }

      const traversal = readTraversal(masked, offset + root.length);
      const outcome = resolveAddress(root, traversal);

      if (outcome.type === 'malformed') {
        warnings.push(
          this.warning(
            WarningCodes.MALFORMED_REFERENCE,
            `Malformed reference '${text.slice(offset, traversal.end + (traversal.malformed ? 1 : 0))}'`,
            artifact.path,
            artifact.id,
            fileLine(offset)
          )
        );
        continue;
      }

      if (outcome.type === 'address') {
        candidates.push({ offset, specifier: outcome.address, kind: outcome.kind });
      }
    }

    candidates.sort((a, b) => a.offset - b.offset);

    const seen = new Map<string, Reference>();
    for (const candidate of candidates) {
      const key = `${candidate.specifier}\u0000${candidate.kind}`;
      if (!seen.has(key)) {
        seen.set(
          key,
          createReference(artifact.id, candidate.specifier, candidate.kind, fileLine(candidate.offset))
        );
      }
    }

    return { references: [...seen.values()], warnings };
  }
}
