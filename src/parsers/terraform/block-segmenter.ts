/**
 * Terraform Block Segmenter
 * @module parsers/terraform/block-segmenter
 *
 * Splits a Terraform file into addressable artifacts: one per top-level
 * block, and one per attribute of a `locals` block. Works on masked text
 * (see hcl-scanner) so braces and quotes inside strings and comments are
 * never mistaken for structure.
 */

import type { ArtifactId, SourceArtifact, SourceFile } from '../../types/artifact';
import { WarningCodes, type ExtractionWarning, type WarningCode } from '../../types/warnings';
import { createLineLocator, type LineLocator, type SegmentResult } from '../base/extractor';
import { maskHcl } from './hcl-scanner';

// ============================================================================
// Types
// ============================================================================

/**
 * A top-level block located in a file
 */
export interface HCLBlock {
  readonly type: string;
  readonly labels: readonly string[];
  /** Offset of the block type keyword */
  readonly headerOffset: number;
  /** Offset just after the opening brace */
  readonly bodyStart: number;
  /** Offset of the closing brace */
  readonly bodyEnd: number;
}

/**
 * An `name = value` attribute directly inside a block body
 */
export interface HCLAttribute {
  readonly name: string;
  readonly nameOffset: number;
  /** Offset just after `=` */
  readonly valueStart: number;
  /** Offset where the next attribute starts, or the body end */
  readonly valueEnd: number;
}

/**
 * Blocks that configure Terraform itself rather than declaring an address
 */
export const NON_ARTIFACT_BLOCKS: ReadonlySet<string> = new Set([
  'terraform',
  'moved',
  'import',
  'check',
  'removed',
]);

const IDENTIFIER = /[A-Za-z_][\w-]*/y;
const ATTRIBUTE = /([A-Za-z_][\w-]*)[ \t]*=(?!=)/y;

// ============================================================================
// Structure Scanning
// ============================================================================

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

function lineEnd(text: string, from: number): number {
  const index = text.indexOf('\n', from);
  return index === -1 ? text.length : index;
}

function matchAt(pattern: RegExp, text: string, offset: number): RegExpExecArray | null {
  pattern.lastIndex = offset;
  return pattern.exec(text);
}

/**
 * Offset of the bracket closing the one at `open`, or -1
 */
export function findClosing(masked: string, open: number, end = masked.length): number {
  const opener = masked[open];
  const closer = opener === '{' ? '}' : opener === '[' ? ']' : ')';
  let depth = 0;

  for (let i = open; i < end; i++) {
    const ch = masked[i];
    if (ch === opener) {
      depth++;
    } else if (ch === closer) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

interface BlockScan {
  readonly blocks: HCLBlock[];
  readonly problems: Array<{ code: WarningCode; message: string; offset: number }>;
}

/**
 * Locate top-level blocks in masked source
 */
export function scanTopLevelBlocks(text: string, masked: string): BlockScan {
  const result: BlockScan = { blocks: [], problems: [] };
  let pos = 0;

  while (pos < masked.length) {
    while (pos < masked.length && isBlank(masked[pos])) pos++;
    if (pos >= masked.length) break;

    const header = pos;
    const typeMatch = matchAt(IDENTIFIER, masked, pos);
    if (!typeMatch) {
      result.problems.push({
        code: WarningCodes.MALFORMED_BLOCK,
        message: `Unexpected '${masked[pos]}' at top level`,
        offset: pos,
      });
      pos = lineEnd(masked, pos) + 1;
      continue;
    }

    const type = typeMatch[0];
    const labels: string[] = [];
    let p = pos + type.length;

    for (;;) {
      while (masked[p] === ' ' || masked[p] === '\t') p++;

      if (masked[p] === '"') {
        const close = masked.indexOf('"', p + 1);
        if (close === -1 || masked.slice(p, close).includes('\n')) break;
        labels.push(text.slice(p + 1, close));
        p = close + 1;
        continue;
      }

      const bare = matchAt(IDENTIFIER, masked, p);
      if (!bare) break;
      labels.push(bare[0]);
      p += bare[0].length;
    }

    // Top-level attribute (variable definitions files); not a block
    if (masked[p] === '=' && labels.length === 0) {
      pos = lineEnd(masked, p) + 1;
      continue;
    }

    if (masked[p] !== '{') {
      result.problems.push({
        code: WarningCodes.MALFORMED_BLOCK,
        message: `Block '${type}' has no body`,
        offset: header,
      });
      pos = lineEnd(masked, p) + 1;
      continue;
    }

    const close = findClosing(masked, p);
    if (close === -1) {
      result.problems.push({
        code: WarningCodes.UNCLOSED_BLOCK,
        message: `Block '${[type, ...labels].join(' ')}' is never closed`,
        offset: header,
      });
      break;
    }

    result.blocks.push({ type, labels, headerOffset: header, bodyStart: p + 1, bodyEnd: close });
    pos = close + 1;
  }

  return result;
}

/**
 * Attributes assigned directly in a body (nested blocks are skipped)
 */
export function scanAttributes(masked: string, start: number, end: number): HCLAttribute[] {
  const found: Array<{ name: string; nameOffset: number; valueStart: number }> = [];
  let depth = 0;
  let lineStart = true;

  for (let i = start; i < end; i++) {
    const ch = masked[i];

    if (ch === '\n') {
      lineStart = true;
      continue;
    }
    if (lineStart && !isBlank(ch)) {
      lineStart = false;
      if (depth === 0) {
        const match = matchAt(ATTRIBUTE, masked, i);
        if (match && i + match[0].length <= end) {
          found.push({ name: match[1], nameOffset: i, valueStart: i + match[0].length });
          i += match[0].length - 1;
          continue;
        }
      }
    }

    if (ch === '{' || ch === '[' || ch === '(') {
      depth++;
    } else if (ch === '}' || ch === ']' || ch === ')') {
      depth = Math.max(0, depth - 1);
    }
  }

  return found.map((attr, index) => ({
    ...attr,
    valueEnd: index + 1 < found.length ? found[index + 1].nameOffset : end,
  }));
}

// ============================================================================
// Segmentation
// ============================================================================

const ALIAS_VALUE = /^\s*"([^"\n]*)"/;

/**
 * Address of a labelled block, or null for labels that do not fit its type
 */
function blockAddress(type: string, labels: readonly string[]): ArtifactId | null {
  switch (type) {
    case 'resource':
      return labels.length === 2 ? `${labels[0]}.${labels[1]}` : null;
    case 'data':
      return labels.length === 2 ? `data.${labels[0]}.${labels[1]}` : null;
    case 'module':
      return labels.length === 1 ? `module.${labels[0]}` : null;
    case 'variable':
      return labels.length === 1 ? `var.${labels[0]}` : null;
    case 'output':
      return labels.length === 1 ? `output.${labels[0]}` : null;
    case 'provider':
      return labels.length === 1 ? `provider.${labels[0]}` : null;
    default:
      return null;
  }
}

const ADDRESSABLE_BLOCKS: ReadonlySet<string> = new Set([
  'resource',
  'data',
  'module',
  'variable',
  'output',
  'provider',
]);

/**
 * Cut a Terraform file into artifacts
 */
export function segmentTerraformFile(file: SourceFile): SegmentResult {
  const { masked, issues } = maskHcl(file.text);
  const lineOf: LineLocator = createLineLocator(file.text);
  const artifacts: SourceArtifact[] = [];
  const warnings: ExtractionWarning[] = [];

  const warn = (code: WarningCode, message: string, offset: number, artifactId: ArtifactId | null = null): void => {
    warnings.push({ type: 'extraction', code, message, path: file.path, artifactId, line: lineOf(offset) });
  };

  const artifact = (id: ArtifactId, start: number, end: number): SourceArtifact => ({
    id,
    family: 'resource-style',
    path: file.path,
    line: lineOf(start),
    text: file.text.slice(start, end),
  });

  for (const issue of issues) {
    warn(issue.code, issue.message, issue.offset);
  }

  const scan = scanTopLevelBlocks(file.text, masked);
  for (const problem of scan.problems) {
    warn(problem.code, problem.message, problem.offset);
  }

  for (const block of scan.blocks) {
    if (NON_ARTIFACT_BLOCKS.has(block.type)) {
      continue;
    }

    if (block.type === 'locals') {
      for (const attr of scanAttributes(masked, block.bodyStart, block.bodyEnd)) {
        artifacts.push(artifact(`local.${attr.name}`, attr.valueStart, attr.valueEnd));
      }
      continue;
    }

    if (!ADDRESSABLE_BLOCKS.has(block.type)) {
      continue;
    }

    let id = blockAddress(block.type, block.labels);
    if (id === null) {
      warn(
        WarningCodes.MALFORMED_BLOCK,
        `Block '${block.type}' has ${block.labels.length} label(s)`,
        block.headerOffset
      );
      continue;
    }

    if (block.type === 'provider') {
      const alias = scanAttributes(masked, block.bodyStart, block.bodyEnd).find(attr => attr.name === 'alias');
      const aliasValue = alias ? ALIAS_VALUE.exec(file.text.slice(alias.valueStart, alias.valueEnd)) : null;
      if (aliasValue) {
        id = `${id}.${aliasValue[1]}`;
      }
    }

    artifacts.push(artifact(id, block.bodyStart, block.bodyEnd));
  }

  return { artifacts, warnings };
}
