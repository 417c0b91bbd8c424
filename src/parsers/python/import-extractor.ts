/**
 * Python Import Extractor
 * @module parsers/python/import-extractor
 *
 * Import-style strategy. Each `.py` file is one artifact identified by its
 * dotted module path. References are the modules named by `import` and
 * `from ... import` statements, with relative forms resolved against the
 * importing module's package.
 */

import {
  createReference,
  type ArtifactId,
  type Reference,
  type ReferenceKind,
  type SourceArtifact,
  type SourceFile,
} from '../../types/artifact';
import type { ExtractionWarning, WarningCode } from '../../types/warnings';
import { WarningCodes } from '../../types/warnings';
import {
  BaseExtractor,
  createLineLocator,
  type ExtractionResult,
  type SegmentResult,
} from '../base/extractor';
import {
  isIdentifier,
  modulePathToId,
  packageSegments,
  resolveRelativeBase,
} from './module-path';

// ============================================================================
// Source Masking
// ============================================================================

/**
 * Replace comments and string literals (including docstrings) with spaces.
 * Newlines are preserved so offsets and line numbers stay valid.
 */
export function maskPythonSource(text: string): string {
  const out: string[] = [];
  const n = text.length;
  let i = 0;

  const blank = (count: number): void => {
    for (let k = 0; k < count; k++) out.push(' ');
  };

  while (i < n) {
    const ch = text[i];

    if (ch === '#') {
      while (i < n && text[i] !== '\n') {
        out.push(' ');
        i++;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      const triple = text.startsWith(ch.repeat(3), i);
      const quote = triple ? ch.repeat(3) : ch;
      blank(quote.length);
      i += quote.length;

      while (i < n) {
        if (text.startsWith(quote, i)) {
          blank(quote.length);
          i += quote.length;
          break;
        }
        const c = text[i];
        if (c === '\\' && i + 1 < n) {
          out.push(' ');
          out.push(text[i + 1] === '\n' ? '\n' : ' ');
          i += 2;
          continue;
        }
        if (c === '\n') {
          // A single-quoted literal never spans lines
          if (!triple) break;
          out.push('\n');
        } else {
          out.push(' ');
        }
        i++;
      }
      continue;
    }

    out.push(ch);
    i++;
  }

  return out.join('');
}

// ============================================================================
// Logical Statements
// ============================================================================

interface Statement {
  readonly text: string;
  /** Offset of the first non-blank character */
  readonly offset: number;
}

const COMPOUND_HEADER = /^(?:if|elif|else|try|except|finally|with|for|while|def|class|async)(?=[\s:(]|$)/;

/**
 * Index just past the `:` ending a compound statement header, or -1. A walrus
 * `:=` does not end the header.
 */
function compoundBodyStart(text: string): number {
  if (!COMPOUND_HEADER.test(text)) {
    return -1;
  }

  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth = Math.max(0, depth - 1);
    } else if (ch === ':' && depth === 0 && text[i + 1] !== '=') {
      return i + 1;
    }
  }
  return -1;
}

/**
 * A statement, followed by the body written on the same line as its
 * compound header (`try: import x`), repeatedly for nested headers
 */
function withInlineBodies(statement: Statement): Statement[] {
  const result: Statement[] = [statement];
  let current = statement;

  for (let bodyStart = compoundBodyStart(current.text); bodyStart >= 0; bodyStart = compoundBodyStart(current.text)) {
    const rest = current.text.slice(bodyStart);
    const text = rest.trimStart();
    if (text.length === 0) {
      break;
    }
    current = { text, offset: current.offset + bodyStart + rest.length - text.length };
    result.push(current);
  }

  return result;
}

/**
 * Join bracket and backslash continuations, split on `;` and separate inline
 * compound bodies from their headers
 */
function splitStatements(masked: string): Statement[] {
  const statements: Statement[] = [];
  let buffer = '';
  let start = -1;
  let depth = 0;

  const flush = (): void => {
    const text = buffer.trim();
    if (text.length > 0) {
      statements.push(...withInlineBodies({ text, offset: start }));
    }
    buffer = '';
    start = -1;
  };

  for (let i = 0; i < masked.length; i++) {
    const ch = masked[i];

    if (ch === '\\' && masked[i + 1] === '\n') {
      buffer += ' ';
      i++;
      continue;
    }
    if (ch === '\\' && masked.startsWith('\r\n', i + 1)) {
      buffer += ' ';
      i += 2;
      continue;
    }
    if (ch === '\n') {
      if (depth > 0) {
        buffer += ' ';
      } else {
        flush();
      }
      continue;
    }
    if (ch === ';' && depth === 0) {
      flush();
      continue;
    }

    if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth = Math.max(0, depth - 1);
    }

    if (start < 0 && ch.trim() !== '') {
      start = i;
    }
    buffer += ch;
  }
  flush();

  return statements;
}

// ============================================================================
// Statement Parsing
// ============================================================================

const IMPORT_STATEMENT = /^import(?=[\s(]|$)/;
const FROM_STATEMENT = /^from(?=[\s.]|$)/;
const IMPORT_KEYWORD = /(?:^|(?<=[\s.]))import(?=[\s(*]|$)/;
const FROM_MODULE = /^((?:\.\s*)*)([A-Za-z_]\w*(?:\s*\.\s*[A-Za-z_]\w*)*)?$/;
const IMPORT_ITEM = /^([A-Za-z_]\w*(?:\s*\.\s*[A-Za-z_]\w*)*)(?:\s+as\s+[A-Za-z_]\w*)?$/;
const FROM_ITEM = /^([A-Za-z_]\w*)(?:\s+as\s+[A-Za-z_]\w*)?$/;

const FUTURE_MODULE = '__future__';

interface ParsedImport {
  readonly specifier: string;
  readonly kind: ReferenceKind;
}

interface StatementOutcome {
  readonly imports: ParsedImport[];
  readonly problems: Array<{ code: WarningCode; message: string }>;
}

function normalizeDotted(name: string): string {
  return name.replace(/\s+/g, '');
}

function splitItems(list: string): string[] {
  const items = list.split(',').map(item => item.trim());
  // A trailing comma is allowed inside parentheses
  if (items.length > 1 && items[items.length - 1] === '') {
    items.pop();
  }
  return items;
}

function parseImportStatement(text: string): StatementOutcome {
  const result: StatementOutcome = { imports: [], problems: [] };
  const body = text.slice('import'.length).trim();

  if (body.length === 0) {
    result.problems.push({ code: WarningCodes.INVALID_IMPORT, message: 'import statement names no module' });
    return result;
  }

  for (const item of splitItems(body)) {
    const match = IMPORT_ITEM.exec(item);
    if (!match) {
      result.problems.push({ code: WarningCodes.INVALID_IMPORT, message: `Invalid module name in import: '${item}'` });
      continue;
    }
    result.imports.push({ specifier: normalizeDotted(match[1]), kind: 'direct' });
  }

  return result;
}

function parseFromStatement(text: string, pkg: readonly string[]): StatementOutcome {
  const result: StatementOutcome = { imports: [], problems: [] };
  const rest = text.slice('from'.length);
  const keyword = IMPORT_KEYWORD.exec(rest);

  if (!keyword) {
    result.problems.push({ code: WarningCodes.INVALID_IMPORT, message: `Malformed from-import: '${text}'` });
    return result;
  }

  const modulePart = rest.slice(0, keyword.index).trim();
  let names = rest.slice(keyword.index + 'import'.length).trim();
  const moduleMatch = FROM_MODULE.exec(modulePart);

  if (!moduleMatch || (moduleMatch[1].length === 0 && moduleMatch[2] === undefined)) {
    result.problems.push({ code: WarningCodes.INVALID_IMPORT, message: `Invalid module in from-import: '${modulePart}'` });
    return result;
  }

  const level = (moduleMatch[1].match(/\./g) ?? []).length;
  const moduleName = moduleMatch[2] === undefined ? '' : normalizeDotted(moduleMatch[2]);

  if (level === 0 && moduleName === FUTURE_MODULE) {
    return result;
  }

  let base: string[];
  if (level === 0) {
    base = moduleName.split('.');
  } else {
    const anchor = resolveRelativeBase(pkg, level);
    if (anchor === null) {
      result.problems.push({
        code: WarningCodes.RELATIVE_IMPORT_BEYOND_ROOT,
        message: `Relative import '${modulePart}' climbs above the analysis root`,
      });
      return result;
    }
    base = moduleName ? [...anchor, ...moduleName.split('.')] : anchor;
  }

  if (names === '*') {
    if (base.length === 0) {
      result.problems.push({
        code: WarningCodes.RELATIVE_IMPORT_BEYOND_ROOT,
        message: `Relative wildcard import '${modulePart}' names the analysis root`,
      });
      return result;
    }
    result.imports.push({ specifier: base.join('.'), kind: 'wildcard' });
    return result;
  }

  if (names.startsWith('(')) {
    if (!names.endsWith(')')) {
      result.problems.push({ code: WarningCodes.INVALID_IMPORT, message: `Unbalanced parentheses in from-import: '${text}'` });
      return result;
    }
    names = names.slice(1, -1).trim();
  }

  if (names.length === 0) {
    result.problems.push({ code: WarningCodes.INVALID_IMPORT, message: `from-import of '${modulePart}' names nothing` });
    return result;
  }

  for (const item of splitItems(names)) {
    const match = FROM_ITEM.exec(item);
    if (!match || !isIdentifier(match[1])) {
      result.problems.push({ code: WarningCodes.INVALID_IMPORT, message: `Invalid name in from-import: '${item}'` });
      continue;
    }
    result.imports.push({ specifier: [...base, match[1]].join('.'), kind: 'direct' });
  }

  return result;
}

// ============================================================================
// Extractor
// ============================================================================

export interface PythonImportExtractorOptions {
  /** Accepted file extensions (default: ['.py']) */
  extensions?: readonly string[];
}

/**
 * Import-style reference extractor for Python modules
 */
export class PythonImportExtractor extends BaseExtractor {
  readonly family = 'import-style' as const;
  readonly name = 'python-imports';
  readonly version = '1.0.0';

  constructor(options: PythonImportExtractorOptions = {}) {
    super(options.extensions ?? ['.py']);
  }

  segment(file: SourceFile): SegmentResult {
    return {
      artifacts: [
        {
          id: modulePathToId(file.path),
          family: this.family,
          path: file.path,
          line: 1,
          text: file.text,
        },
      ],
      warnings: [],
    };
  }

  extract(artifact: SourceArtifact): ExtractionResult {
    const masked = maskPythonSource(artifact.text);
    const lineOf = createLineLocator(masked);
    const pkg = packageSegments(artifact.id, artifact.path);
    const seen = new Map<string, Reference>();
    const warnings: ExtractionWarning[] = [];

    for (const statement of splitStatements(masked)) {
      let outcome: StatementOutcome;
      if (IMPORT_STATEMENT.test(statement.text)) {
        outcome = parseImportStatement(statement.text);
      } else if (FROM_STATEMENT.test(statement.text)) {
        outcome = parseFromStatement(statement.text, pkg);
      } else {
        continue;
      }

      const line = artifact.line + lineOf(statement.offset) - 1;

      for (const problem of outcome.problems) {
        warnings.push(this.warning(problem.code, problem.message, artifact.path, artifact.id, line));
      }

      for (const parsed of outcome.imports) {
        const key = `${parsed.specifier}\u0000${parsed.kind}`;
        if (!seen.has(key)) {
          seen.set(key, createReference(artifact.id, parsed.specifier, parsed.kind, line));
        }
      }
    }

    return { references: [...seen.values()], warnings };
  }

  /**
   * Package aggregation: strip trailing segments until a known module matches
   */
  override resolveFallback(specifier: string, knownIds: ReadonlySet<ArtifactId>): ArtifactId | null {
    const segments = specifier.split('.');
    for (let length = segments.length - 1; length > 0; length--) {
      const candidate = segments.slice(0, length).join('.');
      if (knownIds.has(candidate)) {
        return candidate;
      }
    }
    return null;
  }
}
