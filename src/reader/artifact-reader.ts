/**
 * Artifact Reader
 * @module reader/artifact-reader
 *
 * Enumerates source files of one family under an analysis root and turns
 * them into artifacts through the family's extractor. Enumeration is lazy
 * and restartable; unreadable files become warnings instead of failures.
 */

import { promises as fs, type Dirent } from 'node:fs';
import * as path from 'node:path';

import type { SourceArtifact } from '../types/artifact';
import {
  WarningCodes,
  type ArtifactReadWarning,
  type ExtractionWarning,
} from '../types/warnings';
import type { ReferenceExtractor } from '../parsers/base/extractor';
import { RootNotFoundError } from '../errors/domain';
import { getErrnoCode, getErrorMessage } from '../errors/base';
import { createModuleLogger, type StructuredLogger } from '../logging/logger';
import { DEFAULT_IGNORE_DIRECTORIES } from '../config/schema';
import { compareStrings } from '../utils/sort';

// ============================================================================
// Types
// ============================================================================

/**
 * A file selected for reading
 */
export interface CandidateFile {
  /** Root-relative path, POSIX separators */
  readonly path: string;
  readonly absolutePath: string;
}

/**
 * Outcome of reading one file
 */
export type LoadResult =
  | {
      readonly type: 'artifacts';
      readonly artifacts: SourceArtifact[];
      readonly warnings: ExtractionWarning[];
    }
  | { readonly type: 'warning'; readonly warning: ArtifactReadWarning };

/**
 * Item of the reader's artifact sequence
 */
export type ReadItem =
  | { readonly type: 'artifact'; readonly artifact: SourceArtifact }
  | { readonly type: 'warning'; readonly warning: ArtifactReadWarning | ExtractionWarning };

export interface ArtifactReaderOptions {
  /** Files above this size in bytes are skipped (default: 5 MiB) */
  maxFileSize?: number;
  /** Directory names never descended into */
  ignoreDirectories?: readonly string[];
  /** Read dot-files and dot-directories (default: false) */
  includeHidden?: boolean;
  logger?: StructuredLogger;
}

const BINARY_SNIFF_BYTES = 8192;
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

function looksBinary(buffer: Buffer): boolean {
  return buffer.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

// ============================================================================
// Reader
// ============================================================================

export class ArtifactReader implements AsyncIterable<ReadItem> {
  readonly root: string;
  private readonly strategy: ReferenceExtractor;
  private readonly maxFileSize: number;
  private readonly ignoreDirectories: ReadonlySet<string>;
  private readonly includeHidden: boolean;
  private readonly logger: StructuredLogger;

  constructor(root: string, strategy: ReferenceExtractor, options: ArtifactReaderOptions = {}) {
    this.root = path.resolve(root);
    this.strategy = strategy;
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.ignoreDirectories = new Set<string>(options.ignoreDirectories ?? DEFAULT_IGNORE_DIRECTORIES);
    this.includeHidden = options.includeHidden ?? false;
    this.logger = options.logger ?? createModuleLogger('artifact-reader');
  }

  /**
   * @throws RootNotFoundError when the root is missing or not a directory
   */
  async ensureRoot(): Promise<void> {
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(this.root)).isDirectory();
    } catch (error) {
      throw new RootNotFoundError(this.root, {
        cause: error instanceof Error ? error : undefined,
        details: { errno: getErrnoCode(error) },
      });
    }

    if (!isDirectory) {
      throw new RootNotFoundError(this.root, { details: { reason: 'not a directory' } });
    }
  }

  /**
   * Candidate files in name order. Every call walks the tree afresh.
   * Directories that cannot be listed are reported through `onWarning`.
   */
  async *files(onWarning?: (warning: ArtifactReadWarning) => void): AsyncGenerator<CandidateFile> {
    yield* this.walk(this.root, '', onWarning);
  }

  private async *walk(
    dir: string,
    relative: string,
    onWarning?: (warning: ArtifactReadWarning) => void
  ): AsyncGenerator<CandidateFile> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      const warning = this.readWarning(relative || '.', error);
      this.logger.artifactSkipped(warning.path, warning.message);
      onWarning?.(warning);
      return;
    }

    entries.sort((a, b) => compareStrings(a.name, b.name));

    for (const entry of entries) {
      const entryPath = relative ? `${relative}/${entry.name}` : entry.name;

      if (!this.includeHidden && entry.name.startsWith('.')) {
        continue;
      }

      if (entry.isSymbolicLink()) {
        this.logger.artifactSkipped(entryPath, 'symbolic link');
        continue;
      }

      if (entry.isDirectory()) {
        if (!this.ignoreDirectories.has(entry.name)) {
          yield* this.walk(path.join(dir, entry.name), entryPath, onWarning);
        }
        continue;
      }

      if (entry.isFile() && this.strategy.canExtract(entry.name)) {
        yield { path: entryPath, absolutePath: path.join(dir, entry.name) };
      }
    }
  }

  /**
   * Read one file and segment it into artifacts
   */
  async load(file: CandidateFile): Promise<LoadResult> {
    let buffer: Buffer;
    try {
      const info = await fs.stat(file.absolutePath);
      if (info.size > this.maxFileSize) {
        const message = `File is ${info.size} bytes, limit is ${this.maxFileSize}`;
        this.logger.artifactSkipped(file.path, message);
        return {
          type: 'warning',
          warning: { type: 'artifact-read', code: WarningCodes.FILE_TOO_LARGE, message, path: file.path },
        };
      }
      buffer = await fs.readFile(file.absolutePath);
    } catch (error) {
      const warning = this.readWarning(file.path, error);
      this.logger.artifactSkipped(file.path, warning.message);
      return { type: 'warning', warning };
    }

    if (looksBinary(buffer)) {
      this.logger.artifactSkipped(file.path, 'binary content');
      return { type: 'artifacts', artifacts: [], warnings: [] };
    }

    let text = buffer.toString('utf8');
    if (text.charCodeAt(0) === 0xfeff) {
      text = text.slice(1);
    }

    const segmented = this.strategy.segment({ path: file.path, absolutePath: file.absolutePath, text });
    return { type: 'artifacts', artifacts: segmented.artifacts, warnings: segmented.warnings };
  }

  /**
   * The artifact sequence: artifacts and the warnings met while reading them
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<ReadItem> {
    await this.ensureRoot();

    const pending: ArtifactReadWarning[] = [];
    for await (const file of this.files(warning => pending.push(warning))) {
      while (pending.length > 0) {
        const warning = pending.shift();
        if (warning) yield { type: 'warning', warning };
      }

      const result = await this.load(file);
      if (result.type === 'warning') {
        yield { type: 'warning', warning: result.warning };
        continue;
      }
      for (const warning of result.warnings) {
        yield { type: 'warning', warning };
      }
      for (const artifact of result.artifacts) {
        yield { type: 'artifact', artifact };
      }
    }

    for (const warning of pending) {
      yield { type: 'warning', warning };
    }
  }

  private readWarning(filePath: string, error: unknown): ArtifactReadWarning {
    const errno = getErrnoCode(error);
    return {
      type: 'artifact-read',
      code: WarningCodes.FILE_READ_ERROR,
      message: errno ? `${errno}: ${getErrorMessage(error)}` : getErrorMessage(error),
      path: filePath,
    };
  }
}
