/**
 * Dependency Analysis Service
 * @module services/analysis-service
 *
 * Query facade over the whole pipeline: read the tree under a root, extract
 * references per file in a bounded worker pool, build and analyze the graph,
 * then answer per-node queries and exports from the resulting session.
 */

import type { ArtifactFamily, ArtifactId, ExtractedArtifact } from '../types/artifact';
import type { AnalysisResult, ClosureOptions, ExternalReference, GraphNode } from '../types/graph';
import type { AnalysisWarning } from '../types/warnings';
import { AnalysisCancelledError } from '../errors/domain';
import { defaultConfig, type AnalyzerConfig } from '../config/schema';
import { loadConfig, type ConfigLoaderOptions } from '../config/loader';
import { createModuleLogger, initLogger, withLogging, type StructuredLogger } from '../logging/logger';
import { ArtifactReader } from '../reader/artifact-reader';
import { createDefaultRegistry, type ExtractorRegistry } from '../parsers/registry/extractor-registry';
import type { DependencyGraph } from '../graph/dependency-graph';
import { buildGraph, type FallbackResolvers } from '../graph/graph-builder';
import { analyzeGraph, dependenciesOf, dependentsOf } from '../analysis/graph-analyzer';
import { exportGraph, type ExportOptions, type ExportResult } from '../export/exporter';
import { summarizeGraph, type GraphSummary } from '../export/summary';
import { forEachWithLimit } from '../utils/concurrency';
import { compareStrings } from '../utils/sort';

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeOptions {
  /** Aborting stops new files from starting; `analyze` then rejects */
  signal?: AbortSignal;
  /** Overrides `analysis.concurrency` for this run */
  concurrency?: number;
}

export interface AnalysisServiceDependencies {
  readonly config?: AnalyzerConfig;
  readonly registry?: ExtractorRegistry;
  readonly logger?: StructuredLogger;
}

function warningLocation(warning: AnalysisWarning): string {
  return warning.type === 'resolution' ? warning.artifactId : warning.path;
}

function warningLine(warning: AnalysisWarning): number {
  return warning.type === 'extraction' ? warning.line ?? 0 : 0;
}

/**
 * Read and extraction warnings arrive in worker completion order; sort them
 * by location so a session's warning list does not depend on scheduling.
 */
function compareWarnings(a: AnalysisWarning, b: AnalysisWarning): number {
  return (
    compareStrings(warningLocation(a), warningLocation(b)) ||
    warningLine(a) - warningLine(b) ||
    compareStrings(a.code, b.code) ||
    compareStrings(a.message, b.message)
  );
}

// ============================================================================
// Session
// ============================================================================

export interface AnalysisSessionData {
  readonly root: string;
  readonly family: ArtifactFamily;
  readonly graph: DependencyGraph;
  readonly analysis: AnalysisResult;
  readonly externalReferences: readonly ExternalReference[];
  readonly warnings: readonly AnalysisWarning[];
  readonly durationMs: number;
}

/**
 * Result of one analysis run. The graph and everything derived from it are
 * immutable, so queries may run concurrently.
 */
export class AnalysisSession implements AnalysisSessionData {
  readonly root: string;
  readonly family: ArtifactFamily;
  readonly graph: DependencyGraph;
  readonly analysis: AnalysisResult;
  readonly externalReferences: readonly ExternalReference[];
  readonly warnings: readonly AnalysisWarning[];
  readonly durationMs: number;

  constructor(data: AnalysisSessionData, private readonly config: AnalyzerConfig = defaultConfig()) {
    this.root = data.root;
    this.family = data.family;
    this.graph = data.graph;
    this.analysis = data.analysis;
    this.externalReferences = Object.freeze([...data.externalReferences]);
    this.warnings = Object.freeze([...data.warnings]);
    this.durationMs = data.durationMs;
  }

  /**
   * @throws NodeNotFoundError for an unknown id
   */
  getNode(id: ArtifactId): GraphNode {
    return this.graph.requireNode(id);
  }

  dependenciesOf(id: ArtifactId, options?: ClosureOptions): ArtifactId[] {
    return dependenciesOf(this.graph, id, options);
  }

  dependentsOf(id: ArtifactId, options?: ClosureOptions): ArtifactId[] {
    return dependentsOf(this.graph, id, options);
  }

  /**
   * @throws UnsupportedExportFormatError for an unknown format
   */
  export(format: string, options: ExportOptions = {}): ExportResult {
    return exportGraph(
      format,
      {
        graph: this.graph,
        analysis: this.analysis,
        externalReferences: this.externalReferences,
        family: this.family,
        warningCount: this.warnings.length,
      },
      {
        rankdir: this.config.export.dot.rankdir,
        jsonIndent: this.config.export.jsonIndent,
        topN: this.config.summary.topN,
        ...options,
      }
    );
  }

  summarize(topN: number = this.config.summary.topN): GraphSummary {
    return summarizeGraph(
      {
        graph: this.graph,
        analysis: this.analysis,
        externalReferences: this.externalReferences,
        family: this.family,
        warningCount: this.warnings.length,
      },
      topN
    );
  }
}

// ============================================================================
// Service
// ============================================================================

export class DependencyAnalysisService {
  private readonly config: AnalyzerConfig;
  private readonly registry: ExtractorRegistry;
  private readonly logger: StructuredLogger;

  constructor(deps: AnalysisServiceDependencies = {}) {
    this.config = deps.config ?? defaultConfig();
    this.registry = deps.registry ?? createDefaultRegistry(this.config.families);
    this.logger = deps.logger ?? createModuleLogger('analysis-service');
  }

  /**
   * Analyze every artifact of one family under `root`
   *
   * @throws UnsupportedFamilyError when no extractor handles `family`
   * @throws RootNotFoundError when `root` is missing or not a directory
   * @throws AnalysisCancelledError when `signal` aborts before the run completes
   */
  async analyze(root: string, family: string, options: AnalyzeOptions = {}): Promise<AnalysisSession> {
    const extractor = this.registry.get(family);
    const { signal } = options;
    const reader = new ArtifactReader(root, extractor, {
      maxFileSize: this.config.analysis.maxFileSize,
      ignoreDirectories: this.config.analysis.ignoreDirectories,
      includeHidden: this.config.analysis.includeHidden,
      logger: this.logger,
    });
    const startTime = performance.now();

    this.logger.analysisStarted(reader.root, extractor.family);

    try {
      if (signal?.aborted) {
        throw new AnalysisCancelledError(reader.root, signal.reason);
      }
      await reader.ensureRoot();

      const warnings: AnalysisWarning[] = [];
      const extracted: ExtractedArtifact[] = [];

      await withLogging(this.logger, 'extraction', () => forEachWithLimit(
        reader.files(warning => warnings.push(warning)),
        async file => {
          const result = await reader.load(file);
          if (result.type === 'warning') {
            warnings.push(result.warning);
            return;
          }

          warnings.push(...result.warnings);
          let referenceCount = 0;
          for (const artifact of result.artifacts) {
            const { references, warnings: extractionWarnings } = extractor.extract(artifact);
            warnings.push(...extractionWarnings);
            extracted.push({ artifact, references });
            referenceCount += references.length;
          }
          this.logger.extractionCompleted(file.path, result.artifacts.length, referenceCount);
        },
        { concurrency: options.concurrency ?? this.config.analysis.concurrency, signal }
      ));

      if (signal?.aborted) {
        throw new AnalysisCancelledError(reader.root, signal.reason);
      }

      const resolvers: FallbackResolvers = {};
      resolvers[extractor.family] = extractor;
      const built = buildGraph(extracted, { resolvers, logger: this.logger });
      const analysis = analyzeGraph(built.graph);
      this.logger.cyclesDetected(analysis.cycles.length);

      const durationMs = Math.round(performance.now() - startTime);
      this.logger.analysisCompleted(reader.root, durationMs, built.graph.nodeCount, built.graph.edgeCount);

      return new AnalysisSession(
        {
          root: reader.root,
          family: extractor.family,
          graph: built.graph,
          analysis,
          externalReferences: built.externalReferences,
          warnings: [...warnings.sort(compareWarnings), ...built.warnings],
          durationMs,
        },
        this.config
      );
    } catch (error) {
      this.logger.analysisFailed(reader.root, error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  supportedFamilies(): string[] {
    return this.registry.families();
  }
}

/**
 * Load configuration, configure the root logger from it and build a service
 */
export async function createAnalysisService(options?: ConfigLoaderOptions): Promise<DependencyAnalysisService> {
  const config = await loadConfig(options);
  initLogger(undefined, {
    level: config.logging.level,
    pretty: config.logging.pretty,
    environment: config.env,
  });
  return new DependencyAnalysisService({ config });
}
