/**
 * Dependency Analysis Service Tests
 * @module tests/services/analysis-service
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import path from 'node:path';
import {
  AnalysisSession,
  DependencyAnalysisService,
  createAnalysisService,
} from '@/services/analysis-service';
import { validateConfig } from '@/config/loader';
import { createLogger } from '@/logging/logger';
import {
  AnalysisCancelledError,
  NodeNotFoundError,
  RootNotFoundError,
  UnsupportedFamilyError,
} from '@/errors/domain';
import { WarningCodes } from '@/types/warnings';
import { analyzeGraph } from '@/analysis/graph-analyzer';
import { createLayeredGraph, createTempTree, removeTempTree, type TreeSpec } from '../factories';

const roots: string[] = [];

async function tree(files: TreeSpec): Promise<string> {
  const root = await createTempTree(files);
  roots.push(root);
  return root;
}

function silentLogger() {
  return createLogger('test', undefined, { level: 'silent' });
}

afterEach(async () => {
  await Promise.all(roots.splice(0).map(removeTempTree));
});

describe('DependencyAnalysisService', () => {
  const service = new DependencyAnalysisService({ logger: silentLogger() });

  describe('import-style scenarios', () => {
    it('should detect a three-module cycle without external references', async () => {
      const root = await tree({
        'a.py': 'import b\n',
        'b.py': 'import c\n',
        'c.py': 'import a\n',
      });

      const session = await service.analyze(root, 'import-style');

      expect(session.graph.nodeIds()).toEqual(['a', 'b', 'c']);
      expect(session.analysis.cycles).toEqual([['a', 'b', 'c']]);
      expect(session.externalReferences).toEqual([]);
      expect(session.warnings).toEqual([]);
    });

    it('should resolve a submodule import to the package that exists', async () => {
      const root = await tree({
        'x.py': 'import y.z\n',
        'y/__init__.py': '',
      });

      const session = await service.analyze(root, 'import-style');

      expect(session.graph.edges.map(edge => edge.id)).toEqual(['x->y:direct']);
      expect(session.externalReferences).toEqual([]);
    });

    it('should record a missing module as one external reference', async () => {
      const root = await tree({ 'm.py': 'import nowhere.missing\n' });

      const session = await service.analyze(root, 'import-style');

      expect(session.graph.edgeCount).toBe(0);
      expect(session.externalReferences).toEqual([{ source: 'm', specifier: 'nowhere.missing' }]);
    });

    it('should produce an empty result for an empty root', async () => {
      const root = await tree({});

      const session = await service.analyze(root, 'import-style');

      expect(session.graph.nodeCount).toBe(0);
      expect(session.graph.edgeCount).toBe(0);
      expect(session.analysis).toEqual({ cycles: [], centrality: [] });
      expect(session.externalReferences).toEqual([]);
      expect(session.warnings).toEqual([]);
    });
  });

  describe('resource-style scenarios', () => {
    it('should resolve an indexed resource reference to a conditional edge', async () => {
      const root = await tree({
        'main.tf': [
          'resource "aws_subnet" "public" {',
          '  count = 2',
          '}',
          '',
          'resource "aws_instance" "bastion" {',
          '  subnet_id = aws_subnet.public[0].id',
          '}',
          '',
        ].join('\n'),
      });

      const session = await service.analyze(root, 'resource-style');

      expect(session.family).toBe('resource-style');
      expect(session.graph.edges.map(edge => edge.id)).toEqual([
        'aws_instance.bastion->aws_subnet.public:conditional',
      ]);
    });

    it('should link artifacts across files of a module directory', async () => {
      const root = await tree({
        'variables.tf': 'variable "region" {}\n',
        'main.tf': 'provider "aws" {\n  region = var.region\n}\n',
        'outputs.tf': 'output "region" {\n  value = var.region\n}\n',
      });

      const session = await service.analyze(root, 'resource-style');

      expect(session.dependentsOf('var.region')).toEqual(['output.region', 'provider.aws']);
      expect(session.getNode('var.region').path).toBe('variables.tf');
    });
  });

  describe('warnings', () => {
    it('should sort read and extraction warnings by location and append resolution warnings', async () => {
      const root = await tree({
        'b.py': 'import 9lives\n',
        'a.py': 'import os\n# padding padding padding\n',
        'pkg.py': '',
        'pkg/__init__.py': '',
      });
      const small = new DependencyAnalysisService({
        config: validateConfig({ analysis: { maxFileSize: 20 } }),
        logger: silentLogger(),
      });

      const session = await small.analyze(root, 'import-style');

      expect(session.warnings.map(warning => [warning.type, warning.code])).toEqual([
        ['artifact-read', WarningCodes.FILE_TOO_LARGE],
        ['extraction', WarningCodes.INVALID_IMPORT],
        ['resolution', WarningCodes.DUPLICATE_ARTIFACT],
      ]);
      expect(session.getNode('pkg').path).toBe('pkg.py');
    });
  });

  describe('failures', () => {
    it('should reject an unsupported family', async () => {
      await expect(service.analyze('.', 'cobol')).rejects.toBeInstanceOf(UnsupportedFamilyError);
    });

    it('should reject a missing root and log the failure', async () => {
      const logger = silentLogger();
      const failed = vi.spyOn(logger, 'analysisFailed');
      const root = await tree({});
      const missing = path.join(root, 'absent');

      await expect(
        new DependencyAnalysisService({ logger }).analyze(missing, 'import-style')
      ).rejects.toBeInstanceOf(RootNotFoundError);
      expect(failed).toHaveBeenCalledTimes(1);
      expect(failed.mock.calls[0][0]).toBe(missing);
    });

    it('should reject when already cancelled', async () => {
      const root = await tree({ 'a.py': '' });

      await expect(
        service.analyze(root, 'import-style', { signal: AbortSignal.abort() })
      ).rejects.toBeInstanceOf(AnalysisCancelledError);
    });

    it('should stop taking files once cancelled mid-run', async () => {
      const root = await tree({ 'a.py': '', 'b.py': '', 'c.py': '' });
      const controller = new AbortController();
      const logger = silentLogger();
      const extracted = vi.spyOn(logger, 'extractionCompleted').mockImplementation(() => {
        controller.abort();
      });

      await expect(
        new DependencyAnalysisService({ logger }).analyze(root, 'import-style', {
          signal: controller.signal,
          concurrency: 1,
        })
      ).rejects.toBeInstanceOf(AnalysisCancelledError);
      expect(extracted).toHaveBeenCalledTimes(1);
    });
  });

  it('should list supported families', () => {
    expect(service.supportedFamilies()).toEqual(['import-style', 'resource-style']);
  });
});

describe('AnalysisSession', () => {
  const graph = createLayeredGraph();
  const session = new AnalysisSession(
    {
      root: '/virtual',
      family: 'import-style',
      graph,
      analysis: analyzeGraph(graph),
      externalReferences: [{ source: 'app', specifier: 'os' }],
      warnings: [],
      durationMs: 0,
    },
    validateConfig({ export: { dot: { rankdir: 'TB' } }, summary: { topN: 2 } })
  );

  it('should answer closure queries', () => {
    expect(session.dependenciesOf('app', { transitive: true })).toEqual(['db', 'repo', 'service', 'util']);
    expect(session.dependenciesOf('app')).toEqual(['service', 'util']);
    expect(session.dependentsOf('db', { transitive: true })).toEqual(['app', 'repo', 'service']);
    expect(session.dependentsOf('db')).toEqual(['repo']);
  });

  it('should reject unknown nodes', () => {
    expect(() => session.getNode('missing')).toThrow(NodeNotFoundError);
    expect(() => session.dependenciesOf('missing')).toThrow(NodeNotFoundError);
  });

  it('should export with configured defaults and per-call overrides', () => {
    expect(session.export('dot').content.split('\n')[1]).toBe('  rankdir=TB;');
    expect(session.export('dot', { rankdir: 'RL' }).content.split('\n')[1]).toBe('  rankdir=RL;');
  });

  it('should summarize with the configured top count', () => {
    const summary = session.summarize();

    expect(summary.mostCentral.map(entry => entry.id)).toEqual(['app', 'repo']);
    expect(summary.externalReferenceCount).toBe(1);
    expect(session.summarize(1).mostCentral).toHaveLength(1);
  });
});

describe('createAnalysisService', () => {
  it('should build a service from configuration sources', async () => {
    const cwd = await tree({ 'depgraph.config.yaml': 'logging:\n  level: silent\n' });
    const root = await tree({ 'a.py': 'import b\n', 'b.py': '' });

    const service = await createAnalysisService({ cwd, env: {} });
    const session = await service.analyze(root, 'import-style');

    expect(session.graph.successors('a')).toEqual(['b']);
  });
});
