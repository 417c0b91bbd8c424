/**
 * Summary and Context Document Tests
 * @module tests/export/summary
 */

import { describe, it, expect } from 'vitest';
import { renderContextMarkdown, summarizeGraph } from '@/export/summary';
import { DependencyGraph } from '@/graph/dependency-graph';
import { createCyclicGraph, createLayeredGraph } from '../factories';

describe('summarizeGraph', () => {
  it('should count nodes, edges, categories and degrees', () => {
    const summary = summarizeGraph(
      {
        graph: createLayeredGraph(),
        externalReferences: [{ source: 'app', specifier: 'os' }],
        warningCount: 2,
      },
      2
    );

    expect(summary).toEqual({
      family: 'import-style',
      nodeCount: 5,
      edgeCount: 4,
      externalReferenceCount: 1,
      cycleCount: 0,
      cycles: [],
      mostCentral: [
        { id: 'app', score: 0.5 },
        { id: 'repo', score: 0.5 },
      ],
      nodes: [
        { id: 'app', category: 'module', path: 'app.py', dependencyCount: 2, dependentCount: 0 },
        { id: 'db', category: 'module', path: 'db.py', dependencyCount: 0, dependentCount: 1 },
        { id: 'repo', category: 'module', path: 'repo.py', dependencyCount: 1, dependentCount: 1 },
        { id: 'service', category: 'module', path: 'service.py', dependencyCount: 1, dependentCount: 1 },
        { id: 'util', category: 'module', path: 'util.py', dependencyCount: 0, dependentCount: 1 },
      ],
      categories: [{ category: 'module', count: 5 }],
      warningCount: 2,
    });
  });

  it('should report no family for an empty graph', () => {
    const summary = summarizeGraph({ graph: DependencyGraph.empty() });

    expect(summary.family).toBeNull();
    expect(summary.nodes).toEqual([]);
  });

  it('should prefer the family it is given', () => {
    expect(summarizeGraph({ graph: DependencyGraph.empty(), family: 'resource-style' }).family).toBe(
      'resource-style'
    );
  });
});

describe('renderContextMarkdown', () => {
  it('should render overview, centrality, cycles and artifacts', () => {
    const markdown = renderContextMarkdown(summarizeGraph({ graph: createCyclicGraph() }));

    expect(markdown).toBe(
      [
        '# Dependency context: import-style',
        '',
        '## Overview',
        '',
        '- Artifacts: 3',
        '- Dependencies: 3',
        '- External references: 0',
        '- Cycles: 1',
        '- Warnings: 0',
        '',
        '## Categories',
        '',
        '| Category | Count |',
        '| --- | --- |',
        '| module | 3 |',
        '',
        '## Most central artifacts',
        '',
        '| Artifact | Score | Dependencies | Dependents |',
        '| --- | --- | --- | --- |',
        '| `a` | 0.667 | 1 | 1 |',
        '| `b` | 0.667 | 1 | 1 |',
        '| `c` | 0.667 | 1 | 1 |',
        '',
        '## Cycles',
        '',
        '1. `a` -> `b` -> `c` -> `a`',
        '',
        '## Artifacts',
        '',
        '| Artifact | Category | Path | Dependencies | Dependents |',
        '| --- | --- | --- | --- | --- |',
        '| `a` | module | `a.py` | 1 | 1 |',
        '| `b` | module | `b.py` | 1 | 1 |',
        '| `c` | module | `c.py` | 1 | 1 |',
        '',
      ].join('\n')
    );
  });

  it('should render an empty graph without tables', () => {
    expect(renderContextMarkdown(summarizeGraph({ graph: DependencyGraph.empty() }))).toBe(
      [
        '# Dependency context',
        '',
        '## Overview',
        '',
        '- Artifacts: 0',
        '- Dependencies: 0',
        '- External references: 0',
        '- Cycles: 0',
        '- Warnings: 0',
        '',
        '## Cycles',
        '',
        'No dependency cycles detected.',
        '',
      ].join('\n')
    );
  });
});
