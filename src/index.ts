/**
 * Dependency graph analysis engine
 * @module depgraph-engine
 *
 * @example
 * ```ts
 * const service = await createAnalysisService();
 * const session = await service.analyze('./infrastructure', 'resource-style');
 * session.dependentsOf('aws_vpc.main', { transitive: true });
 * session.export('dot');
 * ```
 */

export * from './types';
export * from './errors';
export * from './config';
export * from './logging';
export * from './parsers';
export * from './reader';
export * from './graph';
export * from './analysis';
export * from './export';
export * from './services';
export { forEachWithLimit } from './utils/concurrency';
export type { ParallelOptions } from './utils/concurrency';
export { compareStrings } from './utils/sort';
