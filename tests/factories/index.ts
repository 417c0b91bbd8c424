/**
 * Test Factories
 * @module tests/factories
 */

export * from './graph.factory';
export * from './artifact.factory';
export * from './fs.factory';
