/**
 * Graph Analysis
 * @module analysis
 */

export {
  tarjanSCC,
  orderComponent,
  breadthFirstClosure,
  findReachableNodes,
  findNodesThatReach,
} from './algorithms';
export type { StronglyConnectedComponent } from './algorithms';

export {
  findCycles,
  computeCentrality,
  dependenciesOf,
  dependentsOf,
  analyzeGraph,
  GraphAnalyzer,
} from './graph-analyzer';
