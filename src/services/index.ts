/**
 * Services
 * @module services
 */

export {
  AnalysisSession,
  DependencyAnalysisService,
  createAnalysisService,
} from './analysis-service';
export type {
  AnalyzeOptions,
  AnalysisServiceDependencies,
  AnalysisSessionData,
} from './analysis-service';
