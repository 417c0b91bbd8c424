/**
 * Configuration Module
 * @module config
 */

export {
  Environment,
  DEFAULT_IGNORE_DIRECTORIES,
  AnalysisConfigSchema,
  FamiliesConfigSchema,
  SummaryConfigSchema,
  ExportConfigSchema,
  LoggingConfigSchema,
  AnalyzerConfigSchema,
  defaultConfig,
} from './schema';
export type {
  AnalysisConfig,
  FamiliesConfig,
  SummaryConfig,
  ExportConfig,
  LoggingConfig,
  AnalyzerConfig,
  PartialAnalyzerConfig,
} from './schema';

export {
  CONFIG_FILE_NAMES,
  EnvironmentConfigSource,
  FileConfigSource,
  ConfigLoader,
  createConfigLoader,
  loadConfig,
  validateConfig,
} from './loader';
export type { ConfigFragment, ConfigSource, ConfigLoaderOptions } from './loader';
