/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation and caching.
 * Sources are merged in priority order (lowest first) and the result is
 * validated against AnalyzerConfigSchema.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { join, extname } from 'node:path';
import { parse as parseYaml } from 'yaml';

import { AnalyzerConfig, AnalyzerConfigSchema } from './schema';
import { ConfigurationError, ConfigValidationError } from '../errors/domain';
import { getErrorMessage } from '../errors/base';
import { createModuleLogger } from '../logging/logger';

/**
 * Untyped configuration fragment as produced by a single source
 */
export type ConfigFragment = Record<string, unknown>;

/**
 * Default configuration file names, looked up in the working directory
 */
export const CONFIG_FILE_NAMES = [
  'depgraph.config.yaml',
  'depgraph.config.yml',
  'depgraph.config.json',
] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  /** Unique name for the source */
  name: string;
  /** Priority level (higher = overrides lower) */
  priority: number;
  /** Load configuration from this source */
  load(): Promise<ConfigFragment>;
  /** Whether this source is available */
  isAvailable(): boolean;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Environment variable configuration source
 * Maps DEPGRAPH_* and LOG_* variables to the configuration structure
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<ConfigFragment> {
    const env = this.env;

    return this.filterUndefined({
      env: env.NODE_ENV,
      analysis: {
        concurrency: env.DEPGRAPH_CONCURRENCY ? parseInt(env.DEPGRAPH_CONCURRENCY, 10) : undefined,
        maxFileSize: env.DEPGRAPH_MAX_FILE_SIZE ? parseInt(env.DEPGRAPH_MAX_FILE_SIZE, 10) : undefined,
        ignoreDirectories: env.DEPGRAPH_IGNORE_DIRS
          ? env.DEPGRAPH_IGNORE_DIRS.split(',').map(s => s.trim()).filter(s => s.length > 0)
          : undefined,
        includeHidden: env.DEPGRAPH_INCLUDE_HIDDEN ? env.DEPGRAPH_INCLUDE_HIDDEN === 'true' : undefined,
      },
      summary: {
        topN: env.DEPGRAPH_SUMMARY_TOP_N ? parseInt(env.DEPGRAPH_SUMMARY_TOP_N, 10) : undefined,
      },
      export: {
        dot: {
          rankdir: env.DEPGRAPH_DOT_RANKDIR,
        },
      },
      logging: {
        level: env.LOG_LEVEL,
        pretty: env.LOG_PRETTY ? env.LOG_PRETTY === 'true' : undefined,
      },
    });
  }

  /**
   * Recursively remove undefined values from an object
   */
  private filterUndefined(obj: Record<string, unknown>): ConfigFragment {
    const result: ConfigFragment = {};

    for (const [key, value] of Object.entries(obj)) {
      if (value === undefined) {
        continue;
      }

      if (isPlainObject(value)) {
        const filtered = this.filterUndefined(value);
        if (Object.keys(filtered).length > 0) {
          result[key] = filtered;
        }
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * YAML or JSON file configuration source, picked by file extension
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;
  private readonly logger = createModuleLogger('config-loader');

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<ConfigFragment> {
    if (!this.isAvailable()) {
      this.logger.debug({ filePath: this.filePath }, 'Config file not found, skipping');
      return {};
    }

    let parsed: unknown;
    try {
      const content = readFileSync(this.filePath, 'utf-8');
      const extension = extname(this.filePath).toLowerCase();
      parsed = extension === '.json' ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      this.logger.error({ err: error, filePath: this.filePath }, 'Failed to load config file');
      throw new ConfigurationError(
        `file:${this.filePath}`,
        `Failed to load configuration file: ${getErrorMessage(error)}`,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    // An empty YAML document parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigurationError(
        `file:${this.filePath}`,
        'Configuration file must contain a mapping at the top level'
      );
    }

    this.logger.debug({ filePath: this.filePath }, 'Loaded config from file');
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

/**
 * Configuration loader options
 */
export interface ConfigLoaderOptions {
  /** Directory searched for depgraph.config.* files (default: process.cwd()) */
  cwd?: string;
  /** Environment read by the default environment source (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Enable caching (default: true) */
  enableCache?: boolean;
  /** Custom config sources; replaces the defaults when non-empty */
  sources?: ConfigSource[];
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private sources: ConfigSource[] = [];
  private config: AnalyzerConfig | null = null;
  private readonly enableCache: boolean;
  private readonly logger = createModuleLogger('config-loader');

  constructor(options: ConfigLoaderOptions = {}) {
    this.enableCache = options.enableCache ?? true;

    if (options.sources && options.sources.length > 0) {
      this.sources = [...options.sources];
    } else {
      this.initializeDefaultSources(options.cwd ?? process.cwd(), options.env ?? process.env);
    }

    this.sources.sort((a, b) => a.priority - b.priority);
  }

  private initializeDefaultSources(cwd: string, env: NodeJS.ProcessEnv): void {
    CONFIG_FILE_NAMES.forEach((fileName, index) => {
      this.sources.push(new FileConfigSource(join(cwd, fileName), 5 + index));
    });
    this.sources.push(new EnvironmentConfigSource(env));
  }

  /**
   * Add a configuration source
   */
  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    this.invalidateCache();
    return this;
  }

  /**
   * Remove a configuration source by name
   */
  removeSource(name: string): this {
    this.sources = this.sources.filter(s => s.name !== name);
    this.invalidateCache();
    return this;
  }

  /**
   * Names of the registered sources in merge order
   */
  getSourceNames(): string[] {
    return this.sources.map(s => s.name);
  }

  /**
   * Load and validate configuration from all sources
   */
  async load(): Promise<AnalyzerConfig> {
    if (this.enableCache && this.config) {
      return this.config;
    }

    const merged: ConfigFragment = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        continue;
      }

      const partial = await source.load();
      this.deepMerge(merged, partial);
      this.logger.debug({ source: source.name }, 'Loaded config from source');
    }

    const result = AnalyzerConfigSchema.safeParse(merged);

    if (!result.success) {
      this.logger.error({ errors: result.error.errors }, 'Configuration validation failed');
      throw new ConfigValidationError(formatIssues(result.error));
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get loaded configuration (throws if not loaded)
   */
  get(): AnalyzerConfig {
    if (!this.config) {
      throw new ConfigurationError('config', 'Configuration not loaded. Call load() first.');
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  invalidateCache(): void {
    this.config = null;
  }

  async reload(): Promise<AnalyzerConfig> {
    this.invalidateCache();
    return this.load();
  }

  /**
   * Deep merge two objects, with source overwriting target. Arrays are replaced.
   */
  private deepMerge(target: ConfigFragment, source: ConfigFragment): void {
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];

      if (sourceValue === undefined) {
        continue;
      }

      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        this.deepMerge(targetValue, sourceValue);
      } else if (isPlainObject(sourceValue)) {
        const copy: ConfigFragment = {};
        this.deepMerge(copy, sourceValue);
        target[key] = copy;
      } else {
        target[key] = sourceValue;
      }
    }
  }
}

function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Create a config loader with default settings
 */
export function createConfigLoader(options?: ConfigLoaderOptions): ConfigLoader {
  return new ConfigLoader(options);
}

/**
 * Load configuration with a single call
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<AnalyzerConfig> {
  return createConfigLoader(options).load();
}

/**
 * Validate a configuration object, applying defaults.
 * Throws ConfigValidationError on failure.
 */
export function validateConfig(config: unknown): AnalyzerConfig {
  const result = AnalyzerConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}
