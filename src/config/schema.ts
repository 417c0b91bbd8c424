/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating engine configuration.
 * Provides type-safe configuration with compile-time type inference.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Analysis Configuration
// ============================================================================

/**
 * Directories never descended into
 */
export const DEFAULT_IGNORE_DIRECTORIES = [
  'node_modules',
  '__pycache__',
  'venv',
  '.venv',
  '.git',
  '.terraform',
  '.tox',
  'dist',
  'build',
] as const;

/**
 * Reader and extraction pool configuration
 */
export const AnalysisConfigSchema = z.object({
  /** Files extracted concurrently */
  concurrency: z.coerce.number().int().min(1).max(64).default(8),
  /** Files above this size are skipped with a warning */
  maxFileSize: z.coerce.number().int().min(1).default(5 * 1024 * 1024), // 5MB
  /** Directory names skipped anywhere in the tree */
  ignoreDirectories: z.array(z.string().min(1)).default([...DEFAULT_IGNORE_DIRECTORIES]),
  /** Descend into dot-directories and read dot-files */
  includeHidden: z.boolean().default(false),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

// ============================================================================
// Family Configuration
// ============================================================================

const extensionSchema = z.string().regex(/^\.[\w.]+$/, 'Extensions must start with a dot');

/**
 * Per-family file selection
 */
export const FamiliesConfigSchema = z.object({
  importStyle: z.object({
    extensions: z.array(extensionSchema).min(1).default(['.py']),
  }).default({}),
  resourceStyle: z.object({
    extensions: z.array(extensionSchema).min(1).default(['.tf']),
  }).default({}),
});

export type FamiliesConfig = z.infer<typeof FamiliesConfigSchema>;

// ============================================================================
// Output Configuration
// ============================================================================

/**
 * Structured summary configuration
 */
export const SummaryConfigSchema = z.object({
  /** Number of most central nodes listed in summaries */
  topN: z.coerce.number().int().min(1).max(1000).default(10),
});

export type SummaryConfig = z.infer<typeof SummaryConfigSchema>;

/**
 * Exporter configuration
 */
export const ExportConfigSchema = z.object({
  dot: z.object({
    rankdir: z.enum(['TB', 'LR', 'BT', 'RL']).default('LR'),
  }).default({}),
  /** Indentation of JSON documents */
  jsonIndent: z.coerce.number().int().min(0).max(8).default(2),
});

export type ExportConfig = z.infer<typeof ExportConfigSchema>;

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Complete Configuration
// ============================================================================

/**
 * Complete engine configuration schema
 */
export const AnalyzerConfigSchema = z.object({
  env: Environment.default('development'),
  analysis: AnalysisConfigSchema.default({}),
  families: FamiliesConfigSchema.default({}),
  summary: SummaryConfigSchema.default({}),
  export: ExportConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

/**
 * Configuration as supplied by a source, before defaults are applied
 */
export type PartialAnalyzerConfig = z.input<typeof AnalyzerConfigSchema>;

/**
 * Fully defaulted configuration
 */
export function defaultConfig(): AnalyzerConfig {
  return AnalyzerConfigSchema.parse({});
}
