/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the dependency graph engine.
 * Includes domain-specific logging methods for analysis runs, extraction and
 * graph construction.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

import { isBaseError } from '../errors/base';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  module?: string;
  root?: string;
  family?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific log methods
 */
export interface DomainLogMethods {
  // Analysis lifecycle
  analysisStarted(root: string, family: string): void;
  analysisCompleted(root: string, durationMs: number, nodeCount: number, edgeCount: number): void;
  analysisFailed(root: string, error: Error): void;

  // Reader / extractor
  artifactSkipped(path: string, reason: string): void;
  extractionCompleted(path: string, artifactCount: number, referenceCount: number): void;

  // Graph
  graphBuilt(nodeCount: number, edgeCount: number, externalCount: number, durationMs?: number): void;
  cyclesDetected(cycleCount: number): void;

  // Performance
  performanceMetric(operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
}

/**
 * Pino logger extended with domain-specific methods
 */
export type StructuredLogger = Omit<Logger, 'child'> & DomainLogMethods & {
  child(bindings: LogContext): StructuredLogger;
};

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true',
    redact: ['token', 'secret', 'password', 'apiKey'],
    service: process.env.SERVICE_NAME || 'depgraph-engine',
    version: process.env.SERVICE_VERSION || '0.1.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

/**
 * Expands redaction paths to nested variations
 */
function createRedactionPaths(paths: string[]): string[] {
  return paths.flatMap(path => [path, `*.${path}`]);
}

function errorCodeOf(error: Error): string | undefined {
  return isBaseError(error) ? error.code : undefined;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const originalChild = logger.child.bind(logger);

  const methods: DomainLogMethods = {
    analysisStarted(root, family) {
      logger.info({ event: 'analysis_started', root, family }, `Analysis started for ${root} (${family})`);
    },

    analysisCompleted(root, durationMs, nodeCount, edgeCount) {
      logger.info(
        {
          event: 'analysis_completed',
          root,
          durationMs,
          nodeCount,
          edgeCount,
        },
        `Analysis completed: ${nodeCount} nodes, ${edgeCount} edges in ${durationMs}ms`
      );
    },

    analysisFailed(root, error) {
      logger.error(
        {
          event: 'analysis_failed',
          root,
          err: error,
          errorCode: errorCodeOf(error),
        },
        `Analysis failed: ${error.message}`
      );
    },

    artifactSkipped(path, reason) {
      logger.debug({ event: 'artifact_skipped', path, reason }, `Skipped ${path}: ${reason}`);
    },

    extractionCompleted(path, artifactCount, referenceCount) {
      logger.debug(
        {
          event: 'extraction_completed',
          path,
          artifactCount,
          referenceCount,
        },
        `Extracted ${referenceCount} references from ${artifactCount} artifacts in ${path}`
      );
    },

    graphBuilt(nodeCount, edgeCount, externalCount, durationMs) {
      logger.info(
        {
          event: 'graph_built',
          nodeCount,
          edgeCount,
          externalCount,
          durationMs,
          avgEdgesPerNode: nodeCount > 0 ? Number((edgeCount / nodeCount).toFixed(2)) : 0,
        },
        `Graph built: ${nodeCount} nodes, ${edgeCount} edges, ${externalCount} external references`
      );
    },

    cyclesDetected(cycleCount) {
      if (cycleCount === 0) {
        logger.debug({ event: 'cycles_detected', cycleCount }, 'No dependency cycles');
        return;
      }
      logger.warn({ event: 'cycles_detected', cycleCount }, `Detected ${cycleCount} dependency cycles`);
    },

    performanceMetric(operation, durationMs, metadata) {
      logger.debug(
        {
          event: 'performance_metric',
          operation,
          durationMs,
          ...metadata,
        },
        `${operation}: ${durationMs}ms`
      );
    },
  };

  // Override child to preserve domain methods
  return Object.assign(logger, methods, {
    child: (bindings: LogContext): StructuredLogger => extendWithDomainMethods(originalChild(bindings)),
  });
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('depgraph');
  }
  return rootLogger;
}

/**
 * Replaces the root logger, e.g. after configuration has been loaded
 */
export function initLogger(context?: LogContext, overrides?: Partial<LoggerConfig>): StructuredLogger {
  rootLogger = createLogger('depgraph', context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}

/**
 * Wraps an async function with timing and logging
 */
export async function withLogging<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = performance.now();

  try {
    const result = await fn();
    logger.performanceMetric(operation, Math.round(performance.now() - startTime), { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Math.round(performance.now() - startTime), { status: 'error' });
    throw error;
  }
}
