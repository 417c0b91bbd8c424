/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised by the analysis pipeline, graph queries, exporters and
 * configuration loading.
 */

import { BaseError, ErrorContext } from './base';
import { ErrorCodes } from './codes';

// ============================================================================
// Analysis Errors
// ============================================================================

/**
 * The analysis root does not exist or is not a directory
 */
export class RootNotFoundError extends BaseError {
  public readonly root: string;

  constructor(root: string, context: ErrorContext = {}) {
    super(`Analysis root not found: ${root}`, ErrorCodes.ROOT_NOT_FOUND, context);
    this.name = 'RootNotFoundError';
    this.root = root;
  }
}

/**
 * No extractor strategy is registered for the requested family
 */
export class UnsupportedFamilyError extends BaseError {
  public readonly family: string;
  public readonly supported: readonly string[];

  constructor(family: string, supported: readonly string[]) {
    super(
      `No extractor registered for family '${family}' (supported: ${supported.join(', ') || 'none'})`,
      ErrorCodes.UNSUPPORTED_FAMILY,
      { details: { family, supported: [...supported] } }
    );
    this.name = 'UnsupportedFamilyError';
    this.family = family;
    this.supported = supported;
  }
}

/**
 * The enclosing invocation was aborted before extraction finished
 */
export class AnalysisCancelledError extends BaseError {
  constructor(root: string, reason?: unknown) {
    super(
      `Analysis of ${root} was cancelled`,
      ErrorCodes.ANALYSIS_CANCELLED,
      {
        cause: reason instanceof Error ? reason : undefined,
        details: { root },
      }
    );
    this.name = 'AnalysisCancelledError';
  }
}

// ============================================================================
// Graph Errors
// ============================================================================

/**
 * A per-node query named an artifact that is not in the graph
 */
export class NodeNotFoundError extends BaseError {
  public readonly nodeId: string;

  constructor(nodeId: string) {
    super(`Node not found: ${nodeId}`, ErrorCodes.NODE_NOT_FOUND, {
      details: { nodeId },
    });
    this.name = 'NodeNotFoundError';
    this.nodeId = nodeId;
  }
}

/**
 * A graph was constructed from elements that break its invariants
 */
export class GraphInvariantError extends BaseError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, ErrorCodes.GRAPH_INVARIANT_VIOLATION, { details }, false);
    this.name = 'GraphInvariantError';
  }
}

/**
 * An interchange document failed schema validation or graph invariants
 */
export class InvalidGraphDocumentError extends BaseError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[], cause?: Error) {
    super(
      `Invalid graph document: ${issues.slice(0, 5).join('; ')}${issues.length > 5 ? ` (+${issues.length - 5} more)` : ''}`,
      ErrorCodes.INVALID_GRAPH_DOCUMENT,
      { cause, details: { issues: [...issues] } }
    );
    this.name = 'InvalidGraphDocumentError';
    this.issues = issues;
  }
}

// ============================================================================
// Export Errors
// ============================================================================

/**
 * Export was requested in a format no exporter handles
 */
export class UnsupportedExportFormatError extends BaseError {
  public readonly format: string;

  constructor(format: string, supported: readonly string[]) {
    super(
      `Unsupported export format '${format}' (supported: ${supported.join(', ')})`,
      ErrorCodes.UNSUPPORTED_EXPORT_FORMAT,
      { details: { format, supported: [...supported] } }
    );
    this.name = 'UnsupportedExportFormatError';
    this.format = format;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * A configuration source could not be loaded or a value is missing
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;

  constructor(configKey: string, message: string, context: ErrorContext = {}) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, {
      ...context,
      details: { ...context.details, configKey },
    });
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Merged configuration failed schema validation
 */
export class ConfigValidationError extends BaseError {
  public readonly issues: ReadonlyArray<{ path: string; message: string }>;

  constructor(issues: ReadonlyArray<{ path: string; message: string }>) {
    super(
      `Configuration validation failed:\n${issues.map(e => `  - ${e.path}: ${e.message}`).join('\n')}`,
      ErrorCodes.CONFIG_VALIDATION_ERROR,
      { details: { issues: issues.map(issue => ({ ...issue })) } }
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}
