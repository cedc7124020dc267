/**
 * Error classes and the diagnostic taxonomy shared by the engine and its front ends.
 */

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * Diagnostic types produced by the core.
 *
 * `schema_error` and `dependency_error` are fail-fast; the rest are collected
 * across the whole generation phase.
 */
export type CoreDiagnosticType =
  | "schema_error"
  | "dependency_error"
  | "validation_error"
  | "generation_error"
  | "unsupported_kind";

/** Diagnostic types only the CLI and serverless front ends produce. */
export type InputDiagnosticType = "invalid_input" | "invalid_json";

export type DiagnosticType = CoreDiagnosticType | InputDiagnosticType;

export type DiagnosticSeverity = "error" | "warning";

/**
 * A single error or warning reported to the caller.
 */
export interface Diagnostic {
  type: DiagnosticType;
  severity: DiagnosticSeverity;
  /** Node the diagnostic belongs to; absent for diagram-wide problems */
  nodeId?: string;
  message: string;
  /** Hint for fixing the problem */
  suggestion?: string;
}

export function diagnosticError(
  type: DiagnosticType,
  message: string,
  extra?: { nodeId?: string; suggestion?: string },
): Diagnostic {
  return { type, severity: "error", message, ...compact(extra) };
}

export function diagnosticWarning(
  type: DiagnosticType,
  message: string,
  extra?: { nodeId?: string; suggestion?: string },
): Diagnostic {
  return { type, severity: "warning", message, ...compact(extra) };
}

// Keeps `nodeId: undefined` out of serialized results.
function compact(extra?: { nodeId?: string; suggestion?: string }): { nodeId?: string; suggestion?: string } {
  const out: { nodeId?: string; suggestion?: string } = {};
  if (extra?.nodeId !== undefined) out.nodeId = extra.nodeId;
  if (extra?.suggestion !== undefined) out.suggestion = extra.suggestion;
  return out;
}

// =============================================================================
// Error Classes
// =============================================================================

export type DiagramTfErrorCode = "DEPENDENCY_CYCLE" | "REFERENCE_MAP" | "CONFIG";

/**
 * Base class for errors thrown (rather than reported) by diagram-tf.
 */
export class DiagramTfError extends Error {
  readonly code: DiagramTfErrorCode;

  constructor(code: DiagramTfErrorCode, message: string) {
    super(message);
    this.name = "DiagramTfError";
    this.code = code;
  }
}

/**
 * Thrown by the dependency resolver when the edges form a cycle.
 */
export class DependencyCycleError extends DiagramTfError {
  /** Nodes that could never be scheduled, in declaration order */
  readonly nodeIds: readonly string[];

  constructor(nodeIds: readonly string[]) {
    super("DEPENDENCY_CYCLE", `dependency cycle detected among nodes: ${nodeIds.join(", ")}`);
    this.name = "DependencyCycleError";
    this.nodeIds = nodeIds;
  }
}

export class ReferenceMapError extends DiagramTfError {
  constructor(message: string) {
    super("REFERENCE_MAP", message);
    this.name = "ReferenceMapError";
  }
}

export class ConfigError extends DiagramTfError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("CONFIG", `invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
