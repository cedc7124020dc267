/**
 * Engine — Type Definitions
 */

import type { Diagnostic } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { TerraformFiles } from "../terraform/builder.js";

// ── Phases ──────────────────────────────────────────────────────

export type FailureReason = "schema" | "dependency" | "generation";

export type EnginePhase =
  | { name: "validating" }
  | { name: "resolving" }
  | { name: "generating"; tier: number; nodeIds: readonly string[] }
  | { name: "assembling" }
  | { name: "done" }
  | { name: "failed"; reason: FailureReason };

// ── Options ─────────────────────────────────────────────────────

export type ParserOptions = {
  /** Concurrency ceiling per tier; missing or non-positive means host parallelism (capped) */
  maxParallel?: number;
  /** Produce terraform.tfvars from the diagram metadata (default: true) */
  emitTfvars?: boolean;
  /** Produce outputs.tf with an id output per resource (default: false) */
  emitOutputs?: boolean;
  /** Default for the aws_region variable */
  region?: string;
  logger?: Logger;
  /** Called on every phase transition */
  onPhase?: (phase: EnginePhase) => void;
};

// ── Results ─────────────────────────────────────────────────────

export type ParseResult = Readonly<{
  success: boolean;
  /** Output file name → content; empty unless `success` */
  files: Readonly<TerraformFiles>;
  errors: readonly Diagnostic[];
  warnings: readonly Diagnostic[];
}>;

/**
 * What one validate+generate unit hands back to the tier merge.
 */
export type UnitOutcome = {
  nodeId: string;
  errors: Diagnostic[];
  warnings: Diagnostic[];
  /** Rendered block; empty when nothing was generated */
  artifact: string;
  /** Symbolic address, set only when `artifact` is non-empty */
  address?: string;
};
