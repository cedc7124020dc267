/**
 * Diagram parser — the tiered execution engine.
 *
 * validating → resolving → generating (tier 0..n-1) → assembling → done | failed
 *
 * Nodes of one tier run as independent units through a bounded pool. The reference
 * map only grows between tiers, so no unit sees an address from its own or a later
 * tier. Handler errors are collected across every tier; only diagram validation and
 * cycle detection stop a run early.
 */

import { randomUUID } from "node:crypto";
import { resolveTiers } from "../dependency/resolver.js";
import { validateDiagram } from "../diagram/validate.js";
import type { Diagram, DiagramNode } from "../diagram/types.js";
import {
  DependencyCycleError,
  diagnosticError,
  errorMessage,
  type Diagnostic,
} from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { HandlerRegistry } from "../registry/registry.js";
import type { ReferenceLookup, ResourceHandler, ValidationOutcome } from "../registry/types.js";
import { resolveTerraformType, terraformAddress } from "../terraform/addresses.js";
import { TerraformBuilder } from "../terraform/builder.js";
import { sanitizeName } from "../terraform/hcl.js";
import {
  DEFAULT_REGION,
  outputsTf,
  tfvarsFromMetadata,
  variablesTf,
  versionsTf,
} from "../terraform/templates.js";
import { resolveMaxParallel, runPooled } from "./pool.js";
import { ReferenceMap } from "./reference-map.js";
import type { EnginePhase, FailureReason, ParseResult, ParserOptions, UnitOutcome } from "./types.js";

type Unit = {
  node: DiagramNode;
  handler: ResourceHandler | undefined;
};

export class DiagramParser {
  private readonly maxParallel: number;
  private readonly emitTfvars: boolean;
  private readonly emitOutputs: boolean;
  private readonly region: string;
  private readonly logger: Logger;
  private readonly onPhase?: (phase: EnginePhase) => void;

  constructor(
    private readonly registry: HandlerRegistry,
    options: ParserOptions = {},
  ) {
    this.maxParallel = resolveMaxParallel(options.maxParallel);
    this.emitTfvars = options.emitTfvars ?? true;
    this.emitOutputs = options.emitOutputs ?? false;
    this.region = options.region ?? DEFAULT_REGION;
    this.logger = options.logger ?? createSilentLogger("parser");
    this.onPhase = options.onPhase;
  }

  /** Effective concurrency ceiling after defaults and the hard cap. */
  get concurrency(): number {
    return this.maxParallel;
  }

  async parse(diagram: Diagram): Promise<ParseResult> {
    const logger = this.logger.withContext({ runId: randomUUID().slice(0, 8) });
    const startedAt = Date.now();
    logger.info("Parsing diagram", {
      name: diagram.metadata.name,
      nodes: diagram.nodes.length,
      edges: diagram.edges.length,
      maxParallel: this.maxParallel,
    });

    this.enter(logger, { name: "validating" });
    const schemaErrors = validateDiagram(diagram);
    if (schemaErrors.length > 0) {
      return this.fail(logger, "schema", schemaErrors, []);
    }

    this.enter(logger, { name: "resolving" });
    let tiers: string[][];
    try {
      tiers = resolveTiers(diagram);
    } catch (error) {
      if (!(error instanceof DependencyCycleError)) throw error;
      const cycle = diagnosticError("dependency_error", error.message, {
        suggestion: "Remove circular edges or fix node references",
      });
      return this.fail(logger, "dependency", [cycle], []);
    }
    logger.debug(`Resolved ${tiers.length} tier(s)`, { tiers: tiers.map((t) => t.length) });

    const nodesById = new Map(diagram.nodes.map((n) => [n.id, n]));
    const refs = new ReferenceMap();
    const errors: Diagnostic[] = [];
    const warnings: Diagnostic[] = [];
    const artifacts: string[] = [];
    // Terraform address → node that holds it
    const owners = new Map<string, string>();

    for (const [index, tier] of tiers.entries()) {
      this.enter(logger, { name: "generating", tier: index, nodeIds: tier });
      const outcomes = await this.runTier(tier, nodesById, diagram, refs.view());

      // Outcomes are in declaration order regardless of completion order.
      const addresses: Array<[string, string]> = [];
      for (const outcome of outcomes) {
        errors.push(...outcome.errors);
        warnings.push(...outcome.warnings);
        if (outcome.artifact === "" || outcome.address === undefined) continue;

        const owner = owners.get(outcome.address);
        if (owner !== undefined) {
          errors.push(
            diagnosticError("generation_error", `address ${outcome.address} is already used by node ${owner}`, {
              nodeId: outcome.nodeId,
              suggestion: "Rename the node so its id stays unique after sanitizing",
            }),
          );
          continue;
        }
        owners.set(outcome.address, outcome.nodeId);
        artifacts.push(outcome.artifact);
        addresses.push([outcome.nodeId, outcome.address]);
      }
      refs.extend(addresses);

      logger.withContext({ tier: index }).debug("Tier complete", {
        nodes: tier.length,
        artifacts: addresses.length,
        errors: outcomes.reduce((n, o) => n + o.errors.length, 0),
      });
    }

    if (errors.length > 0) {
      return this.fail(logger, "generation", errors, warnings);
    }

    this.enter(logger, { name: "assembling" });
    const builder = new TerraformBuilder(this.emitTfvars)
      .setVersions(versionsTf())
      .setVariables(variablesTf(diagram.metadata, this.region));
    for (const artifact of artifacts) {
      builder.addResource(artifact);
    }
    if (this.emitOutputs) {
      builder.setOutputs(
        outputsTf(refs.entries().map(([nodeId, address]) => ({ nodeId, address, name: sanitizeName(nodeId) }))),
      );
    }
    if (this.emitTfvars) {
      builder.setTfvars(tfvarsFromMetadata(diagram.metadata, this.region));
    }
    const files = builder.build();

    this.enter(logger, { name: "done" });
    logger.info("Diagram parsed", {
      files: Object.keys(files),
      resources: builder.resourceCount,
      warnings: warnings.length,
      durationMs: Date.now() - startedAt,
    });
    return freezeResult(true, files, [], warnings);
  }

  // ===========================================================================
  // Tier execution
  // ===========================================================================

  private runTier(
    tier: readonly string[],
    nodesById: ReadonlyMap<string, DiagramNode>,
    diagram: Diagram,
    refs: ReferenceLookup,
  ): Promise<UnitOutcome[]> {
    // Handlers are looked up for the whole tier before any unit starts.
    const units: Unit[] = [];
    for (const id of tier) {
      const node = nodesById.get(id);
      if (node) units.push({ node, handler: this.registry.get(node.kind) });
    }
    return runPooled(units, (unit) => this.runUnit(unit, diagram, refs), this.maxParallel);
  }

  private async runUnit(unit: Unit, diagram: Diagram, refs: ReferenceLookup): Promise<UnitOutcome> {
    const { node, handler } = unit;
    if (!handler) {
      const kinds = this.registry.list();
      return {
        nodeId: node.id,
        errors: [
          diagnosticError("unsupported_kind", `unsupported resource type: ${node.kind}`, {
            nodeId: node.id,
            suggestion:
              kinds.length > 0 ? `Use one of: ${kinds.join(", ")}` : "Register a handler for this resource kind",
          }),
        ],
        warnings: [],
        artifact: "",
      };
    }

    let validation: ValidationOutcome;
    try {
      validation = handler.validate(node);
    } catch (error) {
      validation = {
        errors: [
          diagnosticError("validation_error", `validator for ${node.kind} failed: ${errorMessage(error)}`, {
            nodeId: node.id,
          }),
        ],
        warnings: [],
      };
    }
    const errors = validation.errors.map((e) => withNode(e, node.id));
    const warnings = validation.warnings.map((w) => withNode(w, node.id));

    let artifact = "";
    try {
      artifact = await handler.generate(node, diagram, refs);
    } catch (error) {
      errors.push(diagnosticError("generation_error", errorMessage(error), { nodeId: node.id }));
    }

    if (artifact === "") {
      return { nodeId: node.id, errors, warnings, artifact };
    }
    return {
      nodeId: node.id,
      errors,
      warnings,
      artifact,
      address: terraformAddress(resolveTerraformType(node.kind, handler), node.id),
    };
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  private enter(logger: Logger, phase: EnginePhase): void {
    if (phase.name === "generating") {
      logger.debug(`Phase: generating tier ${phase.tier}`, { nodes: phase.nodeIds });
    } else {
      logger.debug(`Phase: ${phase.name}`);
    }
    this.onPhase?.(phase);
  }

  private fail(
    logger: Logger,
    reason: FailureReason,
    errors: Diagnostic[],
    warnings: Diagnostic[],
  ): ParseResult {
    this.enter(logger, { name: "failed", reason });
    logger.warn(`Diagram parse failed (${reason})`, { errors: errors.length, warnings: warnings.length });
    return freezeResult(false, {}, errors, warnings);
  }
}

function withNode(diagnostic: Diagnostic, nodeId: string): Diagnostic {
  return diagnostic.nodeId === undefined ? { ...diagnostic, nodeId } : diagnostic;
}

function freezeResult(
  success: boolean,
  files: ParseResult["files"],
  errors: Diagnostic[],
  warnings: Diagnostic[],
): ParseResult {
  return Object.freeze({
    success,
    files: Object.freeze(files),
    errors: Object.freeze(errors),
    warnings: Object.freeze(warnings),
  });
}
