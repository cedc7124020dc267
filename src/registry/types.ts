/**
 * Resource handler contract.
 *
 * One handler per resource kind. Handlers are stateless values: the engine calls
 * them concurrently and in any order within a tier.
 */

import type { Diagnostic } from "../errors.js";
import type { Diagram, DiagramNode } from "../diagram/types.js";

/**
 * Read-only view of the addresses assigned to resources generated in earlier tiers.
 */
export interface ReferenceLookup {
  get(nodeId: string): string | undefined;
  has(nodeId: string): boolean;
  readonly size: number;
}

export type ValidationOutcome = {
  errors: Diagnostic[];
  warnings: Diagnostic[];
};

export interface ResourceHandler {
  /** Resource kind this handler serves, matched against `node.kind` */
  readonly kind: string;
  /** Terraform resource type used for the symbolic address (e.g. "aws_vpc") */
  readonly terraformType?: string;

  /**
   * Check the node's own properties. Must not look at other nodes.
   */
  validate(node: DiagramNode): ValidationOutcome;

  /**
   * Render the node's Terraform block. May read edges touching the node and the
   * addresses of its dependencies; an empty string means nothing was generated.
   */
  generate(node: DiagramNode, diagram: Diagram, refs: ReferenceLookup): string | Promise<string>;
}
