/**
 * Diagram-level validation.
 *
 * Structural checks only; each resource handler validates its own properties.
 */

import { diagnosticError, type Diagnostic } from "../errors.js";
import type { Diagram } from "./types.js";

export function validateDiagram(diagram: Diagram): Diagnostic[] {
  const errors: Diagnostic[] = [];

  if (diagram.metadata.version === "") {
    errors.push(
      diagnosticError("schema_error", "metadata.version is required", {
        suggestion: 'Set metadata.version (e.g. "1.0")',
      }),
    );
  }

  const seen = new Set<string>();
  diagram.nodes.forEach((node, index) => {
    if (node.id === "") {
      errors.push(
        diagnosticError("schema_error", `node at index ${index} has empty id`, {
          suggestion: "Set node.id",
        }),
      );
    } else if (seen.has(node.id)) {
      errors.push(
        diagnosticError("schema_error", `duplicate node id: ${node.id}`, {
          nodeId: node.id,
          suggestion: "Use unique ids for each node",
        }),
      );
    } else {
      seen.add(node.id);
    }

    if (node.kind === "") {
      errors.push(
        diagnosticError("schema_error", "node.type is required", {
          ...(node.id ? { nodeId: node.id } : {}),
          suggestion: "Set node.type (e.g. ec2_instance, vpc)",
        }),
      );
    }
  });

  diagram.edges.forEach((edge, index) => {
    if (edge.source === "" || edge.target === "") {
      errors.push(
        diagnosticError("schema_error", `edge at index ${index} must have source and target`, {
          suggestion: "Set edge.source and edge.target to node ids",
        }),
      );
    } else if (!seen.has(edge.source)) {
      errors.push(
        diagnosticError("schema_error", `edge source node not found: ${edge.source}`, {
          suggestion: "Reference an existing node id",
        }),
      );
    } else if (!seen.has(edge.target)) {
      errors.push(
        diagnosticError("schema_error", `edge target node not found: ${edge.target}`, {
          suggestion: "Reference an existing node id",
        }),
      );
    }
  });

  return errors;
}
