/**
 * Diagram builders for tests.
 */

import type { Diagram, DiagramEdge, DiagramMetadata, DiagramNode, EdgeKind, Properties } from "../src/diagram/types.js";

export function node(id: string, kind: string, properties: Properties = {}, label = ""): DiagramNode {
  return { id, kind, label, properties };
}

export function edge(source: string, target: string, kind: EdgeKind = "depends_on"): DiagramEdge {
  return { id: `${source}->${target}`, source, target, kind, properties: {} };
}

export function diagram(
  nodes: readonly DiagramNode[],
  edges: readonly DiagramEdge[] = [],
  metadata: Partial<DiagramMetadata> = {},
): Diagram {
  return {
    metadata: { version: "1.0", name: "test", description: "", environment: "", ...metadata },
    nodes,
    edges,
  };
}
