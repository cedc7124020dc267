/**
 * Lookup helpers over a diagram's nodes and edges.
 */

import type { Diagram, DiagramEdge, DiagramNode, EdgeKind } from "./types.js";

export function findNode(diagram: Diagram, id: string): DiagramNode | undefined {
  return diagram.nodes.find((n) => n.id === id);
}

/**
 * Edges pointing at `nodeId`, in declaration order, optionally of one kind.
 */
export function incomingEdges(diagram: Diagram, nodeId: string, kind?: EdgeKind): DiagramEdge[] {
  return diagram.edges.filter((e) => e.target === nodeId && (kind === undefined || e.kind === kind));
}

/**
 * Edges leaving `nodeId`, in declaration order, optionally of one kind.
 */
export function outgoingEdges(diagram: Diagram, nodeId: string, kind?: EdgeKind): DiagramEdge[] {
  return diagram.edges.filter((e) => e.source === nodeId && (kind === undefined || e.kind === kind));
}

/**
 * Nodes that reach `nodeId` through an incoming edge of `kind`, in edge order.
 */
export function parentNodes(diagram: Diagram, nodeId: string, kind: EdgeKind): DiagramNode[] {
  const parents: DiagramNode[] = [];
  for (const edge of incomingEdges(diagram, nodeId, kind)) {
    const node = findNode(diagram, edge.source);
    if (node) parents.push(node);
  }
  return parents;
}
