/**
 * Dependency resolution — groups diagram nodes into tiers.
 *
 * Every edge orders its source before its target, whatever its kind. Tier 0 holds
 * the nodes nothing points at; tier n+1 holds the nodes whose last remaining
 * dependency was in tier n. Within a tier nodes keep their declaration order.
 */

import { DependencyCycleError } from "../errors.js";
import type { Diagram } from "../diagram/types.js";

/**
 * Resolve the diagram into tiers of node ids.
 *
 * @throws DependencyCycleError when the edges form a cycle; no tiers are returned.
 */
export function resolveTiers(diagram: Diagram): string[][] {
  const position = new Map<string, number>();
  const order: string[] = [];
  for (const node of diagram.nodes) {
    if (position.has(node.id)) continue;
    position.set(node.id, order.length);
    order.push(node.id);
  }
  if (order.length === 0) return [];

  // Only edges between existing, distinct nodes constrain the order.
  const edges = diagram.edges.filter(
    (e) => e.source !== e.target && position.has(e.source) && position.has(e.target),
  );

  const inDegree = new Map<string, number>(order.map((id) => [id, 0]));
  const targetsBySource = new Map<string, string[]>();
  for (const edge of edges) {
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1);
    const targets = targetsBySource.get(edge.source);
    if (targets) targets.push(edge.target);
    else targetsBySource.set(edge.source, [edge.target]);
  }

  const byDeclaration = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);

  const tiers: string[][] = [];
  let emitted = 0;
  let current = order.filter((id) => inDegree.get(id) === 0);

  while (current.length > 0) {
    tiers.push(current);
    emitted += current.length;

    const next: string[] = [];
    for (const id of current) {
      for (const target of targetsBySource.get(id) ?? []) {
        const remaining = (inDegree.get(target) ?? 0) - 1;
        inDegree.set(target, remaining);
        if (remaining === 0) next.push(target);
      }
    }
    current = next.sort(byDeclaration);
  }

  if (emitted < order.length) {
    throw new DependencyCycleError(order.filter((id) => (inDegree.get(id) ?? 0) > 0));
  }
  return tiers;
}

/**
 * Node ids in dependency order (dependencies first).
 */
export function topologicalOrder(diagram: Diagram): string[] {
  return resolveTiers(diagram).flat();
}

/**
 * Tier index for each node id.
 */
export function tierIndex(tiers: readonly (readonly string[])[]): Map<string, number> {
  const index = new Map<string, number>();
  tiers.forEach((tier, i) => {
    for (const id of tier) index.set(id, i);
  });
  return index;
}
