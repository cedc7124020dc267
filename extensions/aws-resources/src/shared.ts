/**
 * Helpers shared by the AWS resource handlers.
 */

import {
  HclBlock,
  diagnosticError,
  getString,
  getStringRecord,
  hasProperty,
  incomingEdges,
  findNode,
  reference,
  renderBlocks,
  sanitizeName,
  type Diagnostic,
  type Diagram,
  type DiagramNode,
  type EdgeKind,
  type HclValue,
  type ReferenceLookup,
} from "../../../src/plugin-sdk/index.js";

/**
 * `validation_error` for a missing required string property, or undefined.
 */
export function requireString(node: DiagramNode, key: string, example?: string): Diagnostic | undefined {
  if (getString(node.properties, key) !== "") return undefined;
  return diagnosticError("validation_error", `${key} is required`, {
    nodeId: node.id,
    suggestion: example ? `Set properties.${key} (e.g. ${example})` : `Set properties.${key}`,
  });
}

export function present(diagnostics: ReadonlyArray<Diagnostic | undefined>): Diagnostic[] {
  return diagnostics.filter((d): d is Diagnostic => d !== undefined);
}

/**
 * `properties.tags`, with `Name` defaulting to the node label unless the tags set it.
 */
export function tagsWithName(node: DiagramNode): Record<string, string> {
  const tags = getStringRecord(node.properties, "tags");
  if (node.label !== "" && !hasProperty(tags, "Name")) {
    tags.Name = node.label;
  }
  return tags;
}

export function resourceBlock(terraformType: string, node: DiagramNode): HclBlock {
  return new HclBlock("resource", [terraformType, sanitizeName(node.id)]);
}

export function renderResource(...blocks: HclBlock[]): string {
  return renderBlocks(blocks);
}

/**
 * Addresses of the sources of incoming `kind` edges that already have one,
 * optionally restricted to sources of one resource kind. Edge order is kept.
 */
export function sourceAddresses(
  node: DiagramNode,
  diagram: Diagram,
  refs: ReferenceLookup,
  kind: EdgeKind,
  sourceKind?: string,
): string[] {
  const addresses: string[] = [];
  for (const edge of incomingEdges(diagram, node.id, kind)) {
    if (sourceKind !== undefined && findNode(diagram, edge.source)?.kind !== sourceKind) continue;
    const address = refs.get(edge.source);
    if (address !== undefined) addresses.push(address);
  }
  return addresses;
}

export function referenceList(addresses: readonly string[], attribute: string): HclValue {
  return addresses.map((a) => reference(a, attribute));
}
