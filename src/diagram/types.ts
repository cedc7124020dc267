/**
 * Diagram — Type Definitions
 *
 * The graph a user draws: resources as nodes, relationships as edges.
 */

// ── Values ──────────────────────────────────────────────────────

/** Any value a JSON document can hold. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type Properties = { readonly [key: string]: JsonValue };

// ── Graph ───────────────────────────────────────────────────────

export interface DiagramMetadata {
  readonly version: string;
  readonly name: string;
  readonly description: string;
  readonly environment: string;
}

/** Canvas coordinates; only the editor uses them. */
export interface NodePosition {
  readonly x: number;
  readonly y: number;
}

export interface DiagramNode {
  readonly id: string;
  /** Resource kind that selects the handler (e.g. "vpc", "ec2_instance") */
  readonly kind: string;
  readonly label: string;
  readonly position?: NodePosition;
  readonly properties: Properties;
}

export const EDGE_KINDS = ["contains", "connects_to", "depends_on"] as const;

export type EdgeKind = (typeof EDGE_KINDS)[number];

export interface DiagramEdge {
  readonly id: string;
  readonly source: string;
  readonly target: string;
  /** Meaningful to handlers only; every kind orders source before target */
  readonly kind: EdgeKind;
  readonly properties: Properties;
}

export interface Diagram {
  readonly metadata: DiagramMetadata;
  readonly nodes: readonly DiagramNode[];
  readonly edges: readonly DiagramEdge[];
}
