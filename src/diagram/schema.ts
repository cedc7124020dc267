/**
 * Diagram JSON loader
 *
 * Checks the shape of a diagram document with Zod and normalizes the fields the core
 * relies on: properties are always present, a missing edge type means `depends_on`,
 * and missing strings are empty (the semantic validator reports those that matter).
 */

import { z } from "zod";
import { diagnosticError, errorMessage, type Diagnostic } from "../errors.js";
import { EDGE_KINDS, type Diagram, type JsonValue } from "./types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const propertiesSchema = z
  .record(z.string(), jsonValueSchema)
  .nullish()
  .transform((value) => value ?? {});

export const metadataSchema = z.object({
  version: z.string().default(""),
  name: z.string().default(""),
  description: z.string().default(""),
  environment: z.string().default(""),
});

export const nodeSchema = z.object({
  id: z.string().default(""),
  type: z.string().default(""),
  label: z.string().default(""),
  position: z.object({ x: z.number(), y: z.number() }).optional(),
  properties: propertiesSchema,
});

export const edgeSchema = z.object({
  id: z.string().default(""),
  source: z.string().default(""),
  target: z.string().default(""),
  type: z
    .union([z.enum(EDGE_KINDS), z.literal("")])
    .nullish()
    .transform((value) => (value ? value : "depends_on")),
  properties: propertiesSchema,
});

export const diagramSchema = z.object({
  metadata: metadataSchema.default({}),
  nodes: z.array(nodeSchema).default([]),
  edges: z.array(edgeSchema).default([]),
});

export type DiagramDocument = z.input<typeof diagramSchema>;

// =============================================================================
// Loading
// =============================================================================

export type LoadResult =
  | { ok: true; diagram: Diagram }
  | { ok: false; errors: Diagnostic[] };

/**
 * Validate an already-parsed JSON value and convert it to a {@link Diagram}.
 */
export function loadDiagram(raw: unknown): LoadResult {
  const parsed = diagramSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) =>
        diagnosticError("schema_error", `${formatPath(issue.path)}: ${issue.message}`, {
          suggestion: "Fix the diagram document so it matches the expected structure",
        }),
      ),
    };
  }

  const doc = parsed.data;
  const diagram: Diagram = {
    metadata: doc.metadata,
    nodes: doc.nodes.map((n) => ({
      id: n.id,
      kind: n.type,
      label: n.label,
      ...(n.position ? { position: n.position } : {}),
      properties: n.properties,
    })),
    edges: doc.edges.map((e) => ({
      id: e.id,
      source: e.source,
      target: e.target,
      kind: e.type,
      properties: e.properties,
    })),
  };
  return { ok: true, diagram };
}

/**
 * Parse diagram JSON text. Syntax errors are reported as `invalid_json`.
 */
export function parseDiagramJson(text: string): LoadResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      errors: [diagnosticError("invalid_json", `invalid diagram JSON: ${errorMessage(error)}`)],
    };
  }
  return loadDiagram(raw);
}

/**
 * Render a Zod issue path the way it reads in the document, e.g. `nodes[2].properties`.
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return "diagram";
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}
