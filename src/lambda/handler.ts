/**
 * Serverless entry point (API Gateway proxy integration).
 *
 * The request body carries the diagram JSON, optionally base64-encoded. Generated
 * files come back base64-encoded in a JSON body.
 */

import { z } from "zod";
import { resolveConfig, type ParserConfig } from "../config/config.js";
import { createDefaultRegistry } from "../defaults.js";
import { parseDiagramJson } from "../diagram/schema.js";
import { DiagramParser } from "../engine/parser.js";
import { ConfigError, diagnosticError, type Diagnostic } from "../errors.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { HandlerRegistry } from "../registry/registry.js";
import { fileEntries } from "../terraform/builder.js";

export const invocationEventSchema = z.object({
  body: z.string().default(""),
  isBase64: z.boolean().optional(),
  emitTfvars: z.boolean().optional(),
});

export type InvocationEvent = z.input<typeof invocationEventSchema>;

export type InvocationBody = {
  statusCode: number;
  success: boolean;
  errors?: Diagnostic[];
  warnings?: Diagnostic[];
  /** File name → base64 content */
  files?: Record<string, string>;
};

export type ApiGatewayResponse = {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
};

export type InvocationDeps = {
  registry?: HandlerRegistry;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

let processRegistry: HandlerRegistry | undefined;

// Built once per container and reused across invocations, so it carries no
// per-invocation logger.
function defaultRegistry(): HandlerRegistry {
  processRegistry ??= createDefaultRegistry();
  return processRegistry;
}

function respond(out: InvocationBody): ApiGatewayResponse {
  return {
    statusCode: out.statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(out),
  };
}

function reject(statusCode: number, errors: Diagnostic[]): ApiGatewayResponse {
  return respond({ statusCode, success: false, errors });
}

export async function handleInvocation(event: unknown, deps: InvocationDeps = {}): Promise<ApiGatewayResponse> {
  let config: ParserConfig;
  try {
    config = resolveConfig({}, deps.env ?? process.env);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    deps.logger?.error("Invalid configuration", { issues: error.issues });
    return reject(500, [diagnosticError("invalid_input", error.message)]);
  }
  const logger = deps.logger ?? createLogger("lambda", { level: config.logLevel, format: "json" });

  const parsedEvent = invocationEventSchema.safeParse(event);
  if (!parsedEvent.success) {
    return reject(400, [
      diagnosticError("invalid_input", `invalid invocation event: ${parsedEvent.error.issues[0]?.message ?? "unknown"}`),
    ]);
  }
  const { body, isBase64, emitTfvars } = parsedEvent.data;

  let text = body;
  if (isBase64) {
    const compact = body.replace(/\s+/g, "");
    if (compact.length % 4 !== 0 || !BASE64.test(compact)) {
      return reject(400, [diagnosticError("invalid_input", "invalid base64 body")]);
    }
    text = Buffer.from(compact, "base64").toString("utf8");
  }

  const loaded = parseDiagramJson(text);
  if (!loaded.ok) {
    const syntax = loaded.errors.some((e) => e.type === "invalid_json");
    return reject(syntax ? 400 : 422, loaded.errors);
  }

  const parser = new DiagramParser(deps.registry ?? defaultRegistry(), {
    maxParallel: config.maxParallel,
    emitTfvars: emitTfvars ?? config.emitTfvars,
    emitOutputs: config.emitOutputs,
    region: config.region,
    logger,
  });
  const result = await parser.parse(loaded.diagram);

  const out: InvocationBody = {
    statusCode: result.success ? 200 : 422,
    success: result.success,
  };
  if (result.errors.length > 0) out.errors = [...result.errors];
  if (result.warnings.length > 0) out.warnings = [...result.warnings];
  if (result.success) {
    out.files = Object.fromEntries(
      fileEntries(result.files).map(([name, content]) => [name, Buffer.from(content, "utf8").toString("base64")]),
    );
  }
  return respond(out);
}
