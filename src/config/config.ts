/**
 * diagram-tf Configuration
 *
 * Options are validated with Zod. Values come from, in increasing precedence:
 * schema defaults, `DIAGRAM_TF_*` environment variables, explicit overrides.
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";
import { DEFAULT_REGION } from "../terraform/templates.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export type LogLevelOption = z.infer<typeof logLevelSchema>;

export const parserConfigSchema = z.object({
  /** Units run concurrently within a tier; 0 or less means host parallelism */
  maxParallel: z.number().int().default(0),
  emitTfvars: z.boolean().default(true),
  emitOutputs: z.boolean().default(false),
  region: z.string().min(1).default(DEFAULT_REGION),
  logLevel: logLevelSchema.default("info"),
  logFormat: z.enum(["pretty", "json"]).default("pretty"),
});

export type ParserConfig = z.output<typeof parserConfigSchema>;
export type ParserConfigInput = z.input<typeof parserConfigSchema>;

export const ENV_PREFIX = "DIAGRAM_TF_";

// =============================================================================
// Resolution
// =============================================================================

function isTruthy(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Read configuration values from `DIAGRAM_TF_*` environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const maxParallel = env[`${ENV_PREFIX}MAX_PARALLEL`];
  if (maxParallel !== undefined && maxParallel !== "") out.maxParallel = Number(maxParallel);
  const region = env[`${ENV_PREFIX}REGION`];
  if (region !== undefined && region !== "") out.region = region;
  const logLevel = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (logLevel !== undefined && logLevel !== "") out.logLevel = logLevel;
  const logFormat = env[`${ENV_PREFIX}LOG_FORMAT`];
  if (logFormat !== undefined && logFormat !== "") out.logFormat = logFormat;
  const noTfvars = env[`${ENV_PREFIX}NO_TFVARS`];
  if (noTfvars !== undefined && noTfvars !== "") out.emitTfvars = !isTruthy(noTfvars);
  return out;
}

/**
 * Build the effective configuration.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(
  overrides: ParserConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ParserConfig {
  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const result = parserConfigSchema.safeParse({ ...configFromEnv(env), ...explicit });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return result.data;
}
