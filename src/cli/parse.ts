import { InvalidArgumentError } from "commander";
import { logLevelSchema, type LogLevelOption } from "../config/config.js";

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevelOption {
  const result = logLevelSchema.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${logLevelSchema.options.join(", ")}.`);
  }
  return result.data;
}
