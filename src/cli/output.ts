/**
 * Diagnostic printing shared by the CLI commands.
 */

import type { Diagnostic } from "../errors.js";
import type { CliRuntime } from "./runtime.js";

export function formatDiagnostic(d: Diagnostic): string[] {
  const tag = d.severity === "error" ? "ERROR" : "WARN";
  const lines = [`${tag} [${d.nodeId ?? "diagram"}] ${d.type}: ${d.message}`];
  if (d.suggestion) lines.push(`  suggestion: ${d.suggestion}`);
  return lines;
}

export function printDiagnostics(runtime: CliRuntime, diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    for (const line of formatDiagnostic(d)) runtime.error(line);
  }
}

export function printJson(runtime: CliRuntime, value: unknown): void {
  runtime.log(JSON.stringify(value, null, 2));
}
