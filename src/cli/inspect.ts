/**
 * Read-only commands: `kinds` lists registered handlers, `tiers` prints the
 * dependency tiers of a diagram without generating anything.
 */

import type { Command } from "commander";
import { createDefaultRegistry } from "../defaults.js";
import { resolveTiers } from "../dependency/resolver.js";
import { parseDiagramJson } from "../diagram/schema.js";
import { validateDiagram } from "../diagram/validate.js";
import { DependencyCycleError } from "../errors.js";
import type { DiagramTfPlugin } from "../plugin-sdk/index.js";
import { resolveTerraformType } from "../terraform/addresses.js";
import { runCommandWithRuntime } from "./cli-utils.js";
import { printDiagnostics, printJson } from "./output.js";
import type { CliRuntime } from "./runtime.js";

export function kindsCommand(
  opts: { json?: boolean },
  runtime: CliRuntime,
  plugins: readonly DiagramTfPlugin[] = [],
): void {
  const registry = createDefaultRegistry({ extraPlugins: plugins });
  const rows = registry.list().map((kind) => ({
    kind,
    terraformType: resolveTerraformType(kind, registry.get(kind)),
  }));
  if (opts.json) {
    printJson(runtime, rows);
    return;
  }
  for (const row of rows) runtime.log(`${row.kind}\t${row.terraformType}`);
}

export async function tiersCommand(opts: { input: string; json?: boolean }, runtime: CliRuntime): Promise<void> {
  const loaded = parseDiagramJson(await runtime.readInput(opts.input));
  if (!loaded.ok) {
    printDiagnostics(runtime, loaded.errors);
    runtime.exit(1);
    return;
  }
  const problems = validateDiagram(loaded.diagram);
  if (problems.length > 0) {
    printDiagnostics(runtime, problems);
    runtime.exit(1);
    return;
  }

  let tiers: string[][];
  try {
    tiers = resolveTiers(loaded.diagram);
  } catch (error) {
    if (!(error instanceof DependencyCycleError)) throw error;
    runtime.error(error.message);
    runtime.exit(1);
    return;
  }

  if (opts.json) {
    printJson(runtime, tiers);
    return;
  }
  tiers.forEach((tier, index) => runtime.log(`tier ${index}: ${tier.join(", ")}`));
}

export function registerInspectCommands(
  program: Command,
  runtime: CliRuntime,
  plugins: readonly DiagramTfPlugin[] = [],
): void {
  program
    .command("kinds")
    .description("List the resource kinds that have a handler")
    .option("--json", "Print the list as JSON")
    .action(async (opts: { json?: boolean }) => {
      await runCommandWithRuntime(runtime, async () => kindsCommand(opts, runtime, plugins));
    });

  program
    .command("tiers")
    .description("Print the dependency tiers of a diagram")
    .requiredOption("-i, --input <file>", "Diagram JSON file, or - for stdin")
    .option("--json", "Print the tiers as JSON")
    .action(async (opts: { input: string; json?: boolean }) => {
      await runCommandWithRuntime(runtime, () => tiersCommand(opts, runtime));
    });
}
