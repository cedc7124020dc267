/**
 * `diagram-tf generate` — diagram JSON in, Terraform files out.
 */

import * as path from "node:path";
import type { Command } from "commander";
import { resolveConfig, type LogLevelOption } from "../config/config.js";
import { createDefaultRegistry } from "../defaults.js";
import { parseDiagramJson } from "../diagram/schema.js";
import { DiagramParser } from "../engine/parser.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { DiagramTfPlugin } from "../plugin-sdk/index.js";
import { fileEntries } from "../terraform/builder.js";
import { runCommandWithRuntime } from "./cli-utils.js";
import { printDiagnostics, printJson } from "./output.js";
import { parseInteger, parseLogLevel } from "./parse.js";
import type { CliRuntime } from "./runtime.js";

export type GenerateOptions = {
  input: string;
  output: string;
  /** false when --no-tfvars was given */
  tfvars: boolean;
  outputs?: boolean;
  parallel?: number;
  region?: string;
  json?: boolean;
  logLevel?: LogLevelOption;
};

export async function generateCommand(
  opts: GenerateOptions,
  runtime: CliRuntime,
  plugins: readonly DiagramTfPlugin[] = [],
): Promise<void> {
  const config = resolveConfig(
    {
      maxParallel: opts.parallel,
      emitTfvars: opts.tfvars ? undefined : false,
      emitOutputs: opts.outputs ? true : undefined,
      region: opts.region,
      logLevel: opts.logLevel,
    },
    runtime.env,
  );
  const logger = createLogger("diagram-tf", { level: config.logLevel, format: config.logFormat });

  let text: string;
  try {
    text = await runtime.readInput(opts.input);
  } catch (error) {
    runtime.error(`read input: ${errorMessage(error)}`);
    runtime.exit(1);
    return;
  }

  const loaded = parseDiagramJson(text);
  if (!loaded.ok) {
    if (opts.json) printJson(runtime, { success: false, errors: loaded.errors });
    else printDiagnostics(runtime, loaded.errors);
    runtime.exit(1);
    return;
  }

  const registry = createDefaultRegistry({ logger, extraPlugins: plugins });
  const parser = new DiagramParser(registry, {
    maxParallel: config.maxParallel,
    emitTfvars: config.emitTfvars,
    emitOutputs: config.emitOutputs,
    region: config.region,
    logger,
  });
  const result = await parser.parse(loaded.diagram);

  if (!result.success) {
    if (opts.json) {
      printJson(runtime, { success: false, errors: result.errors, warnings: result.warnings });
    } else {
      printDiagnostics(runtime, [...result.errors, ...result.warnings]);
    }
    runtime.exit(1);
    return;
  }

  await runtime.mkdir(opts.output);
  const written: string[] = [];
  for (const [name, content] of fileEntries(result.files)) {
    const target = path.join(opts.output, name);
    await runtime.writeFile(target, content);
    written.push(target);
  }

  if (opts.json) {
    printJson(runtime, { success: true, files: written, warnings: result.warnings });
    return;
  }
  for (const target of written) runtime.log(`wrote ${target}`);
  printDiagnostics(runtime, result.warnings);
}

export function registerGenerateCommand(
  program: Command,
  runtime: CliRuntime,
  plugins: readonly DiagramTfPlugin[] = [],
): void {
  program
    .command("generate")
    .description("Generate Terraform files from a diagram JSON document")
    .requiredOption("-i, --input <file>", "Diagram JSON file, or - for stdin")
    .option("-o, --output <dir>", "Output directory for Terraform files", "output")
    .option("--no-tfvars", "Do not generate terraform.tfvars")
    .option("--outputs", "Generate outputs.tf with an id output per resource")
    .option("--parallel <n>", "Max nodes processed in parallel per tier (0 = auto)", parseInteger)
    .option("--region <region>", "Default AWS region")
    .option("--json", "Print the result as JSON")
    .option("--log-level <level>", "trace | debug | info | warn | error | fatal | silent", parseLogLevel)
    .action(async (opts: GenerateOptions) => {
      await runCommandWithRuntime(runtime, () => generateCommand(opts, runtime, plugins));
    });
}
