import { Command } from "commander";
import type { DiagramTfPlugin } from "../plugin-sdk/index.js";
import { VERSION } from "../version.js";
import { registerGenerateCommand } from "./generate.js";
import { registerInspectCommands } from "./inspect.js";
import { defaultRuntime, type CliRuntime } from "./runtime.js";

export function buildProgram(
  runtime: CliRuntime = defaultRuntime,
  options: { plugins?: readonly DiagramTfPlugin[] } = {},
): Command {
  const program = new Command();
  program
    .name("diagram-tf")
    .description("Compile infrastructure diagrams into Terraform configuration")
    .version(VERSION)
    .configureOutput({
      writeOut: (str) => runtime.log(str.trimEnd()),
      writeErr: (str) => runtime.error(str.trimEnd()),
    });

  const plugins = options.plugins ?? [];
  registerGenerateCommand(program, runtime, plugins);
  registerInspectCommands(program, runtime, plugins);
  return program;
}
