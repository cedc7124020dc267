import { errorMessage } from "../errors.js";
import type { CliRuntime } from "./runtime.js";

/**
 * Run a command action, reporting any thrown error on stderr with exit code 1.
 */
export async function runCommandWithRuntime(runtime: CliRuntime, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.error(`error: ${errorMessage(error)}`);
    runtime.exit(1);
  }
}
