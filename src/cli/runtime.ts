/**
 * I/O seam for CLI commands; tests swap in an in-memory runtime.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";

export type CliRuntime = {
  /** Write a line to stdout */
  log: (message: string) => void;
  /** Write a line to stderr */
  error: (message: string) => void;
  /** Record the process exit code; commands never terminate the process themselves */
  exit: (code: number) => void;
  /** Read a file, or stdin when `path` is "-" */
  readInput: (path: string) => Promise<string>;
  writeFile: (path: string, content: string) => Promise<void>;
  mkdir: (path: string) => Promise<void>;
  env: NodeJS.ProcessEnv;
};

async function readStdin(): Promise<string> {
  process.stdin.setEncoding("utf8");
  let data = "";
  for await (const chunk of process.stdin) {
    data += String(chunk);
  }
  return data;
}

export const defaultRuntime: CliRuntime = {
  log: (message) => {
    process.stdout.write(`${message}\n`);
  },
  error: (message) => {
    process.stderr.write(`${message}\n`);
  },
  exit: (code) => {
    process.exitCode = code;
  },
  readInput: (path) => (path === "-" ? readStdin() : readFile(path, "utf8")),
  writeFile: (path, content) => writeFile(path, content, "utf8"),
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
  env: process.env,
};
