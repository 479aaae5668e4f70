/**
 * CLI testing utilities
 */

import { fileURLToPath } from "node:url";
import { execa } from "execa";

/**
 * TypeScript entry of the `cirrus` binary
 */
export const CLI_ENTRY = fileURLToPath(new URL("../../cli/src/cli.ts", import.meta.url));

/**
 * Repository root; the child process runs here so that `--import tsx`
 * resolves from the workspace's node_modules
 */
const REPO_ROOT = fileURLToPath(new URL("../../../", import.meta.url));

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  stdout: string;
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: NodeJS.Signals | null;
}

export interface CliExecOptions {
  /** Environment variables, merged over the current environment */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** @default 20000 */
  timeout?: number;
}

/**
 * Run the CLI from its TypeScript sources in a child process
 * @param args - Command arguments
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { env, input = "", timeout = 20_000 } = options;

  const result = await execa("node", ["--import", "tsx", CLI_ENTRY, ...args], {
    cwd: REPO_ROOT,
    env: { ...process.env, ...env },
    input,
    reject: false,
    timeout,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput<T = unknown>(stdout: string): T {
  return JSON.parse(stdout.trim());
}
