/**
 * `--status` checks: one observation compared against the documented
 * terminal status
 */

import { CliError, EXIT } from "./errors.js";
import type { CliIO } from "./io.js";

export const TARGET_STATUS = {
  server: "on",
  serverOff: "off",
  image: "created",
  database: "started",
  balancer: "started",
  cluster: "started",
  backup: "done",
} as const;

/**
 * Print `actual` on stdout when it equals `expected`. Otherwise print it on
 * stderr and fail with exit code 1 and nothing else.
 */
export function checkStatus(io: CliIO, actual: string, expected: string): void {
  if (actual === expected) {
    io.stdout(`${actual}\n`);
    return;
  }
  io.stderr(`${actual}\n`);
  throw new CliError(`Status is '${actual}', expected '${expected}'`, { exitCode: EXIT.failure, silent: true });
}
