/**
 * Best-effort processing of `ID...` arguments
 */

import type { CliIO } from "./io.js";
import { CliError, InterruptedError, formatCliError, isInterrupt } from "./errors.js";

export interface BulkOptions {
  io: CliIO;
  /** Keep going after a failed ID. @default true */
  continueOnError?: boolean;
  verbose?: boolean;
  /** Checked before each ID; once aborted no further ID runs */
  signal?: AbortSignal;
  /** Printed on stdout for each success. @default the ID */
  describe?: (id: string) => string;
}

export interface BulkResult<K> {
  succeeded: K[];
  failed: Array<{ id: K; error: unknown }>;
}

/**
 * Run `task` for each ID in order, one at a time. Successes print the ID on
 * stdout, failures are reported per ID on stderr. Throws a CliError when any
 * ID failed. An interrupt stops the run and propagates as is.
 */
export async function runBulk<K extends string | number>(
  ids: readonly K[],
  task: (id: K) => Promise<void>,
  options: BulkOptions
): Promise<BulkResult<K>> {
  const { io, continueOnError = true, verbose = false, signal } = options;
  const describe = options.describe ?? ((id: string) => id);
  const result: BulkResult<K> = { succeeded: [], failed: [] };

  for (const id of ids) {
    if (signal?.aborted) {
      throw new InterruptedError(`Interrupted before ${id}`);
    }
    try {
      await task(id);
      result.succeeded.push(id);
      io.stdout(`${describe(String(id))}\n`);
    } catch (error) {
      if (!continueOnError || isInterrupt(error)) {
        throw error;
      }
      result.failed.push({ id, error });
      io.stderr(`Error: ${id}: ${formatCliError(error, verbose)}\n`);
    }
  }

  if (result.failed.length > 0) {
    const first = result.failed[0]?.error;
    throw new CliError(`${result.failed.length} of ${ids.length} operation(s) failed`, { cause: first });
  }
  return result;
}
