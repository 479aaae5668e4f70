/**
 * Confirmation of destructive commands
 */

import { extractDeleteHash, type RemovalResponse, type RemoveOptions } from "@cirrus/sdk";
import { CliError } from "./errors.js";
import type { CliIO } from "./io.js";

/**
 * Ask before a destructive action unless `yes` is set. Without a TTY the
 * action needs `--yes`.
 */
export async function confirm(io: CliIO, question: string, yes: boolean | undefined): Promise<void> {
  if (yes) {
    return;
  }
  if (!io.isStdinTTY) {
    throw new CliError(`${question} Pass --yes to confirm in non-interactive mode`);
  }
  const answer = (await io.prompt(`${question} [y/N]: `)).toLowerCase();
  if (answer !== "y" && answer !== "yes") {
    throw new CliError("Aborted");
  }
}

/**
 * Run a removal. When the API answers with a `*_delete.hash`, ask for the
 * code it emailed and repeat the request with both.
 */
export async function removeWithCode(
  io: CliIO,
  remove: (options?: RemoveOptions) => Promise<RemovalResponse>
): Promise<void> {
  const response = await remove();
  const hash = extractDeleteHash(response);
  if (hash === undefined) {
    return;
  }

  const code = await io.prompt("Enter the confirmation code sent to your email: ");
  if (code.length === 0) {
    throw new CliError("Confirmation code is required");
  }
  await remove({ hash, code });
}
