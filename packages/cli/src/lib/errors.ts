/**
 * CLI error handling and exit code mapping
 */

import { CommanderError, InvalidArgumentError } from "commander";
import {
  ApiError,
  NotFoundError,
  PollInterruptedError,
  PollTimeoutError,
  isAuthError,
} from "@cirrus/sdk";

export const EXIT = {
  ok: 0,
  failure: 1,
  notFound: 2,
  auth: 3,
  timeout: 4,
  interrupted: 130,
} as const;

/**
 * Base CLI error class
 *
 * A `silent` error sets the exit code without printing anything; the
 * command has already written what it needed to.
 */
export class CliError extends Error {
  exitCode: number;
  silent: boolean;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown; silent?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT.failure;
    this.silent = options?.silent ?? false;
  }
}

/**
 * Missing or unusable credentials
 */
export class AuthError extends CliError {
  constructor(message: string) {
    super(message, { exitCode: EXIT.auth });
    this.name = "AuthError";
  }
}

/**
 * Ctrl-C between two steps of a command
 */
export class InterruptedError extends CliError {
  constructor(message = "Interrupted") {
    super(message, { exitCode: EXIT.interrupted });
    this.name = "InterruptedError";
  }
}

/**
 * True for an interrupt from the CLI or from a status poll
 */
export function isInterrupt(error: unknown): boolean {
  return error instanceof InterruptedError || error instanceof PollInterruptedError;
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/API/unknown error
 * - 2: resource not found
 * - 3: authentication
 * - 4: timed out waiting for a status
 * - 130: interrupted
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  if (error instanceof NotFoundError) {
    return EXIT.notFound;
  }
  if (isAuthError(error)) {
    return EXIT.auth;
  }
  if (error instanceof PollTimeoutError) {
    return EXIT.timeout;
  }
  if (error instanceof PollInterruptedError) {
    return EXIT.interrupted;
  }
  return EXIT.failure;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    if (error instanceof ApiError) {
      const details = [`status ${error.status}`];
      if (error.errorCode) details.push(`error_code ${error.errorCode}`);
      if (error.responseId) details.push(`response_id ${error.responseId}`);
      message = `${message} (${details.join(", ")})`;
    } else if (error instanceof InvalidArgumentError) {
      message = message.replace(/^error: /, "");
    }

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
