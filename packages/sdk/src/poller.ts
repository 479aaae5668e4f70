/**
 * Status poller: repeatedly fetches a resource status until it reaches one
 * of the target values, the attempt or time budget runs out, or the caller
 * aborts.
 *
 * Invariants:
 * - Resolves on the first matching status and makes no further calls
 * - With `maxAttempts = N` at most N calls are made; no sleep follows the last one
 * - Polling never mutates the resource; `fetchStatus` is the only side effect
 */

import { setTimeout as delay } from "node:timers/promises";
import {
  CloudError,
  PollError,
  PollInterruptedError,
  PollTimeoutError,
  ValidationError,
  isTransientError,
} from "./errors.js";

export type PollState = "pending" | "polling" | "succeeded" | "timed_out" | "failed";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface PollRequest {
  fetchStatus: () => Promise<string>;
  /** Acceptable terminal statuses, compared exactly */
  target: string | readonly string[];
  intervalMs: number;
  maxAttempts?: number;
  timeoutMs?: number;
  /** Transient fetch failures to tolerate; each one counts as an attempt. @default 0 */
  retries?: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
  now?: () => number;
  onAttempt?: (attempt: number, status: string) => void;
  onTransition?: (from: PollState, to: PollState) => void;
}

export interface PollResult {
  status: string;
  attempts: number;
  elapsedMs: number;
}

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Poll until `fetchStatus` returns one of `target`
 * @throws {PollTimeoutError} When `maxAttempts` or `timeoutMs` is exhausted
 * @throws {PollInterruptedError} When `signal` aborts
 * @throws {PollError} When `fetchStatus` fails
 */
export async function pollStatus(request: PollRequest): Promise<PollResult> {
  const {
    fetchStatus,
    intervalMs,
    maxAttempts,
    timeoutMs,
    retries = 0,
    signal,
    sleep = defaultSleep,
    now = Date.now,
    onAttempt,
    onTransition,
  } = request;
  const target: readonly string[] = typeof request.target === "string" ? [request.target] : request.target;

  if (target.length === 0) {
    throw new ValidationError("Poll target must name at least one status");
  }
  if (!Number.isFinite(intervalMs) || intervalMs < 0) {
    throw new ValidationError(`Invalid poll interval: ${intervalMs}`);
  }
  if (maxAttempts !== undefined && (!Number.isInteger(maxAttempts) || maxAttempts < 1)) {
    throw new ValidationError(`Invalid maxAttempts: ${maxAttempts}`);
  }

  let state: PollState = "pending";
  const transition = (to: PollState): void => {
    const from = state;
    state = to;
    onTransition?.(from, to);
  };

  const started = now();
  let attempts = 0;
  let retriesLeft = retries;
  let lastStatus: string | undefined;

  const interrupted = (cause?: unknown): PollInterruptedError => {
    transition("failed");
    return new PollInterruptedError(attempts, lastStatus, cause === undefined ? undefined : { cause });
  };

  transition("polling");

  for (;;) {
    if (signal?.aborted) {
      throw interrupted(signal.reason);
    }

    attempts++;
    let status: string | undefined;
    try {
      status = await fetchStatus();
    } catch (err) {
      if (signal?.aborted) {
        throw interrupted(err);
      }
      if (retriesLeft > 0 && isTransientError(err)) {
        retriesLeft--;
      } else {
        transition("failed");
        const reason = err instanceof Error ? err.message : String(err);
        throw new PollError(`Failed to fetch status: ${reason}`, attempts, lastStatus, { cause: err });
      }
    }

    if (status !== undefined) {
      lastStatus = status;
      onAttempt?.(attempts, status);
      if (target.includes(status)) {
        transition("succeeded");
        return { status, attempts, elapsedMs: now() - started };
      }
    }

    const elapsed = now() - started;
    const outOfAttempts = maxAttempts !== undefined && attempts >= maxAttempts;
    const outOfTime = timeoutMs !== undefined && elapsed >= timeoutMs;
    if (outOfAttempts || outOfTime) {
      transition("timed_out");
      throw new PollTimeoutError(lastStatus, attempts, target);
    }

    const wait = timeoutMs === undefined ? intervalMs : Math.min(intervalMs, timeoutMs - elapsed);
    try {
      await sleep(wait, signal);
    } catch (err) {
      if (signal?.aborted) {
        throw interrupted(err);
      }
      transition("failed");
      throw err instanceof CloudError ? err : new PollError("Poll sleep failed", attempts, lastStatus, { cause: err });
    }
  }
}
