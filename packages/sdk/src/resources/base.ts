import type { HttpClient } from "../http.js";
import { pollStatus, type PollResult } from "../poller.js";
import type { ApiRecord, ListOptions, QueryValue, RemoveOptions, WaitOptions } from "../types.js";

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_WAIT_TIMEOUT_MS = 600_000;
export const DEFAULT_PAGE_LIMIT = 100;

/**
 * Response of a removal that needs an emailed confirmation code, e.g.
 * `{ "server_delete": { "hash": "...", "is_moved_in_quarantine": false } }`
 */
export type RemovalResponse = ApiRecord | undefined;

/**
 * Return the confirmation hash from a `*_delete` removal response, if any
 */
export function extractDeleteHash(response: unknown): string | undefined {
  if (typeof response !== "object" || response === null) return undefined;
  for (const [key, value] of Object.entries(response)) {
    if (!key.endsWith("_delete") || typeof value !== "object" || value === null) continue;
    const hash: unknown = Reflect.get(value, "hash");
    if (typeof hash === "string" && hash.length > 0) return hash;
  }
  return undefined;
}

/**
 * Base for the per-domain API objects composed by `CloudClient`
 */
export abstract class ResourceApi {
  constructor(protected readonly http: HttpClient) {}

  protected page(options: ListOptions = {}): Record<string, QueryValue> {
    return { limit: options.limit ?? DEFAULT_PAGE_LIMIT, offset: options.offset ?? 0 };
  }

  protected removal(options: RemoveOptions = {}): Record<string, QueryValue> {
    return { hash: options.hash, code: options.code };
  }

  protected waitFor(
    fetchStatus: () => Promise<string>,
    target: string | readonly string[],
    options: WaitOptions = {}
  ): Promise<PollResult> {
    return pollStatus({
      fetchStatus,
      target,
      intervalMs: options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      timeoutMs: options.maxAttempts === undefined ? (options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS) : options.timeoutMs,
      maxAttempts: options.maxAttempts,
      signal: options.signal,
      sleep: options.sleep,
      onAttempt: options.onAttempt,
    });
  }
}

/**
 * Drop keys whose value is undefined so that PATCH bodies only carry the
 * fields being changed
 */
export function compact(input: Record<string, unknown>): ApiRecord {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}
