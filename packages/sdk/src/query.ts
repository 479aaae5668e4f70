/**
 * Client-side `key:value` filters for listed records
 */

import { ValidationError } from "./errors.js";

export interface Filter {
  /** Dot path into the record (e.g. "os.name") */
  key: string;
  value: string;
}

/**
 * Accepted filter expression: comma separated `key:value` pairs
 */
export const FILTER_PATTERN = /^(([a-z0-9._-]+:[a-z0-9._\-/+%]+),?)+$/i;

const KEY_ALIASES: Record<string, string> = {
  region: "location",
  proto: "protocol",
};

/** Keys whose values may carry an `m` or `g` size suffix */
const SIZE_KEYS = new Set(["ram", "disk", "size"]);

const MISSING = Symbol("missing");

/**
 * Get a nested value from an object using dot-path notation
 * @param path - Dot-separated path (e.g., "os.name")
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  const value = lookup(obj, path);
  return value === MISSING ? undefined : value;
}

/**
 * True if every segment of `path` exists on `obj`, even when the final
 * value is null
 */
export function hasPath(obj: unknown, path: string): boolean {
  return lookup(obj, path) !== MISSING;
}

function lookup(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split(".")) {
    if (typeof current !== "object" || current === null || !(key in current)) {
      return MISSING;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Parse one filter expression (`"status:on,region:ru-1"`) into filters
 * @throws {ValidationError} If the expression does not match `key:value[,key:value...]`
 */
export function parseFilters(expression: string): Filter[] {
  if (!FILTER_PATTERN.test(expression)) {
    throw new ValidationError(
      `Invalid filter format: '${expression}'. Filter must contain comma separated key:value pairs`
    );
  }
  return expression
    .split(",")
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const idx = pair.indexOf(":");
      return normalizeFilter({ key: pair.slice(0, idx), value: pair.slice(idx + 1) });
    });
}

/**
 * Apply key aliases and convert size suffixes to megabytes
 */
export function normalizeFilter(filter: Filter): Filter {
  const key = KEY_ALIASES[filter.key] ?? filter.key;
  let value = filter.value;

  if (SIZE_KEYS.has(key)) {
    const match = /^(\d+)([mg])$/i.exec(value);
    if (match) {
      const amount = Number(match[1]);
      value = match[2]?.toLowerCase() === "g" ? String(amount * 1024) : String(amount);
    }
  }

  return { key, value };
}

/**
 * A record matches when every filter key exists on it and the stringified
 * value equals the filter value
 */
export function matchesFilters(record: unknown, filters: readonly Filter[]): boolean {
  for (const { key, value } of filters) {
    const actual = lookup(record, key);
    if (actual === MISSING) return false;
    if (stringify(actual) !== value) return false;
  }
  return true;
}

/**
 * Keep the records matching all filters, preserving order
 */
export function filterRecords<T>(records: readonly T[], filters: readonly Filter[]): T[] {
  if (filters.length === 0) return [...records];
  return records.filter((record) => matchesFilters(record, filters));
}

function stringify(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}
