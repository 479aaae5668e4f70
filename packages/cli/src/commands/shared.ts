/**
 * Options and checks shared by the resource commands
 */

import { Option, type Command } from "commander";
import { DEFAULT_PAGE_LIMIT, getPath, type ApiRecord, type Filter } from "@cirrus/sdk";
import { collectFilters, parseLimit } from "../lib/arg.js";

export interface ListFlags {
  filter?: Filter[];
  limit?: number;
}

export function filterOption(): Option {
  return new Option("-f, --filter <key:value>", "show records matching KEY:VALUE[,KEY:VALUE...] (repeatable)").argParser(
    collectFilters
  );
}

export function limitOption(): Option {
  return new Option("--limit <count>", "number of records to fetch").argParser(parseLimit).default(DEFAULT_PAGE_LIMIT);
}

export function yesOption(): Option {
  return new Option("-y, --yes", "do not ask for confirmation");
}

/**
 * Fail with a usage error unless at least one of `flags` was given
 */
export function requireOneOf(command: Command, flags: ReadonlyArray<readonly [string, unknown]>): void {
  if (flags.some(([, value]) => value !== undefined)) {
    return;
  }
  const names = flags.map(([name]) => `'${name}'`).join(", ");
  command.error(`error: One of options is required: [${names}]`);
}

/**
 * Add a `location:` filter for `--region`
 */
export function withRegion(filters: Filter[] | undefined, region: string | undefined): Filter[] {
  const list = filters ?? [];
  return region === undefined ? list : [...list, { key: "location", value: region }];
}

/**
 * Number at `path`, if the record has one
 */
export function numberAt(record: ApiRecord, path: string): number | undefined {
  const value = getPath(record, path);
  return typeof value === "number" ? value : undefined;
}

/**
 * Print the `id` of every record, one per line
 */
export function idLines(records: readonly ApiRecord[]): string {
  return records.map((r) => `${String(r["id"])}\n`).join("");
}
