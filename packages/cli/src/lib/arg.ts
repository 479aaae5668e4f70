/**
 * Argument parsing and validation helpers
 *
 * Every parser here runs while commander reads the command line, so bad
 * input fails with an InvalidArgumentError before any request is made.
 */

import { InvalidArgumentError } from "commander";
import {
  ValidationError,
  assertFirewallResourceType,
  parseCidr,
  parseFilters,
  parsePortProto,
  sizeToMb,
  validateVpcSubnet,
  type Filter,
  type FirewallResourceType,
  type PortProto,
} from "@cirrus/sdk";

const MAX_LIMIT = 10000;

/**
 * Run an SDK validator and report its ValidationError as an argument error
 */
function validated<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > MAX_LIMIT) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_LIMIT}`);
  }

  return parsed;
}

/**
 * Numeric resource ID (servers, databases, balancers, ...)
 */
export function parseId(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0 || !Number.isSafeInteger(Number(trimmed))) {
    throw new InvalidArgumentError(`'${value}' is not a valid ID`);
  }
  return Number(trimmed);
}

/**
 * Variadic variant of parseId for `ID...` arguments
 */
export function collectIds(value: string, previous: number[] = []): number[] {
  return [...previous, parseId(value)];
}

export function collectStrings(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parseLimit(value: string): number {
  return parseNonNegativeInt(value, "--limit");
}

/**
 * Positive number of seconds, converted to milliseconds
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError(`'${value}' is not a positive number of seconds`);
  }
  return Math.round(seconds * 1000);
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`'${value}' is not a valid port`);
  }
  return port;
}

/**
 * `YYYY-MM-DD`, returned as midnight UTC in ISO 8601
 */
export function parseDate(value: string): string {
  const time = new Date(`${value}T00:00:00Z`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(time.getTime()) || !time.toISOString().startsWith(value)) {
    throw new InvalidArgumentError(`'${value}' is not a date in YYYY-MM-DD format`);
  }
  return `${value}T00:00:00Z`;
}

/**
 * 1 (Monday) to 7 (Sunday)
 */
export function parseDayOfWeek(value: string): number {
  if (!/^[1-7]$/.test(value.trim())) {
    throw new InvalidArgumentError(`'${value}' is not a day of week from 1 to 7`);
  }
  return Number(value.trim());
}

/**
 * Size with optional M, G or T suffix, in megabytes
 */
export function parseSize(value: string): number {
  return validated(() => sizeToMb(value));
}

export function parseCidrArg(value: string): string {
  validated(() => parseCidr(value));
  return value;
}

export function parseSubnet(value: string): string {
  return validated(() => validateVpcSubnet(value));
}

/**
 * `[PORT[-PORT]/]PROTO`, e.g. `22/tcp`, `2000-3000/udp` or `icmp`
 */
export function parsePortProtoArg(value: string): PortProto {
  return validated(() => parsePortProto(value));
}

export function collectPortProto(value: string, previous: PortProto[] = []): PortProto[] {
  return [...previous, parsePortProtoArg(value)];
}

export function parseFirewallResourceType(value: string): FirewallResourceType {
  return validated(() => assertFirewallResourceType(value));
}

/**
 * Collect repeated `-f/--filter` expressions into one filter list
 */
export function collectFilters(value: string, previous: Filter[] = []): Filter[] {
  return [...previous, ...validated(() => parseFilters(value))];
}

/**
 * Build a parser accepting one of `choices`
 */
export function choice<T extends string>(choices: readonly T[], name: string): (value: string) => T {
  return (value) => {
    const found = choices.find((c) => c === value);
    if (found === undefined) {
      throw new InvalidArgumentError(`${name} must be one of: ${choices.join(", ")}`);
    }
    return found;
  };
}

/**
 * `KEY=VALUE` pairs, e.g. database config parameters
 */
export function collectKeyValue(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const idx = value.indexOf("=");
  if (idx <= 0) {
    throw new InvalidArgumentError(`'${value}' must look like KEY=VALUE`);
  }
  return { ...previous, [value.slice(0, idx)]: value.slice(idx + 1) };
}
