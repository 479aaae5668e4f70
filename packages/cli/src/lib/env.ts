/**
 * Environment and configuration path resolution
 */

import * as path from "node:path";
import { existsSync } from "node:fs";
import { homedir } from "node:os";

export type Env = Record<string, string | undefined>;

export const ENV = {
  token: "CIRRUS_TOKEN",
  configFile: "CIRRUS_CONFIG_FILE",
  profile: "CIRRUS_PROFILE",
  outputFormat: "CIRRUS_OUTPUT_FORMAT",
  endpoint: "CIRRUS_ENDPOINT",
  debug: "CIRRUS_DEBUG",
} as const;

export const DEFAULT_CONFIG_NAME = ".cirrusrc";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string, home: string = homedir()): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return home;
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(home, rest);
}

/**
 * Resolve the config file path
 * Priority: -c/--config > CIRRUS_CONFIG_FILE > ~/.cirrusrc (or an existing ~/.cirrusrc.toml)
 */
export function resolveConfigPath(cliPath: string | undefined, env: Env, home: string = homedir()): string {
  const explicit = cliPath ?? nonEmpty(env[ENV.configFile]);
  if (explicit !== undefined) {
    return path.resolve(expandTilde(explicit, home));
  }

  const base = path.join(home, DEFAULT_CONFIG_NAME);
  const withExtension = `${base}.toml`;
  if (!existsSync(base) && existsSync(withExtension)) {
    return withExtension;
  }
  return base;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: Env): boolean {
  const value = env[ENV.debug]?.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

/**
 * Treat empty environment variables as unset
 */
export function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}
