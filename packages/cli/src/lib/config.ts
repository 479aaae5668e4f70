/**
 * Configuration profiles
 *
 * The config file is TOML with one table per profile:
 *
 * ```toml
 * [default]
 * token = "..."
 * output_format = "json"
 * ```
 *
 * Settings resolve as: command-line flag > environment > profile > default.
 * The result is one frozen RuntimeConfig per invocation.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseToml, stringify as stringifyToml, TomlError } from "smol-toml";
import { z } from "zod";
import { DEFAULT_BASE_URL, type Logger } from "@cirrus/sdk";
import { ENV, isVerbose, nonEmpty, resolveConfigPath, type Env } from "./env.js";
import { CliError } from "./errors.js";
import { OUTPUT_FORMATS, parseOutputFormat, type OutputFormat } from "./render.js";

export const DEFAULT_PROFILE = "default";

export const ProfileSchema = z.object({
  token: z.string().min(1, "token must not be empty").optional(),
  output_format: z.enum(OUTPUT_FORMATS).optional(),
  region: z.string().min(1).optional(),
  availability_zone: z.string().min(1).optional(),
});

export type Profile = z.infer<typeof ProfileSchema>;

export type ConfigKey = keyof Profile;

export const CONFIG_KEYS: readonly ConfigKey[] = ["token", "output_format", "region", "availability_zone"];

export type GlobalOptions = {
  config?: string;
  profile?: string;
  output?: OutputFormat;
  verbose?: boolean;
};

export interface RuntimeConfig {
  readonly configPath: string;
  readonly profile: string;
  readonly token: string | undefined;
  readonly outputFormat: OutputFormat;
  readonly region: string | undefined;
  readonly availabilityZone: string | undefined;
  readonly apiBaseUrl: string;
  readonly verbose: boolean;
}

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((k) => k === value);
}

/**
 * Read and parse the raw TOML document. A missing file is an empty document.
 */
export async function readConfigDocument(filePath: string): Promise<Record<string, unknown> | undefined> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isErrno(err) && err.code === "ENOENT") {
      return undefined;
    }
    throw new CliError(`Cannot read config file ${filePath}`, { cause: err });
  }

  try {
    return parseToml(text);
  } catch (err) {
    const reason = err instanceof TomlError ? err.message.split("\n")[0] : String(err);
    throw new CliError(`Invalid config file ${filePath}: ${reason}`, { cause: err });
  }
}

export interface ConfigLocation {
  configPath: string;
  profile: string;
}

/**
 * Config file path and profile name, without reading the file
 */
export function resolveConfigLocation(globals: GlobalOptions, env: Env, home?: string): ConfigLocation {
  return {
    configPath: resolveConfigPath(globals.config, env, home),
    profile: globals.profile ?? nonEmpty(env[ENV.profile]) ?? DEFAULT_PROFILE,
  };
}

/**
 * Names of the profile tables in the document, in file order
 */
export function profileNames(document: Record<string, unknown> | undefined): string[] {
  return Object.entries(document ?? {})
    .filter(([, table]) => isTable(table))
    .map(([name]) => name);
}

/**
 * Load and validate one profile. Other profiles are not looked at, so a bad
 * value elsewhere in the file does not get in the way. A profile missing
 * from the file is empty.
 */
export async function loadProfile(filePath: string, name: string, logger?: Logger): Promise<Profile> {
  const table = (await readConfigDocument(filePath))?.[name];
  if (table === undefined) {
    return {};
  }
  if (!isTable(table)) {
    throw new CliError(`Invalid profile [${name}] in ${filePath}: expected a table`);
  }
  const unknownKeys = Object.keys(table).filter((key) => !isConfigKey(key));
  if (unknownKeys.length > 0) {
    logger?.debug("config.ignored", { message: `Ignoring unknown keys in [${name}]: ${unknownKeys.join(", ")}` });
  }
  const result = ProfileSchema.safeParse(table);
  if (!result.success) {
    throw new CliError(`Invalid profile [${name}] in ${filePath}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Combine flags, environment and the config file into a frozen RuntimeConfig
 */
export async function resolveRuntimeConfig(
  globals: GlobalOptions,
  env: Env,
  options: { home?: string; logger?: Logger } = {}
): Promise<RuntimeConfig> {
  const { configPath, profile: profileName } = resolveConfigLocation(globals, env, options.home);
  const profile = await loadProfile(configPath, profileName, options.logger);

  const envFormat = nonEmpty(env[ENV.outputFormat]);
  const outputFormat =
    globals.output ?? (envFormat !== undefined ? parseOutputFormat(envFormat) : undefined) ?? profile.output_format ?? "default";

  const endpoint = nonEmpty(env[ENV.endpoint]);
  if (endpoint !== undefined) {
    options.logger?.warn("config.endpoint", { message: `Using API endpoint ${endpoint}` });
  }

  return Object.freeze({
    configPath,
    profile: profileName,
    token: nonEmpty(env[ENV.token]) ?? profile.token,
    outputFormat,
    region: profile.region,
    availabilityZone: profile.availability_zone,
    apiBaseUrl: endpoint ?? DEFAULT_BASE_URL,
    verbose: Boolean(globals.verbose) || isVerbose(env),
  });
}

/**
 * Validate a single value for `config set`
 */
export function validateConfigValue(key: ConfigKey, value: string): string {
  const result = ProfileSchema.shape[key].safeParse(value);
  if (!result.success) {
    throw new CliError(`Invalid value for ${key}: ${describeIssues(result.error)}`);
  }
  return value;
}

/**
 * Set or remove keys of one profile, keeping everything else in the file
 */
export async function updateProfile(
  filePath: string,
  profile: string,
  update: (current: Record<string, unknown>) => Record<string, unknown>
): Promise<void> {
  const document = (await readConfigDocument(filePath)) ?? {};
  const existing = document[profile];
  const current: Record<string, unknown> = isTable(existing) ? Object.fromEntries(Object.entries(existing)) : {};
  document[profile] = update(current);
  await writeConfigDocument(filePath, document);
}

/**
 * Write the document readable by the owner only
 */
export async function writeConfigDocument(filePath: string, document: Record<string, unknown>): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, stringifyToml(document) + "\n", { encoding: "utf8", mode: 0o600 });
  await fs.chmod(filePath, 0o600);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
