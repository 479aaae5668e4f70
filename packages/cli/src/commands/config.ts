/**
 * `cirrus config`: manage profiles in the config file
 */

import { existsSync } from "node:fs";
import { InvalidArgumentError, type Command } from "commander";
import { REDACTED } from "@cirrus/sdk";
import {
  CONFIG_KEYS,
  isConfigKey,
  profileNames,
  readConfigDocument,
  updateProfile,
  validateConfigValue,
  writeConfigDocument,
  type ConfigKey,
} from "../lib/config.js";
import type { CliContext } from "../lib/context.js";
import { CliError } from "../lib/errors.js";

function parseConfigKey(value: string): ConfigKey {
  if (!isConfigKey(value)) {
    throw new InvalidArgumentError(`Unknown key '${value}'. Expected one of: ${CONFIG_KEYS.join(", ")}`);
  }
  return value;
}

export function registerConfigCommands(program: Command, ctx: CliContext): void {
  const config = program.command("config").description("manage configuration profiles");

  config
    .command("init")
    .description("create the config file with a token for the current profile")
    .option("--token <token>", "API token (asked for when omitted)")
    .action(async (opts: { token?: string }) => {
      await ctx.timed("cli.config.init", async () => {
        const { configPath, profile } = ctx.configLocation();
        if (existsSync(configPath)) {
          throw new CliError(`Config file already exists: ${configPath}. Use 'cirrus config set token ...' to change it`);
        }

        let token = opts.token;
        if (token === undefined) {
          if (!ctx.io.isStdinTTY) {
            throw new CliError("No token given. Pass --token or run interactively");
          }
          token = await ctx.io.prompt("API token: ");
        }
        const value = validateConfigValue("token", token.trim());

        await writeConfigDocument(configPath, { [profile]: { token: value } });
        ctx.io.stdout(`Configuration saved to ${configPath}\n`);
      });
    });

  config
    .command("show")
    .description("show the resolved configuration")
    .option("--show-token", "print the token instead of hiding it")
    .action(async (opts: { showToken?: boolean }) => {
      await ctx.timed("cli.config.show", async () => {
        const cfg = await ctx.config();
        let token: string | null = null;
        if (cfg.token !== undefined) {
          token = opts.showToken ? cfg.token : REDACTED;
        }
        await ctx.print({
          config_file: cfg.configPath,
          profile: cfg.profile,
          token,
          output_format: cfg.outputFormat,
          region: cfg.region ?? null,
          availability_zone: cfg.availabilityZone ?? null,
          api_endpoint: cfg.apiBaseUrl,
        });
      });
    });

  config
    .command("set <key> <value>")
    .description(`set a key of the current profile (${CONFIG_KEYS.join(", ")})`)
    .action(async (rawKey: string, value: string) => {
      await ctx.timed("cli.config.set", async () => {
        const key = parseConfigKey(rawKey);
        const checked = validateConfigValue(key, value);
        const { configPath, profile } = ctx.configLocation();
        await updateProfile(configPath, profile, (current) => ({ ...current, [key]: checked }));
        ctx.io.stdout(`Set ${key} in profile '${profile}'\n`);
      });
    });

  config
    .command("unset <key>")
    .description("remove a key from the current profile")
    .action(async (rawKey: string) => {
      await ctx.timed("cli.config.unset", async () => {
        const key = parseConfigKey(rawKey);
        const { configPath, profile } = ctx.configLocation();
        if (!existsSync(configPath)) {
          throw new CliError(`Config file not found: ${configPath}`);
        }
        await updateProfile(configPath, profile, (current) =>
          Object.fromEntries(Object.entries(current).filter(([k]) => k !== key))
        );
        ctx.io.stdout(`Removed ${key} from profile '${profile}'\n`);
      });
    });

  config
    .command("profiles")
    .description("list profiles; the current one is marked with *")
    .action(async () => {
      await ctx.timed("cli.config.profiles", async () => {
        const { configPath, profile } = ctx.configLocation();
        for (const name of profileNames(await readConfigDocument(configPath))) {
          ctx.io.stdout(`${name === profile ? "*" : " "} ${name}\n`);
        }
      });
    });

  config
    .command("path")
    .description("print the config file path")
    .action(() => {
      ctx.io.stdout(`${ctx.configLocation().configPath}\n`);
    });
}
