/**
 * The `cirrus` command tree
 *
 * `createProgram` builds a fresh commander program per invocation; `run`
 * parses one argument vector and returns the exit code.
 */

import { Command, CommanderError, Option } from "commander";
import type { GlobalOptions } from "./lib/config.js";
import { CliContext, type CliDeps } from "./lib/context.js";
import { CliError, EXIT, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { colorize, parseOutputFormat } from "./lib/render.js";
import { CLI_VERSION } from "./version.js";
import { registerConfigCommands } from "./commands/config.js";
import { registerAccountCommands } from "./commands/account.js";
import { registerServerCommands } from "./commands/servers.js";
import { registerSshKeyCommands } from "./commands/ssh-keys.js";
import { registerImageCommands } from "./commands/images.js";
import { registerProjectCommands } from "./commands/projects.js";
import { registerDatabaseCommands } from "./commands/databases.js";
import { registerStorageCommands } from "./commands/storage.js";
import { registerBalancerCommands } from "./commands/balancers.js";
import { registerClusterCommands } from "./commands/clusters.js";
import { registerDomainCommands } from "./commands/domains.js";
import { registerVpcCommands } from "./commands/vpcs.js";
import { registerFirewallCommands } from "./commands/firewall.js";
import { registerFloatingIpCommands } from "./commands/floating-ips.js";

export type { CliDeps } from "./lib/context.js";

export interface CliProgram {
  program: Command;
  context: CliContext;
  /** Errors commander has already printed */
  reported: WeakSet<Error>;
}

export function createProgram(deps: CliDeps): CliProgram {
  const program = new Command();
  const reported = new WeakSet<Error>();
  const context = new CliContext(deps, () => program.opts<GlobalOptions>());
  const { io } = deps;

  // Subcommands created with .command() inherit both settings
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.isStderrTTY)),
    })
    .exitOverride((err) => {
      reported.add(err);
      throw err;
    });

  // Global options
  program
    .name("cirrus")
    .description("Command-line client for the cloud API")
    .version(CLI_VERSION, "-V, --version", "print the version")
    .option("--verbose", "log HTTP requests and timings to stderr (env: CIRRUS_DEBUG)")
    .option("-c, --config <file>", "config file (env: CIRRUS_CONFIG_FILE)")
    .option("-p, --profile <name>", "config profile (env: CIRRUS_PROFILE)")
    .addOption(
      new Option("-o, --output <format>", "output format: default, raw, json or yaml (env: CIRRUS_OUTPUT_FORMAT)").argParser(
        parseOutputFormat
      )
    );

  program
    .command("version")
    .description("print the version")
    .action(() => {
      io.stdout(`${CLI_VERSION}\n`);
    });

  registerConfigCommands(program, context);
  registerAccountCommands(program, context);
  registerServerCommands(program, context);
  registerSshKeyCommands(program, context);
  registerImageCommands(program, context);
  registerProjectCommands(program, context);
  registerDatabaseCommands(program, context);
  registerStorageCommands(program, context);
  registerBalancerCommands(program, context);
  registerClusterCommands(program, context);
  registerDomainCommands(program, context);
  registerVpcCommands(program, context);
  registerFirewallCommands(program, context);
  registerFloatingIpCommands(program, context);

  return { program, context, reported };
}

/**
 * Run the CLI on `argv` (without the node and script paths)
 * @returns The process exit code
 */
export async function run(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { program, context, reported } = createProgram(deps);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return EXIT.ok;
  } catch (err) {
    const exitCode = mapErrorToExitCode(err);
    const alreadyShown =
      (err instanceof CommanderError && reported.has(err)) || (err instanceof CliError && err.silent);

    if (!alreadyShown) {
      const message = formatCliError(err, context.verbose);
      deps.io.stderr(`${colorize(`Error: ${message}`, "red", deps.io.isStderrTTY)}\n`);
    }

    return exitCode;
  }
}
