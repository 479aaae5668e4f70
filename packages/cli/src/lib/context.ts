/**
 * Per-invocation state shared by command handlers: the resolved config,
 * the API client, output and waiting
 */

import { Option, type Command } from "commander";
import {
  Logger,
  MetricsCollector,
  createClient,
  type CloudClient,
  type FetchLike,
  type SleepFn,
  type WaitOptions,
} from "@cirrus/sdk";
import {
  resolveConfigLocation,
  resolveRuntimeConfig,
  type ConfigLocation,
  type GlobalOptions,
  type RuntimeConfig,
} from "./config.js";
import { isVerbose, type Env } from "./env.js";
import { AuthError } from "./errors.js";
import type { BulkOptions } from "./bulk.js";
import type { CliIO } from "./io.js";
import { renderOutput, type View } from "./render.js";
import { parseSeconds } from "./arg.js";
import { emitRequestMetrics, withTiming, type MetricSink } from "./telemetry.js";
import { CLI_VERSION } from "../version.js";

export interface CliDeps {
  io: CliIO;
  env: Env;
  /** Replaces global fetch for every API request */
  fetch?: FetchLike;
  /** Sleep used between status polls */
  sleep?: SleepFn;
  /** Aborts status polls and bulk runs, e.g. on SIGINT */
  signal?: AbortSignal;
  /** Called when the command enters a poll or bulk run that stops on `signal` */
  onInterruptible?: () => void;
  /** Home directory for the default config path */
  home?: string;
}

export interface WaitFlags {
  wait?: boolean;
  waitTimeout?: number;
  pollInterval?: number;
}

export const DEFAULT_WAIT_TIMEOUT_SECONDS = 600;
export const DEFAULT_POLL_INTERVAL_SECONDS = 5;

/**
 * Add `--wait`, `--wait-timeout` and `--poll-interval` to a command
 */
export function addWaitOptions(command: Command, what: string): Command {
  return command
    .option("--wait", `wait until ${what}`)
    .addOption(
      new Option("--wait-timeout <seconds>", "give up waiting after this many seconds")
        .argParser(parseSeconds)
        .default(DEFAULT_WAIT_TIMEOUT_SECONDS * 1000, String(DEFAULT_WAIT_TIMEOUT_SECONDS))
    )
    .addOption(
      new Option("--poll-interval <seconds>", "seconds between status checks")
        .argParser(parseSeconds)
        .default(DEFAULT_POLL_INTERVAL_SECONDS * 1000, String(DEFAULT_POLL_INTERVAL_SECONDS))
    );
}

export class CliContext {
  readonly io: CliIO;
  readonly logger: Logger;
  readonly metrics = new MetricsCollector();
  #deps: CliDeps;
  #globals: () => GlobalOptions;
  #config: RuntimeConfig | undefined;
  #client: CloudClient | undefined;

  constructor(deps: CliDeps, globals: () => GlobalOptions) {
    this.#deps = deps;
    this.#globals = globals;
    this.io = deps.io;
    this.logger = new Logger({ sink: (line) => deps.io.stderr(`${line}\n`), debug: false });
  }

  get env(): Env {
    return this.#deps.env;
  }

  /**
   * `--verbose` or CIRRUS_DEBUG; known without reading the config file
   */
  get verbose(): boolean {
    return Boolean(this.#globals().verbose) || isVerbose(this.#deps.env);
  }

  get home(): string | undefined {
    return this.#deps.home;
  }

  get globals(): GlobalOptions {
    return this.#globals();
  }

  /**
   * Config file path and profile name; does not read the file
   */
  configLocation(): ConfigLocation {
    return resolveConfigLocation(this.#globals(), this.#deps.env, this.#deps.home);
  }

  async config(): Promise<RuntimeConfig> {
    if (this.#config === undefined) {
      this.logger.setDebug(this.verbose);
      this.#config = await resolveRuntimeConfig(this.#globals(), this.#deps.env, {
        home: this.#deps.home,
        logger: this.logger,
      });
    }
    return this.#config;
  }

  /**
   * API client for the resolved profile
   * @throws {AuthError} When no token is configured
   */
  async client(): Promise<CloudClient> {
    if (this.#client === undefined) {
      const config = await this.config();
      if (config.token === undefined) {
        throw new AuthError(
          `No API token configured for profile '${config.profile}'. Run 'cirrus config init' or set CIRRUS_TOKEN`
        );
      }
      this.#client = createClient({
        token: config.token,
        baseUrl: config.apiBaseUrl,
        userAgent: `cirrus-cli/${CLI_VERSION} node/${process.versions.node}`,
        fetch: this.#deps.fetch,
        logger: this.logger,
        metrics: this.metrics,
      });
    }
    return this.#client;
  }

  /**
   * Render a response in the configured output format. An empty (204)
   * response prints nothing.
   */
  async print(body: unknown, view?: View): Promise<void> {
    if (body === undefined) return;
    const { outputFormat } = await this.config();
    const rendered = renderOutput(body, outputFormat, view);
    if (rendered.warning) {
      this.io.stderr(rendered.warning);
    }
    this.io.stdout(rendered.stdout);
  }

  get signal(): AbortSignal | undefined {
    return this.#deps.signal;
  }

  bulkOptions(): BulkOptions {
    this.#deps.onInterruptible?.();
    return { io: this.io, verbose: this.verbose, signal: this.#deps.signal };
  }

  waitOptions(flags: WaitFlags): WaitOptions {
    this.#deps.onInterruptible?.();
    return {
      intervalMs: flags.pollInterval ?? DEFAULT_POLL_INTERVAL_SECONDS * 1000,
      timeoutMs: flags.waitTimeout ?? DEFAULT_WAIT_TIMEOUT_SECONDS * 1000,
      signal: this.#deps.signal,
      sleep: this.#deps.sleep,
      onAttempt: (attempt, status) => this.logger.debug("poll.attempt", { message: `#${attempt} status=${status}` }),
    };
  }

  /**
   * Run a command body, emitting timing and request metrics in verbose mode
   */
  timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const sink: MetricSink | undefined = this.verbose ? (line) => this.io.stderr(line) : undefined;
    return withTiming(label, fn, sink).finally(() => emitRequestMetrics(sink, this.metrics));
  }
}
