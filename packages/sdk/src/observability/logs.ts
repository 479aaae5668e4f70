/**
 * Structured logging for API requests and CLI operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  method?: string;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Destination for formatted log lines. Defaults to stderr so that logs
 * never mix with command output on stdout.
 */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  sink?: LogSink;
  debug?: boolean;
  /** Strings replaced with `<redacted>` in every emitted line */
  secrets?: string[];
}

export const REDACTED = "<redacted>";

export class Logger {
  #enabled = true;
  #debug: boolean;
  #sink: LogSink;
  #secrets: string[];

  constructor(options: LoggerOptions = {}) {
    this.#sink = options.sink ?? ((line) => process.stderr.write(`${line}\n`));
    this.#debug = options.debug ?? Boolean(process.env.CIRRUS_DEBUG);
    this.#secrets = (options.secrets ?? []).filter((s) => s.length > 0);
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !this.#debug) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.method || entry.path) {
      parts.push(`${entry.method ?? ""} ${entry.path ?? ""}`.trim());
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(this.redact(parts.join(" ")));
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Replace every registered secret in `text`
   */
  redact(text: string): string {
    let out = text;
    for (const secret of this.#secrets) {
      out = out.split(secret).join(REDACTED);
    }
    return out;
  }

  /**
   * Register a value that must never appear in log output
   */
  addSecret(secret: string): void {
    if (secret.length > 0 && !this.#secrets.includes(secret)) {
      this.#secrets.push(secret);
    }
  }

  get debugEnabled(): boolean {
    return this.#enabled && this.#debug;
  }

  setDebug(debug: boolean): void {
    this.#debug = debug;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
