/**
 * Output rendering helpers
 */

import { InvalidArgumentError } from "commander";
import { stringify as toYaml } from "yaml";
import { filterRecords, getPath, type Filter } from "@cirrus/sdk";

export const OUTPUT_FORMATS = ["default", "raw", "json", "yaml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const FALLBACK_WARNING = "Error: Cannot represent output. Fallback to JSON.";

/** Cells longer than this are cut and end with an ellipsis */
export const MAX_CELL_WIDTH = 40;

const GUTTER = "  ";

type Color = "red" | "green" | "yellow";

export class InvalidFormatError extends InvalidArgumentError {
  constructor(value: string) {
    super(`Unknown output format '${value}'. Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
    this.name = "InvalidFormatError";
  }
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new InvalidFormatError(value);
  }
  return normalized;
}

export interface Column {
  header: string;
  /** Dot path into the record */
  path: string;
  format?: (value: unknown, record: Record<string, unknown>) => string;
}

/**
 * How one response is shown: which envelope key holds the records, the
 * table columns and the client-side filters
 */
export interface View {
  key?: string;
  columns?: readonly Column[];
  filters?: readonly Filter[];
  /** Table rows for one record, when a record spans several lines */
  expand?: (record: Record<string, unknown>) => Record<string, unknown>[];
}

export interface Rendered {
  stdout: string;
  /** Written to stderr before stdout */
  warning?: string;
}

/**
 * Render an API response body in the given format
 */
export function renderOutput(body: unknown, format: OutputFormat, view: View = {}): Rendered {
  const filtered = applyFilters(body, view);

  switch (format) {
    case "raw":
      return { stdout: `${JSON.stringify(filtered)}\n` };
    case "json":
      return { stdout: renderJson(filtered) };
    case "yaml":
      return { stdout: toYaml(filtered) };
    case "default": {
      const table = renderTable(expandRows(recordsOf(filtered, view.key), view.expand), view.columns);
      if (table === undefined) {
        return { stdout: renderJson(filtered), warning: `${FALLBACK_WARNING}\n` };
      }
      return { stdout: table };
    }
  }
}

/**
 * Keep only the records under `view.key` that match every filter; the
 * rest of the envelope is left as is
 */
export function applyFilters(body: unknown, view: View): unknown {
  const filters = view.filters ?? [];
  if (filters.length === 0 || view.key === undefined || !isRecord(body)) {
    return body;
  }
  const records = body[view.key];
  if (!Array.isArray(records)) {
    return body;
  }
  return { ...body, [view.key]: filterRecords(records, filters) };
}

function expandRows(data: unknown, expand: View["expand"]): unknown {
  if (expand === undefined || !Array.isArray(data) || !data.every(isRecord)) return data;
  return data.flatMap(expand);
}

function recordsOf(body: unknown, key: string | undefined): unknown {
  if (key === undefined) return body;
  return isRecord(body) ? body[key] : undefined;
}

/**
 * Aligned table with a header row. Returns undefined when the data is not
 * a record or a list of records, or when no column can be shown.
 */
export function renderTable(data: unknown, columns?: readonly Column[]): string | undefined {
  const rows = Array.isArray(data) ? data : [data];
  if (!rows.every(isRecord)) {
    return undefined;
  }

  const cols = columns ?? inferColumns(rows);
  if (cols.length === 0) {
    // An empty list without fixed columns renders as nothing
    return rows.length === 0 ? "" : undefined;
  }

  const table = [
    cols.map((c) => c.header),
    ...rows.map((row) =>
      cols.map((c) => truncate(c.format ? c.format(getPath(row, c.path), row) : cellText(getPath(row, c.path))))
    ),
  ];

  const widths = cols.map((_, i) => Math.max(...table.map((line) => (line[i] ?? "").length)));
  return (
    table.map((line) => line.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(GUTTER).trimEnd()).join("\n") + "\n"
  );
}

/**
 * Columns for every scalar field of the first record
 */
function inferColumns(rows: readonly Record<string, unknown>[]): Column[] {
  const [first] = rows;
  if (!first) return [];
  return Object.entries(first)
    .filter(([, value]) => value === null || typeof value !== "object")
    .map(([key]) => ({ header: key.toUpperCase(), path: key }));
}

export function cellText(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function truncate(text: string): string {
  const single = text.replace(/\s*\n\s*/g, " ");
  return single.length > MAX_CELL_WIDTH ? `${single.slice(0, MAX_CELL_WIDTH - 1)}…` : single;
}

export function renderJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Apply ANSI color only if the output stream is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
