/**
 * Unit tests for output rendering
 */

import { describe, it, expect } from "vitest";
import { parse as parseYaml } from "yaml";
import {
  FALLBACK_WARNING,
  InvalidFormatError,
  colorize,
  parseOutputFormat,
  renderOutput,
  renderTable,
  type Column,
} from "../src/lib/render.js";

const servers = {
  servers: [
    { id: 1, name: "web", status: "on", location: "ru-1" },
    { id: 22, name: "database", status: "off", location: "nl-1" },
  ],
  meta: { total: 2 },
};

const COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "STATUS", path: "status" },
];

describe("output rendering", () => {
  describe("parseOutputFormat", () => {
    it("should accept the four formats case-insensitively", () => {
      expect(parseOutputFormat("json")).toBe("json");
      expect(parseOutputFormat(" YAML ")).toBe("yaml");
      expect(parseOutputFormat("raw")).toBe("raw");
      expect(parseOutputFormat("default")).toBe("default");
    });

    it("should reject unknown formats", () => {
      expect(() => parseOutputFormat("xml")).toThrow(InvalidFormatError);
      expect(() => parseOutputFormat("xml")).toThrow(
        "Unknown output format 'xml'. Expected one of: default, raw, json, yaml"
      );
    });
  });

  describe("renderTable", () => {
    it("should align columns with a two-space gutter", () => {
      expect(renderTable(servers.servers, COLUMNS)).toBe(
        "ID  NAME      STATUS\n" + "1   web       on\n" + "22  database  off\n"
      );
    });

    it("should infer columns from scalar fields", () => {
      const table = renderTable({ id: 7, tags: ["a"], name: "x", note: null });
      expect(table).toBe("ID  NAME  NOTE\n" + "7   x\n");
    });

    it("should render nested paths and custom formats", () => {
      const columns: Column[] = [
        { header: "OS", path: "os.name" },
        { header: "RAM", path: "ram", format: (value) => `${String(value)}M` },
      ];
      expect(renderTable([{ os: { name: "ubuntu" }, ram: 2048 }], columns)).toBe("OS      RAM\n" + "ubuntu  2048M\n");
    });

    it("should truncate long cells with an ellipsis", () => {
      const table = renderTable([{ comment: "c".repeat(50) }], [{ header: "COMMENT", path: "comment" }]);
      expect(table).toBe("COMMENT\n" + "c".repeat(39) + "…\n");
    });

    it("should fold multi-line cells onto one line", () => {
      const table = renderTable([{ event: "boot\n  done" }], [{ header: "EVENT", path: "event" }]);
      expect(table).toBe("EVENT\nboot done\n");
    });

    it("should return undefined for data that is not records", () => {
      expect(renderTable(["ubuntu", "debian"])).toBeUndefined();
      expect(renderTable("text")).toBeUndefined();
      expect(renderTable({ nested: { a: 1 } })).toBeUndefined();
    });
  });

  describe("renderOutput", () => {
    it("should render the records under the view key as a table", () => {
      const rendered = renderOutput(servers, "default", { key: "servers", columns: COLUMNS });
      expect(rendered.warning).toBeUndefined();
      expect(rendered.stdout).toBe("ID  NAME      STATUS\n1   web       on\n22  database  off\n");
    });

    it("should fall back to JSON with a warning", () => {
      const body = { k8s_versions: ["v1.29", "v1.30"] };
      const rendered = renderOutput(body, "default", { key: "k8s_versions" });
      expect(rendered.warning).toBe(`${FALLBACK_WARNING}\n`);
      expect(rendered.stdout).toBe(JSON.stringify(body, null, 2) + "\n");
    });

    it("should render pretty JSON and single-line raw JSON", () => {
      expect(renderOutput({ a: 1 }, "json").stdout).toBe('{\n  "a": 1\n}\n');
      expect(renderOutput({ a: [1, 2] }, "raw").stdout).toBe('{"a":[1,2]}\n');
    });

    it("should render YAML that parses back to the same value", () => {
      const rendered = renderOutput(servers, "yaml");
      expect(parseYaml(rendered.stdout)).toEqual(servers);
    });

    it("should apply filters in every format and keep the envelope", () => {
      const view = {
        key: "servers",
        columns: COLUMNS,
        filters: [{ key: "status", value: "off" }],
      };
      expect(JSON.parse(renderOutput(servers, "json", view).stdout)).toEqual({
        servers: [{ id: 22, name: "database", status: "off", location: "nl-1" }],
        meta: { total: 2 },
      });
      expect(renderOutput(servers, "default", view).stdout).toBe("ID  NAME      STATUS\n22  database  off\n");
    });

    it("should render an empty list without columns as nothing", () => {
      const rendered = renderOutput({ resources: [] }, "default", { key: "resources" });
      expect(rendered).toEqual({ stdout: "" });
    });

    it("should expand records into several rows only in the table", () => {
      const view = {
        key: "servers",
        columns: COLUMNS.slice(0, 2),
        expand: (record: Record<string, unknown>) => [record, { id: record["id"], name: "spare" }],
      };
      expect(renderOutput(servers, "default", view).stdout).toBe("ID  NAME\n1   web\n1   spare\n22  database\n22  spare\n");
      expect(renderOutput(servers, "json", view).stdout).toBe(`${JSON.stringify(servers, null, 2)}\n`);
    });

    it("should render only the header when no record matches", () => {
      const view = { key: "servers", columns: COLUMNS, filters: [{ key: "status", value: "removed" }] };
      expect(renderOutput(servers, "default", view).stdout).toBe("ID  NAME  STATUS\n");
    });
  });

  describe("colorize", () => {
    it("should only color TTY output", () => {
      expect(colorize("Error", "red", false)).toBe("Error");
      expect(colorize("Error", "red", true)).toBe("\x1b[31mError\x1b[0m");
    });
  });
});
