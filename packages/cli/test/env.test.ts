/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { writeFile } from "node:fs/promises";
import { createTempDir, removeDir } from "@cirrus/testkit";
import { expandTilde, isVerbose, nonEmpty, resolveConfigPath } from "../src/lib/env.js";

describe("environment resolution", () => {
  let home: string;

  beforeEach(async () => {
    home = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(home);
  });

  describe("expandTilde", () => {
    it("should expand a bare tilde", () => {
      expect(expandTilde("~", "/home/alex")).toBe("/home/alex");
    });

    it("should expand a tilde prefix", () => {
      expect(expandTilde("~/conf/cirrus.toml", "/home/alex")).toBe(path.join("/home/alex", "conf/cirrus.toml"));
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("/etc/cirrusrc", "/home/alex")).toBe("/etc/cirrusrc");
      expect(expandTilde("~other/file", "/home/alex")).toBe("~other/file");
    });
  });

  describe("resolveConfigPath", () => {
    it("should use CLI option when provided", () => {
      const result = resolveConfigPath("/cli/cirrusrc", { CIRRUS_CONFIG_FILE: "/env/cirrusrc" }, home);
      expect(result).toBe(path.resolve("/cli/cirrusrc"));
    });

    it("should use CIRRUS_CONFIG_FILE when CLI option not provided", () => {
      const result = resolveConfigPath(undefined, { CIRRUS_CONFIG_FILE: "/env/cirrusrc" }, home);
      expect(result).toBe(path.resolve("/env/cirrusrc"));
    });

    it("should ignore an empty CIRRUS_CONFIG_FILE", () => {
      const result = resolveConfigPath(undefined, { CIRRUS_CONFIG_FILE: "  " }, home);
      expect(result).toBe(path.join(home, ".cirrusrc"));
    });

    it("should default to ~/.cirrusrc", () => {
      expect(resolveConfigPath(undefined, {}, home)).toBe(path.join(home, ".cirrusrc"));
    });

    it("should pick an existing ~/.cirrusrc.toml when ~/.cirrusrc is absent", async () => {
      await writeFile(path.join(home, ".cirrusrc.toml"), "");
      expect(resolveConfigPath(undefined, {}, home)).toBe(path.join(home, ".cirrusrc.toml"));
    });

    it("should prefer ~/.cirrusrc when both exist", async () => {
      await writeFile(path.join(home, ".cirrusrc"), "");
      await writeFile(path.join(home, ".cirrusrc.toml"), "");
      expect(resolveConfigPath(undefined, {}, home)).toBe(path.join(home, ".cirrusrc"));
    });

    it("should expand a tilde in the explicit path", () => {
      expect(resolveConfigPath("~/cfg.toml", {}, home)).toBe(path.join(home, "cfg.toml"));
    });
  });

  describe("isVerbose", () => {
    it("should accept 1, true and yes", () => {
      expect(isVerbose({ CIRRUS_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ CIRRUS_DEBUG: "TRUE" })).toBe(true);
      expect(isVerbose({ CIRRUS_DEBUG: " yes " })).toBe(true);
    });

    it("should be false otherwise", () => {
      expect(isVerbose({})).toBe(false);
      expect(isVerbose({ CIRRUS_DEBUG: "0" })).toBe(false);
      expect(isVerbose({ CIRRUS_DEBUG: "" })).toBe(false);
    });
  });

  describe("nonEmpty", () => {
    it("should treat blank values as unset", () => {
      expect(nonEmpty(undefined)).toBeUndefined();
      expect(nonEmpty("")).toBeUndefined();
      expect(nonEmpty(" \t")).toBeUndefined();
      expect(nonEmpty("ru-1")).toBe("ru-1");
    });
  });
});
