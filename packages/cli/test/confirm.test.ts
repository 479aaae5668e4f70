/**
 * Unit tests for confirmations and status checks
 */

import { describe, it, expect } from "vitest";
import { confirm, removeWithCode } from "../src/lib/confirm.js";
import { CliError } from "../src/lib/errors.js";
import { TARGET_STATUS, checkStatus } from "../src/lib/status.js";
import { captureIO } from "./helpers.js";

describe("confirm", () => {
  it("should pass without asking when --yes is given", async () => {
    const io = captureIO();
    await confirm(io, "Remove server(s) 1?", true);
    expect(io.questions).toEqual([]);
  });

  it("should require --yes without a terminal", async () => {
    const io = captureIO({ tty: false });
    await expect(confirm(io, "Remove server(s) 1?", undefined)).rejects.toThrow(
      "Remove server(s) 1? Pass --yes to confirm in non-interactive mode"
    );
  });

  it("should accept y and yes", async () => {
    const io = captureIO({ tty: true, answers: ["Y", "yes"] });
    await confirm(io, "Remove?", false);
    await confirm(io, "Remove?", false);
    expect(io.questions).toEqual(["Remove? [y/N]: ", "Remove? [y/N]: "]);
  });

  it("should abort on any other answer", async () => {
    const io = captureIO({ tty: true, answers: [""] });
    await expect(confirm(io, "Remove?", false)).rejects.toThrow(new CliError("Aborted"));
  });
});

describe("removeWithCode", () => {
  it("should stop after one call without a delete hash", async () => {
    const io = captureIO({ tty: true });
    const calls: unknown[] = [];
    await removeWithCode(io, async (options) => {
      calls.push(options);
      return undefined;
    });
    expect(calls).toEqual([undefined]);
    expect(io.questions).toEqual([]);
  });

  it("should repeat the call with the hash and the emailed code", async () => {
    const io = captureIO({ tty: true, answers: ["123456"] });
    const calls: unknown[] = [];
    await removeWithCode(io, async (options) => {
      calls.push(options);
      return options === undefined ? { server_delete: { hash: "abc", is_moved_in_quarantine: false } } : undefined;
    });
    expect(calls).toEqual([undefined, { hash: "abc", code: "123456" }]);
    expect(io.questions).toEqual(["Enter the confirmation code sent to your email: "]);
  });

  it("should fail on an empty code", async () => {
    const io = captureIO({ tty: true, answers: [""] });
    await expect(removeWithCode(io, async () => ({ dbaas_delete: { hash: "abc" } }))).rejects.toThrow(
      "Confirmation code is required"
    );
  });
});

describe("checkStatus", () => {
  it("should print a matching status on stdout", () => {
    const io = captureIO();
    checkStatus(io, "on", TARGET_STATUS.server);
    expect(io.out).toBe("on\n");
    expect(io.err).toBe("");
  });

  it("should print a different status on stderr and fail silently", () => {
    const io = captureIO();
    let caught: unknown;
    try {
      checkStatus(io, "started", TARGET_STATUS.backup);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CliError);
    expect(caught).toMatchObject({ exitCode: 1, silent: true });
    expect(io.out).toBe("");
    expect(io.err).toBe("started\n");
  });
});
