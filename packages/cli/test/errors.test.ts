/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import {
  ConflictError,
  ForbiddenError,
  NetworkError,
  NotFoundError,
  PollError,
  PollInterruptedError,
  PollTimeoutError,
  UnauthorizedError,
  ValidationError,
} from "@cirrus/sdk";
import {
  AuthError,
  CliError,
  EXIT,
  InterruptedError,
  formatCliError,
  isInterrupt,
  mapErrorToExitCode,
} from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
      expect(err.silent).toBe(false);
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });

    it("should use exit code 3 for AuthError", () => {
      const err = new AuthError("no token");
      expect(err.exitCode).toBe(EXIT.auth);
      expect(err.name).toBe("AuthError");
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should map NotFoundError to exit code 2", () => {
      expect(mapErrorToExitCode(new NotFoundError({ status: 404 }))).toBe(2);
    });

    it("should map 401 and 403 to exit code 3", () => {
      expect(mapErrorToExitCode(new UnauthorizedError({ status: 401 }))).toBe(3);
      expect(mapErrorToExitCode(new ForbiddenError({ status: 403 }))).toBe(3);
    });

    it("should map PollTimeoutError to exit code 4", () => {
      expect(mapErrorToExitCode(new PollTimeoutError("off", 3, ["on"]))).toBe(4);
    });

    it("should map PollInterruptedError to exit code 130", () => {
      expect(mapErrorToExitCode(new PollInterruptedError(2, "off"))).toBe(130);
    });

    it("should map InterruptedError to exit code 130", () => {
      expect(mapErrorToExitCode(new InterruptedError())).toBe(130);
      expect(isInterrupt(new InterruptedError())).toBe(true);
      expect(isInterrupt(new PollInterruptedError(1, undefined))).toBe(true);
      expect(isInterrupt(new PollError("boom", 1, undefined))).toBe(false);
    });

    it("should map other failures to exit code 1", () => {
      expect(mapErrorToExitCode(new ConflictError({ status: 409 }))).toBe(1);
      expect(mapErrorToExitCode(new NetworkError("connection refused"))).toBe(1);
      expect(mapErrorToExitCode(new ValidationError("bad input"))).toBe(1);
      expect(mapErrorToExitCode(new PollError("Failed to fetch status: boom", 1, undefined))).toBe(1);
      expect(mapErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
    });

    it("should keep the exit code of commander errors", () => {
      expect(mapErrorToExitCode(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
      expect(mapErrorToExitCode(new CommanderError(1, "commander.unknownOption", "error: unknown option"))).toBe(1);
    });

    it("should prefer the CliError exit code", () => {
      expect(mapErrorToExitCode(new CliError("missing bucket", { exitCode: EXIT.notFound }))).toBe(2);
    });
  });

  describe("formatCliError", () => {
    it("should format Error objects", () => {
      expect(formatCliError(new Error("test message"))).toBe("test message");
    });

    it("should format non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(123)).toBe("123");
    });

    it("should append API error details", () => {
      const err = new NotFoundError({
        status: 404,
        errorCode: "not_found",
        responseId: "req-1",
        message: "Server not found",
      });
      expect(formatCliError(err)).toBe("Server not found (status 404, error_code not_found, response_id req-1)");
    });

    it("should join API message lists", () => {
      const err = new ConflictError({ status: 409, message: ["name is taken", "try another"] });
      expect(formatCliError(err)).toBe("name is taken; try another (status 409)");
    });

    it("should fall back to the status text", () => {
      expect(formatCliError(new UnauthorizedError({ status: 401, statusText: "Unauthorized" }))).toBe(
        "Unauthorized (status 401)"
      );
      expect(formatCliError(new ConflictError({ status: 409 }))).toBe("HTTP 409 (status 409)");
    });

    it("should drop the commander prefix from argument errors", () => {
      expect(formatCliError(new InvalidArgumentError("error: bad value"))).toBe("bad value");
    });

    it("should truncate very long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include the cause in verbose mode", () => {
      const err = new CliError("1 of 2 operation(s) failed", { cause: new Error("boom") });
      expect(formatCliError(err, false)).toBe("1 of 2 operation(s) failed");
      expect(formatCliError(err, true)).toContain("\n  Cause: boom\n");
    });
  });
});
