/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  choice,
  collectFilters,
  collectIds,
  collectKeyValue,
  collectPortProto,
  parseCidrArg,
  parseDate,
  parseDayOfWeek,
  parseFirewallResourceType,
  parseId,
  parseNonNegativeInt,
  parsePort,
  parsePortProtoArg,
  parseSeconds,
  parseSize,
  parseSubnet,
} from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid positive integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt("1", "test")).toBe(1);
      expect(parseNonNegativeInt("100", "test")).toBe(100);
      expect(parseNonNegativeInt("9999", "test")).toBe(9999);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-100", "test")).toThrow("must be a non-negative integer");
    });

    it("should reject NaN", () => {
      expect(() => parseNonNegativeInt("abc", "test")).toThrow("must be a non-negative integer");
    });

    it("should reject values > 10000", () => {
      expect(() => parseNonNegativeInt("100000", "--limit")).toThrow("--limit must be <= 10000");
    });

    it("should allow exactly 10000", () => {
      expect(parseNonNegativeInt("10000", "test")).toBe(10000);
    });
  });

  describe("parseId", () => {
    it("should parse positive integers", () => {
      expect(parseId("1")).toBe(1);
      expect(parseId(" 42 ")).toBe(42);
    });

    it("should reject zero, negatives and words", () => {
      expect(() => parseId("0")).toThrow("'0' is not a valid ID");
      expect(() => parseId("-3")).toThrow(InvalidArgumentError);
      expect(() => parseId("web")).toThrow("'web' is not a valid ID");
      expect(() => parseId("1.5")).toThrow(InvalidArgumentError);
    });

    it("should accumulate variadic IDs", () => {
      expect(collectIds("3", collectIds("1"))).toEqual([1, 3]);
    });
  });

  describe("parseSeconds", () => {
    it("should convert seconds to milliseconds", () => {
      expect(parseSeconds("5")).toBe(5000);
      expect(parseSeconds("0.5")).toBe(500);
    });

    it("should reject zero and non-numbers", () => {
      expect(() => parseSeconds("0")).toThrow("'0' is not a positive number of seconds");
      expect(() => parseSeconds("")).toThrow(InvalidArgumentError);
      expect(() => parseSeconds("soon")).toThrow(InvalidArgumentError);
    });
  });

  describe("parsePort", () => {
    it("should accept 1..65535", () => {
      expect(parsePort("1")).toBe(1);
      expect(parsePort("65535")).toBe(65535);
    });

    it("should reject out of range ports", () => {
      expect(() => parsePort("0")).toThrow("'0' is not a valid port");
      expect(() => parsePort("65536")).toThrow("'65536' is not a valid port");
      expect(() => parsePort("http")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseSize", () => {
    it("should convert suffixed sizes to megabytes", () => {
      expect(parseSize("512")).toBe(512);
      expect(parseSize("512M")).toBe(512);
      expect(parseSize("15G")).toBe(15360);
      expect(parseSize("1t")).toBe(1048576);
    });

    it("should report bad sizes as argument errors", () => {
      expect(() => parseSize("15GB")).toThrow(InvalidArgumentError);
      expect(() => parseSize("big")).toThrow("Invalid size: 'big'");
    });
  });

  describe("parseDate", () => {
    it("should return midnight UTC of the date", () => {
      expect(parseDate("2026-01-05")).toBe("2026-01-05T00:00:00Z");
    });

    it("should reject other formats and days that do not exist", () => {
      expect(() => parseDate("05.01.2026")).toThrow("'05.01.2026' is not a date in YYYY-MM-DD format");
      expect(() => parseDate("2026-02-30")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseDayOfWeek", () => {
    it("should accept 1 to 7", () => {
      expect(parseDayOfWeek("1")).toBe(1);
      expect(parseDayOfWeek("7")).toBe(7);
    });

    it("should reject other days", () => {
      expect(() => parseDayOfWeek("0")).toThrow("'0' is not a day of week from 1 to 7");
      expect(() => parseDayOfWeek("8")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseCidrArg", () => {
    it("should return valid networks unchanged", () => {
      expect(parseCidrArg("0.0.0.0/0")).toBe("0.0.0.0/0");
      expect(parseCidrArg("10.1.2.0/24")).toBe("10.1.2.0/24");
      expect(parseCidrArg("2001:db8::/32")).toBe("2001:db8::/32");
    });

    it("should reject host bits and bad prefixes", () => {
      expect(() => parseCidrArg("10.1.2.3/24")).toThrow("has host bits set");
      expect(() => parseCidrArg("10.0.0.0/33")).toThrow("has an invalid prefix length");
      expect(() => parseCidrArg("example.com")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseSubnet", () => {
    it("should accept private IPv4 networks", () => {
      expect(parseSubnet("192.168.10.0/24")).toBe("192.168.10.0/24");
      expect(parseSubnet("172.16.0.0/12")).toBe("172.16.0.0/12");
    });

    it("should reject public and oversized networks", () => {
      expect(() => parseSubnet("8.8.8.0/24")).toThrow("Network 8.8.8.0/24 is not subnet of");
      expect(() => parseSubnet("10.0.0.0/7")).toThrow(InvalidArgumentError);
      expect(() => parseSubnet("fd00::/64")).toThrow("is not an IPv4 network");
    });
  });

  describe("parsePortProtoArg", () => {
    it("should parse ports, ranges and ICMP", () => {
      expect(parsePortProtoArg("22/tcp")).toEqual({ port: "22", protocol: "tcp" });
      expect(parsePortProtoArg("2000-3000/UDP")).toEqual({ port: "2000-3000", protocol: "udp" });
      expect(parsePortProtoArg("tcp")).toEqual({ protocol: "tcp" });
      expect(parsePortProtoArg("ICMP")).toEqual({ protocol: "icmp" });
    });

    it("should reject malformed values", () => {
      expect(() => parsePortProtoArg("22")).toThrow("Malformed argument: '22'");
      expect(() => parsePortProtoArg("22/icmp")).toThrow(InvalidArgumentError);
      expect(() => parsePortProtoArg("x22/tcp")).toThrow(InvalidArgumentError);
    });

    it("should collect several values", () => {
      expect(collectPortProto("icmp", collectPortProto("80/tcp"))).toEqual([
        { port: "80", protocol: "tcp" },
        { protocol: "icmp" },
      ]);
    });
  });

  describe("parseFirewallResourceType", () => {
    it("should accept known types only", () => {
      expect(parseFirewallResourceType("dbaas")).toBe("dbaas");
      expect(() => parseFirewallResourceType("database")).toThrow("Invalid resource type: 'database'");
    });
  });

  describe("collectFilters", () => {
    it("should merge repeated expressions and apply aliases", () => {
      const first = collectFilters("status:on");
      expect(collectFilters("region:ru-1,ram:2g", first)).toEqual([
        { key: "status", value: "on" },
        { key: "location", value: "ru-1" },
        { key: "ram", value: "2048" },
      ]);
    });

    it("should reject expressions without a colon", () => {
      expect(() => collectFilters("status")).toThrow("Invalid filter format: 'status'");
    });
  });

  describe("choice", () => {
    const parseOrder = choice(["asc", "desc"], "--order");

    it("should return a listed value", () => {
      expect(parseOrder("desc")).toBe("desc");
    });

    it("should list the choices on error", () => {
      expect(() => parseOrder("up")).toThrow("--order must be one of: asc, desc");
    });
  });

  describe("collectKeyValue", () => {
    it("should collect KEY=VALUE pairs", () => {
      expect(collectKeyValue("b=x=y", collectKeyValue("a=1"))).toEqual({ a: "1", b: "x=y" });
    });

    it("should reject values without a key", () => {
      expect(() => collectKeyValue("=1")).toThrow("'=1' must look like KEY=VALUE");
      expect(() => collectKeyValue("flag")).toThrow(InvalidArgumentError);
    });
  });
});
