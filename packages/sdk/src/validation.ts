/**
 * Client-side input validation shared by the SDK and the CLI
 */

import { BlockList, isIP } from "node:net";
import { ValidationError } from "./errors.js";
import type { FirewallProto, FirewallResourceType } from "./types.js";

export interface Cidr {
  address: string;
  prefix: number;
  version: 4 | 6;
}

export interface PortProto {
  /** Port or `from-to` range; absent for ICMP */
  port?: string;
  protocol: FirewallProto;
}

/** Private ranges a VPC subnet must fall into */
export const ALLOWED_VPC_SUBNETS = ["10.0.0.0/8", "192.168.0.0/16", "172.16.0.0/12"] as const;

export const FIREWALL_RESOURCE_TYPES: readonly FirewallResourceType[] = ["server", "dbaas", "balancer"];

const PORT_PROTO_PATTERN = /^((\d+(-\d+)?\/)?(tcp|udp)|icmp)$/i;

const SIZE_PATTERN = /^(\d+)([mgt]?)$/i;

/**
 * Parse an IPv4 or IPv6 network in CIDR notation. A bare address is a
 * single-host network. Host bits must be zero.
 */
export function parseCidr(value: string): Cidr {
  const [address = "", prefixText, ...rest] = value.split("/");
  const kind = isIP(address);
  if (kind === 0 || rest.length > 0) {
    throw new ValidationError(`Invalid CIDR: '${value}' does not appear to be an IPv4 or IPv6 network`);
  }
  const version: 4 | 6 = kind === 4 ? 4 : 6;
  const maxPrefix = version === 4 ? 32 : 128;

  let prefix = maxPrefix;
  if (prefixText !== undefined) {
    if (!/^\d{1,3}$/.test(prefixText) || Number(prefixText) > maxPrefix) {
      throw new ValidationError(`Invalid CIDR: '${value}' has an invalid prefix length`);
    }
    prefix = Number(prefixText);
  }

  const bits = addressToBigInt(address, version);
  const hostBits = BigInt(maxPrefix - prefix);
  if (hostBits > 0n && bits % (1n << hostBits) !== 0n) {
    throw new ValidationError(`Invalid CIDR: '${value}' has host bits set`);
  }

  return { address, prefix, version };
}

/**
 * Validate a VPC subnet: an IPv4 network inside one of the private ranges
 */
export function validateVpcSubnet(value: string): string {
  const cidr = parseCidr(value);
  if (cidr.version !== 4) {
    throw new ValidationError(`Invalid CIDR: '${value}' is not an IPv4 network`);
  }

  const inside = ALLOWED_VPC_SUBNETS.some((allowed) => {
    const [net = "", prefix = "0"] = allowed.split("/");
    if (cidr.prefix < Number(prefix)) return false;
    const list = new BlockList();
    list.addSubnet(net, Number(prefix), "ipv4");
    return list.check(cidr.address, "ipv4");
  });

  if (!inside) {
    throw new ValidationError(
      `Network ${value} is not subnet of: [${ALLOWED_VPC_SUBNETS.map((n) => `'${n}'`).join(", ")}]`
    );
  }
  return value;
}

/**
 * Parse `22/tcp`, `2000-3000/udp` or `icmp` (case-insensitive)
 */
export function parsePortProto(value: string): PortProto {
  if (!PORT_PROTO_PATTERN.test(value)) {
    throw new ValidationError(
      `Malformed argument: '${value}': correct patterns: '22/TCP', '2000-3000/UDP', 'ICMP', etc.`
    );
  }
  if (/^icmp$/i.test(value)) {
    return { protocol: "icmp" };
  }
  const slash = value.indexOf("/");
  const proto = value.slice(slash + 1).toLowerCase();
  const protocol: FirewallProto = proto === "udp" ? "udp" : "tcp";
  return slash > 0 ? { port: value.slice(0, slash), protocol } : { protocol };
}

/**
 * Convert `5G`, `1024M`, `1T` or a bare number to megabytes
 */
export function sizeToMb(value: string): number {
  const match = SIZE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid size: '${value}'. Expected a number with optional M, G or T suffix`);
  }
  const amount = Number(match[1]);
  switch ((match[2] ?? "").toLowerCase()) {
    case "g":
      return amount * 1024;
    case "t":
      return amount * 1024 * 1024;
    default:
      return amount;
  }
}

export function isFirewallResourceType(value: string): value is FirewallResourceType {
  return FIREWALL_RESOURCE_TYPES.some((t) => t === value);
}

export function assertFirewallResourceType(value: string): FirewallResourceType {
  if (!isFirewallResourceType(value)) {
    throw new ValidationError(
      `Invalid resource type: '${value}'. Expected one of: ${FIREWALL_RESOURCE_TYPES.join(", ")}`
    );
  }
  return value;
}

function addressToBigInt(address: string, version: 4 | 6): bigint {
  if (version === 4) {
    return address.split(".").reduce((acc, octet) => (acc << 8n) + BigInt(Number(octet)), 0n);
  }

  let text = address;
  // Embedded IPv4 tail, e.g. ::ffff:10.0.0.1
  const v4Tail = /(\d+\.\d+\.\d+\.\d+)$/.exec(text);
  if (v4Tail?.[1]) {
    const v4 = addressToBigInt(v4Tail[1], 4);
    text = text.slice(0, -v4Tail[1].length) + `${(v4 >> 16n).toString(16)}:${(v4 & 0xffffn).toString(16)}`;
  }

  const [head = "", tail] = text.split("::");
  const headGroups = head.length > 0 ? head.split(":") : [];
  const tailGroups = tail !== undefined && tail.length > 0 ? tail.split(":") : [];
  const missing = 8 - headGroups.length - tailGroups.length;
  const groups = tail === undefined ? headGroups : [...headGroups, ...Array<string>(missing).fill("0"), ...tailGroups];

  return groups.reduce((acc, group) => (acc << 16n) + BigInt(parseInt(group, 16)), 0n);
}
