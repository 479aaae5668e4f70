/**
 * Core types for the cloud API SDK
 */

import type { Logger } from "./observability/logs.js";
import type { MetricsCollector } from "./observability/metrics.js";

/**
 * A JSON object as returned by the API. Field sets differ per resource and
 * per API version, so records stay open.
 */
export type ApiRecord = Record<string, unknown>;

/**
 * Pagination block of list responses
 */
export interface Meta {
  total: number;
}

/**
 * Response envelope: the payload sits under a resource-specific key
 * (`servers`, `server`, `dbs`, ...) next to `meta` and `response_id`
 */
export type Envelope<K extends string, T> = { [P in K]: T } & {
  meta?: Meta;
  response_id?: string;
};

/**
 * Resource with a lifecycle status
 */
export interface StatusRecord extends ApiRecord {
  id: number | string;
  status: string;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined | Array<string | number>;

/**
 * Minimal fetch signature so that tests can pass an in-process fake
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface HttpClientOptions {
  token: string;
  /** @default "https://api.timeweb.cloud" */
  baseUrl?: string;
  userAgent?: string;
  /** Per-request timeout. @default 100000 */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
}

/**
 * Query parameters for confirmed removal of resources that require an
 * emailed confirmation code
 */
export interface RemoveOptions {
  hash?: string;
  code?: string;
}

/**
 * Options accepted by `waitForStatus` helpers
 */
export interface WaitOptions {
  intervalMs?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onAttempt?: (attempt: number, status: string) => void;
}

export type ServerAction =
  | "start"
  | "shutdown"
  | "hard_shutdown"
  | "reboot"
  | "hard_reboot"
  | "reset_password"
  | "install"
  | "remove"
  | "clone";

export type BackupAction = "restore" | "mount" | "unmount";

export type BackupInterval = "day" | "week" | "month";

export type BootMode = "default" | "single" | "recovery";

export type NatMode = "dnat_and_snat" | "snat" | "no_nat";

export type IpVersion = "ipv4" | "ipv6";

export type LogOrder = "asc" | "desc";

export type Dbms = "mysql" | "mysql5" | "mysql8" | "postgres" | "redis" | "mongodb";

export type BucketType = "public" | "private";

export type BalancerProto = "http" | "http2" | "https" | "tcp";

export type BalancerAlgo = "roundrobin" | "leastconn";

export type DnsRecordType = "A" | "AAAA" | "CNAME" | "MX" | "TXT" | "SRV";

export type FirewallProto = "tcp" | "udp" | "icmp";

export type FirewallDirection = "ingress" | "egress";

export type FirewallPolicy = "DROP" | "ACCEPT";

/** Resources a firewall group can be linked to */
export type FirewallResourceType = "server" | "dbaas" | "balancer";

/** Resource types understood by project transfer and floating IP binding */
export type ResourceType = "server" | "balancer" | "database" | "kubernetes" | "storage" | "dedicated";

export interface ServerConfiguration {
  configuratorId: number;
  cpu: number;
  ramMb: number;
  diskMb: number;
}
