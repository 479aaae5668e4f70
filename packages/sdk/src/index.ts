/**
 * cirrus SDK
 *
 * Typed client for the cloud provider REST API with a status poller and
 * client-side record filters
 */

export type {
  ApiRecord,
  Meta,
  Envelope,
  StatusRecord,
  HttpMethod,
  QueryValue,
  FetchLike,
  RequestOptions,
  HttpClientOptions,
  ListOptions,
  RemoveOptions,
  WaitOptions,
  ServerAction,
  BackupAction,
  BackupInterval,
  BootMode,
  NatMode,
  IpVersion,
  LogOrder,
  Dbms,
  BucketType,
  BalancerProto,
  BalancerAlgo,
  DnsRecordType,
  FirewallProto,
  FirewallDirection,
  FirewallPolicy,
  FirewallResourceType,
  ResourceType,
  ServerConfiguration,
} from "./types.js";

export { CloudClient, createClient } from "./client.js";
export { HttpClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./http.js";
export { SDK_VERSION } from "./version.js";

// Polling
export { pollStatus, defaultSleep } from "./poller.js";
export type { PollRequest, PollResult, PollState, SleepFn } from "./poller.js";

// Filters
export { getPath, hasPath, parseFilters, normalizeFilter, matchesFilters, filterRecords, FILTER_PATTERN } from "./query.js";
export type { Filter } from "./query.js";

// Validation
export {
  parseCidr,
  validateVpcSubnet,
  parsePortProto,
  sizeToMb,
  isFirewallResourceType,
  assertFirewallResourceType,
  ALLOWED_VPC_SUBNETS,
  FIREWALL_RESOURCE_TYPES,
} from "./validation.js";
export type { Cidr, PortProto } from "./validation.js";

// Resources
export {
  ResourceApi,
  extractDeleteHash,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_WAIT_TIMEOUT_MS,
  DEFAULT_PAGE_LIMIT,
} from "./resources/base.js";
export type { RemovalResponse } from "./resources/base.js";
export { AccountApi } from "./resources/account.js";
export { ServersApi } from "./resources/servers.js";
export type {
  AutoBackupInput,
  ServerCreateInput,
  ServerUpdateInput,
  ServerNetwork,
  ServerLogsOptions,
} from "./resources/servers.js";
export { SshKeysApi } from "./resources/ssh-keys.js";
export type { SshKeyInput } from "./resources/ssh-keys.js";
export { ImagesApi } from "./resources/images.js";
export type { ImageCreateInput } from "./resources/images.js";
export { ProjectsApi } from "./resources/projects.js";
export type { ProjectInput } from "./resources/projects.js";
export { DatabasesApi } from "./resources/databases.js";
export type { DatabaseCreateInput, DatabaseUpdateInput } from "./resources/databases.js";
export { StorageApi } from "./resources/storage.js";
export type { BucketCreateInput, BucketUpdateInput } from "./resources/storage.js";
export { BalancersApi } from "./resources/balancers.js";
export type { BalancerCreateInput, BalancerUpdateInput, BalancerRule } from "./resources/balancers.js";
export { ClustersApi } from "./resources/clusters.js";
export type { ClusterCreateInput, NodeGroupInput } from "./resources/clusters.js";
export { DomainsApi } from "./resources/domains.js";
export type { DnsRecordInput } from "./resources/domains.js";
export { VpcsApi } from "./resources/vpcs.js";
export type { VpcCreateInput } from "./resources/vpcs.js";
export { FirewallApi } from "./resources/firewall.js";
export type { FirewallRuleInput } from "./resources/firewall.js";
export { FloatingIpsApi } from "./resources/floating-ips.js";

// Errors
export {
  CloudError,
  ValidationError,
  NetworkError,
  ApiError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  ConflictError,
  LockedError,
  TooManyRequestsError,
  InternalServerError,
  UnexpectedResponseError,
  MalformedResponseError,
  PollError,
  PollTimeoutError,
  PollInterruptedError,
  isAuthError,
  isTransientError,
} from "./errors.js";
export type { ApiErrorDetails } from "./errors.js";

// Observability
export { Logger, logger, REDACTED } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink, LoggerOptions } from "./observability/logs.js";
export { MetricsCollector, metrics, normalizeRoute } from "./observability/metrics.js";
export type { EndpointMetrics } from "./observability/metrics.js";
