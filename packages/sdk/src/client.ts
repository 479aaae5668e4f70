/**
 * Cloud API client: one API object per resource domain over a shared
 * HttpClient
 */

import { HttpClient } from "./http.js";
import { AccountApi } from "./resources/account.js";
import { BalancersApi } from "./resources/balancers.js";
import { ClustersApi } from "./resources/clusters.js";
import { DatabasesApi } from "./resources/databases.js";
import { DomainsApi } from "./resources/domains.js";
import { FirewallApi } from "./resources/firewall.js";
import { FloatingIpsApi } from "./resources/floating-ips.js";
import { ImagesApi } from "./resources/images.js";
import { ProjectsApi } from "./resources/projects.js";
import { ServersApi } from "./resources/servers.js";
import { SshKeysApi } from "./resources/ssh-keys.js";
import { StorageApi } from "./resources/storage.js";
import { VpcsApi } from "./resources/vpcs.js";
import type { HttpClientOptions } from "./types.js";

export class CloudClient {
  readonly account: AccountApi;
  readonly servers: ServersApi;
  readonly sshKeys: SshKeysApi;
  readonly images: ImagesApi;
  readonly projects: ProjectsApi;
  readonly databases: DatabasesApi;
  readonly storage: StorageApi;
  readonly balancers: BalancersApi;
  readonly clusters: ClustersApi;
  readonly domains: DomainsApi;
  readonly vpcs: VpcsApi;
  readonly firewall: FirewallApi;
  readonly floatingIps: FloatingIpsApi;

  constructor(readonly http: HttpClient) {
    this.account = new AccountApi(http);
    this.servers = new ServersApi(http);
    this.sshKeys = new SshKeysApi(http);
    this.images = new ImagesApi(http);
    this.projects = new ProjectsApi(http);
    this.databases = new DatabasesApi(http);
    this.storage = new StorageApi(http);
    this.balancers = new BalancersApi(http);
    this.clusters = new ClustersApi(http);
    this.domains = new DomainsApi(http);
    this.vpcs = new VpcsApi(http);
    this.firewall = new FirewallApi(http);
    this.floatingIps = new FloatingIpsApi(http);
  }
}

/**
 * Create a client
 *
 * @example
 * ```typescript
 * const client = createClient({ token: process.env.CIRRUS_TOKEN ?? "" });
 * const { servers } = await client.servers.list();
 * ```
 */
export function createClient(options: HttpClientOptions): CloudClient {
  return new CloudClient(new HttpClient(options));
}
