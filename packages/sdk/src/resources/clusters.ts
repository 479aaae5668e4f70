import type { PollResult } from "../poller.js";
import type { ApiRecord, Envelope, ListOptions, RemoveOptions, StatusRecord, WaitOptions } from "../types.js";
import { ResourceApi, type RemovalResponse } from "./base.js";

export type ClusterList = Envelope<"clusters", StatusRecord[]>;
export type ClusterResponse = Envelope<"cluster", StatusRecord>;
export type NodeGroupList = Envelope<"node_groups", ApiRecord[]>;
export type NodeGroupResponse = Envelope<"node_group", ApiRecord>;
export type NodeList = Envelope<"nodes", ApiRecord[]>;

export interface NodeGroupInput {
  name: string;
  presetId: number;
  nodeCount: number;
}

export interface ClusterCreateInput {
  name: string;
  version: string;
  networkDriver: string;
  presetId: number;
  description?: string;
  ingress?: boolean;
  workerGroups?: NodeGroupInput[];
}

function nodeGroupBody(group: NodeGroupInput): ApiRecord {
  return { name: group.name, preset_id: group.presetId, node_count: group.nodeCount };
}

/**
 * Managed Kubernetes clusters, node groups and nodes
 */
export class ClustersApi extends ResourceApi {
  list(options?: ListOptions): Promise<ClusterList> {
    return this.http.get<ClusterList>("/api/v1/k8s/clusters", { query: this.page(options) });
  }

  get(id: number): Promise<ClusterResponse> {
    return this.http.get<ClusterResponse>(`/api/v1/k8s/clusters/${id}`);
  }

  create(input: ClusterCreateInput): Promise<ClusterResponse | undefined> {
    return this.http.post<ClusterResponse>("/api/v1/k8s/clusters", {
      body: {
        name: input.name,
        description: input.description ?? "",
        ha: false,
        k8s_version: input.version,
        network_driver: input.networkDriver,
        ingress: input.ingress ?? true,
        preset_id: input.presetId,
        ...(input.workerGroups ? { worker_groups: input.workerGroups.map(nodeGroupBody) } : {}),
      },
    });
  }

  update(id: number, description: string): Promise<ClusterResponse | undefined> {
    return this.http.patch<ClusterResponse>(`/api/v1/k8s/clusters/${id}`, { body: { description } });
  }

  remove(id: number, options?: RemoveOptions): Promise<RemovalResponse> {
    return this.http.delete<ApiRecord>(`/api/v1/k8s/clusters/${id}`, { query: this.removal(options) });
  }

  resources(id: number): Promise<Envelope<"resources", ApiRecord>> {
    return this.http.get<Envelope<"resources", ApiRecord>>(`/api/v1/k8s/clusters/${id}/resources`);
  }

  /**
   * Download the kubeconfig; the API answers with YAML text
   */
  kubeconfig(id: number): Promise<string> {
    return this.http.getText(`/api/v1/k8s/clusters/${id}/kubeconfig`);
  }

  versions(): Promise<Envelope<"k8s_versions", string[]>> {
    return this.http.get<Envelope<"k8s_versions", string[]>>("/api/v1/k8s/k8s_versions");
  }

  networkDrivers(): Promise<Envelope<"network_drivers", string[]>> {
    return this.http.get<Envelope<"network_drivers", string[]>>("/api/v1/k8s/network_drivers");
  }

  presets(): Promise<Envelope<"k8s_presets", ApiRecord[]>> {
    return this.http.get<Envelope<"k8s_presets", ApiRecord[]>>("/api/v1/presets/k8s");
  }

  nodeGroups(id: number): Promise<NodeGroupList> {
    return this.http.get<NodeGroupList>(`/api/v1/k8s/clusters/${id}/groups`);
  }

  createNodeGroup(id: number, input: NodeGroupInput): Promise<NodeGroupResponse | undefined> {
    return this.http.post<NodeGroupResponse>(`/api/v1/k8s/clusters/${id}/groups`, { body: nodeGroupBody(input) });
  }

  async removeNodeGroup(id: number, groupId: number): Promise<void> {
    await this.http.delete(`/api/v1/k8s/clusters/${id}/groups/${groupId}`);
  }

  /**
   * Add `count` nodes to a group. The response lists the group's nodes,
   * with the new total in `meta.total`.
   */
  addNodes(id: number, groupId: number, count = 1): Promise<NodeList | undefined> {
    return this.http.post<NodeList>(`/api/v1/k8s/clusters/${id}/groups/${groupId}/nodes`, { body: { count } });
  }

  removeNodes(id: number, groupId: number, count = 1): Promise<NodeList | undefined> {
    return this.http.delete<NodeList>(`/api/v1/k8s/clusters/${id}/groups/${groupId}/nodes`, { body: { count } });
  }

  nodes(id: number): Promise<NodeList> {
    return this.http.get<NodeList>(`/api/v1/k8s/clusters/${id}/nodes`);
  }

  async removeNode(id: number, nodeId: number): Promise<void> {
    await this.http.delete(`/api/v1/k8s/clusters/${id}/nodes/${nodeId}`);
  }

  async status(id: number): Promise<string> {
    const { cluster } = await this.get(id);
    return cluster.status;
  }

  /**
   * Poll the cluster until its status is one of `target` (e.g. "started")
   */
  waitForStatus(id: number, target: string | readonly string[], options?: WaitOptions): Promise<PollResult> {
    return this.waitFor(() => this.status(id), target, options);
  }
}
