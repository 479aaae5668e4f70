import type { PollResult } from "../poller.js";
import type {
  ApiRecord,
  BalancerAlgo,
  BalancerProto,
  Envelope,
  RemoveOptions,
  StatusRecord,
  WaitOptions,
} from "../types.js";
import { ResourceApi, compact, type RemovalResponse } from "./base.js";

export type BalancerList = Envelope<"balancers", StatusRecord[]>;
export type BalancerResponse = Envelope<"balancer", StatusRecord>;
export type BalancerRuleList = Envelope<"rules", ApiRecord[]>;
export type BalancerRuleResponse = Envelope<"rule", ApiRecord>;

export interface BalancerHealthCheck {
  proto?: BalancerProto;
  port?: number;
  path?: string;
  inter?: number;
  timeout?: number;
  fall?: number;
  rise?: number;
}

export interface BalancerCreateInput extends BalancerHealthCheck {
  name: string;
  presetId: number;
  algo?: BalancerAlgo;
  sticky?: boolean;
  proxyProtocol?: boolean;
  forceHttps?: boolean;
  backendKeepalive?: boolean;
  network?: { id: string; floatingIp?: string };
}

export type BalancerUpdateInput = Partial<BalancerCreateInput>;

export interface BalancerRule {
  balancerProto: BalancerProto;
  balancerPort: number;
  serverProto: BalancerProto;
  serverPort: number;
}

/**
 * Load balancers, their backend IPs and forwarding rules
 */
export class BalancersApi extends ResourceApi {
  list(): Promise<BalancerList> {
    return this.http.get<BalancerList>("/api/v1/balancers");
  }

  get(id: number): Promise<BalancerResponse> {
    return this.http.get<BalancerResponse>(`/api/v1/balancers/${id}`);
  }

  presets(): Promise<Envelope<"balancers_presets", ApiRecord[]>> {
    return this.http.get<Envelope<"balancers_presets", ApiRecord[]>>("/api/v1/presets/balancers");
  }

  create(input: BalancerCreateInput): Promise<BalancerResponse | undefined> {
    return this.http.post<BalancerResponse>("/api/v1/balancers", {
      body: {
        name: input.name,
        preset_id: input.presetId,
        algo: input.algo ?? "roundrobin",
        proto: input.proto ?? "http",
        port: input.port ?? 80,
        path: input.path ?? "/",
        inter: input.inter ?? 10,
        timeout: input.timeout ?? 5,
        fall: input.fall ?? 3,
        rise: input.rise ?? 2,
        is_sticky: input.sticky ?? false,
        is_use_proxy: input.proxyProtocol ?? false,
        is_ssl: input.forceHttps ?? false,
        is_keepalive: input.backendKeepalive ?? false,
        ...(input.network
          ? { network: compact({ id: input.network.id, floating_ip: input.network.floatingIp }) }
          : {}),
      },
    });
  }

  update(id: number, input: BalancerUpdateInput): Promise<BalancerResponse | undefined> {
    return this.http.patch<BalancerResponse>(`/api/v1/balancers/${id}`, {
      body: compact({
        name: input.name,
        preset_id: input.presetId,
        algo: input.algo,
        proto: input.proto,
        port: input.port,
        path: input.path,
        inter: input.inter,
        timeout: input.timeout,
        fall: input.fall,
        rise: input.rise,
        is_sticky: input.sticky,
        is_use_proxy: input.proxyProtocol,
        is_ssl: input.forceHttps,
        is_keepalive: input.backendKeepalive,
      }),
    });
  }

  remove(id: number, options?: RemoveOptions): Promise<RemovalResponse> {
    return this.http.delete<ApiRecord>(`/api/v1/balancers/${id}`, { query: this.removal(options) });
  }

  ips(id: number): Promise<Envelope<"ips", string[]>> {
    return this.http.get<Envelope<"ips", string[]>>(`/api/v1/balancers/${id}/ips`);
  }

  async addIps(id: number, ips: string[]): Promise<void> {
    await this.http.post(`/api/v1/balancers/${id}/ips`, { body: { ips } });
  }

  async removeIps(id: number, ips: string[]): Promise<void> {
    await this.http.delete(`/api/v1/balancers/${id}/ips`, { body: { ips } });
  }

  rules(id: number): Promise<BalancerRuleList> {
    return this.http.get<BalancerRuleList>(`/api/v1/balancers/${id}/rules`);
  }

  createRule(id: number, rule: BalancerRule): Promise<BalancerRuleResponse | undefined> {
    return this.http.post<BalancerRuleResponse>(`/api/v1/balancers/${id}/rules`, {
      body: {
        balancer_proto: rule.balancerProto,
        balancer_port: rule.balancerPort,
        server_proto: rule.serverProto,
        server_port: rule.serverPort,
      },
    });
  }

  updateRule(id: number, ruleId: number, rule: Partial<BalancerRule>): Promise<BalancerRuleResponse | undefined> {
    return this.http.patch<BalancerRuleResponse>(`/api/v1/balancers/${id}/rules/${ruleId}`, {
      body: compact({
        balancer_proto: rule.balancerProto,
        balancer_port: rule.balancerPort,
        server_proto: rule.serverProto,
        server_port: rule.serverPort,
      }),
    });
  }

  async removeRule(id: number, ruleId: number): Promise<void> {
    await this.http.delete(`/api/v1/balancers/${id}/rules/${ruleId}`);
  }

  async status(id: number): Promise<string> {
    const { balancer } = await this.get(id);
    return balancer.status;
  }

  /**
   * Poll the balancer until its status is one of `target` (e.g. "started")
   */
  waitForStatus(id: number, target: string | readonly string[], options?: WaitOptions): Promise<PollResult> {
    return this.waitFor(() => this.status(id), target, options);
  }
}
