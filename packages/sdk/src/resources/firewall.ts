import type {
  ApiRecord,
  Envelope,
  FirewallDirection,
  FirewallPolicy,
  FirewallProto,
  FirewallResourceType,
  ListOptions,
} from "../types.js";
import { assertFirewallResourceType, parseCidr } from "../validation.js";
import { ResourceApi, compact } from "./base.js";

export type FirewallGroupList = Envelope<"groups", ApiRecord[]>;
export type FirewallGroupResponse = Envelope<"group", ApiRecord>;
export type FirewallRuleList = Envelope<"rules", ApiRecord[]>;
export type FirewallRuleResponse = Envelope<"rule", ApiRecord>;

export interface FirewallRuleInput {
  direction: FirewallDirection;
  protocol: FirewallProto;
  /** IPv4 or IPv6 network */
  cidr: string;
  /** Port or `from-to` range; ignored for ICMP */
  port?: string;
  description?: string;
}

function ruleBody(rule: FirewallRuleInput): ApiRecord {
  parseCidr(rule.cidr);
  return compact({
    description: rule.description,
    direction: rule.direction,
    protocol: rule.protocol,
    cidr: rule.cidr,
    port: rule.protocol === "icmp" ? undefined : rule.port,
  });
}

/**
 * Firewall rule groups, their rules and linked resources
 */
export class FirewallApi extends ResourceApi {
  groups(options?: ListOptions): Promise<FirewallGroupList> {
    return this.http.get<FirewallGroupList>("/api/v1/firewall/groups", { query: this.page(options) });
  }

  group(id: string): Promise<FirewallGroupResponse> {
    return this.http.get<FirewallGroupResponse>(`/api/v1/firewall/groups/${id}`);
  }

  createGroup(name: string, description?: string, policy: FirewallPolicy = "DROP"): Promise<FirewallGroupResponse | undefined> {
    return this.http.post<FirewallGroupResponse>("/api/v1/firewall/groups", {
      body: compact({ name, description }),
      query: { policy },
    });
  }

  updateGroup(id: string, name: string, description?: string): Promise<FirewallGroupResponse | undefined> {
    return this.http.patch<FirewallGroupResponse>(`/api/v1/firewall/groups/${id}`, {
      body: compact({ name, description }),
    });
  }

  async removeGroup(id: string): Promise<void> {
    await this.http.delete(`/api/v1/firewall/groups/${id}`);
  }

  groupResources(id: string, options?: ListOptions): Promise<Envelope<"resources", ApiRecord[]>> {
    return this.http.get<Envelope<"resources", ApiRecord[]>>(`/api/v1/firewall/groups/${id}/resources`, {
      query: this.page(options),
    });
  }

  link(groupId: string, resourceId: string | number, resourceType: FirewallResourceType): Promise<ApiRecord | undefined> {
    return this.http.post<ApiRecord>(`/api/v1/firewall/groups/${groupId}/resources/${resourceId}`, {
      query: { resource_type: assertFirewallResourceType(resourceType) },
    });
  }

  async unlink(groupId: string, resourceId: string | number, resourceType: FirewallResourceType): Promise<void> {
    await this.http.delete(`/api/v1/firewall/groups/${groupId}/resources/${resourceId}`, {
      query: { resource_type: assertFirewallResourceType(resourceType) },
    });
  }

  rules(groupId: string, options?: ListOptions): Promise<FirewallRuleList> {
    return this.http.get<FirewallRuleList>(`/api/v1/firewall/groups/${groupId}/rules`, { query: this.page(options) });
  }

  rule(groupId: string, ruleId: string): Promise<FirewallRuleResponse> {
    return this.http.get<FirewallRuleResponse>(`/api/v1/firewall/groups/${groupId}/rules/${ruleId}`);
  }

  createRule(groupId: string, rule: FirewallRuleInput): Promise<FirewallRuleResponse | undefined> {
    return this.http.post<FirewallRuleResponse>(`/api/v1/firewall/groups/${groupId}/rules`, { body: ruleBody(rule) });
  }

  updateRule(groupId: string, ruleId: string, rule: FirewallRuleInput): Promise<FirewallRuleResponse | undefined> {
    return this.http.patch<FirewallRuleResponse>(`/api/v1/firewall/groups/${groupId}/rules/${ruleId}`, {
      body: ruleBody(rule),
    });
  }

  async removeRule(groupId: string, ruleId: string): Promise<void> {
    await this.http.delete(`/api/v1/firewall/groups/${groupId}/rules/${ruleId}`);
  }

  /**
   * Groups linked to a resource
   */
  resourceGroups(
    resourceId: string | number,
    resourceType: FirewallResourceType,
    options?: ListOptions
  ): Promise<FirewallGroupList> {
    const type = assertFirewallResourceType(resourceType);
    return this.http.get<FirewallGroupList>(`/api/v1/firewall/service/${type}/${resourceId}`, {
      query: this.page(options),
    });
  }
}
