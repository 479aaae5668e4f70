import type { ApiRecord, Envelope, ResourceType } from "../types.js";
import { ResourceApi, compact } from "./base.js";

export type FloatingIpList = Envelope<"ips", ApiRecord[]>;
export type FloatingIpResponse = Envelope<"ip", ApiRecord>;

export class FloatingIpsApi extends ResourceApi {
  list(): Promise<FloatingIpList> {
    return this.http.get<FloatingIpList>("/api/v1/floating-ips");
  }

  get(id: string): Promise<FloatingIpResponse> {
    return this.http.get<FloatingIpResponse>(`/api/v1/floating-ips/${id}`);
  }

  create(input: { availabilityZone: string; isDdosGuard?: boolean }): Promise<FloatingIpResponse | undefined> {
    return this.http.post<FloatingIpResponse>("/api/v1/floating-ips", {
      body: { is_ddos_guard: input.isDdosGuard ?? false, availability_zone: input.availabilityZone },
    });
  }

  update(id: string, input: { comment?: string; ptr?: string }): Promise<FloatingIpResponse | undefined> {
    return this.http.patch<FloatingIpResponse>(`/api/v1/floating-ips/${id}`, {
      body: compact({ comment: input.comment, ptr: input.ptr }),
    });
  }

  async remove(id: string): Promise<void> {
    await this.http.delete(`/api/v1/floating-ips/${id}`);
  }

  async attach(id: string, resourceType: ResourceType, resourceId: string | number): Promise<void> {
    await this.http.post(`/api/v1/floating-ips/${id}/bind`, {
      body: { resource_type: resourceType, resource_id: resourceId },
    });
  }

  async detach(id: string): Promise<void> {
    await this.http.post(`/api/v1/floating-ips/${id}/unbind`);
  }
}
