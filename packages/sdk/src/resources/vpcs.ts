import type { ApiRecord, Envelope } from "../types.js";
import { validateVpcSubnet } from "../validation.js";
import { ResourceApi, compact } from "./base.js";

export type VpcList = Envelope<"vpcs", ApiRecord[]>;
export type VpcResponse = Envelope<"vpc", ApiRecord>;

export interface VpcCreateInput {
  name: string;
  subnet: string;
  location: string;
  availabilityZone?: string;
  description?: string;
}

/**
 * Virtual private networks. Listing, reading, creating and updating use
 * API v2; removal and ports are only available in v1.
 */
export class VpcsApi extends ResourceApi {
  list(): Promise<VpcList> {
    return this.http.get<VpcList>("/api/v2/vpcs");
  }

  get(id: string): Promise<VpcResponse> {
    return this.http.get<VpcResponse>(`/api/v2/vpcs/${id}`);
  }

  create(input: VpcCreateInput): Promise<VpcResponse | undefined> {
    validateVpcSubnet(input.subnet);
    return this.http.post<VpcResponse>("/api/v2/vpcs", {
      body: compact({
        name: input.name,
        subnet_v4: input.subnet,
        location: input.location,
        availability_zone: input.availabilityZone,
        description: input.description,
      }),
    });
  }

  update(id: string, input: { name?: string; description?: string }): Promise<VpcResponse | undefined> {
    return this.http.patch<VpcResponse>(`/api/v2/vpcs/${id}`, {
      body: compact({ name: input.name, description: input.description }),
    });
  }

  async remove(id: string): Promise<void> {
    await this.http.delete(`/api/v1/vpcs/${id}`);
  }

  services(id: string): Promise<Envelope<"services", ApiRecord[]>> {
    return this.http.get<Envelope<"services", ApiRecord[]>>(`/api/v2/vpcs/${id}/services`);
  }

  ports(id: string): Promise<Envelope<"vpc_ports", ApiRecord[]>> {
    return this.http.get<Envelope<"vpc_ports", ApiRecord[]>>(`/api/v1/vpcs/${id}/ports`);
  }
}
