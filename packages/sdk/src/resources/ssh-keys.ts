import type { ApiRecord, Envelope } from "../types.js";
import { ResourceApi, compact } from "./base.js";

export type SshKeyList = Envelope<"ssh_keys", ApiRecord[]>;
export type SshKeyResponse = Envelope<"ssh_key", ApiRecord>;

export interface SshKeyInput {
  name: string;
  body: string;
  isDefault?: boolean;
}

export class SshKeysApi extends ResourceApi {
  list(): Promise<SshKeyList> {
    return this.http.get<SshKeyList>("/api/v1/ssh-keys");
  }

  get(id: number): Promise<SshKeyResponse> {
    return this.http.get<SshKeyResponse>(`/api/v1/ssh-keys/${id}`);
  }

  create(input: SshKeyInput): Promise<SshKeyResponse | undefined> {
    return this.http.post<SshKeyResponse>("/api/v1/ssh-keys", {
      body: { name: input.name, body: input.body, is_default: input.isDefault ?? false },
    });
  }

  update(id: number, input: Partial<SshKeyInput>): Promise<SshKeyResponse | undefined> {
    return this.http.patch<SshKeyResponse>(`/api/v1/ssh-keys/${id}`, {
      body: compact({ name: input.name, body: input.body, is_default: input.isDefault }),
    });
  }

  async remove(id: number): Promise<void> {
    await this.http.delete(`/api/v1/ssh-keys/${id}`);
  }

  async addToServer(serverId: number, keyIds: number[]): Promise<void> {
    // The endpoint expects "ssh_key_ids" here, unlike server creation
    await this.http.post(`/api/v1/servers/${serverId}/ssh-keys`, { body: { ssh_key_ids: keyIds } });
  }

  async removeFromServer(serverId: number, keyId: number): Promise<void> {
    await this.http.delete(`/api/v1/servers/${serverId}/ssh-keys/${keyId}`);
  }
}
