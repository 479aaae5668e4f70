import type { ApiRecord, BucketType, Envelope, RemoveOptions } from "../types.js";
import { ResourceApi, compact, type RemovalResponse } from "./base.js";

export type BucketList = Envelope<"buckets", ApiRecord[]>;
export type BucketResponse = Envelope<"bucket", ApiRecord>;

export interface BucketCreateInput {
  name: string;
  presetId: number;
  type?: BucketType;
}

export interface BucketUpdateInput {
  presetId?: number;
  type?: BucketType;
}

/**
 * S3-compatible object storage: buckets, users and bucket subdomains
 */
export class StorageApi extends ResourceApi {
  buckets(): Promise<BucketList> {
    return this.http.get<BucketList>("/api/v1/storages/buckets");
  }

  presets(): Promise<Envelope<"storages_presets", ApiRecord[]>> {
    return this.http.get<Envelope<"storages_presets", ApiRecord[]>>("/api/v1/presets/storages");
  }

  createBucket(input: BucketCreateInput): Promise<BucketResponse | undefined> {
    return this.http.post<BucketResponse>("/api/v1/storages/buckets", {
      body: { name: input.name, preset_id: input.presetId, type: input.type ?? "private" },
    });
  }

  updateBucket(id: number, input: BucketUpdateInput): Promise<BucketResponse | undefined> {
    return this.http.patch<BucketResponse>(`/api/v1/storages/buckets/${id}`, {
      body: compact({ preset_id: input.presetId, bucket_type: input.type }),
    });
  }

  removeBucket(id: number, options?: RemoveOptions): Promise<RemovalResponse> {
    return this.http.delete<ApiRecord>(`/api/v1/storages/buckets/${id}`, { query: this.removal(options) });
  }

  users(): Promise<Envelope<"users", ApiRecord[]>> {
    return this.http.get<Envelope<"users", ApiRecord[]>>("/api/v1/storages/users");
  }

  updateUserSecret(userId: number, secret: string): Promise<Envelope<"user", ApiRecord> | undefined> {
    return this.http.patch<Envelope<"user", ApiRecord>>(`/api/v1/storages/users/${userId}`, {
      body: { secret_key: secret },
    });
  }

  subdomains(bucketId: number): Promise<Envelope<"subdomains", ApiRecord[]>> {
    return this.http.get<Envelope<"subdomains", ApiRecord[]>>(`/api/v1/storages/buckets/${bucketId}/subdomains`);
  }

  addSubdomains(bucketId: number, subdomains: string[]): Promise<Envelope<"subdomains", ApiRecord[]> | undefined> {
    return this.http.post<Envelope<"subdomains", ApiRecord[]>>(`/api/v1/storages/buckets/${bucketId}/subdomains`, {
      body: { subdomains },
    });
  }

  removeSubdomains(bucketId: number, subdomains: string[]): Promise<Envelope<"subdomains", ApiRecord[]> | undefined> {
    return this.http.delete<Envelope<"subdomains", ApiRecord[]>>(`/api/v1/storages/buckets/${bucketId}/subdomains`, {
      body: { subdomains },
    });
  }
}
