import type { ApiRecord, Envelope } from "../types.js";
import { ResourceApi } from "./base.js";

export type AccountStatus = Envelope<"status", ApiRecord>;
export type AccountFinances = Envelope<"finances", ApiRecord>;

/**
 * Account status, balance and API access restrictions
 */
export class AccountApi extends ResourceApi {
  status(): Promise<AccountStatus> {
    return this.http.get<AccountStatus>("/api/v1/account/status");
  }

  finances(): Promise<AccountFinances> {
    return this.http.get<AccountFinances>("/api/v1/account/finances");
  }

  restrictions(): Promise<ApiRecord> {
    return this.http.get<ApiRecord>("/api/v1/auth/access");
  }
}
