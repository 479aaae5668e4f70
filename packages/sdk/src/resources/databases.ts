import type { PollResult } from "../poller.js";
import type { ApiRecord, Dbms, Envelope, ListOptions, RemoveOptions, StatusRecord, WaitOptions } from "../types.js";
import { ResourceApi, compact, type RemovalResponse } from "./base.js";

export type DatabaseList = Envelope<"dbs", StatusRecord[]>;
export type DatabaseResponse = Envelope<"db", StatusRecord>;
export type DatabaseBackupList = Envelope<"backups", StatusRecord[]>;
export type DatabaseBackupResponse = Envelope<"backup", StatusRecord>;

export interface DatabaseCreateInput {
  name: string;
  dbms: Dbms;
  presetId: number;
  password: string;
  login?: string;
  hashType?: "caching_sha2" | "mysql_native";
  configParameters?: Record<string, string | number>;
}

export interface DatabaseUpdateInput {
  name?: string;
  password?: string;
  presetId?: number;
  configParameters?: Record<string, string | number>;
  externalIp?: boolean;
}

/**
 * Managed databases and their backups
 */
export class DatabasesApi extends ResourceApi {
  list(options?: ListOptions): Promise<DatabaseList> {
    return this.http.get<DatabaseList>("/api/v1/dbs", { query: this.page(options) });
  }

  get(id: number): Promise<DatabaseResponse> {
    return this.http.get<DatabaseResponse>(`/api/v1/dbs/${id}`);
  }

  presets(): Promise<Envelope<"databases_presets", ApiRecord[]>> {
    return this.http.get<Envelope<"databases_presets", ApiRecord[]>>("/api/v1/presets/dbs");
  }

  create(input: DatabaseCreateInput): Promise<DatabaseResponse | undefined> {
    return this.http.post<DatabaseResponse>("/api/v1/dbs", {
      body: {
        name: input.name,
        // The API names MySQL 8 plain "mysql"
        type: input.dbms === "mysql8" ? "mysql" : input.dbms,
        login: input.login ?? null,
        password: input.password,
        hash_type: input.hashType ?? null,
        preset_id: input.presetId,
        config_parameters: input.configParameters ?? null,
      },
    });
  }

  update(id: number, input: DatabaseUpdateInput): Promise<DatabaseResponse | undefined> {
    return this.http.patch<DatabaseResponse>(`/api/v1/dbs/${id}`, {
      body: compact({
        name: input.name,
        password: input.password,
        preset_id: input.presetId,
        config_parameters: input.configParameters,
        is_external_ip: input.externalIp,
      }),
    });
  }

  remove(id: number, options?: RemoveOptions): Promise<RemovalResponse> {
    return this.http.delete<ApiRecord>(`/api/v1/dbs/${id}`, { query: this.removal(options) });
  }

  backups(id: number, options?: ListOptions): Promise<DatabaseBackupList> {
    return this.http.get<DatabaseBackupList>(`/api/v1/dbs/${id}/backups`, { query: this.page(options) });
  }

  backup(id: number, backupId: number): Promise<DatabaseBackupResponse> {
    return this.http.get<DatabaseBackupResponse>(`/api/v1/dbs/${id}/backups/${backupId}`);
  }

  createBackup(id: number): Promise<DatabaseBackupResponse | undefined> {
    return this.http.post<DatabaseBackupResponse>(`/api/v1/dbs/${id}/backups`, { body: {} });
  }

  async removeBackup(id: number, backupId: number): Promise<void> {
    await this.http.delete(`/api/v1/dbs/${id}/backups/${backupId}`);
  }

  async restoreBackup(id: number, backupId: number): Promise<void> {
    await this.http.put(`/api/v1/dbs/${id}/backups/${backupId}`);
  }

  async status(id: number): Promise<string> {
    const { db } = await this.get(id);
    return db.status;
  }

  /**
   * Poll the database until its status is one of `target` (e.g. "started")
   */
  waitForStatus(id: number, target: string | readonly string[], options?: WaitOptions): Promise<PollResult> {
    return this.waitFor(() => this.status(id), target, options);
  }

  /**
   * Poll a backup until it reaches `target` (default "done")
   */
  waitForBackup(
    id: number,
    backupId: number,
    target: string | readonly string[] = "done",
    options?: WaitOptions
  ): Promise<PollResult> {
    return this.waitFor(async () => (await this.backup(id, backupId)).backup.status, target, options);
  }
}
