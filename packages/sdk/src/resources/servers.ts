import { ValidationError } from "../errors.js";
import type { PollResult } from "../poller.js";
import type {
  ApiRecord,
  BackupAction,
  BackupInterval,
  BootMode,
  Envelope,
  IpVersion,
  ListOptions,
  LogOrder,
  NatMode,
  RemoveOptions,
  ServerAction,
  ServerConfiguration,
  StatusRecord,
  WaitOptions,
} from "../types.js";
import { ResourceApi, compact, type RemovalResponse } from "./base.js";

export type ServerList = Envelope<"servers", StatusRecord[]>;
export type ServerResponse = Envelope<"server", StatusRecord>;
export type DiskList = Envelope<"server_disks", StatusRecord[]>;
export type DiskResponse = Envelope<"server_disk", StatusRecord>;
export type BackupList = Envelope<"backups", StatusRecord[]>;
export type BackupResponse = Envelope<"backup", StatusRecord>;
export type AutoBackupResponse = Envelope<"auto_backups_settings", ApiRecord>;
export type ServerIpList = Envelope<"server_ips", ApiRecord[]>;

export interface AutoBackupInput {
  /** Left unchanged when omitted */
  enabled?: boolean;
  /** Number of backups to keep */
  copyCount: number;
  /** ISO 8601 time of the first backup */
  startAt: string;
  interval: BackupInterval;
  /** 1 (Monday) to 7, for weekly backups */
  dayOfWeek?: number;
}

export interface ServerNetwork {
  id: string;
  ip?: string;
}

export interface ServerCreateInput {
  name: string;
  bandwidth?: number;
  presetId?: number;
  configuration?: ServerConfiguration;
  osId?: number;
  imageId?: string;
  softwareId?: number;
  comment?: string;
  avatarId?: string;
  sshKeyIds?: number[];
  isDdosGuard?: boolean;
  isLocalNetwork?: boolean;
  network?: ServerNetwork;
  availabilityZone?: string;
  isRootPasswordRequired?: boolean;
}

export interface ServerUpdateInput {
  name?: string;
  bandwidth?: number;
  presetId?: number;
  configuration?: ServerConfiguration;
  osId?: number;
  imageId?: string;
  softwareId?: number;
  comment?: string;
  avatarId?: string;
}

export interface ServerLogsOptions extends ListOptions {
  order?: LogOrder;
}

function configurationBody(config: ServerConfiguration | undefined): ApiRecord | undefined {
  if (!config) return undefined;
  return {
    configurator_id: config.configuratorId,
    cpu: config.cpu,
    ram: config.ramMb,
    disk: config.diskMb,
  };
}

/**
 * Cloud servers, their IPs, disks and disk backups
 */
export class ServersApi extends ResourceApi {
  list(options?: ListOptions): Promise<ServerList> {
    return this.http.get<ServerList>("/api/v1/servers", { query: this.page(options) });
  }

  get(id: number): Promise<ServerResponse> {
    return this.http.get<ServerResponse>(`/api/v1/servers/${id}`);
  }

  /**
   * Create a server. Exactly one of `presetId`/`configuration` and exactly
   * one of `osId`/`imageId` must be given.
   */
  create(input: ServerCreateInput): Promise<ServerResponse | undefined> {
    if ((input.presetId === undefined) === (input.configuration === undefined)) {
      throw new ValidationError("Exactly one of presetId, configuration is required");
    }
    if ((input.osId === undefined) === (input.imageId === undefined)) {
      throw new ValidationError("Exactly one of osId, imageId is required");
    }

    const body = compact({
      name: input.name,
      bandwidth: input.bandwidth,
      preset_id: input.presetId,
      configuration: configurationBody(input.configuration),
      os_id: input.osId,
      image_id: input.imageId,
      software_id: input.softwareId,
      comment: input.comment,
      avatar_id: input.avatarId,
      ssh_keys_ids: input.sshKeyIds && input.sshKeyIds.length > 0 ? input.sshKeyIds : undefined,
      is_ddos_guard: input.isDdosGuard ?? false,
      is_local_network: input.isLocalNetwork,
      network: input.network,
      availability_zone: input.availabilityZone,
      is_root_password_required: input.isRootPasswordRequired,
    });
    return this.http.post<ServerResponse>("/api/v1/servers", { body });
  }

  update(id: number, input: ServerUpdateInput): Promise<ServerResponse | undefined> {
    if (input.presetId !== undefined && input.configuration !== undefined) {
      throw new ValidationError("presetId and configuration are mutually exclusive");
    }
    if (input.osId !== undefined && input.imageId !== undefined) {
      throw new ValidationError("osId and imageId are mutually exclusive");
    }

    const body = compact({
      name: input.name,
      bandwidth: input.bandwidth,
      // The update endpoint names this field "configurator"
      configurator: configurationBody(input.configuration),
      preset_id: input.presetId,
      os_id: input.osId,
      image_id: input.imageId,
      software_id: input.softwareId,
      comment: input.comment,
      avatar_id: input.avatarId,
    });
    return this.http.patch<ServerResponse>(`/api/v1/servers/${id}`, { body });
  }

  remove(id: number, options?: RemoveOptions): Promise<RemovalResponse> {
    return this.http.delete<ApiRecord>(`/api/v1/servers/${id}`, { query: this.removal(options) });
  }

  async action(id: number, action: ServerAction): Promise<void> {
    await this.http.post(`/api/v1/servers/${id}/action`, { body: { action } });
  }

  clone(id: number): Promise<ServerResponse | undefined> {
    return this.http.post<ServerResponse>(`/api/v1/servers/${id}/clone`, { body: {} });
  }

  presets(): Promise<Envelope<"server_presets", ApiRecord[]>> {
    return this.http.get<Envelope<"server_presets", ApiRecord[]>>("/api/v1/presets/servers");
  }

  configurators(): Promise<Envelope<"server_configurators", ApiRecord[]>> {
    return this.http.get<Envelope<"server_configurators", ApiRecord[]>>("/api/v1/configurator/servers");
  }

  osImages(): Promise<Envelope<"servers_os", ApiRecord[]>> {
    return this.http.get<Envelope<"servers_os", ApiRecord[]>>("/api/v1/os/servers");
  }

  software(): Promise<Envelope<"servers_software", ApiRecord[]>> {
    return this.http.get<Envelope<"servers_software", ApiRecord[]>>("/api/v1/software/servers");
  }

  logs(id: number, options: ServerLogsOptions = {}): Promise<Envelope<"server_logs", ApiRecord[]>> {
    return this.http.get<Envelope<"server_logs", ApiRecord[]>>(`/api/v1/servers/${id}/logs`, {
      query: { ...this.page(options), order: options.order ?? "asc" },
    });
  }

  async setBootMode(id: number, mode: BootMode): Promise<void> {
    const bootMode = mode === "recovery" ? "recovery_disk" : mode;
    await this.http.post(`/api/v1/servers/${id}/boot-mode`, { body: { boot_mode: bootMode } });
  }

  async setNatMode(id: number, mode: NatMode): Promise<void> {
    await this.http.patch(`/api/v1/servers/${id}/local-networks/nat-mode`, { body: { nat_mode: mode } });
  }

  // Public IPs

  ips(id: number): Promise<ServerIpList> {
    return this.http.get<ServerIpList>(`/api/v1/servers/${id}/ips`);
  }

  addIp(id: number, version: IpVersion, ptr?: string): Promise<Envelope<"server_ip", ApiRecord> | undefined> {
    return this.http.post<Envelope<"server_ip", ApiRecord>>(`/api/v1/servers/${id}/ips`, { body: { type: version, ptr: ptr ?? null } });
  }

  async removeIp(id: number, ip: string): Promise<void> {
    await this.http.delete(`/api/v1/servers/${id}/ips`, { body: { ip } });
  }

  updateIp(id: number, ip: string, ptr: string): Promise<Envelope<"server_ip", ApiRecord> | undefined> {
    return this.http.patch<Envelope<"server_ip", ApiRecord>>(`/api/v1/servers/${id}/ips`, { body: { ip, ptr } });
  }

  // Disks

  disks(id: number): Promise<DiskList> {
    return this.http.get<DiskList>(`/api/v1/servers/${id}/disks`);
  }

  disk(id: number, diskId: number): Promise<DiskResponse> {
    return this.http.get<DiskResponse>(`/api/v1/servers/${id}/disks/${diskId}`);
  }

  addDisk(id: number, sizeMb: number): Promise<DiskResponse | undefined> {
    return this.http.post<DiskResponse>(`/api/v1/servers/${id}/disks`, { body: { size: sizeMb } });
  }

  resizeDisk(id: number, diskId: number, sizeMb: number): Promise<DiskResponse | undefined> {
    return this.http.patch<DiskResponse>(`/api/v1/servers/${id}/disks/${diskId}`, { body: { size: sizeMb } });
  }

  async removeDisk(id: number, diskId: number): Promise<void> {
    await this.http.delete(`/api/v1/servers/${id}/disks/${diskId}`);
  }

  // Disk backups

  autoBackup(id: number, diskId: number): Promise<AutoBackupResponse> {
    return this.http.get<AutoBackupResponse>(`/api/v1/servers/${id}/disks/${diskId}/auto-backups`);
  }

  updateAutoBackup(id: number, diskId: number, input: AutoBackupInput): Promise<AutoBackupResponse | undefined> {
    return this.http.patch<AutoBackupResponse>(`/api/v1/servers/${id}/disks/${diskId}/auto-backups`, {
      body: compact({
        is_enabled: input.enabled,
        copy_count: input.copyCount,
        creation_start_at: input.startAt,
        interval: input.interval,
        day_of_week: input.dayOfWeek,
      }),
    });
  }

  backups(id: number, diskId: number): Promise<BackupList> {
    return this.http.get<BackupList>(`/api/v1/servers/${id}/disks/${diskId}/backups`);
  }

  backup(id: number, diskId: number, backupId: number): Promise<BackupResponse> {
    return this.http.get<BackupResponse>(`/api/v1/servers/${id}/disks/${diskId}/backups/${backupId}`);
  }

  createBackup(id: number, diskId: number, comment?: string): Promise<BackupResponse | undefined> {
    return this.http.post<BackupResponse>(`/api/v1/servers/${id}/disks/${diskId}/backups`, {
      body: { comment: comment ?? null },
    });
  }

  updateBackup(id: number, diskId: number, backupId: number, comment: string): Promise<BackupResponse | undefined> {
    return this.http.patch<BackupResponse>(`/api/v1/servers/${id}/disks/${diskId}/backups/${backupId}`, {
      body: { comment },
    });
  }

  async removeBackup(id: number, diskId: number, backupId: number): Promise<void> {
    await this.http.delete(`/api/v1/servers/${id}/disks/${diskId}/backups/${backupId}`);
  }

  async backupAction(id: number, diskId: number, backupId: number, action: BackupAction): Promise<void> {
    await this.http.post(`/api/v1/servers/${id}/disks/${diskId}/backups/${backupId}/action`, {
      body: { action },
    });
  }

  async status(id: number): Promise<string> {
    const { server } = await this.get(id);
    return server.status;
  }

  /**
   * Poll the server until its status is one of `target` (e.g. "on")
   */
  waitForStatus(id: number, target: string | readonly string[], options?: WaitOptions): Promise<PollResult> {
    return this.waitFor(() => this.status(id), target, options);
  }

  /**
   * Poll a disk backup until it reaches `target` (default "done")
   */
  waitForBackup(
    id: number,
    diskId: number,
    backupId: number,
    target: string | readonly string[] = "done",
    options?: WaitOptions
  ): Promise<PollResult> {
    return this.waitFor(async () => (await this.backup(id, diskId, backupId)).backup.status, target, options);
  }
}
