/**
 * `cirrus server`: cloud servers, their IPs, disks and disk backups
 */

import { Option, type Command } from "commander";
import {
  filterRecords,
  type ApiRecord,
  type BackupInterval,
  type BootMode,
  type CloudClient,
  type Filter,
  type IpVersion,
  type LogOrder,
  type NatMode,
  type ServerAction,
  type ServerConfiguration,
} from "@cirrus/sdk";
import { choice, collectIds, collectStrings, parseDate, parseDayOfWeek, parseId, parseSize } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm, removeWithCode } from "../lib/confirm.js";
import { addWaitOptions, type CliContext, type WaitFlags } from "../lib/context.js";
import { CliError, EXIT } from "../lib/errors.js";
import { isRecord, type Column } from "../lib/render.js";
import { TARGET_STATUS, checkStatus } from "../lib/status.js";
import {
  filterOption,
  idLines,
  limitOption,
  numberAt,
  requireOneOf,
  withRegion,
  yesOption,
  type ListFlags,
} from "./shared.js";

const BOOT_MODES: readonly BootMode[] = ["default", "single", "recovery"];
const NAT_MODES: readonly NatMode[] = ["dnat_and_snat", "snat", "no_nat"];
const LOG_ORDERS: readonly LogOrder[] = ["asc", "desc"];
const BACKUP_INTERVALS: readonly BackupInterval[] = ["day", "week", "month"];

/**
 * One row per disk of a server, tagged with the server ID
 */
export function serverDisks(server: Record<string, unknown>): Record<string, unknown>[] {
  const disks = Array.isArray(server["disks"]) ? server["disks"] : [];
  return disks.filter(isRecord).map((disk) => ({ server_id: server["id"], ...disk }));
}

/**
 * First public IPv4 address of a server record
 */
function publicIpv4(_: unknown, server: ApiRecord): string {
  const networks = server["networks"];
  if (!Array.isArray(networks)) return "";
  for (const network of networks) {
    if (typeof network !== "object" || network === null || Reflect.get(network, "type") !== "public") continue;
    const ips: unknown = Reflect.get(network, "ips");
    if (!Array.isArray(ips)) continue;
    for (const ip of ips) {
      if (typeof ip === "object" && ip !== null && Reflect.get(ip, "type") === "ipv4") {
        return String(Reflect.get(ip, "ip"));
      }
    }
  }
  return "";
}

function addressList(ips: unknown): string {
  if (!Array.isArray(ips)) return "";
  return ips
    .map((ip: unknown) => (typeof ip === "object" && ip !== null ? Reflect.get(ip, "ip") : undefined))
    .filter((ip): ip is string => typeof ip === "string")
    .join(", ");
}

const SERVER_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "REGION", path: "location" },
  { header: "STATUS", path: "status" },
  { header: "IPV4", path: "networks", format: publicIpv4 },
];

const PRESET_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "REGION", path: "location" },
  { header: "PRICE", path: "price" },
  { header: "CPU", path: "cpu" },
  { header: "RAM", path: "ram" },
  { header: "DISK", path: "disk" },
  { header: "DISK_TYPE", path: "disk_type" },
  { header: "BANDWIDTH", path: "bandwidth" },
];

const OS_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "FAMILY", path: "family" },
  { header: "NAME", path: "name" },
  { header: "VERSION", path: "version" },
];

const SOFTWARE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "OS", path: "os_ids" },
];

const NETWORK_COLUMNS: readonly Column[] = [
  { header: "TYPE", path: "type" },
  { header: "NAT_MODE", path: "nat_mode" },
  { header: "BANDWIDTH", path: "bandwidth" },
  { header: "IPS", path: "ips", format: addressList },
];

const IP_COLUMNS: readonly Column[] = [
  { header: "IP", path: "ip" },
  { header: "TYPE", path: "type" },
  { header: "PTR", path: "ptr" },
  { header: "MAIN", path: "is_main" },
];

const DISK_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "system_name" },
  { header: "MOUNTED", path: "is_mounted" },
  { header: "SYSTEM", path: "is_system" },
  { header: "TYPE", path: "type" },
  { header: "STATUS", path: "status" },
  { header: "SIZE", path: "size" },
  { header: "USED", path: "used" },
];

const SERVER_DISK_COLUMNS: readonly Column[] = [{ header: "SERVER", path: "server_id" }, ...DISK_COLUMNS];

const AUTO_BACKUP_COLUMNS: readonly Column[] = [
  { header: "ENABLED", path: "is_enabled" },
  { header: "KEEP", path: "copy_count" },
  { header: "START", path: "creation_start_at" },
  { header: "INTERVAL", path: "interval" },
  { header: "DAY_OF_WEEK", path: "day_of_week" },
];

const BACKUP_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "CREATED", path: "created_at" },
  { header: "STATUS", path: "status" },
  { header: "SIZE", path: "size" },
  { header: "COMMENT", path: "comment" },
];

const LOG_COLUMNS: readonly Column[] = [
  { header: "LOGGED_AT", path: "logged_at" },
  { header: "EVENT", path: "event" },
];

interface ListServersFlags extends ListFlags {
  region?: string;
  ids?: boolean;
}

interface ConfigurationFlags {
  presetId?: number;
  configuratorId?: number;
  cpu?: number;
  ram?: number;
  disk?: number;
}

interface CreateFlags extends ConfigurationFlags, WaitFlags {
  name: string;
  comment?: string;
  avatarId?: string;
  image?: string;
  osId?: number;
  softwareId?: number;
  bandwidth?: number;
  sshKey?: number[];
  ddosProtection?: boolean;
  localNetwork?: boolean;
  networkId?: string;
  privateIp?: string;
  availabilityZone?: string;
}

interface SetFlags extends ConfigurationFlags {
  name?: string;
  comment?: string;
  avatarId?: string;
  image?: string;
  osId?: number;
  softwareId?: number;
  bandwidth?: number;
}


/**
 * `--preset-id` and the `--cpu/--ram/--disk` group exclude each other
 */
function addConfigurationOptions(command: Command): Command {
  return command
    .addOption(
      new Option("--preset-id <id>", "server preset").argParser(parseId).conflicts(["cpu", "ram", "disk", "configuratorId"])
    )
    .addOption(new Option("--configurator-id <id>", "configurator for --cpu/--ram/--disk").argParser(parseId))
    .addOption(new Option("--cpu <count>", "number of vCPUs").argParser(parseId))
    .addOption(new Option("--ram <size>", "RAM size, e.g. 2G").argParser(parseSize))
    .addOption(new Option("--disk <size>", "system disk size, e.g. 15G").argParser(parseSize));
}

/**
 * Configurator for a custom configuration: the one given, or the first
 * available in `region`
 */
async function findConfiguratorId(
  client: CloudClient,
  explicit: number | undefined,
  region: string | undefined
): Promise<number> {
  if (explicit !== undefined) return explicit;
  const { server_configurators: configurators } = await client.servers.configurators();
  const match = configurators.find((c) => region === undefined || c["location"] === region);
  const id = match ? numberAt(match, "id") : undefined;
  if (id === undefined) {
    throw new CliError(`No server configurator found${region ? ` for region ${region}` : ""}; pass --configurator-id`);
  }
  return id;
}

async function waitForServers(ctx: CliContext, client: CloudClient, ids: readonly number[], target: string, flags: WaitFlags): Promise<void> {
  for (const id of ids) {
    await client.servers.waitForStatus(id, target, ctx.waitOptions(flags));
  }
}

export function registerServerCommands(program: Command, ctx: CliContext): void {
  const server = program.command("server").aliases(["servers", "s"]).description("manage cloud servers");

  server
    .command("list")
    .alias("ls")
    .description("list servers")
    .addOption(filterOption())
    .addOption(limitOption())
    .option("--region <region>", "only servers in this region")
    .option("--ids", "print server IDs only")
    .action(async (opts: ListServersFlags) => {
      await ctx.timed("cli.server.list", async () => {
        const client = await ctx.client();
        const body = await client.servers.list({ limit: opts.limit });
        const filters: Filter[] = withRegion(opts.filter, opts.region);
        if (opts.ids) {
          ctx.io.stdout(idLines(filterRecords(body.servers, filters)));
          return;
        }
        await ctx.print(body, { key: "servers", columns: SERVER_COLUMNS, filters });
      });
    });

  server
    .command("get")
    .description("show a server")
    .argument("<id>", "server ID", parseId)
    .option("--status", `print the status; exit 1 unless it is '${TARGET_STATUS.server}'`)
    .option("--networks", "show networks")
    .option("--disks", "show disks")
    .action(async (id: number, opts: { status?: boolean; networks?: boolean; disks?: boolean }) => {
      await ctx.timed("cli.server.get", async () => {
        const client = await ctx.client();
        if (opts.disks) {
          await ctx.print(await client.servers.disks(id), { key: "server_disks", columns: DISK_COLUMNS });
          return;
        }
        const body = await client.servers.get(id);
        if (opts.status) {
          checkStatus(ctx.io, body.server.status, TARGET_STATUS.server);
          return;
        }
        if (opts.networks) {
          await ctx.print({ networks: body.server["networks"] ?? [] }, { key: "networks", columns: NETWORK_COLUMNS });
          return;
        }
        await ctx.print(body, { key: "server", columns: SERVER_COLUMNS });
      });
    });

  const create = server
    .command("create")
    .description("create a server")
    .requiredOption("--name <name>", "server name")
    .option("--comment <text>", "comment")
    .option("--avatar-id <id>", "avatar")
    .addOption(new Option("--image <id>", "image to install").conflicts("osId"))
    .addOption(new Option("--os-id <id>", "operating system to install").argParser(parseId))
    .addOption(new Option("--software-id <id>", "software from the marketplace").argParser(parseId))
    .addOption(new Option("--bandwidth <mbps>", "network bandwidth").argParser(parseId))
    .addOption(new Option("--ssh-key <id>", "SSH key to add (repeatable)").argParser(collectIds))
    .option("--ddos-protection", "enable DDoS protection")
    .option("--local-network", "connect to the local network")
    .option("--network-id <id>", "VPC to connect to")
    .option("--private-ip <ip>", "address in the VPC")
    .option("--availability-zone <zone>", "availability zone (default: from profile)");
  addConfigurationOptions(create);
  addWaitOptions(create, `the server is '${TARGET_STATUS.server}'`).action(async (opts: CreateFlags, command: Command) => {
    requireOneOf(command, [
      ["--preset-id", opts.presetId],
      ["--cpu", opts.cpu],
    ]);
    requireOneOf(command, [
      ["--image", opts.image],
      ["--os-id", opts.osId],
    ]);
    if (opts.presetId === undefined && (opts.ram === undefined || opts.disk === undefined)) {
      command.error("error: --cpu, --ram and --disk must be given together");
    }

    await ctx.timed("cli.server.create", async () => {
      const client = await ctx.client();
      const cfg = await ctx.config();
      let configuration: ServerConfiguration | undefined;
      if (opts.cpu !== undefined && opts.ram !== undefined && opts.disk !== undefined) {
        configuration = {
          configuratorId: await findConfiguratorId(client, opts.configuratorId, cfg.region),
          cpu: opts.cpu,
          ramMb: opts.ram,
          diskMb: opts.disk,
        };
      }

      const body = await client.servers.create({
        name: opts.name,
        comment: opts.comment,
        avatarId: opts.avatarId,
        presetId: opts.presetId,
        configuration,
        osId: opts.osId,
        imageId: opts.image,
        softwareId: opts.softwareId,
        bandwidth: opts.bandwidth,
        sshKeyIds: opts.sshKey,
        isDdosGuard: opts.ddosProtection ?? false,
        isLocalNetwork: opts.localNetwork,
        network: opts.networkId === undefined ? undefined : { id: opts.networkId, ip: opts.privateIp },
        availabilityZone: opts.availabilityZone ?? cfg.availabilityZone,
      });
      if (body === undefined) {
        throw new CliError("Server create returned no data");
      }
      if (opts.wait) {
        await waitForServers(ctx, client, [Number(body.server.id)], TARGET_STATUS.server, opts);
        await ctx.print(await client.servers.get(Number(body.server.id)), { key: "server", columns: SERVER_COLUMNS });
        return;
      }
      await ctx.print(body, { key: "server", columns: SERVER_COLUMNS });
    });
  });

  const set = server
    .command("set")
    .description("change server settings or configuration")
    .argument("<id>", "server ID", parseId)
    .option("--name <name>", "new name")
    .option("--comment <text>", "new comment")
    .option("--avatar-id <id>", "new avatar")
    .addOption(new Option("--image <id>", "reinstall from an image").conflicts("osId"))
    .addOption(new Option("--os-id <id>", "reinstall an operating system").argParser(parseId))
    .addOption(new Option("--software-id <id>", "software from the marketplace").argParser(parseId))
    .addOption(new Option("--bandwidth <mbps>", "network bandwidth").argParser(parseId));
  addConfigurationOptions(set).action(async (id: number, opts: SetFlags) => {
    await ctx.timed("cli.server.set", async () => {
      const client = await ctx.client();
      let configuration: ServerConfiguration | undefined;
      if (opts.cpu !== undefined || opts.ram !== undefined || opts.disk !== undefined) {
        // Fill the parts not given from the current configuration
        const { server: current } = await client.servers.get(id);
        const configuratorId = opts.configuratorId ?? numberAt(current, "configurator_id");
        const cpu = opts.cpu ?? numberAt(current, "cpu");
        const ram = opts.ram ?? numberAt(current, "ram");
        const disk = opts.disk ?? numberAt(current, "disks.0.size");
        if (configuratorId === undefined || cpu === undefined || ram === undefined || disk === undefined) {
          throw new CliError(`Server ${id} has no configurator; use --preset-id`);
        }
        configuration = { configuratorId, cpu, ramMb: ram, diskMb: disk };
      }

      const body = await client.servers.update(id, {
        name: opts.name,
        comment: opts.comment,
        avatarId: opts.avatarId,
        presetId: opts.presetId,
        configuration,
        osId: opts.osId,
        imageId: opts.image,
        softwareId: opts.softwareId,
        bandwidth: opts.bandwidth,
      });
      await ctx.print(body ?? (await client.servers.get(id)), { key: "server", columns: SERVER_COLUMNS });
    });
  });

  server
    .command("remove")
    .alias("rm")
    .description("remove servers")
    .argument("<ids...>", "server IDs", collectIds)
    .addOption(yesOption())
    .action(async (ids: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.server.remove", async () => {
        await confirm(ctx.io, `Remove server(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => removeWithCode(ctx.io, (removal) => client.servers.remove(id, removal)), ctx.bulkOptions());
      });
    });

  const power = (name: string, alias: string, description: string, soft: ServerAction, hard: ServerAction | undefined, target: string): void => {
    const command = server.command(name).alias(alias).description(description).argument("<ids...>", "server IDs", collectIds);
    if (hard !== undefined) {
      command.option("--hard", "do it the hard way (power cycle)");
    }
    addWaitOptions(command, `the server is '${target}'`).action(async (ids: number[], opts: WaitFlags & { hard?: boolean }) => {
      await ctx.timed(`cli.server.${name}`, async () => {
        const client = await ctx.client();
        const action = opts.hard && hard !== undefined ? hard : soft;
        await runBulk(
          ids,
          async (id) => {
            await client.servers.action(id, action);
            if (opts.wait) {
              await waitForServers(ctx, client, [id], target, opts);
            }
          },
          ctx.bulkOptions()
        );
      });
    });
  };

  power("boot", "start", "power on servers", "start", undefined, TARGET_STATUS.server);
  power("reboot", "restart", "reboot servers", "reboot", "hard_reboot", TARGET_STATUS.server);
  power("shutdown", "stop", "shut servers down", "shutdown", "hard_shutdown", TARGET_STATUS.serverOff);

  server
    .command("reset-root-password")
    .description("reset the root password; the new one is sent by email")
    .argument("<id>", "server ID", parseId)
    .addOption(yesOption())
    .action(async (id: number, opts: { yes?: boolean }) => {
      await ctx.timed("cli.server.reset-root-password", async () => {
        await confirm(ctx.io, `Reset root password of server ${id}?`, opts.yes);
        const client = await ctx.client();
        await client.servers.action(id, "reset_password");
        ctx.io.stdout(`${id}\n`);
      });
    });

  const clone = server.command("clone").description("clone a server").argument("<id>", "server ID", parseId);
  addWaitOptions(clone, `the clone is '${TARGET_STATUS.server}'`).action(async (id: number, opts: WaitFlags) => {
    await ctx.timed("cli.server.clone", async () => {
      const client = await ctx.client();
      const body = await client.servers.clone(id);
      if (body === undefined) {
        throw new CliError("Server clone returned no data");
      }
      if (opts.wait) {
        await waitForServers(ctx, client, [Number(body.server.id)], TARGET_STATUS.server, opts);
      }
      await ctx.print(body, { key: "server", columns: SERVER_COLUMNS });
    });
  });

  server
    .command("list-presets")
    .alias("lp")
    .description("list server presets")
    .addOption(filterOption())
    .option("--region <region>", "only presets in this region")
    .action(async (opts: ListServersFlags) => {
      await ctx.timed("cli.server.list-presets", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.presets(), {
          key: "server_presets",
          columns: PRESET_COLUMNS,
          filters: withRegion(opts.filter, opts.region),
        });
      });
    });

  server
    .command("list-os-images")
    .alias("lo")
    .description("list operating systems")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.server.list-os-images", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.osImages(), { key: "servers_os", columns: OS_COLUMNS, filters: opts.filter });
      });
    });

  server
    .command("list-software")
    .description("list marketplace software")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.server.list-software", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.software(), {
          key: "servers_software",
          columns: SOFTWARE_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  server
    .command("logs")
    .description("show server action log")
    .argument("<id>", "server ID", parseId)
    .addOption(limitOption())
    .addOption(new Option("--order <order>", "sort order").argParser(choice(LOG_ORDERS, "--order")).default("asc"))
    .action(async (id: number, opts: ListFlags & { order: LogOrder }) => {
      await ctx.timed("cli.server.logs", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.logs(id, { limit: opts.limit, order: opts.order }), {
          key: "server_logs",
          columns: LOG_COLUMNS,
        });
      });
    });

  server
    .command("set-boot-mode")
    .description("set the boot mode (default, single, recovery)")
    .argument("<mode>", "boot mode", choice(BOOT_MODES, "mode"))
    .argument("<ids...>", "server IDs", collectIds)
    .addOption(yesOption())
    .action(async (mode: BootMode, ids: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.server.set-boot-mode", async () => {
        await confirm(ctx.io, `Changing the boot mode reboots server(s) ${ids.join(", ")}. Continue?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => client.servers.setBootMode(id, mode), ctx.bulkOptions());
      });
    });

  server
    .command("set-nat-mode")
    .description("set the NAT mode of the local network (dnat_and_snat, snat, no_nat)")
    .argument("<mode>", "NAT mode", choice(NAT_MODES, "mode"))
    .argument("<ids...>", "server IDs", collectIds)
    .action(async (mode: NatMode, ids: number[]) => {
      await ctx.timed("cli.server.set-nat-mode", async () => {
        const client = await ctx.client();
        await runBulk(ids, (id) => client.servers.setNatMode(id, mode), ctx.bulkOptions());
      });
    });

  registerIpCommands(server, ctx);
  registerDiskCommands(server, ctx);
  registerBackupCommands(server, ctx);
}

function registerIpCommands(server: Command, ctx: CliContext): void {
  const ip = server.command("ip").alias("ips").description("manage public IPs of a server");

  ip.command("list")
    .alias("ls")
    .description("list IPs")
    .argument("<server-id>", "server ID", parseId)
    .addOption(filterOption())
    .action(async (serverId: number, opts: ListFlags) => {
      await ctx.timed("cli.server.ip.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.ips(serverId), { key: "server_ips", columns: IP_COLUMNS, filters: opts.filter });
      });
    });

  ip.command("add")
    .description("add an IP")
    .argument("<server-id>", "server ID", parseId)
    .addOption(new Option("--ipv4", "add an IPv4 address").conflicts("ipv6"))
    .option("--ipv6", "add an IPv6 address")
    .option("--ptr <fqdn>", "reverse DNS record")
    .action(async (serverId: number, opts: { ipv4?: boolean; ipv6?: boolean; ptr?: string }) => {
      await ctx.timed("cli.server.ip.add", async () => {
        const client = await ctx.client();
        const version: IpVersion = opts.ipv6 ? "ipv6" : "ipv4";
        const body = await client.servers.addIp(serverId, version, opts.ptr);
        await ctx.print(body, { key: "server_ip", columns: IP_COLUMNS });
      });
    });

  ip.command("remove")
    .alias("rm")
    .description("remove IPs")
    .argument("<server-id>", "server ID", parseId)
    .argument("<ips...>", "addresses", collectStrings)
    .addOption(yesOption())
    .action(async (serverId: number, ips: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.server.ip.remove", async () => {
        await confirm(ctx.io, `Remove IP(s) ${ips.join(", ")} from server ${serverId}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ips, (address) => client.servers.removeIp(serverId, address), ctx.bulkOptions());
      });
    });

  ip.command("set-ptr")
    .description("set the reverse DNS record of an IP")
    .argument("<server-id>", "server ID", parseId)
    .argument("<ip>", "address")
    .argument("<ptr>", "reverse DNS record")
    .action(async (serverId: number, address: string, ptr: string) => {
      await ctx.timed("cli.server.ip.set-ptr", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.updateIp(serverId, address, ptr), { key: "server_ip", columns: IP_COLUMNS });
      });
    });
}

interface AutoBackupFlags {
  status?: boolean;
  enable?: boolean;
  disable?: boolean;
  keep: number;
  startDate?: string;
  interval: BackupInterval;
  dayOfWeek?: number;
}

function registerDiskCommands(server: Command, ctx: CliContext): void {
  const disk = server.command("disk").alias("disks").description("manage server disks");

  disk
    .command("list")
    .alias("ls")
    .description("list disks")
    .argument("<server-id>", "server ID", parseId)
    .addOption(filterOption())
    .action(async (serverId: number, opts: ListFlags) => {
      await ctx.timed("cli.server.disk.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.disks(serverId), {
          key: "server_disks",
          columns: DISK_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  disk
    .command("list-all")
    .alias("la")
    .description("list disks of every server")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.server.disk.list-all", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.list({ limit: opts.limit }), {
          key: "servers",
          columns: SERVER_DISK_COLUMNS,
          filters: opts.filter,
          expand: serverDisks,
        });
      });
    });

  disk
    .command("get")
    .description("show a disk")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .action(async (serverId: number, diskId: number) => {
      await ctx.timed("cli.server.disk.get", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.disk(serverId, diskId), { key: "server_disk", columns: DISK_COLUMNS });
      });
    });

  disk
    .command("add")
    .description("add a disk")
    .argument("<server-id>", "server ID", parseId)
    .requiredOption("--size <size>", "disk size, e.g. 10G", parseSize)
    .action(async (serverId: number, opts: { size: number }) => {
      await ctx.timed("cli.server.disk.add", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.addDisk(serverId, opts.size), { key: "server_disk", columns: DISK_COLUMNS });
      });
    });

  disk
    .command("resize")
    .description("grow a disk")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .requiredOption("--size <size>", "new size, e.g. 20G", parseSize)
    .action(async (serverId: number, diskId: number, opts: { size: number }) => {
      await ctx.timed("cli.server.disk.resize", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.resizeDisk(serverId, diskId, opts.size), {
          key: "server_disk",
          columns: DISK_COLUMNS,
        });
      });
    });

  disk
    .command("auto-backup")
    .description("show or change automatic backups of a disk")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .option("--status", "print the settings; exit 1 unless automatic backups are enabled")
    .addOption(new Option("--enable", "turn automatic backups on").conflicts("disable"))
    .option("--disable", "turn automatic backups off")
    .addOption(new Option("--keep <count>", "number of backups to keep").argParser(parseId).default(1))
    .option("--start-date <date>", "date of the first backup, YYYY-MM-DD (default: today)", parseDate)
    .addOption(
      new Option("--interval <interval>", "day, week or month").argParser(choice(BACKUP_INTERVALS, "--interval")).default("day")
    )
    .option("--day-of-week <day>", "day of weekly backups, 1 (Monday) to 7", parseDayOfWeek)
    .action(async (serverId: number, diskId: number, opts: AutoBackupFlags) => {
      await ctx.timed("cli.server.disk.auto-backup", async () => {
        const client = await ctx.client();
        if (opts.status) {
          const body = await client.servers.autoBackup(serverId, diskId);
          await ctx.print(body, { key: "auto_backups_settings", columns: AUTO_BACKUP_COLUMNS });
          if (body.auto_backups_settings["is_enabled"] !== true) {
            throw new CliError("Automatic backups are disabled", { exitCode: EXIT.failure, silent: true });
          }
          return;
        }
        const body = await client.servers.updateAutoBackup(serverId, diskId, {
          enabled: opts.enable ? true : opts.disable ? false : undefined,
          copyCount: opts.keep,
          startAt: opts.startDate ?? `${new Date().toISOString().slice(0, 10)}T00:00:00Z`,
          interval: opts.interval,
          dayOfWeek: opts.dayOfWeek,
        });
        await ctx.print(body, { key: "auto_backups_settings", columns: AUTO_BACKUP_COLUMNS });
      });
    });

  disk
    .command("remove")
    .alias("rm")
    .description("remove disks")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-ids...>", "disk IDs", collectIds)
    .addOption(yesOption())
    .action(async (serverId: number, diskIds: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.server.disk.remove", async () => {
        await confirm(ctx.io, `Remove disk(s) ${diskIds.join(", ")} of server ${serverId}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(diskIds, (diskId) => client.servers.removeDisk(serverId, diskId), ctx.bulkOptions());
      });
    });
}

function registerBackupCommands(server: Command, ctx: CliContext): void {
  const backup = server.command("backup").alias("backups").description("manage disk backups");

  backup
    .command("list")
    .alias("ls")
    .description("list backups of a disk")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .addOption(filterOption())
    .action(async (serverId: number, diskId: number, opts: ListFlags) => {
      await ctx.timed("cli.server.backup.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.backups(serverId, diskId), {
          key: "backups",
          columns: BACKUP_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  backup
    .command("get")
    .description("show a backup")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .argument("<backup-id>", "backup ID", parseId)
    .option("--status", `print the status; exit 1 unless it is '${TARGET_STATUS.backup}'`)
    .action(async (serverId: number, diskId: number, backupId: number, opts: { status?: boolean }) => {
      await ctx.timed("cli.server.backup.get", async () => {
        const client = await ctx.client();
        const body = await client.servers.backup(serverId, diskId, backupId);
        if (opts.status) {
          checkStatus(ctx.io, body.backup.status, TARGET_STATUS.backup);
          return;
        }
        await ctx.print(body, { key: "backup", columns: BACKUP_COLUMNS });
      });
    });

  const create = backup
    .command("create")
    .description("back up a disk")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .option("--comment <text>", "comment");
  addWaitOptions(create, `the backup is '${TARGET_STATUS.backup}'`).action(
    async (serverId: number, diskId: number, opts: WaitFlags & { comment?: string }) => {
      await ctx.timed("cli.server.backup.create", async () => {
        const client = await ctx.client();
        const body = await client.servers.createBackup(serverId, diskId, opts.comment);
        if (body === undefined) {
          throw new CliError("Backup create returned no data");
        }
        if (opts.wait) {
          const backupId = Number(body.backup.id);
          await client.servers.waitForBackup(serverId, diskId, backupId, TARGET_STATUS.backup, ctx.waitOptions(opts));
          await ctx.print(await client.servers.backup(serverId, diskId, backupId), { key: "backup", columns: BACKUP_COLUMNS });
          return;
        }
        await ctx.print(body, { key: "backup", columns: BACKUP_COLUMNS });
      });
    }
  );

  backup
    .command("remove")
    .alias("rm")
    .description("remove backups")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .argument("<backup-ids...>", "backup IDs", collectIds)
    .addOption(yesOption())
    .action(async (serverId: number, diskId: number, backupIds: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.server.backup.remove", async () => {
        await confirm(ctx.io, `Remove backup(s) ${backupIds.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(backupIds, (backupId) => client.servers.removeBackup(serverId, diskId, backupId), ctx.bulkOptions());
      });
    });

  backup
    .command("set-property")
    .alias("set")
    .description("change the comment of a backup")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .argument("<backup-id>", "backup ID", parseId)
    .requiredOption("--comment <text>", "comment")
    .action(async (serverId: number, diskId: number, backupId: number, opts: { comment: string }) => {
      await ctx.timed("cli.server.backup.set-property", async () => {
        const client = await ctx.client();
        await ctx.print(await client.servers.updateBackup(serverId, diskId, backupId, opts.comment), {
          key: "backup",
          columns: BACKUP_COLUMNS,
        });
      });
    });

  backup
    .command("restore")
    .description("restore a disk from a backup")
    .argument("<server-id>", "server ID", parseId)
    .argument("<disk-id>", "disk ID", parseId)
    .argument("<backup-id>", "backup ID", parseId)
    .addOption(yesOption())
    .action(async (serverId: number, diskId: number, backupId: number, opts: { yes?: boolean }) => {
      await ctx.timed("cli.server.backup.restore", async () => {
        await confirm(ctx.io, `Restore disk from backup ${backupId}? Data on disk ${diskId} will be lost.`, opts.yes);
        const client = await ctx.client();
        await client.servers.backupAction(serverId, diskId, backupId, "restore");
        ctx.io.stdout(`${backupId}\n`);
      });
    });

  for (const name of ["mount", "unmount"] as const) {
    backup
      .command(name)
      .description(`${name} a backup`)
      .argument("<server-id>", "server ID", parseId)
      .argument("<disk-id>", "disk ID", parseId)
      .argument("<backup-id>", "backup ID", parseId)
      .action(async (serverId: number, diskId: number, backupId: number) => {
        await ctx.timed(`cli.server.backup.${name}`, async () => {
          const client = await ctx.client();
          await client.servers.backupAction(serverId, diskId, backupId, name);
          ctx.io.stdout(`${backupId}\n`);
        });
      });
  }
}
