import type { Command } from "commander";
import type { ResourceType } from "@cirrus/sdk";
import { choice, collectStrings } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm } from "../lib/confirm.js";
import type { CliContext } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { filterOption, yesOption, type ListFlags } from "./shared.js";

const BINDABLE: readonly ResourceType[] = ["server", "balancer", "database", "dedicated"];

const IP_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "IP", path: "ip" },
  { header: "ZONE", path: "availability_zone" },
  { header: "RESOURCE_TYPE", path: "resource_type" },
  { header: "RESOURCE_ID", path: "resource_id" },
  { header: "COMMENT", path: "comment" },
  { header: "PTR", path: "ptr" },
];

export function registerFloatingIpCommands(program: Command, ctx: CliContext): void {
  const ip = program.command("ip").alias("ips").description("manage floating IPs");

  ip.command("list")
    .alias("ls")
    .description("list floating IPs")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.ip.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.floatingIps.list(), { key: "ips", columns: IP_COLUMNS, filters: opts.filter });
      });
    });

  ip.command("get")
    .description("show a floating IP")
    .argument("<id>", "floating IP ID")
    .action(async (id: string) => {
      await ctx.timed("cli.ip.get", async () => {
        const client = await ctx.client();
        await ctx.print(await client.floatingIps.get(id), { key: "ip", columns: IP_COLUMNS });
      });
    });

  ip.command("create")
    .description("allocate a floating IP")
    .option("--availability-zone <zone>", "availability zone (default: from profile)")
    .option("--ddos-protection", "enable DDoS protection")
    .action(async (opts: { availabilityZone?: string; ddosProtection?: boolean }) => {
      await ctx.timed("cli.ip.create", async () => {
        const cfg = await ctx.config();
        const availabilityZone = opts.availabilityZone ?? cfg.availabilityZone;
        if (availabilityZone === undefined) {
          throw new CliError("No availability zone given. Pass --availability-zone or set 'availability_zone' in the profile");
        }
        const client = await ctx.client();
        await ctx.print(await client.floatingIps.create({ availabilityZone, isDdosGuard: opts.ddosProtection }), {
          key: "ip",
          columns: IP_COLUMNS,
        });
      });
    });

  ip.command("set")
    .description("change the comment or reverse DNS of a floating IP")
    .argument("<id>", "floating IP ID")
    .option("--comment <text>", "comment")
    .option("--ptr <fqdn>", "reverse DNS record")
    .action(async (id: string, opts: { comment?: string; ptr?: string }) => {
      await ctx.timed("cli.ip.set", async () => {
        const client = await ctx.client();
        const body = await client.floatingIps.update(id, opts);
        await ctx.print(body ?? (await client.floatingIps.get(id)), { key: "ip", columns: IP_COLUMNS });
      });
    });

  ip.command("remove")
    .alias("rm")
    .description("release floating IPs")
    .argument("<ids...>", "floating IP IDs", collectStrings)
    .addOption(yesOption())
    .action(async (ids: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.ip.remove", async () => {
        await confirm(ctx.io, `Release floating IP(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => client.floatingIps.remove(id), ctx.bulkOptions());
      });
    });

  ip.command("attach")
    .description("bind a floating IP to a resource")
    .argument("<id>", "floating IP ID")
    .argument("<resource-type>", `one of: ${BINDABLE.join(", ")}`, choice(BINDABLE, "resource type"))
    .argument("<resource-id>", "resource ID")
    .action(async (id: string, type: ResourceType, resourceId: string) => {
      await ctx.timed("cli.ip.attach", async () => {
        const client = await ctx.client();
        await client.floatingIps.attach(id, type, resourceId);
        ctx.io.stdout(`${id}\n`);
      });
    });

  ip.command("detach")
    .description("unbind a floating IP")
    .argument("<id>", "floating IP ID")
    .action(async (id: string) => {
      await ctx.timed("cli.ip.detach", async () => {
        const client = await ctx.client();
        await client.floatingIps.detach(id);
        ctx.io.stdout(`${id}\n`);
      });
    });
}
