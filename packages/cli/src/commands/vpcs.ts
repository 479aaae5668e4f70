import type { Command } from "commander";
import { collectStrings, parseSubnet } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm } from "../lib/confirm.js";
import type { CliContext } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { filterOption, withRegion, yesOption, type ListFlags } from "./shared.js";

const VPC_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "REGION", path: "location" },
  { header: "ZONE", path: "availability_zone" },
  { header: "SUBNET", path: "subnet_v4" },
  { header: "DESCRIPTION", path: "description" },
];

const SERVICE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "TYPE", path: "type" },
  { header: "NAME", path: "name" },
  { header: "PRIVATE_IP", path: "local_ip" },
  { header: "PUBLIC_IP", path: "public_ip" },
];

const PORT_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "IPV4", path: "ipv4" },
  { header: "SERVICE", path: "service.type" },
  { header: "SERVICE_ID", path: "service.id" },
  { header: "NAT_MODE", path: "nat_mode" },
];

export function registerVpcCommands(program: Command, ctx: CliContext): void {
  const vpc = program.command("vpc").aliases(["vpcs", "network", "networks"]).description("manage virtual networks");

  vpc
    .command("list")
    .alias("ls")
    .description("list networks")
    .addOption(filterOption())
    .option("--region <region>", "only networks in this region")
    .action(async (opts: ListFlags & { region?: string }) => {
      await ctx.timed("cli.vpc.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.vpcs.list(), {
          key: "vpcs",
          columns: VPC_COLUMNS,
          filters: withRegion(opts.filter, opts.region),
        });
      });
    });

  vpc
    .command("get")
    .description("show a network")
    .argument("<id>", "network ID")
    .action(async (id: string) => {
      await ctx.timed("cli.vpc.get", async () => {
        const client = await ctx.client();
        await ctx.print(await client.vpcs.get(id), { key: "vpc", columns: VPC_COLUMNS });
      });
    });

  vpc
    .command("create")
    .description("create a network for a private IPv4 SUBNET, e.g. 192.168.0.0/24")
    .argument("<subnet>", "IPv4 CIDR inside 10.0.0.0/8, 172.16.0.0/12 or 192.168.0.0/16", parseSubnet)
    .requiredOption("--name <name>", "network name")
    .option("--description <text>", "description")
    .option("--region <region>", "region (default: from profile)")
    .option("--availability-zone <zone>", "availability zone (default: from profile)")
    .action(
      async (subnet: string, opts: { name: string; description?: string; region?: string; availabilityZone?: string }) => {
        await ctx.timed("cli.vpc.create", async () => {
          const cfg = await ctx.config();
          const location = opts.region ?? cfg.region;
          if (location === undefined) {
            throw new CliError("No region given. Pass --region or set 'region' in the profile");
          }
          const client = await ctx.client();
          const body = await client.vpcs.create({
            name: opts.name,
            subnet,
            location,
            availabilityZone: opts.availabilityZone ?? cfg.availabilityZone,
            description: opts.description,
          });
          await ctx.print(body, { key: "vpc", columns: VPC_COLUMNS });
        });
      }
    );

  vpc
    .command("set")
    .description("rename or describe a network")
    .argument("<id>", "network ID")
    .option("--name <name>", "new name")
    .option("--description <text>", "new description")
    .action(async (id: string, opts: { name?: string; description?: string }) => {
      await ctx.timed("cli.vpc.set", async () => {
        const client = await ctx.client();
        const body = await client.vpcs.update(id, opts);
        await ctx.print(body ?? (await client.vpcs.get(id)), { key: "vpc", columns: VPC_COLUMNS });
      });
    });

  vpc
    .command("remove")
    .alias("rm")
    .description("remove networks")
    .argument("<ids...>", "network IDs", collectStrings)
    .addOption(yesOption())
    .action(async (ids: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.vpc.remove", async () => {
        await confirm(ctx.io, `Remove network(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => client.vpcs.remove(id), ctx.bulkOptions());
      });
    });

  vpc
    .command("show")
    .description("list services connected to a network")
    .argument("<id>", "network ID")
    .addOption(filterOption())
    .action(async (id: string, opts: ListFlags) => {
      await ctx.timed("cli.vpc.show", async () => {
        const client = await ctx.client();
        await ctx.print(await client.vpcs.services(id), { key: "services", columns: SERVICE_COLUMNS, filters: opts.filter });
      });
    });

  const port = vpc.command("port").alias("ports").description("network ports");

  port
    .command("list")
    .alias("ls")
    .description("list ports of a network")
    .argument("<id>", "network ID")
    .addOption(filterOption())
    .action(async (id: string, opts: ListFlags) => {
      await ctx.timed("cli.vpc.port.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.vpcs.ports(id), { key: "vpc_ports", columns: PORT_COLUMNS, filters: opts.filter });
      });
    });
}
