/**
 * `cirrus firewall`: rule groups, rules and the resources they protect
 */

import { Option, type Command } from "commander";
import type { FirewallDirection, FirewallPolicy, FirewallResourceType, PortProto } from "@cirrus/sdk";
import { choice, collectPortProto, collectStrings, parseCidrArg, parseId, parsePortProtoArg } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm } from "../lib/confirm.js";
import type { CliContext } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { filterOption, limitOption, requireOneOf, yesOption, type ListFlags } from "./shared.js";

const POLICIES: readonly FirewallPolicy[] = ["DROP", "ACCEPT"];
const ANY_NETWORK = "0.0.0.0/0";

const GROUP_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "POLICY", path: "policy" },
  { header: "DESCRIPTION", path: "description" },
];

const RULE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "DIRECTION", path: "direction" },
  { header: "PROTOCOL", path: "protocol" },
  { header: "PORT", path: "port" },
  { header: "CIDR", path: "cidr" },
  { header: "DESCRIPTION", path: "description" },
];

const RESOURCE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "TYPE", path: "type" },
];

interface TargetFlags {
  server?: number;
  balancer?: number;
  database?: number;
}

interface RuleFlags {
  cidr: string;
  ingress?: boolean;
  egress?: boolean;
  description?: string;
}

/**
 * `--server`, `--balancer` and `--database` name one resource
 */
function addTargetOptions(command: Command): Command {
  return command
    .addOption(new Option("--server <id>", "a cloud server").argParser(parseId).conflicts(["balancer", "database"]))
    .addOption(new Option("--balancer <id>", "a load balancer").argParser(parseId).conflicts("database"))
    .addOption(new Option("--database <id>", "a managed database").argParser(parseId));
}

function resolveTarget(command: Command, opts: TargetFlags): { id: number; type: FirewallResourceType } {
  requireOneOf(command, [
    ["--server", opts.server],
    ["--balancer", opts.balancer],
    ["--database", opts.database],
  ]);
  if (opts.server !== undefined) return { id: opts.server, type: "server" };
  if (opts.balancer !== undefined) return { id: opts.balancer, type: "balancer" };
  if (opts.database !== undefined) return { id: opts.database, type: "dbaas" };
  throw new CliError("No resource given");
}

function addRuleOptions(command: Command): Command {
  return command
    .addOption(new Option("--cidr <cidr>", "IPv4 or IPv6 network").argParser(parseCidrArg).default(ANY_NETWORK))
    .addOption(new Option("--ingress", "incoming traffic (default)").conflicts("egress"))
    .option("--egress", "outgoing traffic")
    .option("--description <text>", "rule description");
}

export function portProtoLabel(spec: PortProto): string {
  return spec.port === undefined ? spec.protocol : `${spec.port}/${spec.protocol}`;
}

function direction(opts: RuleFlags): FirewallDirection {
  return opts.egress ? "egress" : "ingress";
}

export function registerFirewallCommands(program: Command, ctx: CliContext): void {
  const fw = program.command("firewall").alias("fw").description("manage firewall groups and rules");

  addTargetOptions(fw.command("link").description("protect a resource with a group").argument("<group-id>", "group ID")).action(
    async (groupId: string, opts: TargetFlags, command: Command) => {
      const target = resolveTarget(command, opts);
      await ctx.timed("cli.firewall.link", async () => {
        const client = await ctx.client();
        await client.firewall.link(groupId, target.id, target.type);
        ctx.io.stdout(`${target.id}\n`);
      });
    }
  );

  addTargetOptions(fw.command("unlink").description("detach a group from a resource").argument("<group-id>", "group ID")).action(
    async (groupId: string, opts: TargetFlags, command: Command) => {
      const target = resolveTarget(command, opts);
      await ctx.timed("cli.firewall.unlink", async () => {
        const client = await ctx.client();
        await client.firewall.unlink(groupId, target.id, target.type);
        ctx.io.stdout(`${target.id}\n`);
      });
    }
  );

  addTargetOptions(fw.command("show").description("list groups linked to a resource")).action(
    async (opts: TargetFlags, command: Command) => {
      const target = resolveTarget(command, opts);
      await ctx.timed("cli.firewall.show", async () => {
        const client = await ctx.client();
        await ctx.print(await client.firewall.resourceGroups(target.id, target.type), {
          key: "groups",
          columns: GROUP_COLUMNS,
        });
      });
    }
  );

  registerGroupCommands(fw, ctx);
  registerRuleCommands(fw, ctx);
}

function registerGroupCommands(fw: Command, ctx: CliContext): void {
  const group = fw.command("group").alias("groups").description("firewall groups");

  group
    .command("list")
    .alias("ls")
    .description("list groups")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.firewall.group.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.firewall.groups({ limit: opts.limit }), {
          key: "groups",
          columns: GROUP_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  group
    .command("get")
    .description("show a group and the resources it protects")
    .argument("<group-id>", "group ID")
    .option("--resources", "list linked resources instead")
    .action(async (groupId: string, opts: { resources?: boolean }) => {
      await ctx.timed("cli.firewall.group.get", async () => {
        const client = await ctx.client();
        if (opts.resources) {
          await ctx.print(await client.firewall.groupResources(groupId), { key: "resources", columns: RESOURCE_COLUMNS });
          return;
        }
        await ctx.print(await client.firewall.group(groupId), { key: "group", columns: GROUP_COLUMNS });
      });
    });

  group
    .command("create")
    .description("create a group")
    .requiredOption("--name <name>", "group name")
    .option("--description <text>", "description")
    .addOption(new Option("--policy <policy>", "default policy").argParser(choice(POLICIES, "--policy")).default("DROP"))
    .action(async (opts: { name: string; description?: string; policy: FirewallPolicy }) => {
      await ctx.timed("cli.firewall.group.create", async () => {
        const client = await ctx.client();
        await ctx.print(await client.firewall.createGroup(opts.name, opts.description, opts.policy), {
          key: "group",
          columns: GROUP_COLUMNS,
        });
      });
    });

  group
    .command("set")
    .description("rename or describe a group")
    .argument("<group-id>", "group ID")
    .requiredOption("--name <name>", "group name")
    .option("--description <text>", "description")
    .action(async (groupId: string, opts: { name: string; description?: string }) => {
      await ctx.timed("cli.firewall.group.set", async () => {
        const client = await ctx.client();
        const body = await client.firewall.updateGroup(groupId, opts.name, opts.description);
        await ctx.print(body ?? (await client.firewall.group(groupId)), { key: "group", columns: GROUP_COLUMNS });
      });
    });

  group
    .command("remove")
    .alias("rm")
    .description("remove groups")
    .argument("<group-ids...>", "group IDs", collectStrings)
    .addOption(yesOption())
    .action(async (groupIds: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.firewall.group.remove", async () => {
        await confirm(ctx.io, `Remove firewall group(s) ${groupIds.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(groupIds, (groupId) => client.firewall.removeGroup(groupId), ctx.bulkOptions());
      });
    });
}

function registerRuleCommands(fw: Command, ctx: CliContext): void {
  const rule = fw.command("rule").alias("rules").description("firewall rules");

  rule
    .command("list")
    .alias("ls")
    .description("list rules of a group")
    .argument("<group-id>", "group ID")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (groupId: string, opts: ListFlags) => {
      await ctx.timed("cli.firewall.rule.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.firewall.rules(groupId, { limit: opts.limit }), {
          key: "rules",
          columns: RULE_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  const add = rule
    .command("add")
    .description("add rules, one per [PORT[-PORT]/]PROTO, e.g. 22/tcp 2000-3000/udp icmp")
    .argument("<port-proto...>", "port and protocol", collectPortProto)
    .addOption(new Option("--group <group-id>", "add to an existing group").conflicts("makeGroup"))
    .option("--make-group <name>", "create a new group for the rules");
  addRuleOptions(add).action(
    async (specs: PortProto[], opts: RuleFlags & { group?: string; makeGroup?: string }, command: Command) => {
      requireOneOf(command, [
        ["--group", opts.group],
        ["--make-group", opts.makeGroup],
      ]);
      await ctx.timed("cli.firewall.rule.add", async () => {
        const client = await ctx.client();
        let groupId = opts.group;
        if (groupId === undefined && opts.makeGroup !== undefined) {
          const created = await client.firewall.createGroup(opts.makeGroup);
          const id = created?.group["id"];
          if (typeof id !== "string") {
            throw new CliError("Group create returned no ID");
          }
          groupId = id;
          ctx.io.stderr(`Created group ${id}\n`);
        }
        if (groupId === undefined) {
          throw new CliError("No group given");
        }
        const target = groupId;
        const byLabel = new Map(specs.map((spec) => [portProtoLabel(spec), spec]));
        await runBulk(
          [...byLabel.keys()],
          async (label) => {
            const spec = byLabel.get(label);
            if (spec === undefined) return;
            await client.firewall.createRule(target, {
              direction: direction(opts),
              protocol: spec.protocol,
              port: spec.port,
              cidr: opts.cidr,
              description: opts.description,
            });
          },
          ctx.bulkOptions()
        );
      });
    }
  );

  const update = rule
    .command("update")
    .alias("upd")
    .description("replace a rule")
    .argument("<group-id>", "group ID")
    .argument("<rule-id>", "rule ID")
    .argument("<port-proto>", "[PORT[-PORT]/]PROTO", parsePortProtoArg);
  addRuleOptions(update).action(async (groupId: string, ruleId: string, spec: PortProto, opts: RuleFlags) => {
    await ctx.timed("cli.firewall.rule.update", async () => {
      const client = await ctx.client();
      await ctx.print(
        await client.firewall.updateRule(groupId, ruleId, {
          direction: direction(opts),
          protocol: spec.protocol,
          port: spec.port,
          cidr: opts.cidr,
          description: opts.description,
        }),
        { key: "rule", columns: RULE_COLUMNS }
      );
    });
  });

  rule
    .command("remove")
    .alias("rm")
    .description("remove rules")
    .argument("<group-id>", "group ID")
    .argument("<rule-ids...>", "rule IDs", collectStrings)
    .addOption(yesOption())
    .action(async (groupId: string, ruleIds: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.firewall.rule.remove", async () => {
        await confirm(ctx.io, `Remove firewall rule(s) ${ruleIds.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ruleIds, (ruleId) => client.firewall.removeRule(groupId, ruleId), ctx.bulkOptions());
      });
    });
}
