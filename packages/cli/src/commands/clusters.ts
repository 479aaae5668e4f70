/**
 * `cirrus cluster`: managed Kubernetes
 */

import { InvalidArgumentError, type Command } from "commander";
import type { NodeGroupInput } from "@cirrus/sdk";
import { collectIds, parseId } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm, removeWithCode } from "../lib/confirm.js";
import { addWaitOptions, type CliContext, type WaitFlags } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { TARGET_STATUS, checkStatus } from "../lib/status.js";
import { filterOption, limitOption, yesOption, type ListFlags } from "./shared.js";

const CLUSTER_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "STATUS", path: "status" },
  { header: "VERSION", path: "k8s_version" },
  { header: "NETWORK_DRIVER", path: "network_driver" },
  { header: "INGRESS", path: "ingress" },
];

const PRESET_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "TYPE", path: "type" },
  { header: "PRICE", path: "price" },
  { header: "CPU", path: "cpu" },
  { header: "RAM", path: "ram" },
  { header: "DISK", path: "disk" },
];

const GROUP_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "PRESET_ID", path: "preset_id" },
  { header: "NODES", path: "node_count" },
];

const NODE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "GROUP_ID", path: "group_id" },
  { header: "STATUS", path: "status" },
  { header: "IP", path: "node_ip" },
  { header: "TYPE", path: "type" },
];

/**
 * `NAME:PRESET_ID:COUNT`, e.g. `workers:1141:3`
 */
export function collectNodeGroups(value: string, previous: NodeGroupInput[] = []): NodeGroupInput[] {
  const match = /^([^:]+):(\d+):(\d+)$/.exec(value);
  if (!match?.[1] || !match[2] || !match[3] || Number(match[3]) < 1) {
    throw new InvalidArgumentError(`'${value}' must look like NAME:PRESET_ID:COUNT`);
  }
  return [...previous, { name: match[1], presetId: Number(match[2]), nodeCount: Number(match[3]) }];
}

/**
 * Print a list of plain strings one per line, or as a list in json/yaml
 */
async function printNames(ctx: CliContext, key: string, names: readonly string[]): Promise<void> {
  const { outputFormat } = await ctx.config();
  if (outputFormat === "default") {
    ctx.io.stdout(names.map((name) => `${name}\n`).join(""));
    return;
  }
  await ctx.print({ [key]: names });
}

interface CreateClusterFlags extends WaitFlags {
  name: string;
  k8sVersion: string;
  networkDriver: string;
  presetId: number;
  description?: string;
  ingress: boolean;
  workers?: NodeGroupInput[];
}

export function registerClusterCommands(program: Command, ctx: CliContext): void {
  const cluster = program
    .command("cluster")
    .aliases(["clusters", "kubernetes", "k8s"])
    .description("manage Kubernetes clusters");

  cluster
    .command("list")
    .alias("ls")
    .description("list clusters")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.cluster.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.clusters.list({ limit: opts.limit }), {
          key: "clusters",
          columns: CLUSTER_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  cluster
    .command("get")
    .description("show a cluster")
    .argument("<id>", "cluster ID", parseId)
    .option("--status", `print the status; exit 1 unless it is '${TARGET_STATUS.cluster}'`)
    .action(async (id: number, opts: { status?: boolean }) => {
      await ctx.timed("cli.cluster.get", async () => {
        const client = await ctx.client();
        const body = await client.clusters.get(id);
        if (opts.status) {
          checkStatus(ctx.io, body.cluster.status, TARGET_STATUS.cluster);
          return;
        }
        await ctx.print(body, { key: "cluster", columns: CLUSTER_COLUMNS });
      });
    });

  const create = cluster
    .command("create")
    .description("create a cluster")
    .requiredOption("--name <name>", "cluster name")
    .requiredOption("--k8s-version <version>", "Kubernetes version, see list-k8s-versions")
    .requiredOption("--network-driver <driver>", "CNI, see list-network-drivers")
    .requiredOption("--preset-id <id>", "master node preset", parseId)
    .option("--description <text>", "description")
    .option("--no-ingress", "do not install an ingress controller")
    .option("--workers <name:preset:count>", "worker node group (repeatable)", collectNodeGroups);
  addWaitOptions(create, `the cluster is '${TARGET_STATUS.cluster}'`).action(async (opts: CreateClusterFlags) => {
    await ctx.timed("cli.cluster.create", async () => {
      const client = await ctx.client();
      const body = await client.clusters.create({
        name: opts.name,
        version: opts.k8sVersion,
        networkDriver: opts.networkDriver,
        presetId: opts.presetId,
        description: opts.description,
        ingress: opts.ingress,
        workerGroups: opts.workers,
      });
      if (body === undefined) {
        throw new CliError("Cluster create returned no data");
      }
      if (opts.wait) {
        const id = Number(body.cluster.id);
        await client.clusters.waitForStatus(id, TARGET_STATUS.cluster, ctx.waitOptions(opts));
        await ctx.print(await client.clusters.get(id), { key: "cluster", columns: CLUSTER_COLUMNS });
        return;
      }
      await ctx.print(body, { key: "cluster", columns: CLUSTER_COLUMNS });
    });
  });

  cluster
    .command("set")
    .description("change the description of a cluster")
    .argument("<id>", "cluster ID", parseId)
    .requiredOption("--description <text>", "new description")
    .action(async (id: number, opts: { description: string }) => {
      await ctx.timed("cli.cluster.set", async () => {
        const client = await ctx.client();
        const body = await client.clusters.update(id, opts.description);
        await ctx.print(body ?? (await client.clusters.get(id)), { key: "cluster", columns: CLUSTER_COLUMNS });
      });
    });

  cluster
    .command("remove")
    .alias("rm")
    .description("remove clusters")
    .argument("<ids...>", "cluster IDs", collectIds)
    .addOption(yesOption())
    .action(async (ids: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.cluster.remove", async () => {
        await confirm(ctx.io, `Remove cluster(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => removeWithCode(ctx.io, (removal) => client.clusters.remove(id, removal)), ctx.bulkOptions());
      });
    });

  cluster
    .command("show")
    .description("show resources used by a cluster")
    .argument("<id>", "cluster ID", parseId)
    .action(async (id: number) => {
      await ctx.timed("cli.cluster.show", async () => {
        const client = await ctx.client();
        await ctx.print(await client.clusters.resources(id), { key: "resources" });
      });
    });

  cluster
    .command("kubeconfig")
    .aliases(["kubecfg", "cfg"])
    .description("print the kubeconfig of a cluster")
    .argument("<id>", "cluster ID", parseId)
    .action(async (id: number) => {
      await ctx.timed("cli.cluster.kubeconfig", async () => {
        const client = await ctx.client();
        const text = await client.clusters.kubeconfig(id);
        ctx.io.stdout(text.endsWith("\n") ? text : `${text}\n`);
      });
    });

  cluster
    .command("list-k8s-versions")
    .alias("lv")
    .description("list available Kubernetes versions")
    .action(async () => {
      await ctx.timed("cli.cluster.list-k8s-versions", async () => {
        const client = await ctx.client();
        const { k8s_versions: versions } = await client.clusters.versions();
        await printNames(ctx, "k8s_versions", versions);
      });
    });

  cluster
    .command("list-network-drivers")
    .description("list available network drivers")
    .action(async () => {
      await ctx.timed("cli.cluster.list-network-drivers", async () => {
        const client = await ctx.client();
        const { network_drivers: drivers } = await client.clusters.networkDrivers();
        await printNames(ctx, "network_drivers", drivers);
      });
    });

  cluster
    .command("list-presets")
    .alias("lp")
    .description("list node presets")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.cluster.list-presets", async () => {
        const client = await ctx.client();
        await ctx.print(await client.clusters.presets(), {
          key: "k8s_presets",
          columns: PRESET_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  const group = cluster.command("group").alias("groups").description("worker node groups");

  group
    .command("list")
    .alias("ls")
    .description("list node groups")
    .argument("<cluster-id>", "cluster ID", parseId)
    .action(async (clusterId: number) => {
      await ctx.timed("cli.cluster.group.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.clusters.nodeGroups(clusterId), { key: "node_groups", columns: GROUP_COLUMNS });
      });
    });

  group
    .command("add")
    .description("add a node group")
    .argument("<cluster-id>", "cluster ID", parseId)
    .requiredOption("--name <name>", "group name")
    .requiredOption("--preset-id <id>", "node preset", parseId)
    .requiredOption("--nodes <count>", "number of nodes", parseId)
    .action(async (clusterId: number, opts: { name: string; presetId: number; nodes: number }) => {
      await ctx.timed("cli.cluster.group.add", async () => {
        const client = await ctx.client();
        const body = await client.clusters.createNodeGroup(clusterId, {
          name: opts.name,
          presetId: opts.presetId,
          nodeCount: opts.nodes,
        });
        await ctx.print(body, { key: "node_group", columns: GROUP_COLUMNS });
      });
    });

  group
    .command("remove")
    .alias("rm")
    .description("remove node groups")
    .argument("<cluster-id>", "cluster ID", parseId)
    .argument("<group-ids...>", "group IDs", collectIds)
    .addOption(yesOption())
    .action(async (clusterId: number, groupIds: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.cluster.group.remove", async () => {
        await confirm(ctx.io, `Remove node group(s) ${groupIds.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(groupIds, (groupId) => client.clusters.removeNodeGroup(clusterId, groupId), ctx.bulkOptions());
      });
    });

  for (const [name, verb] of [
    ["scale-up", "add"],
    ["scale-down", "remove"],
  ] as const) {
    group
      .command(name)
      .description(`${verb} nodes of a group`)
      .argument("<cluster-id>", "cluster ID", parseId)
      .argument("<group-id>", "group ID", parseId)
      .argument("[count]", "number of nodes", parseId, 1)
      .action(async (clusterId: number, groupId: number, count: number) => {
        await ctx.timed(`cli.cluster.group.${name}`, async () => {
          const client = await ctx.client();
          const body =
            verb === "add"
              ? await client.clusters.addNodes(clusterId, groupId, count)
              : await client.clusters.removeNodes(clusterId, groupId, count);
          await ctx.print(body, { key: "nodes", columns: NODE_COLUMNS });
        });
      });
  }

  const node = cluster.command("node").alias("nodes").description("cluster nodes");

  node
    .command("list")
    .alias("ls")
    .description("list nodes")
    .argument("<cluster-id>", "cluster ID", parseId)
    .addOption(filterOption())
    .action(async (clusterId: number, opts: ListFlags) => {
      await ctx.timed("cli.cluster.node.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.clusters.nodes(clusterId), { key: "nodes", columns: NODE_COLUMNS, filters: opts.filter });
      });
    });

  node
    .command("remove")
    .alias("rm")
    .description("remove nodes")
    .argument("<cluster-id>", "cluster ID", parseId)
    .argument("<node-ids...>", "node IDs", collectIds)
    .addOption(yesOption())
    .action(async (clusterId: number, nodeIds: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.cluster.node.remove", async () => {
        await confirm(ctx.io, `Remove node(s) ${nodeIds.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(nodeIds, (nodeId) => client.clusters.removeNode(clusterId, nodeId), ctx.bulkOptions());
      });
    });
}
