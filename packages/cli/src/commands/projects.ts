import type { Command } from "commander";
import type { ApiRecord, ResourceType } from "@cirrus/sdk";
import { choice, collectIds, parseId } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm } from "../lib/confirm.js";
import type { CliContext } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { filterOption, yesOption, type ListFlags } from "./shared.js";

const RESOURCE_TYPES: readonly ResourceType[] = ["server", "balancer", "database", "kubernetes", "storage", "dedicated"];

const PROJECT_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "DESCRIPTION", path: "description" },
];

const RESOURCE_COLUMNS: readonly Column[] = [
  { header: "TYPE", path: "type" },
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "REGION", path: "location" },
  { header: "STATUS", path: "status" },
];

/**
 * Flatten `{ servers: [...], balancers: [...], ... }` into one list with a
 * `type` column
 */
export function flattenResources(body: ApiRecord): ApiRecord[] {
  const rows: ApiRecord[] = [];
  for (const [group, items] of Object.entries(body)) {
    if (group === "meta" || !Array.isArray(items)) continue;
    for (const item of items) {
      if (typeof item !== "object" || item === null || Array.isArray(item)) continue;
      rows.push({ type: group, ...Object.fromEntries(Object.entries(item)) });
    }
  }
  return rows;
}

export function registerProjectCommands(program: Command, ctx: CliContext): void {
  const project = program.command("project").aliases(["projects", "p"]).description("manage projects");

  project
    .command("list")
    .alias("ls")
    .description("list projects")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.project.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.projects.list(), { key: "projects", columns: PROJECT_COLUMNS, filters: opts.filter });
      });
    });

  project
    .command("get")
    .description("show a project")
    .argument("<id>", "project ID", parseId)
    .action(async (id: number) => {
      await ctx.timed("cli.project.get", async () => {
        const client = await ctx.client();
        await ctx.print(await client.projects.get(id), { key: "project", columns: PROJECT_COLUMNS });
      });
    });

  project
    .command("create")
    .description("create a project")
    .requiredOption("--name <name>", "project name")
    .option("--description <text>", "description")
    .option("--avatar-id <id>", "avatar")
    .action(async (opts: { name: string; description?: string; avatarId?: string }) => {
      await ctx.timed("cli.project.create", async () => {
        const client = await ctx.client();
        const body = await client.projects.create(opts);
        if (body === undefined) {
          throw new CliError("Project create returned no data");
        }
        await ctx.print(body, { key: "project", columns: PROJECT_COLUMNS });
      });
    });

  project
    .command("set")
    .description("change a project")
    .argument("<id>", "project ID", parseId)
    .option("--name <name>", "new name")
    .option("--description <text>", "new description")
    .option("--avatar-id <id>", "new avatar")
    .action(async (id: number, opts: { name?: string; description?: string; avatarId?: string }) => {
      await ctx.timed("cli.project.set", async () => {
        const client = await ctx.client();
        const body = await client.projects.update(id, opts);
        await ctx.print(body ?? (await client.projects.get(id)), { key: "project", columns: PROJECT_COLUMNS });
      });
    });

  project
    .command("remove")
    .alias("rm")
    .description("remove projects")
    .argument("<ids...>", "project IDs", collectIds)
    .addOption(yesOption())
    .action(async (ids: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.project.remove", async () => {
        await confirm(ctx.io, `Remove project(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => client.projects.remove(id), ctx.bulkOptions());
      });
    });

  const resource = project.command("resource").alias("rsrc").description("resources of a project");

  resource
    .command("list")
    .alias("ls")
    .description("list resources of a project")
    .argument("<project-id>", "project ID", parseId)
    .addOption(filterOption())
    .action(async (projectId: number, opts: ListFlags) => {
      await ctx.timed("cli.project.resource.list", async () => {
        const client = await ctx.client();
        const body = await client.projects.resources(projectId);
        await ctx.print({ resources: flattenResources(body) }, {
          key: "resources",
          columns: RESOURCE_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  resource
    .command("move")
    .alias("mv")
    .description("move a resource to another project")
    .argument("<type>", `resource type: ${RESOURCE_TYPES.join(", ")}`, choice(RESOURCE_TYPES, "type"))
    .argument("<resource-id>", "resource ID", parseId)
    .requiredOption("--from <project-id>", "current project", parseId)
    .requiredOption("--to <project-id>", "target project", parseId)
    .action(async (type: ResourceType, resourceId: number, opts: { from: number; to: number }) => {
      await ctx.timed("cli.project.resource.move", async () => {
        const client = await ctx.client();
        await client.projects.moveResource(opts.from, opts.to, resourceId, type);
        ctx.io.stdout(`${resourceId}\n`);
      });
    });
}
