/**
 * `cirrus image`: custom images made from server disks
 */

import type { Command } from "commander";
import { collectStrings, parseId } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm } from "../lib/confirm.js";
import { addWaitOptions, type CliContext, type WaitFlags } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { TARGET_STATUS, checkStatus } from "../lib/status.js";
import { filterOption, limitOption, withRegion, yesOption, type ListFlags } from "./shared.js";

const IMAGE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "REGION", path: "location" },
  { header: "STATUS", path: "status" },
  { header: "SIZE", path: "size" },
  { header: "DISK_ID", path: "disk_id" },
];

interface CreateImageFlags extends WaitFlags {
  name?: string;
  description?: string;
  os?: string;
  region?: string;
}

export function registerImageCommands(program: Command, ctx: CliContext): void {
  const image = program.command("image").aliases(["images", "i"]).description("manage disk images");

  image
    .command("list")
    .alias("ls")
    .description("list images")
    .addOption(filterOption())
    .addOption(limitOption())
    .option("--region <region>", "only images in this region")
    .action(async (opts: ListFlags & { region?: string }) => {
      await ctx.timed("cli.image.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.images.list({ limit: opts.limit }), {
          key: "images",
          columns: IMAGE_COLUMNS,
          filters: withRegion(opts.filter, opts.region),
        });
      });
    });

  image
    .command("get")
    .description("show an image")
    .argument("<id>", "image ID")
    .option("--status", `print the status; exit 1 unless it is '${TARGET_STATUS.image}'`)
    .action(async (id: string, opts: { status?: boolean }) => {
      await ctx.timed("cli.image.get", async () => {
        const client = await ctx.client();
        const body = await client.images.get(id);
        if (opts.status) {
          checkStatus(ctx.io, body.image.status, TARGET_STATUS.image);
          return;
        }
        await ctx.print(body, { key: "image", columns: IMAGE_COLUMNS });
      });
    });

  const create = image
    .command("create")
    .description("make an image of a server disk")
    .argument("<disk-id>", "disk ID", parseId)
    .option("--name <name>", "image name")
    .option("--description <text>", "description")
    .option("--os <os>", "operating system of the disk")
    .option("--region <region>", "where to store the image");
  addWaitOptions(create, `the image is '${TARGET_STATUS.image}'`).action(async (diskId: number, opts: CreateImageFlags) => {
    await ctx.timed("cli.image.create", async () => {
      const client = await ctx.client();
      const body = await client.images.create({
        diskId,
        name: opts.name,
        description: opts.description,
        os: opts.os,
        location: opts.region,
      });
      if (body === undefined) {
        throw new CliError("Image create returned no data");
      }
      if (opts.wait) {
        const id = String(body.image.id);
        await client.images.waitForStatus(id, TARGET_STATUS.image, ctx.waitOptions(opts));
        await ctx.print(await client.images.get(id), { key: "image", columns: IMAGE_COLUMNS });
        return;
      }
      await ctx.print(body, { key: "image", columns: IMAGE_COLUMNS });
    });
  });

  image
    .command("set")
    .description("rename or describe an image")
    .argument("<id>", "image ID")
    .option("--name <name>", "new name")
    .option("--description <text>", "new description")
    .action(async (id: string, opts: { name?: string; description?: string }) => {
      await ctx.timed("cli.image.set", async () => {
        const client = await ctx.client();
        const body = await client.images.update(id, opts);
        await ctx.print(body ?? (await client.images.get(id)), { key: "image", columns: IMAGE_COLUMNS });
      });
    });

  image
    .command("remove")
    .alias("rm")
    .description("remove images")
    .argument("<ids...>", "image IDs", collectStrings)
    .addOption(yesOption())
    .action(async (ids: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.image.remove", async () => {
        await confirm(ctx.io, `Remove image(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => client.images.remove(id), ctx.bulkOptions());
      });
    });
}
