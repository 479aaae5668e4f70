/**
 * `cirrus storage`: S3 buckets, storage users and bucket subdomains
 *
 * Buckets are addressed by name; the ID the API wants is looked up first.
 */

import { Option, type Command } from "commander";
import type { BucketType, CloudClient } from "@cirrus/sdk";
import { choice, collectStrings, parseId } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm, removeWithCode } from "../lib/confirm.js";
import type { CliContext } from "../lib/context.js";
import { CliError, EXIT } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { filterOption, numberAt, yesOption, type ListFlags } from "./shared.js";

const BUCKET_TYPES: readonly BucketType[] = ["private", "public"];

const BUCKET_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "REGION", path: "location" },
  { header: "TYPE", path: "type" },
  { header: "USED", path: "disk_stats.size" },
  { header: "STATUS", path: "status" },
];

const PRESET_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "REGION", path: "location" },
  { header: "PRICE", path: "price" },
  { header: "DISK", path: "disk" },
];

const USER_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "ACCESS_KEY", path: "access_key" },
];

const SUBDOMAIN_COLUMNS: readonly Column[] = [
  { header: "SUBDOMAIN", path: "subdomain" },
  { header: "CERT_RELEASED", path: "cert_released" },
  { header: "STATUS", path: "status" },
];

async function bucketId(client: CloudClient, name: string): Promise<number> {
  const { buckets } = await client.storage.buckets();
  const bucket = buckets.find((b) => b["name"] === name);
  const id = bucket ? numberAt(bucket, "id") : undefined;
  if (id === undefined) {
    throw new CliError(`Bucket not found: ${name}`, { exitCode: EXIT.notFound });
  }
  return id;
}

export function registerStorageCommands(program: Command, ctx: CliContext): void {
  const storage = program.command("storage").aliases(["storages", "s3"]).description("manage S3 object storage");

  storage
    .command("list")
    .alias("ls")
    .description("list buckets")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.storage.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.storage.buckets(), { key: "buckets", columns: BUCKET_COLUMNS, filters: opts.filter });
      });
    });

  storage
    .command("list-presets")
    .alias("lp")
    .description("list storage presets")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.storage.list-presets", async () => {
        const client = await ctx.client();
        await ctx.print(await client.storage.presets(), {
          key: "storages_presets",
          columns: PRESET_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  storage
    .command("mb")
    .description("make a bucket")
    .argument("<name>", "bucket name")
    .requiredOption("--preset-id <id>", "storage preset", parseId)
    .addOption(new Option("--type <type>", "bucket access").argParser(choice(BUCKET_TYPES, "--type")).default("private"))
    .action(async (name: string, opts: { presetId: number; type: BucketType }) => {
      await ctx.timed("cli.storage.mb", async () => {
        const client = await ctx.client();
        const body = await client.storage.createBucket({ name, presetId: opts.presetId, type: opts.type });
        if (body === undefined) {
          throw new CliError("Bucket create returned no data");
        }
        await ctx.print(body, { key: "bucket", columns: BUCKET_COLUMNS });
      });
    });

  storage
    .command("rb")
    .description("remove buckets")
    .argument("<names...>", "bucket names", collectStrings)
    .addOption(yesOption())
    .action(async (names: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.storage.rb", async () => {
        await confirm(ctx.io, `Remove bucket(s) ${names.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(
          names,
          async (name) => {
            const id = await bucketId(client, name);
            await removeWithCode(ctx.io, (removal) => client.storage.removeBucket(id, removal));
          },
          ctx.bulkOptions()
        );
      });
    });

  storage
    .command("set")
    .description("change a bucket")
    .argument("<name>", "bucket name")
    .option("--preset-id <id>", "new preset", parseId)
    .addOption(new Option("--type <type>", "bucket access").argParser(choice(BUCKET_TYPES, "--type")))
    .action(async (name: string, opts: { presetId?: number; type?: BucketType }) => {
      await ctx.timed("cli.storage.set", async () => {
        const client = await ctx.client();
        const id = await bucketId(client, name);
        const body = await client.storage.updateBucket(id, opts);
        await ctx.print(body ?? { bucket: { id, name } }, { key: "bucket", columns: BUCKET_COLUMNS });
      });
    });

  const user = storage.command("user").alias("users").description("storage users");

  user
    .command("list")
    .alias("ls")
    .description("list storage users")
    .action(async () => {
      await ctx.timed("cli.storage.user.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.storage.users(), { key: "users", columns: USER_COLUMNS });
      });
    });

  user
    .command("passwd")
    .description("change the secret key of a storage user")
    .argument("<user-id>", "user ID", parseId)
    .option("--secret <secret>", "new secret key (asked for when omitted)")
    .action(async (userId: number, opts: { secret?: string }) => {
      await ctx.timed("cli.storage.user.passwd", async () => {
        let secret = opts.secret;
        if (secret === undefined) {
          if (!ctx.io.isStdinTTY) {
            throw new CliError("No secret given. Pass --secret or run interactively");
          }
          secret = await ctx.io.prompt("New secret key: ");
        }
        if (secret.length === 0) {
          throw new CliError("Secret key must not be empty");
        }
        const client = await ctx.client();
        await client.storage.updateUserSecret(userId, secret);
        ctx.io.stdout(`${userId}\n`);
      });
    });

  const subdomain = storage.command("subdomain").alias("domain").description("custom domains of a bucket");

  subdomain
    .command("list")
    .alias("ls")
    .description("list subdomains of a bucket")
    .argument("<bucket>", "bucket name")
    .action(async (bucket: string) => {
      await ctx.timed("cli.storage.subdomain.list", async () => {
        const client = await ctx.client();
        const id = await bucketId(client, bucket);
        await ctx.print(await client.storage.subdomains(id), { key: "subdomains", columns: SUBDOMAIN_COLUMNS });
      });
    });

  subdomain
    .command("add")
    .description("attach subdomains to a bucket")
    .argument("<bucket>", "bucket name")
    .argument("<subdomains...>", "fully qualified subdomains", collectStrings)
    .action(async (bucket: string, subdomains: string[]) => {
      await ctx.timed("cli.storage.subdomain.add", async () => {
        const client = await ctx.client();
        const id = await bucketId(client, bucket);
        await client.storage.addSubdomains(id, subdomains);
        ctx.io.stdout(`${subdomains.join("\n")}\n`);
      });
    });

  subdomain
    .command("remove")
    .alias("rm")
    .description("detach subdomains from a bucket")
    .argument("<bucket>", "bucket name")
    .argument("<subdomains...>", "fully qualified subdomains", collectStrings)
    .addOption(yesOption())
    .action(async (bucket: string, subdomains: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.storage.subdomain.remove", async () => {
        await confirm(ctx.io, `Remove subdomain(s) ${subdomains.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        const id = await bucketId(client, bucket);
        await client.storage.removeSubdomains(id, subdomains);
        ctx.io.stdout(`${subdomains.join("\n")}\n`);
      });
    });
}
