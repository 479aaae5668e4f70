import type { Command } from "commander";
import { collectIds, parseId } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm } from "../lib/confirm.js";
import type { CliContext } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import { readTextFile } from "../lib/io.js";
import type { Column } from "../lib/render.js";
import { filterOption, yesOption, type ListFlags } from "./shared.js";

const KEY_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "DEFAULT", path: "is_default" },
  { header: "CREATED", path: "created_at" },
  {
    header: "SERVERS",
    path: "used_by",
    format: (servers) =>
      Array.isArray(servers)
        ? servers
            .map((s: unknown) => (typeof s === "object" && s !== null ? Reflect.get(s, "id") : undefined))
            .filter((id) => id !== undefined)
            .join(", ")
        : "",
  },
];

export function registerSshKeyCommands(program: Command, ctx: CliContext): void {
  const key = program.command("ssh-key").aliases(["ssh-keys", "k"]).description("manage SSH keys");

  key
    .command("list")
    .alias("ls")
    .description("list SSH keys")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.ssh-key.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.sshKeys.list(), { key: "ssh_keys", columns: KEY_COLUMNS, filters: opts.filter });
      });
    });

  key
    .command("get")
    .description("show an SSH key")
    .argument("<id>", "key ID", parseId)
    .action(async (id: number) => {
      await ctx.timed("cli.ssh-key.get", async () => {
        const client = await ctx.client();
        await ctx.print(await client.sshKeys.get(id), { key: "ssh_key", columns: KEY_COLUMNS });
      });
    });

  key
    .command("new")
    .description("upload a public key")
    .argument("<file>", "public key file")
    .option("--name <name>", "key name (default: the key comment)")
    .option("--default", "add the key to new servers by default")
    .action(async (file: string, opts: { name?: string; default?: boolean }) => {
      await ctx.timed("cli.ssh-key.new", async () => {
        const body = (await readTextFile(file)).trim();
        if (body.length === 0) {
          throw new CliError(`Key file is empty: ${file}`);
        }
        // ssh-rsa AAAA... user@host
        const name = opts.name ?? body.split(/\s+/)[2];
        if (name === undefined) {
          throw new CliError("The key has no comment; pass --name");
        }
        const client = await ctx.client();
        await ctx.print(await client.sshKeys.create({ name, body, isDefault: opts.default }), {
          key: "ssh_key",
          columns: KEY_COLUMNS,
        });
      });
    });

  key
    .command("set")
    .alias("edit")
    .description("change an SSH key")
    .argument("<id>", "key ID", parseId)
    .option("--name <name>", "new name")
    .option("--body <file>", "replace the key with the contents of a file")
    .option("--default <bool>", "add to new servers by default (true or false)", (value: string) => value === "true")
    .action(async (id: number, opts: { name?: string; body?: string; default?: boolean }) => {
      await ctx.timed("cli.ssh-key.set", async () => {
        const body = opts.body === undefined ? undefined : (await readTextFile(opts.body)).trim();
        const client = await ctx.client();
        await ctx.print(await client.sshKeys.update(id, { name: opts.name, body, isDefault: opts.default }), {
          key: "ssh_key",
          columns: KEY_COLUMNS,
        });
      });
    });

  key
    .command("add")
    .alias("copy")
    .description("add SSH keys to a server")
    .argument("<server-id>", "server ID", parseId)
    .argument("<key-ids...>", "key IDs", collectIds)
    .action(async (serverId: number, keyIds: number[]) => {
      await ctx.timed("cli.ssh-key.add", async () => {
        const client = await ctx.client();
        await client.sshKeys.addToServer(serverId, keyIds);
        ctx.io.stdout(`${keyIds.join("\n")}\n`);
      });
    });

  key
    .command("remove")
    .alias("rm")
    .description("remove SSH keys, or detach them from a server with --from-server")
    .argument("<ids...>", "key IDs", collectIds)
    .option("--from-server <id>", "only detach the keys from this server", parseId)
    .addOption(yesOption())
    .action(async (ids: number[], opts: { fromServer?: number; yes?: boolean }) => {
      await ctx.timed("cli.ssh-key.remove", async () => {
        const { fromServer } = opts;
        await confirm(
          ctx.io,
          fromServer === undefined ? `Remove SSH key(s) ${ids.join(", ")}?` : `Detach SSH key(s) ${ids.join(", ")} from server ${fromServer}?`,
          opts.yes
        );
        const client = await ctx.client();
        await runBulk(
          ids,
          (id) => (fromServer === undefined ? client.sshKeys.remove(id) : client.sshKeys.removeFromServer(fromServer, id)),
          ctx.bulkOptions()
        );
      });
    });
}
