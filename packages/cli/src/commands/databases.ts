/**
 * `cirrus database`: managed databases and their backups
 */

import { Option, type Command } from "commander";
import type { Dbms } from "@cirrus/sdk";
import { choice, collectIds, collectKeyValue, parseId } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm, removeWithCode } from "../lib/confirm.js";
import { addWaitOptions, type CliContext, type WaitFlags } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { TARGET_STATUS, checkStatus } from "../lib/status.js";
import { filterOption, limitOption, yesOption, type ListFlags } from "./shared.js";

const DBMS: readonly Dbms[] = ["mysql", "mysql5", "mysql8", "postgres", "redis", "mongodb"];
const HASH_TYPES = ["caching_sha2", "mysql_native"] as const;

const DATABASE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "REGION", path: "location" },
  { header: "TYPE", path: "type" },
  { header: "STATUS", path: "status" },
  { header: "HOST", path: "host" },
  { header: "PORT", path: "port" },
];

const PRESET_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "REGION", path: "location" },
  { header: "TYPE", path: "type" },
  { header: "PRICE", path: "price" },
  { header: "CPU", path: "cpu" },
  { header: "RAM", path: "ram" },
  { header: "DISK", path: "disk" },
];

const BACKUP_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "CREATED", path: "created_at" },
  { header: "STATUS", path: "status" },
  { header: "SIZE", path: "size" },
  { header: "TYPE", path: "type" },
];

interface CreateDatabaseFlags extends WaitFlags {
  name: string;
  type: Dbms;
  presetId: number;
  login?: string;
  password?: string;
  hashType?: (typeof HASH_TYPES)[number];
  param?: Record<string, string>;
}

interface SetDatabaseFlags {
  name?: string;
  password?: boolean;
  presetId?: number;
  param?: Record<string, string>;
  externalIp?: boolean;
}

/**
 * Read a password twice from the terminal
 */
async function promptPassword(ctx: CliContext): Promise<string> {
  if (!ctx.io.isStdinTTY) {
    throw new CliError("No password given. Pass --password or run interactively");
  }
  const password = await ctx.io.prompt("Database password: ");
  const again = await ctx.io.prompt("Repeat password: ");
  if (password !== again) {
    throw new CliError("Passwords do not match");
  }
  if (password.length === 0) {
    throw new CliError("Password must not be empty");
  }
  return password;
}

export function registerDatabaseCommands(program: Command, ctx: CliContext): void {
  const db = program.command("database").aliases(["databases", "db"]).description("manage databases");

  db.command("list")
    .alias("ls")
    .description("list databases")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.database.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.databases.list({ limit: opts.limit }), {
          key: "dbs",
          columns: DATABASE_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  db.command("get")
    .description("show a database")
    .argument("<id>", "database ID", parseId)
    .option("--status", `print the status; exit 1 unless it is '${TARGET_STATUS.database}'`)
    .action(async (id: number, opts: { status?: boolean }) => {
      await ctx.timed("cli.database.get", async () => {
        const client = await ctx.client();
        const body = await client.databases.get(id);
        if (opts.status) {
          checkStatus(ctx.io, body.db.status, TARGET_STATUS.database);
          return;
        }
        await ctx.print(body, { key: "db", columns: DATABASE_COLUMNS });
      });
    });

  db.command("list-presets")
    .alias("lp")
    .description("list database presets")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.database.list-presets", async () => {
        const client = await ctx.client();
        await ctx.print(await client.databases.presets(), {
          key: "databases_presets",
          columns: PRESET_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  const create = db
    .command("create")
    .description("create a database")
    .requiredOption("--name <name>", "database name")
    .addOption(
      new Option("--type <dbms>", `database type: ${DBMS.join(", ")}`).argParser(choice(DBMS, "--type")).makeOptionMandatory()
    )
    .requiredOption("--preset-id <id>", "database preset", parseId)
    .option("--login <login>", "user name")
    .option("--password <password>", "user password (asked for when omitted)")
    .addOption(new Option("--hash-type <type>", "MySQL password hashing").argParser(choice(HASH_TYPES, "--hash-type")))
    .option("--param <key=value>", "config parameter (repeatable)", collectKeyValue);
  addWaitOptions(create, `the database is '${TARGET_STATUS.database}'`).action(async (opts: CreateDatabaseFlags) => {
    await ctx.timed("cli.database.create", async () => {
      const password = opts.password ?? (await promptPassword(ctx));
      const client = await ctx.client();
      const body = await client.databases.create({
        name: opts.name,
        dbms: opts.type,
        presetId: opts.presetId,
        password,
        login: opts.login,
        hashType: opts.hashType,
        configParameters: opts.param,
      });
      if (body === undefined) {
        throw new CliError("Database create returned no data");
      }
      if (opts.wait) {
        const id = Number(body.db.id);
        await client.databases.waitForStatus(id, TARGET_STATUS.database, ctx.waitOptions(opts));
        await ctx.print(await client.databases.get(id), { key: "db", columns: DATABASE_COLUMNS });
        return;
      }
      await ctx.print(body, { key: "db", columns: DATABASE_COLUMNS });
    });
  });

  db.command("set")
    .description("change a database")
    .argument("<id>", "database ID", parseId)
    .option("--name <name>", "new name")
    .option("--password", "ask for a new password")
    .option("--preset-id <id>", "new preset", parseId)
    .option("--param <key=value>", "config parameter (repeatable)", collectKeyValue)
    .option("--external-ip", "assign a public IP")
    .option("--no-external-ip", "release the public IP")
    .action(async (id: number, opts: SetDatabaseFlags) => {
      await ctx.timed("cli.database.set", async () => {
        const password = opts.password ? await promptPassword(ctx) : undefined;
        const client = await ctx.client();
        const body = await client.databases.update(id, {
          name: opts.name,
          password,
          presetId: opts.presetId,
          configParameters: opts.param,
          externalIp: opts.externalIp,
        });
        await ctx.print(body ?? (await client.databases.get(id)), { key: "db", columns: DATABASE_COLUMNS });
      });
    });

  db.command("remove")
    .alias("rm")
    .description("remove databases")
    .argument("<ids...>", "database IDs", collectIds)
    .addOption(yesOption())
    .action(async (ids: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.database.remove", async () => {
        await confirm(ctx.io, `Remove database(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => removeWithCode(ctx.io, (removal) => client.databases.remove(id, removal)), ctx.bulkOptions());
      });
    });

  registerBackupCommands(db, ctx);
}

function registerBackupCommands(db: Command, ctx: CliContext): void {
  const backup = db.command("backup").alias("backups").description("manage database backups");

  backup
    .command("list")
    .alias("ls")
    .description("list backups")
    .argument("<db-id>", "database ID", parseId)
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (dbId: number, opts: ListFlags) => {
      await ctx.timed("cli.database.backup.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.databases.backups(dbId, { limit: opts.limit }), {
          key: "backups",
          columns: BACKUP_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  backup
    .command("get")
    .description("show a backup")
    .argument("<db-id>", "database ID", parseId)
    .argument("<backup-id>", "backup ID", parseId)
    .option("--status", `print the status; exit 1 unless it is '${TARGET_STATUS.backup}'`)
    .action(async (dbId: number, backupId: number, opts: { status?: boolean }) => {
      await ctx.timed("cli.database.backup.get", async () => {
        const client = await ctx.client();
        const body = await client.databases.backup(dbId, backupId);
        if (opts.status) {
          checkStatus(ctx.io, body.backup.status, TARGET_STATUS.backup);
          return;
        }
        await ctx.print(body, { key: "backup", columns: BACKUP_COLUMNS });
      });
    });

  const create = backup.command("create").description("back up a database").argument("<db-id>", "database ID", parseId);
  addWaitOptions(create, `the backup is '${TARGET_STATUS.backup}'`).action(async (dbId: number, opts: WaitFlags) => {
    await ctx.timed("cli.database.backup.create", async () => {
      const client = await ctx.client();
      const body = await client.databases.createBackup(dbId);
      if (body === undefined) {
        throw new CliError("Backup create returned no data");
      }
      if (opts.wait) {
        const backupId = Number(body.backup.id);
        await client.databases.waitForBackup(dbId, backupId, TARGET_STATUS.backup, ctx.waitOptions(opts));
        await ctx.print(await client.databases.backup(dbId, backupId), { key: "backup", columns: BACKUP_COLUMNS });
        return;
      }
      await ctx.print(body, { key: "backup", columns: BACKUP_COLUMNS });
    });
  });

  backup
    .command("remove")
    .alias("rm")
    .description("remove backups")
    .argument("<db-id>", "database ID", parseId)
    .argument("<backup-ids...>", "backup IDs", collectIds)
    .addOption(yesOption())
    .action(async (dbId: number, backupIds: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.database.backup.remove", async () => {
        await confirm(ctx.io, `Remove backup(s) ${backupIds.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(backupIds, (backupId) => client.databases.removeBackup(dbId, backupId), ctx.bulkOptions());
      });
    });

  backup
    .command("restore")
    .description("restore a database from a backup")
    .argument("<db-id>", "database ID", parseId)
    .argument("<backup-id>", "backup ID", parseId)
    .addOption(yesOption())
    .action(async (dbId: number, backupId: number, opts: { yes?: boolean }) => {
      await ctx.timed("cli.database.backup.restore", async () => {
        await confirm(ctx.io, `Restore database ${dbId} from backup ${backupId}? Current data will be lost.`, opts.yes);
        const client = await ctx.client();
        await client.databases.restoreBackup(dbId, backupId);
        ctx.io.stdout(`${backupId}\n`);
      });
    });
}
