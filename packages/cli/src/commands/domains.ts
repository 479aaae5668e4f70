/**
 * `cirrus domain`: domains, DNS records and subdomains, addressed by FQDN
 */

import { Option, type Command } from "commander";
import type { DnsRecordInput, DnsRecordType } from "@cirrus/sdk";
import { choice, collectIds, collectStrings, parseId, parsePort } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm } from "../lib/confirm.js";
import type { CliContext } from "../lib/context.js";
import { isRecord, type Column } from "../lib/render.js";
import { filterOption, limitOption, numberAt, yesOption, type ListFlags } from "./shared.js";

const RECORD_TYPES: readonly DnsRecordType[] = ["A", "AAAA", "CNAME", "MX", "TXT", "SRV"];

const DOMAIN_COLUMNS: readonly Column[] = [
  { header: "FQDN", path: "fqdn" },
  { header: "STATUS", path: "domain_status" },
  { header: "EXPIRES", path: "expiration" },
  { header: "PROVIDER", path: "provider" },
];

const DOMAIN_TREE_COLUMNS: readonly Column[] = [
  { header: "FQDN", path: "fqdn" },
  { header: "ID", path: "id" },
  { header: "IP", path: "linked_ip" },
  { header: "SUBDOMAIN", path: "is_subdomain" },
];

const RECORD_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "TYPE", path: "type" },
  { header: "SUBDOMAIN", path: "data.subdomain" },
  { header: "VALUE", path: "data.value" },
  { header: "PRIORITY", path: "data.priority" },
  { header: "TTL", path: "ttl" },
];

/**
 * A domain followed by one row per subdomain
 */
export function domainTree(domain: Record<string, unknown>): Record<string, unknown>[] {
  const subdomains = Array.isArray(domain["subdomains"]) ? domain["subdomains"] : [];
  return [domain, ...subdomains.filter(isRecord).map((sub) => ({ ...sub, is_subdomain: true }))];
}

/**
 * Records created along with a subdomain carry `data.subdomain`
 */
function isSubdomainRecord(record: Record<string, unknown>): boolean {
  const data = record["data"];
  return isRecord(data) && "subdomain" in data;
}

interface RecordFlags {
  type: DnsRecordType;
  value?: string;
  subdomain?: string;
  priority?: number;
  ttl?: number;
  service?: string;
  protocol?: string;
  host?: string;
  port?: number;
}

/**
 * `--service`, `--protocol`, `--host` and `--port` apply to SRV records only
 */
function addRecordOptions(command: Command): Command {
  return command
    .addOption(
      new Option("-t, --type <type>", `record type: ${RECORD_TYPES.join(", ")}`)
        .argParser(choice(RECORD_TYPES, "--type"))
        .makeOptionMandatory()
    )
    .option("--value <value>", "record value")
    .option("--subdomain <name>", "subdomain part, e.g. www")
    .option("--priority <n>", "MX/SRV priority", parseId)
    .option("--ttl <seconds>", "time to live", parseId)
    .option("--service <service>", "SRV service, e.g. _sip")
    .option("--protocol <protocol>", "SRV protocol, e.g. _tcp")
    .option("--host <host>", "SRV target host")
    .option("--port <port>", "SRV target port", parsePort);
}

function recordInput(opts: RecordFlags): DnsRecordInput {
  return {
    type: opts.type,
    value: opts.value,
    subdomain: opts.subdomain,
    priority: opts.priority,
    ttl: opts.ttl,
    service: opts.service,
    protocol: opts.protocol,
    host: opts.host,
    port: opts.port,
  };
}

export function registerDomainCommands(program: Command, ctx: CliContext): void {
  const domain = program.command("domain").aliases(["domains", "d"]).description("manage domains and DNS");

  domain
    .command("list")
    .alias("ls")
    .description("list domains")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.domain.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.domains.list({ limit: opts.limit }), {
          key: "domains",
          columns: DOMAIN_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  domain
    .command("list-all")
    .alias("la")
    .description("list domains with their subdomains")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.domain.list-all", async () => {
        const client = await ctx.client();
        await ctx.print(await client.domains.list({ limit: opts.limit }), {
          key: "domains",
          columns: DOMAIN_TREE_COLUMNS,
          filters: opts.filter,
          expand: domainTree,
        });
      });
    });

  domain
    .command("info")
    .description("show a domain")
    .argument("<fqdn>", "domain name")
    .action(async (fqdn: string) => {
      await ctx.timed("cli.domain.info", async () => {
        const client = await ctx.client();
        await ctx.print(await client.domains.get(fqdn), { key: "domain", columns: DOMAIN_COLUMNS });
      });
    });

  domain
    .command("add")
    .description("add a domain to the account")
    .argument("<fqdn>", "domain name")
    .action(async (fqdn: string) => {
      await ctx.timed("cli.domain.add", async () => {
        const client = await ctx.client();
        await client.domains.add(fqdn);
        ctx.io.stdout(`${fqdn}\n`);
      });
    });

  domain
    .command("remove")
    .aliases(["rm", "delete"])
    .description("remove domains")
    .argument("<fqdns...>", "domain names", collectStrings)
    .addOption(yesOption())
    .action(async (fqdns: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.domain.remove", async () => {
        await confirm(ctx.io, `Remove domain(s) ${fqdns.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(fqdns, (fqdn) => client.domains.remove(fqdn), ctx.bulkOptions());
      });
    });

  const record = domain.command("record").aliases(["records", "rec"]).description("DNS records");

  record
    .command("list")
    .alias("ls")
    .description("list DNS records")
    .argument("<fqdn>", "domain name")
    .addOption(filterOption())
    .addOption(limitOption())
    .action(async (fqdn: string, opts: ListFlags) => {
      await ctx.timed("cli.domain.record.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.domains.records(fqdn, { limit: opts.limit }), {
          key: "dns_records",
          columns: RECORD_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  const add = record.command("add").description("add a DNS record").argument("<fqdn>", "domain name");
  addRecordOptions(add).action(async (fqdn: string, opts: RecordFlags) => {
    await ctx.timed("cli.domain.record.add", async () => {
      const client = await ctx.client();
      await ctx.print(await client.domains.addRecord(fqdn, recordInput(opts)), {
        key: "dns_record",
        columns: RECORD_COLUMNS,
      });
    });
  });

  const update = record
    .command("update")
    .alias("upd")
    .description("replace a DNS record")
    .argument("<fqdn>", "domain name")
    .argument("<record-id>", "record ID", parseId);
  addRecordOptions(update).action(async (fqdn: string, recordId: number, opts: RecordFlags) => {
    await ctx.timed("cli.domain.record.update", async () => {
      const client = await ctx.client();
      await ctx.print(await client.domains.updateRecord(fqdn, recordId, recordInput(opts)), {
        key: "dns_record",
        columns: RECORD_COLUMNS,
      });
    });
  });

  record
    .command("remove")
    .alias("rm")
    .description("remove DNS records")
    .argument("<fqdn>", "domain name")
    .argument("<record-ids...>", "record IDs", collectIds)
    .addOption(yesOption())
    .action(async (fqdn: string, recordIds: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.domain.record.remove", async () => {
        await confirm(ctx.io, `Remove DNS record(s) ${recordIds.join(", ")} of ${fqdn}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(recordIds, (recordId) => client.domains.removeRecord(fqdn, recordId), ctx.bulkOptions());
      });
    });

  record
    .command("delete-all")
    .alias("rma")
    .description("remove every DNS record of a domain")
    .argument("<fqdn>", "domain name")
    .option("--not-ignore-subdomains", "also remove records of subdomains")
    .addOption(yesOption())
    .action(async (fqdn: string, opts: { notIgnoreSubdomains?: boolean; yes?: boolean }) => {
      await ctx.timed("cli.domain.record.delete-all", async () => {
        await confirm(ctx.io, `Remove all DNS records of ${fqdn}?`, opts.yes);
        const client = await ctx.client();
        const { dns_records: records } = await client.domains.records(fqdn);
        const ids = records
          .filter((rec) => opts.notIgnoreSubdomains === true || !isSubdomainRecord(rec))
          .flatMap((rec) => numberAt(rec, "id") ?? []);
        await runBulk(ids, (recordId) => client.domains.removeRecord(fqdn, recordId), ctx.bulkOptions());
      });
    });

  const subdomain = domain.command("subdomain").aliases(["subdomains", "sub"]).description("subdomains");

  subdomain
    .command("add")
    .description("add a subdomain")
    .argument("<fqdn>", "parent domain")
    .argument("<subdomain>", "subdomain name, e.g. www")
    .action(async (fqdn: string, name: string) => {
      await ctx.timed("cli.domain.subdomain.add", async () => {
        const client = await ctx.client();
        await client.domains.addSubdomain(fqdn, name);
        ctx.io.stdout(`${name}.${fqdn}\n`);
      });
    });

  subdomain
    .command("remove")
    .alias("rm")
    .description("remove subdomains")
    .argument("<fqdn>", "parent domain")
    .argument("<subdomains...>", "subdomain names", collectStrings)
    .addOption(yesOption())
    .action(async (fqdn: string, names: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.domain.subdomain.remove", async () => {
        await confirm(ctx.io, `Remove subdomain(s) ${names.join(", ")} of ${fqdn}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(names, (name) => client.domains.removeSubdomain(fqdn, name), ctx.bulkOptions());
      });
    });
}
