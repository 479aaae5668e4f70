/**
 * `cirrus balancer`: load balancers, backends and forwarding rules
 */

import { InvalidArgumentError, Option, type Command } from "commander";
import { z } from "zod";
import type { BalancerAlgo, BalancerProto, BalancerRule, BalancerUpdateInput } from "@cirrus/sdk";
import { choice, collectIds, collectStrings, parseId, parsePort } from "../lib/arg.js";
import { runBulk } from "../lib/bulk.js";
import { confirm, removeWithCode } from "../lib/confirm.js";
import { addWaitOptions, type CliContext, type WaitFlags } from "../lib/context.js";
import { CliError } from "../lib/errors.js";
import type { Column } from "../lib/render.js";
import { TARGET_STATUS, checkStatus } from "../lib/status.js";
import { filterOption, yesOption, type ListFlags } from "./shared.js";

const PROTOS: readonly BalancerProto[] = ["http", "http2", "https", "tcp"];
const ALGOS: readonly BalancerAlgo[] = ["roundrobin", "leastconn"];

const BALANCER_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "NAME", path: "name" },
  { header: "STATUS", path: "status" },
  { header: "IP", path: "ip" },
  { header: "LOCAL_IP", path: "local_ip" },
  { header: "ALGO", path: "algo" },
];

const PRESET_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "REGION", path: "location" },
  { header: "PRICE", path: "price" },
  { header: "BANDWIDTH", path: "bandwidth" },
  { header: "RPS", path: "request_per_second" },
];

const RULE_COLUMNS: readonly Column[] = [
  { header: "ID", path: "id" },
  { header: "FRONTEND", path: "balancer_proto", format: (proto, rule) => `${String(proto)}:${String(rule["balancer_port"])}` },
  { header: "BACKEND", path: "server_proto", format: (proto, rule) => `${String(proto)}:${String(rule["server_port"])}` },
];

const BACKEND_COLUMNS: readonly Column[] = [{ header: "IP", path: "ip" }];

/**
 * `PROTO:PORT`, e.g. `https:443`
 */
export const ProtoPortSchema = z
  .string()
  .regex(/^[a-z0-9]+:\d+$/, "expected PROTO:PORT, e.g. http:80")
  .transform((value) => {
    const [proto = "", port = ""] = value.split(":");
    return { proto, port: Number(port) };
  })
  .pipe(z.object({ proto: z.enum(["http", "http2", "https", "tcp"]), port: z.number().int().min(1).max(65535) }));

export function parseProtoPort(value: string): { proto: BalancerProto; port: number } {
  const result = ProtoPortSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`'${value}': ${result.error.issues.map((i) => i.message).join("; ")}`);
  }
  return result.data;
}

interface HealthCheckFlags {
  proto?: BalancerProto;
  port?: number;
  path?: string;
  inter?: number;
  timeout?: number;
  fall?: number;
  rise?: number;
  algo?: BalancerAlgo;
  sticky?: boolean;
  proxyProtocol?: boolean;
  forceHttps?: boolean;
  keepalive?: boolean;
}

interface CreateBalancerFlags extends HealthCheckFlags, WaitFlags {
  name: string;
  presetId: number;
  networkId?: string;
  privateIp?: string;
}

interface SetBalancerFlags extends HealthCheckFlags {
  name?: string;
  presetId?: number;
}

function addBalancerOptions(command: Command): Command {
  return command
    .addOption(new Option("--algo <algo>", "balancing algorithm").argParser(choice(ALGOS, "--algo")))
    .addOption(new Option("--proto <proto>", "health check protocol").argParser(choice(PROTOS, "--proto")))
    .option("--port <port>", "health check port", parsePort)
    .option("--path <path>", "health check path")
    .option("--inter <seconds>", "health check interval", parseId)
    .option("--timeout <seconds>", "health check timeout", parseId)
    .option("--fall <count>", "failed checks before a backend is down", parseId)
    .option("--rise <count>", "passed checks before a backend is up", parseId)
    .option("--sticky", "keep clients on one backend")
    .option("--proxy-protocol", "use the PROXY protocol")
    .option("--force-https", "redirect HTTP to HTTPS")
    .option("--keepalive", "keep backend connections alive");
}

function balancerInput(opts: SetBalancerFlags): BalancerUpdateInput {
  return {
    name: opts.name,
    presetId: opts.presetId,
    algo: opts.algo,
    proto: opts.proto,
    port: opts.port,
    path: opts.path,
    inter: opts.inter,
    timeout: opts.timeout,
    fall: opts.fall,
    rise: opts.rise,
    sticky: opts.sticky,
    proxyProtocol: opts.proxyProtocol,
    forceHttps: opts.forceHttps,
    backendKeepalive: opts.keepalive,
  };
}

export function registerBalancerCommands(program: Command, ctx: CliContext): void {
  const lb = program.command("balancer").aliases(["balancers", "lb"]).description("manage load balancers");

  lb.command("list")
    .alias("ls")
    .description("list load balancers")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.balancer.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.balancers.list(), {
          key: "balancers",
          columns: BALANCER_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  lb.command("get")
    .description("show a load balancer")
    .argument("<id>", "balancer ID", parseId)
    .option("--status", `print the status; exit 1 unless it is '${TARGET_STATUS.balancer}'`)
    .action(async (id: number, opts: { status?: boolean }) => {
      await ctx.timed("cli.balancer.get", async () => {
        const client = await ctx.client();
        const body = await client.balancers.get(id);
        if (opts.status) {
          checkStatus(ctx.io, body.balancer.status, TARGET_STATUS.balancer);
          return;
        }
        await ctx.print(body, { key: "balancer", columns: BALANCER_COLUMNS });
      });
    });

  lb.command("list-presets")
    .alias("lp")
    .description("list balancer presets")
    .addOption(filterOption())
    .action(async (opts: ListFlags) => {
      await ctx.timed("cli.balancer.list-presets", async () => {
        const client = await ctx.client();
        await ctx.print(await client.balancers.presets(), {
          key: "balancers_presets",
          columns: PRESET_COLUMNS,
          filters: opts.filter,
        });
      });
    });

  const create = lb
    .command("create")
    .description("create a load balancer")
    .requiredOption("--name <name>", "balancer name")
    .requiredOption("--preset-id <id>", "balancer preset", parseId)
    .option("--network-id <id>", "VPC to connect to")
    .option("--private-ip <ip>", "address in the VPC");
  addWaitOptions(addBalancerOptions(create), `the balancer is '${TARGET_STATUS.balancer}'`).action(
    async (opts: CreateBalancerFlags) => {
      await ctx.timed("cli.balancer.create", async () => {
        const client = await ctx.client();
        const body = await client.balancers.create({
          ...balancerInput(opts),
          name: opts.name,
          presetId: opts.presetId,
          network: opts.networkId === undefined ? undefined : { id: opts.networkId, floatingIp: opts.privateIp },
        });
        if (body === undefined) {
          throw new CliError("Balancer create returned no data");
        }
        if (opts.wait) {
          const id = Number(body.balancer.id);
          await client.balancers.waitForStatus(id, TARGET_STATUS.balancer, ctx.waitOptions(opts));
          await ctx.print(await client.balancers.get(id), { key: "balancer", columns: BALANCER_COLUMNS });
          return;
        }
        await ctx.print(body, { key: "balancer", columns: BALANCER_COLUMNS });
      });
    }
  );

  const set = lb
    .command("set")
    .description("change a load balancer")
    .argument("<id>", "balancer ID", parseId)
    .option("--name <name>", "new name")
    .option("--preset-id <id>", "new preset", parseId);
  addBalancerOptions(set).action(async (id: number, opts: SetBalancerFlags) => {
    await ctx.timed("cli.balancer.set", async () => {
      const client = await ctx.client();
      const body = await client.balancers.update(id, balancerInput(opts));
      await ctx.print(body ?? (await client.balancers.get(id)), { key: "balancer", columns: BALANCER_COLUMNS });
    });
  });

  lb.command("remove")
    .alias("rm")
    .description("remove load balancers")
    .argument("<ids...>", "balancer IDs", collectIds)
    .addOption(yesOption())
    .action(async (ids: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.balancer.remove", async () => {
        await confirm(ctx.io, `Remove balancer(s) ${ids.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ids, (id) => removeWithCode(ctx.io, (removal) => client.balancers.remove(id, removal)), ctx.bulkOptions());
      });
    });

  registerBackendCommands(lb, ctx);
  registerRuleCommands(lb, ctx);
}

function registerBackendCommands(lb: Command, ctx: CliContext): void {
  const backend = lb.command("backend").alias("backends").description("backend servers of a balancer");

  backend
    .command("list")
    .alias("ls")
    .description("list backend IPs")
    .argument("<balancer-id>", "balancer ID", parseId)
    .action(async (balancerId: number) => {
      await ctx.timed("cli.balancer.backend.list", async () => {
        const client = await ctx.client();
        const { ips } = await client.balancers.ips(balancerId);
        await ctx.print({ ips: ips.map((ip) => ({ ip })) }, { key: "ips", columns: BACKEND_COLUMNS });
      });
    });

  backend
    .command("add")
    .description("add backend IPs")
    .argument("<balancer-id>", "balancer ID", parseId)
    .argument("<ips...>", "backend addresses", collectStrings)
    .action(async (balancerId: number, ips: string[]) => {
      await ctx.timed("cli.balancer.backend.add", async () => {
        const client = await ctx.client();
        await client.balancers.addIps(balancerId, ips);
        ctx.io.stdout(`${ips.join("\n")}\n`);
      });
    });

  backend
    .command("remove")
    .alias("rm")
    .description("remove backend IPs")
    .argument("<balancer-id>", "balancer ID", parseId)
    .argument("<ips...>", "backend addresses", collectStrings)
    .addOption(yesOption())
    .action(async (balancerId: number, ips: string[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.balancer.backend.remove", async () => {
        await confirm(ctx.io, `Remove backend(s) ${ips.join(", ")} from balancer ${balancerId}?`, opts.yes);
        const client = await ctx.client();
        await client.balancers.removeIps(balancerId, ips);
        ctx.io.stdout(`${ips.join("\n")}\n`);
      });
    });
}

function registerRuleCommands(lb: Command, ctx: CliContext): void {
  const rule = lb.command("rule").alias("rules").description("forwarding rules of a balancer");

  rule
    .command("list")
    .alias("ls")
    .description("list forwarding rules")
    .argument("<balancer-id>", "balancer ID", parseId)
    .action(async (balancerId: number) => {
      await ctx.timed("cli.balancer.rule.list", async () => {
        const client = await ctx.client();
        await ctx.print(await client.balancers.rules(balancerId), { key: "rules", columns: RULE_COLUMNS });
      });
    });

  rule
    .command("add")
    .description("forward FRONTEND to BACKEND, both as PROTO:PORT")
    .argument("<balancer-id>", "balancer ID", parseId)
    .argument("<frontend>", "balancer side, e.g. https:443", parseProtoPort)
    .argument("<backend>", "server side, e.g. http:8080", parseProtoPort)
    .action(async (balancerId: number, frontend: ReturnType<typeof parseProtoPort>, backend: ReturnType<typeof parseProtoPort>) => {
      await ctx.timed("cli.balancer.rule.add", async () => {
        const client = await ctx.client();
        const input: BalancerRule = {
          balancerProto: frontend.proto,
          balancerPort: frontend.port,
          serverProto: backend.proto,
          serverPort: backend.port,
        };
        await ctx.print(await client.balancers.createRule(balancerId, input), { key: "rule", columns: RULE_COLUMNS });
      });
    });

  rule
    .command("update")
    .alias("upd")
    .description("change a forwarding rule")
    .argument("<balancer-id>", "balancer ID", parseId)
    .argument("<rule-id>", "rule ID", parseId)
    .option("--frontend <proto:port>", "balancer side", parseProtoPort)
    .option("--backend <proto:port>", "server side", parseProtoPort)
    .action(
      async (
        balancerId: number,
        ruleId: number,
        opts: { frontend?: ReturnType<typeof parseProtoPort>; backend?: ReturnType<typeof parseProtoPort> },
        command: Command
      ) => {
        if (opts.frontend === undefined && opts.backend === undefined) {
          command.error("error: One of options is required: ['--frontend', '--backend']");
        }
        await ctx.timed("cli.balancer.rule.update", async () => {
          const client = await ctx.client();
          const body = await client.balancers.updateRule(balancerId, ruleId, {
            balancerProto: opts.frontend?.proto,
            balancerPort: opts.frontend?.port,
            serverProto: opts.backend?.proto,
            serverPort: opts.backend?.port,
          });
          await ctx.print(body, { key: "rule", columns: RULE_COLUMNS });
        });
      }
    );

  rule
    .command("remove")
    .alias("rm")
    .description("remove forwarding rules")
    .argument("<balancer-id>", "balancer ID", parseId)
    .argument("<rule-ids...>", "rule IDs", collectIds)
    .addOption(yesOption())
    .action(async (balancerId: number, ruleIds: number[], opts: { yes?: boolean }) => {
      await ctx.timed("cli.balancer.rule.remove", async () => {
        await confirm(ctx.io, `Remove rule(s) ${ruleIds.join(", ")}?`, opts.yes);
        const client = await ctx.client();
        await runBulk(ruleIds, (ruleId) => client.balancers.removeRule(balancerId, ruleId), ctx.bulkOptions());
      });
    });
}
