import type { Command } from "commander";
import type { CliContext } from "../lib/context.js";

export function registerAccountCommands(program: Command, ctx: CliContext): void {
  const account = program.command("account").description("account status, balance and access restrictions");

  account
    .command("status")
    .description("show account status")
    .action(async () => {
      await ctx.timed("cli.account.status", async () => {
        const client = await ctx.client();
        await ctx.print(await client.account.status(), { key: "status" });
      });
    });

  account
    .command("finances")
    .description("show balance and spending")
    .action(async () => {
      await ctx.timed("cli.account.finances", async () => {
        const client = await ctx.client();
        await ctx.print(await client.account.finances(), { key: "finances" });
      });
    });

  account
    .command("restrictions")
    .description("show API access restrictions by IP and country")
    .action(async () => {
      await ctx.timed("cli.account.restrictions", async () => {
        const client = await ctx.client();
        await ctx.print(await client.account.restrictions());
      });
    });
}
