#!/usr/bin/env -S node --import tsx

/**
 * cirrus CLI entry point
 */

import { processIO } from "./lib/io.js";
import { run } from "./program.js";

const controller = new AbortController();
let interruptible = false;

// Inside a poll or bulk run the first Ctrl-C stops the loop after the current
// request; anywhere else, or on a second Ctrl-C, the process exits at once
process.on("SIGINT", () => {
  if (!interruptible || controller.signal.aborted) {
    process.exit(130);
  }
  controller.abort();
});

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), {
    io: processIO(),
    env: process.env,
    signal: controller.signal,
    onInterruptible: () => {
      interruptible = true;
    },
  });
  process.removeAllListeners("SIGINT");
}

await main();
