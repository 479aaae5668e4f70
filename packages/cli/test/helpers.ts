/**
 * In-process harness for CLI tests
 */

import * as path from "node:path";
import { FakeApi, FakeClock } from "@cirrus/testkit";
import type { CliIO } from "../src/lib/io.js";
import { run } from "../src/program.js";

export interface CapturedIO extends CliIO {
  out: string;
  err: string;
  /** Questions asked through `prompt`, in order */
  questions: string[];
}

/**
 * CliIO that records output and answers prompts from `answers`
 */
export function captureIO(options: { tty?: boolean; answers?: string[] } = {}): CapturedIO {
  const answers = [...(options.answers ?? [])];
  const io: CapturedIO = {
    out: "",
    err: "",
    questions: [],
    stdout: (text) => {
      io.out += text;
    },
    stderr: (text) => {
      io.err += text;
    },
    prompt: async (question) => {
      io.questions.push(question);
      return answers.shift() ?? "";
    },
    isStdinTTY: options.tty ?? false,
    isStderrTTY: false,
  };
  return io;
}

export interface Harness {
  api: FakeApi;
  clock: FakeClock;
  io: CapturedIO;
  env: Record<string, string | undefined>;
  home: string;
  /** Aborting it acts like Ctrl-C */
  controller: AbortController;
  /** Set once the command entered a poll or bulk run */
  interruptible: boolean;
  exec(...argv: string[]): Promise<number>;
}

/**
 * CLI wired to a fake API and clock, with a token in the environment and
 * the config file inside `home`
 */
export function harness(home: string, options: { env?: Record<string, string | undefined>; tty?: boolean; answers?: string[] } = {}): Harness {
  const api = new FakeApi();
  const clock = new FakeClock();
  const io = captureIO({ tty: options.tty, answers: options.answers });
  const env: Record<string, string | undefined> = {
    CIRRUS_TOKEN: "test-secret",
    CIRRUS_CONFIG_FILE: path.join(home, "cirrusrc"),
    ...options.env,
  };
  const controller = new AbortController();
  const h: Harness = {
    api,
    clock,
    io,
    env,
    home,
    controller,
    interruptible: false,
    exec: (...argv) =>
      run(argv, {
        io,
        env,
        fetch: api.fetch,
        sleep: clock.sleep,
        home,
        signal: controller.signal,
        onInterruptible: () => {
          h.interruptible = true;
        },
      }),
  };
  return h;
}
