/**
 * I/O helpers for CLI
 *
 * Commands write through a CliIO so that tests can run the program in
 * process and capture its output.
 */

import * as fs from "node:fs/promises";
import { createInterface } from "node:readline/promises";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Ask a question on stderr and read one line from stdin */
  prompt(question: string): Promise<string>;
  readonly isStdinTTY: boolean;
  readonly isStderrTTY: boolean;
}

/**
 * CliIO over the process streams
 */
export function processIO(): CliIO {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    prompt: async (question) => {
      const rl = createInterface({ input: process.stdin, output: process.stderr });
      try {
        return (await rl.question(question)).trim();
      } finally {
        rl.close();
      }
    },
    isStdinTTY: process.stdin.isTTY ?? false,
    isStderrTTY: process.stderr.isTTY ?? false,
  };
}

/**
 * Read a text file, e.g. a public SSH key
 */
export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}
