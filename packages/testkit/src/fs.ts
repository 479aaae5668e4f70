/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "cirrus-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "cirrus-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

