export { FakeApi, sequence, apiError } from "./fake-api.js";
export type { FakeRequest, FakeResponse, FakeHandler } from "./fake-api.js";
export { FakeClock } from "./timers.js";
export { createTempDir, removeDir } from "./fs.js";
export { runCli, parseJsonOutput, CLI_ENTRY } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
