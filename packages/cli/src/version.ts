import { readFileSync } from "node:fs";

// Read package.json for version
const packageJson: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));

export const CLI_VERSION =
  typeof packageJson === "object" && packageJson !== null && "version" in packageJson && typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";
