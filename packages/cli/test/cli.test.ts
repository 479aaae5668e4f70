/**
 * Integration tests for CLI commands, run in process against a fake API
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { readFile, writeFile } from "node:fs/promises";
import { DEFAULT_BASE_URL } from "@cirrus/sdk";
import { apiError, createTempDir, removeDir, sequence } from "@cirrus/testkit";
import { CLI_VERSION } from "../src/version.js";
import { harness, type Harness } from "./helpers.js";

describe("cirrus CLI", () => {
  let home: string;
  let cli: Harness;

  beforeEach(async () => {
    home = await createTempDir();
    cli = harness(home);
  });

  afterEach(async () => {
    await removeDir(home);
  });

  describe("global behaviour", () => {
    it("should print the version", async () => {
      expect(await cli.exec("version")).toBe(0);
      expect(cli.io.out).toBe(`${CLI_VERSION}\n`);
    });

    it("should print the version for --version", async () => {
      expect(await cli.exec("--version")).toBe(0);
      expect(cli.io.out).toBe(`${CLI_VERSION}\n`);
    });

    it("should fail on an unknown command", async () => {
      expect(await cli.exec("frobnicate")).toBe(1);
      expect(cli.io.err).toContain("unknown command 'frobnicate'");
    });

    it("should reject an unknown output format before any request", async () => {
      expect(await cli.exec("-o", "xml", "server", "list")).toBe(1);
      expect(cli.io.err).toContain("Unknown output format 'xml'");
      expect(cli.api.requests).toEqual([]);
    });

    it("should reject an invalid ID before any request", async () => {
      expect(await cli.exec("server", "get", "web")).toBe(1);
      expect(cli.io.err).toContain("'web' is not a valid ID");
      expect(cli.api.requests).toEqual([]);
    });

    it("should exit 3 without a token", async () => {
      cli = harness(home, { env: { CIRRUS_TOKEN: undefined } });
      expect(await cli.exec("server", "list")).toBe(3);
      expect(cli.io.err).toBe(
        "Error: No API token configured for profile 'default'. Run 'cirrus config init' or set CIRRUS_TOKEN\n"
      );
      expect(cli.api.requests).toEqual([]);
    });

    it("should exit 3 when the API rejects the token", async () => {
      cli.api.on("GET", "/api/v1/account/status", { status: 401 });
      expect(await cli.exec("account", "status")).toBe(3);
      expect(cli.io.err).toBe("Error: Unauthorized: check your API token (status 401)\n");
    });

    it("should exit 2 for a missing resource", async () => {
      cli.api.on("GET", "/api/v1/servers/:id", apiError(404, "not_found", "Server not found"));
      expect(await cli.exec("server", "get", "9")).toBe(2);
      expect(cli.io.err).toBe("Error: Server not found (status 404, error_code not_found, response_id test-404)\n");
    });

    it("should send the token and a user agent", async () => {
      cli.api.on("GET", "/api/v1/servers", { body: { servers: [] } });
      expect(await cli.exec("server", "list")).toBe(0);
      const [request] = cli.api.requests;
      expect(request?.headers["authorization"]).toBe("Bearer test-secret");
      expect(request?.headers["user-agent"]).toMatch(/^cirrus-cli\//);
      expect(request?.query.get("limit")).toBe("100");
    });

    it("should write metrics to stderr in verbose mode", async () => {
      cli.api.on("GET", "/api/v1/servers/:id", { body: { server: { id: 1, status: "on" } } });
      expect(await cli.exec("--verbose", "server", "get", "1", "--status")).toBe(0);
      expect(cli.io.out).toBe("on\n");
      expect(cli.io.err).toMatch(/^metric cli\.server\.get duration_ms=\d+ success=true$/m);
      expect(cli.io.err).toMatch(/^metric http method=GET route=\/api\/v1\/servers\/:id requests=1 errors=0 p95_ms=\d+$/m);
    });
  });

  describe("output formats", () => {
    const body = {
      servers: [
        { id: 1, name: "web", location: "ru-1", status: "on", networks: [] },
        { id: 2, name: "db", location: "nl-1", status: "off", networks: [] },
      ],
      meta: { total: 2 },
    };

    beforeEach(() => {
      cli.api.on("GET", "/api/v1/servers", { body });
    });

    it("should print a table by default", async () => {
      expect(await cli.exec("server", "list")).toBe(0);
      expect(cli.io.out).toBe("ID  NAME  REGION  STATUS  IPV4\n" + "1   web   ru-1    on\n" + "2   db    nl-1    off\n");
    });

    it("should filter records client-side", async () => {
      expect(await cli.exec("server", "list", "-f", "status:off", "-o", "json")).toBe(0);
      expect(JSON.parse(cli.io.out)).toEqual({ servers: [body.servers[1]], meta: { total: 2 } });
    });

    it("should filter by region and print IDs only", async () => {
      expect(await cli.exec("server", "ls", "--region", "ru-1", "--ids")).toBe(0);
      expect(cli.io.out).toBe("1\n");
    });

    it("should take the format from CIRRUS_OUTPUT_FORMAT", async () => {
      cli = harness(home, { env: { CIRRUS_OUTPUT_FORMAT: "raw" } });
      cli.api.on("GET", "/api/v1/servers", { body });
      expect(await cli.exec("server", "list")).toBe(0);
      expect(cli.io.out).toBe(`${JSON.stringify(body)}\n`);
    });

    it("should fall back to JSON for lists of strings", async () => {
      cli.api.on("GET", "/api/v1/k8s/k8s_versions", { body: { k8s_versions: ["v1.29.1", "v1.30.2"] } });
      expect(await cli.exec("-o", "yaml", "cluster", "list-k8s-versions")).toBe(0);
      expect(cli.io.out).toBe("k8s_versions:\n  - v1.29.1\n  - v1.30.2\n");
    });

    it("should print plain names in the default format", async () => {
      cli.api.on("GET", "/api/v1/k8s/k8s_versions", { body: { k8s_versions: ["v1.29.1", "v1.30.2"] } });
      expect(await cli.exec("k8s", "lv")).toBe(0);
      expect(cli.io.out).toBe("v1.29.1\nv1.30.2\n");
    });

    it("should print nothing for an empty list without columns", async () => {
      cli.api.on("GET", "/api/v1/k8s/clusters/3/resources", { body: { resources: [] } });
      expect(await cli.exec("cluster", "show", "3")).toBe(0);
      expect(cli.io.out).toBe("");
      expect(cli.io.err).toBe("");
    });
  });

  describe("server", () => {
    it("should print a matching status and exit 0", async () => {
      cli.api.on("GET", "/api/v1/servers/:id", { body: { server: { id: 1, status: "on" } } });
      expect(await cli.exec("server", "get", "1", "--status")).toBe(0);
      expect(cli.io.out).toBe("on\n");
      expect(cli.io.err).toBe("");
    });

    it("should print a different status on stderr and exit 1", async () => {
      cli.api.on("GET", "/api/v1/servers/:id", { body: { server: { id: 1, status: "off" } } });
      expect(await cli.exec("server", "get", "1", "--status")).toBe(1);
      expect(cli.io.out).toBe("");
      expect(cli.io.err).toBe("off\n");
    });

    it("should create a server from a preset", async () => {
      cli.api.on("POST", "/api/v1/servers", { body: { server: { id: 7, name: "web", status: "installing" } } });
      expect(await cli.exec("server", "create", "--name", "web", "--preset-id", "10", "--os-id", "5", "-o", "json")).toBe(0);
      expect(cli.api.calls("POST", "/api/v1/servers")[0]?.body).toEqual({
        name: "web",
        preset_id: 10,
        os_id: 5,
        is_ddos_guard: false,
      });
      expect(JSON.parse(cli.io.out)).toEqual({ server: { id: 7, name: "web", status: "installing" } });
    });

    it("should look up a configurator for a custom configuration", async () => {
      await writeFile(path.join(home, "cirrusrc"), '[default]\nregion = "nl-1"\n');
      cli.api.on("GET", "/api/v1/configurator/servers", {
        body: {
          server_configurators: [
            { id: 11, location: "ru-1" },
            { id: 21, location: "nl-1" },
          ],
        },
      });
      cli.api.on("POST", "/api/v1/servers", { body: { server: { id: 8, status: "installing" } } });
      const code = await cli.exec(
        "server", "create", "--name", "big", "--cpu", "4", "--ram", "8G", "--disk", "80G", "--image", "img-1", "-o", "json"
      );
      expect(code).toBe(0);
      expect(cli.api.calls("POST", "/api/v1/servers")[0]?.body).toEqual({
        name: "big",
        configuration: { configurator_id: 21, cpu: 4, ram: 8192, disk: 81920 },
        image_id: "img-1",
        is_ddos_guard: false,
      });
    });

    it("should require a preset or a configuration", async () => {
      expect(await cli.exec("server", "create", "--name", "web", "--os-id", "5")).toBe(1);
      expect(cli.io.err).toBe("error: One of options is required: ['--preset-id', '--cpu']\n");
      expect(cli.api.requests).toEqual([]);
    });

    it("should require --cpu, --ram and --disk together", async () => {
      expect(await cli.exec("server", "create", "--name", "web", "--cpu", "2", "--os-id", "5")).toBe(1);
      expect(cli.io.err).toBe("error: --cpu, --ram and --disk must be given together\n");
      expect(cli.api.requests).toEqual([]);
    });

    it("should reject mutually exclusive options", async () => {
      expect(await cli.exec("server", "create", "--name", "web", "--preset-id", "1", "--cpu", "2", "--os-id", "5")).toBe(1);
      expect(cli.io.err).toContain("cannot be used with");
      expect(cli.api.requests).toEqual([]);
    });

    it("should wait for a new server to start", async () => {
      cli.api.on("POST", "/api/v1/servers", { body: { server: { id: 7, status: "installing" } } });
      cli.api.on(
        "GET",
        "/api/v1/servers/7",
        sequence(
          { body: { server: { id: 7, status: "installing" } } },
          { body: { server: { id: 7, status: "on" } } }
        )
      );
      const code = await cli.exec("server", "create", "--name", "web", "--preset-id", "10", "--os-id", "5", "--wait", "-o", "json");
      expect(code).toBe(0);
      expect(cli.clock.sleeps).toEqual([5000]);
      expect(cli.api.calls("GET", "/api/v1/servers/7")).toHaveLength(3);
      expect(JSON.parse(cli.io.out)).toEqual({ server: { id: 7, status: "on" } });
    });

    it("should shut servers down and wait for them to stop", async () => {
      cli.api.on("POST", "/api/v1/servers/:id/action", { status: 204 });
      cli.api.on(
        "GET",
        "/api/v1/servers/5",
        sequence({ body: { server: { id: 5, status: "on" } } }, { body: { server: { id: 5, status: "off" } } })
      );
      expect(await cli.exec("server", "stop", "5", "--hard", "--wait", "--poll-interval", "2")).toBe(0);
      expect(cli.api.calls("POST", "/api/v1/servers/5/action")[0]?.body).toEqual({ action: "hard_shutdown" });
      expect(cli.clock.sleeps).toEqual([2000]);
      expect(cli.io.out).toBe("5\n");
    });

    it("should remove what it can and report the rest", async () => {
      cli.api.on("DELETE", "/api/v1/servers/1", { status: 204 });
      cli.api.on("DELETE", "/api/v1/servers/3", { status: 204 });
      cli.api.on("DELETE", "/api/v1/servers/:id", apiError(404, "not_found", "Server not found"));
      expect(await cli.exec("server", "rm", "1", "2", "3", "-y")).toBe(1);
      expect(cli.api.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        "DELETE /api/v1/servers/1",
        "DELETE /api/v1/servers/2",
        "DELETE /api/v1/servers/3",
      ]);
      expect(cli.io.out).toBe("1\n3\n");
      expect(cli.io.err).toBe(
        "Error: 2: Server not found (status 404, error_code not_found, response_id test-404)\n" +
          "Error: 1 of 3 operation(s) failed\n"
      );
    });

    it("should stop removing servers after Ctrl-C", async () => {
      cli.api.on("DELETE", "/api/v1/servers/:id", () => {
        cli.controller.abort();
        return { status: 204 };
      });
      expect(await cli.exec("server", "rm", "1", "2", "3", "-y")).toBe(130);
      expect(cli.interruptible).toBe(true);
      expect(cli.api.requests.map((r) => `${r.method} ${r.path}`)).toEqual(["DELETE /api/v1/servers/1"]);
      expect(cli.io.out).toBe("1\n");
      expect(cli.io.err).toBe("Error: Interrupted before 2\n");
    });

    it("should stop booting servers when Ctrl-C interrupts the wait", async () => {
      cli.api.on("POST", "/api/v1/servers/:id/action", { status: 204 });
      cli.api.on("GET", "/api/v1/servers/:id", () => {
        cli.controller.abort();
        return { body: { server: { id: 1, status: "off" } } };
      });
      expect(await cli.exec("server", "boot", "1", "2", "--wait")).toBe(130);
      expect(cli.api.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        "POST /api/v1/servers/1/action",
        "GET /api/v1/servers/1",
      ]);
      expect(cli.io.out).toBe("");
      expect(cli.io.err).toBe("Error: Interrupted after 1 attempt(s)\n");
    });

    it("should not mark a plain request as interruptible", async () => {
      cli.api.on("GET", "/api/v1/servers/:id", { body: { server: { id: 1, status: "on" } } });
      expect(await cli.exec("server", "get", "1", "--status")).toBe(0);
      expect(cli.interruptible).toBe(false);
    });

    it("should refuse to remove without --yes in non-interactive mode", async () => {
      expect(await cli.exec("server", "rm", "1")).toBe(1);
      expect(cli.io.err).toBe("Error: Remove server(s) 1? Pass --yes to confirm in non-interactive mode\n");
      expect(cli.api.requests).toEqual([]);
    });

    it("should ask for the emailed code when removal needs one", async () => {
      cli = harness(home, { tty: true, answers: ["y", "4321"] });
      cli.api.on("DELETE", "/api/v1/servers/:id", (request) =>
        request.query.get("hash") === null
          ? { body: { server_delete: { hash: "h-1", is_moved_in_quarantine: false } } }
          : { status: 204 }
      );
      expect(await cli.exec("server", "rm", "4")).toBe(0);
      expect(cli.io.questions).toEqual(["Remove server(s) 4? [y/N]: ", "Enter the confirmation code sent to your email: "]);
      const second = cli.api.requests[1];
      expect(second?.query.get("hash")).toBe("h-1");
      expect(second?.query.get("code")).toBe("4321");
      expect(cli.io.out).toBe("4\n");
    });

    it("should list the disks of every server", async () => {
      cli.api.on("GET", "/api/v1/servers", {
        body: {
          servers: [
            {
              id: 1,
              disks: [
                { id: 10, system_name: "vda", is_mounted: true, is_system: true, type: "nvme", status: "done", size: 10240, used: 2048 },
              ],
            },
            {
              id: 2,
              disks: [
                { id: 20, system_name: "vdb", is_mounted: false, is_system: false, type: "nvme", status: "done", size: 5120, used: 0 },
              ],
            },
          ],
        },
      });
      expect(await cli.exec("server", "disk", "la")).toBe(0);
      expect(cli.io.out).toBe(
        "SERVER  ID  NAME  MOUNTED  SYSTEM  TYPE  STATUS  SIZE   USED\n" +
          "1       10  vda   true     true    nvme  done    10240  2048\n" +
          "2       20  vdb   false    false   nvme  done    5120   0\n"
      );
    });

    it("should exit 1 when automatic backups are disabled", async () => {
      const body = { auto_backups_settings: { is_enabled: false, copy_count: 1, interval: "day" } };
      cli.api.on("GET", "/api/v1/servers/5/disks/7/auto-backups", { body });
      expect(await cli.exec("server", "disk", "auto-backup", "5", "7", "--status", "-o", "json")).toBe(1);
      expect(JSON.parse(cli.io.out)).toEqual(body);
      expect(cli.io.err).toBe("");
    });

    it("should exit 0 when automatic backups are enabled", async () => {
      cli.api.on("GET", "/api/v1/servers/5/disks/7/auto-backups", {
        body: { auto_backups_settings: { is_enabled: true, copy_count: 2, interval: "week", day_of_week: 5 } },
      });
      expect(await cli.exec("server", "disk", "auto-backup", "5", "7", "--status")).toBe(0);
      expect(cli.api.requests).toHaveLength(1);
    });

    it("should turn on weekly automatic backups", async () => {
      cli.api.on("PATCH", "/api/v1/servers/5/disks/7/auto-backups", { body: { auto_backups_settings: { is_enabled: true } } });
      const args = ["--enable", "--keep", "3", "--start-date", "2026-01-05", "--interval", "week", "--day-of-week", "1"];
      expect(await cli.exec("server", "disk", "auto-backup", "5", "7", ...args, "-o", "json")).toBe(0);
      expect(cli.api.requests[0]?.body).toEqual({
        is_enabled: true,
        copy_count: 3,
        creation_start_at: "2026-01-05T00:00:00Z",
        interval: "week",
        day_of_week: 1,
      });
    });

    it("should reject a malformed start date", async () => {
      expect(await cli.exec("server", "disk", "auto-backup", "5", "7", "--start-date", "05.01.2026")).toBe(1);
      expect(cli.io.err).toContain("'05.01.2026' is not a date in YYYY-MM-DD format");
      expect(cli.api.requests).toEqual([]);
    });

    it("should change the comment of a backup", async () => {
      cli.api.on("PATCH", "/api/v1/servers/5/disks/7/backups/3", { body: { backup: { id: 3, comment: "before upgrade" } } });
      expect(await cli.exec("server", "backup", "set", "5", "7", "3", "--comment", "before upgrade", "-o", "json")).toBe(0);
      expect(cli.api.requests[0]?.body).toEqual({ comment: "before upgrade" });
    });

    it("should mount a backup without asking", async () => {
      cli.api.on("POST", "/api/v1/servers/5/disks/7/backups/3/action", { status: 204 });
      expect(await cli.exec("server", "backup", "mount", "5", "7", "3")).toBe(0);
      expect(cli.api.requests[0]?.body).toEqual({ action: "mount" });
      expect(cli.io.out).toBe("3\n");
    });

    it("should take --yes only for restore", async () => {
      expect(await cli.exec("server", "backup", "unmount", "5", "7", "3", "-y")).toBe(1);
      expect(cli.io.err).toContain("unknown option '-y'");
      expect(cli.api.requests).toEqual([]);
    });
  });

  describe("firewall", () => {
    it("should add one rule per port and protocol", async () => {
      cli.api.on("POST", "/api/v1/firewall/groups/:id/rules", { body: { rule: { id: "r" } } });
      expect(await cli.exec("firewall", "rule", "add", "22/tcp", "icmp", "--group", "g-1")).toBe(0);
      expect(cli.api.calls("POST", "/api/v1/firewall/groups/g-1/rules").map((r) => r.body)).toEqual([
        { direction: "ingress", protocol: "tcp", cidr: "0.0.0.0/0", port: "22" },
        { direction: "ingress", protocol: "icmp", cidr: "0.0.0.0/0" },
      ]);
      expect(cli.io.out).toBe("22/tcp\nicmp\n");
    });

    it("should create a group for --make-group", async () => {
      cli.api.on("POST", "/api/v1/firewall/groups", { body: { group: { id: "g-new", name: "web" } } });
      cli.api.on("POST", "/api/v1/firewall/groups/:id/rules", { body: { rule: { id: "r" } } });
      expect(
        await cli.exec("fw", "rule", "add", "443/tcp", "--make-group", "web", "--egress", "--cidr", "10.0.0.0/8")
      ).toBe(0);
      const [created] = cli.api.calls("POST", "/api/v1/firewall/groups");
      expect(created?.body).toEqual({ name: "web" });
      expect(created?.query.get("policy")).toBe("DROP");
      expect(cli.api.calls("POST", "/api/v1/firewall/groups/g-new/rules")[0]?.body).toEqual({
        direction: "egress",
        protocol: "tcp",
        cidr: "10.0.0.0/8",
        port: "443",
      });
      expect(cli.io.err).toBe("Created group g-new\n");
    });

    it("should require a group", async () => {
      expect(await cli.exec("firewall", "rule", "add", "22/tcp")).toBe(1);
      expect(cli.io.err).toBe("error: One of options is required: ['--group', '--make-group']\n");
    });

    it("should reject a malformed port", async () => {
      expect(await cli.exec("firewall", "rule", "add", "ssh", "--group", "g-1")).toBe(1);
      expect(cli.io.err).toContain("Malformed argument: 'ssh'");
      expect(cli.api.requests).toEqual([]);
    });

    it("should link a group to a database", async () => {
      cli.api.on("POST", "/api/v1/firewall/groups/:group/resources/:id", { status: 204 });
      expect(await cli.exec("firewall", "link", "g-1", "--database", "12")).toBe(0);
      const [request] = cli.api.requests;
      expect(request?.path).toBe("/api/v1/firewall/groups/g-1/resources/12");
      expect(request?.query.get("resource_type")).toBe("dbaas");
      expect(cli.io.out).toBe("12\n");
    });

    it("should reject two targets", async () => {
      expect(await cli.exec("firewall", "link", "g-1", "--server", "1", "--database", "2")).toBe(1);
      expect(cli.io.err).toContain("cannot be used with");
    });
  });

  describe("other resources", () => {
    it("should upload an SSH key named after its comment", async () => {
      const keyFile = path.join(home, "id_ed25519.pub");
      await writeFile(keyFile, "ssh-ed25519 AAAAC3Nza test@laptop\n");
      cli.api.on("POST", "/api/v1/ssh-keys", { body: { ssh_key: { id: 3, name: "test@laptop" } } });
      expect(await cli.exec("ssh-key", "new", keyFile, "-o", "json")).toBe(0);
      expect(cli.api.calls("POST", "/api/v1/ssh-keys")[0]?.body).toEqual({
        name: "test@laptop",
        body: "ssh-ed25519 AAAAC3Nza test@laptop",
        is_default: false,
      });
    });

    it("should add a subdomain", async () => {
      cli.api.on("POST", "/api/v1/domains/:fqdn/subdomains/:name", { status: 201, body: { subdomain: { fqdn: "www.example.org" } } });
      expect(await cli.exec("domain", "subdomain", "add", "example.org", "www")).toBe(0);
      expect(cli.io.out).toBe("www.example.org\n");
    });

    it("should exit 2 for an unknown bucket name", async () => {
      cli.api.on("GET", "/api/v1/storages/buckets", { body: { buckets: [{ id: 1, name: "assets" }] } });
      expect(await cli.exec("storage", "set", "missing", "--type", "public")).toBe(2);
      expect(cli.io.err).toBe("Error: Bucket not found: missing\n");
    });

    it("should need an availability zone for a floating IP", async () => {
      expect(await cli.exec("ip", "create")).toBe(1);
      expect(cli.io.err).toBe(
        "Error: No availability zone given. Pass --availability-zone or set 'availability_zone' in the profile\n"
      );
    });

    it("should take the availability zone from the profile", async () => {
      await writeFile(path.join(home, "cirrusrc"), '[default]\navailability_zone = "spb-3"\n');
      cli.api.on("POST", "/api/v1/floating-ips", { status: 201, body: { ip: { id: "ip-1", ip: "203.0.113.5" } } });
      expect(await cli.exec("ip", "create", "-o", "json")).toBe(0);
      expect(cli.api.calls("POST", "/api/v1/floating-ips")[0]?.body).toEqual({
        availability_zone: "spb-3",
        is_ddos_guard: false,
      });
    });

    it("should scale a node group up and down", async () => {
      cli.api.on("POST", "/api/v1/k8s/clusters/3/groups/4/nodes", { status: 201, body: { nodes: [], meta: { total: 3 } } });
      cli.api.on("DELETE", "/api/v1/k8s/clusters/3/groups/4/nodes", { body: { nodes: [], meta: { total: 2 } } });
      expect(await cli.exec("cluster", "group", "scale-up", "3", "4", "2")).toBe(0);
      expect(await cli.exec("cluster", "group", "scale-down", "3", "4")).toBe(0);
      expect(cli.api.requests.map((r) => [r.method, r.body])).toEqual([
        ["POST", { count: 2 }],
        ["DELETE", { count: 1 }],
      ]);
    });

    it("should list domains with their subdomains", async () => {
      cli.api.on("GET", "/api/v1/domains", {
        body: {
          domains: [
            {
              fqdn: "example.org",
              id: 1,
              linked_ip: "203.0.113.5",
              subdomains: [{ fqdn: "www.example.org", id: 7, linked_ip: null }],
            },
          ],
        },
      });
      expect(await cli.exec("domain", "la")).toBe(0);
      expect(cli.io.out).toBe(
        "FQDN             ID  IP           SUBDOMAIN\n" + "example.org      1   203.0.113.5\n" + "www.example.org  7                true\n"
      );
    });

    describe("removing every DNS record", () => {
      beforeEach(() => {
        cli.api.on("GET", "/api/v1/domains/example.org/dns-records", {
          body: {
            dns_records: [
              { id: 1, type: "A", data: { value: "203.0.113.5" } },
              { id: 2, type: "A", data: { subdomain: "www", value: "203.0.113.6" } },
              { id: 3, type: "TXT", data: { value: "v=spf1 -all" } },
            ],
          },
        });
        cli.api.on("DELETE", "/api/v1/domains/example.org/dns-records/:id", { status: 204 });
      });

      it("should keep subdomain records by default", async () => {
        expect(await cli.exec("domain", "record", "rma", "example.org", "-y")).toBe(0);
        expect(cli.api.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
          "GET /api/v1/domains/example.org/dns-records",
          "DELETE /api/v1/domains/example.org/dns-records/1",
          "DELETE /api/v1/domains/example.org/dns-records/3",
        ]);
        expect(cli.io.out).toBe("1\n3\n");
      });

      it("should include subdomain records on request", async () => {
        expect(await cli.exec("domain", "record", "delete-all", "example.org", "--not-ignore-subdomains", "-y")).toBe(0);
        expect(cli.io.out).toBe("1\n2\n3\n");
      });
    });
  });

  describe("config", () => {
    it("should create, change and show the config file", async () => {
      const configPath = path.join(home, "cirrusrc");
      cli = harness(home, { env: { CIRRUS_TOKEN: undefined } });

      expect(await cli.exec("config", "init", "--token", "test-secret")).toBe(0);
      expect(cli.io.out).toBe(`Configuration saved to ${configPath}\n`);
      const written = await readFile(configPath, "utf8");
      expect(written).toContain("[default]");
      expect(written).toContain('token = "test-secret"');

      expect(await cli.exec("config", "set", "region", "ru-1")).toBe(0);
      expect(cli.io.out).toContain("Set region in profile 'default'\n");

      cli.io.out = "";
      expect(await cli.exec("config", "show", "-o", "json")).toBe(0);
      expect(JSON.parse(cli.io.out)).toEqual({
        config_file: configPath,
        profile: "default",
        token: "<redacted>",
        output_format: "json",
        region: "ru-1",
        availability_zone: null,
        api_endpoint: DEFAULT_BASE_URL,
      });
    });

    it("should refuse to overwrite an existing file", async () => {
      await writeFile(path.join(home, "cirrusrc"), '[default]\ntoken = "t"\n');
      expect(await cli.exec("config", "init", "--token", "test-secret")).toBe(1);
      expect(cli.io.err).toContain("Config file already exists");
    });

    it("should reject unknown keys and bad values", async () => {
      expect(await cli.exec("config", "set", "colour", "red")).toBe(1);
      expect(cli.io.err).toBe("Error: Unknown key 'colour'. Expected one of: token, output_format, region, availability_zone\n");

      cli.io.err = "";
      expect(await cli.exec("config", "set", "output_format", "xml")).toBe(1);
      expect(cli.io.err).toContain("Error: Invalid value for output_format");
    });

    it("should repair a bad value with config set", async () => {
      const configPath = path.join(home, "cirrusrc");
      await writeFile(configPath, '[default]\noutput_format = "xml"\n');
      expect(await cli.exec("server", "list")).toBe(1);
      expect(cli.io.err).toContain("Invalid profile [default]");

      cli.io.err = "";
      expect(await cli.exec("config", "set", "output_format", "json")).toBe(0);
      expect(cli.io.out).toBe("Set output_format in profile 'default'\n");
      expect(cli.io.err).toBe("");
      expect(await readFile(configPath, "utf8")).toContain('output_format = "json"');
    });

    it("should ignore a bad value in a profile that is not in use", async () => {
      await writeFile(path.join(home, "cirrusrc"), '[default]\nregion = "ru-1"\n\n[old]\noutput_format = "xml"\n');
      cli.api.on("GET", "/api/v1/servers", { body: { servers: [] } });
      expect(await cli.exec("server", "list", "-o", "json")).toBe(0);
      expect(await cli.exec("config", "profiles")).toBe(0);
      expect(cli.io.out).toContain("* default\n  old\n");
    });

    it("should list profiles and mark the current one", async () => {
      await writeFile(path.join(home, "cirrusrc"), '[default]\ntoken = "a"\n\n[work]\ntoken = "b"\n');
      expect(await cli.exec("-p", "work", "config", "profiles")).toBe(0);
      expect(cli.io.out).toBe("  default\n* work\n");
    });
  });
});
