/**
 * Resource API tests against the in-process fake API
 */

import { describe, test, expect, beforeEach } from "vitest";
import { FakeApi, FakeClock, sequence } from "@cirrus/testkit";
import { createClient, type CloudClient } from "./client.js";
import { ValidationError, PollTimeoutError } from "./errors.js";
import { Logger } from "./observability/logs.js";
import { MetricsCollector } from "./observability/metrics.js";
import { extractDeleteHash } from "./resources/base.js";

describe("CloudClient", () => {
  let api: FakeApi;
  let client: CloudClient;

  beforeEach(() => {
    api = new FakeApi();
    client = createClient({
      token: "test-secret",
      baseUrl: "https://api.test",
      fetch: api.fetch,
      logger: new Logger({ sink: () => undefined }),
      metrics: new MetricsCollector(),
    });
  });

  describe("servers", () => {
    test("lists with default paging", async () => {
      api.on("GET", "/api/v1/servers", { body: { servers: [{ id: 1, status: "on" }], meta: { total: 1 } } });

      const result = await client.servers.list();

      expect(result.servers).toEqual([{ id: 1, status: "on" }]);
      expect(api.requests[0]?.query.toString()).toBe("limit=100&offset=0");
    });

    test("creates from a preset and OS", async () => {
      api.on("POST", "/api/v1/servers", { status: 201, body: { server: { id: 9, status: "installing" } } });

      await client.servers.create({ name: "web", presetId: 2447, osId: 61, sshKeyIds: [] });

      expect(api.requests[0]?.body).toEqual({
        name: "web",
        preset_id: 2447,
        os_id: 61,
        is_ddos_guard: false,
      });
    });

    test("sends a custom configuration", async () => {
      api.on("POST", "/api/v1/servers", { status: 201, body: { server: { id: 9, status: "installing" } } });

      await client.servers.create({
        name: "db",
        configuration: { configuratorId: 11, cpu: 2, ramMb: 4096, diskMb: 51200 },
        imageId: "c1a7e3b0-0000-4000-8000-000000000001",
      });

      expect(api.requests[0]?.body).toEqual({
        name: "db",
        configuration: { configurator_id: 11, cpu: 2, ram: 4096, disk: 51200 },
        image_id: "c1a7e3b0-0000-4000-8000-000000000001",
        is_ddos_guard: false,
      });
    });

    test("requires exactly one of preset and configuration", () => {
      expect(() => client.servers.create({ name: "x", osId: 1 })).toThrow(
        "Exactly one of presetId, configuration is required"
      );
      expect(() =>
        client.servers.create({
          name: "x",
          presetId: 1,
          configuration: { configuratorId: 1, cpu: 1, ramMb: 1024, diskMb: 10240 },
          osId: 1,
        })
      ).toThrow(ValidationError);
      expect(() => client.servers.create({ name: "x", presetId: 1 })).toThrow(
        "Exactly one of osId, imageId is required"
      );
      expect(api.requests).toHaveLength(0);
    });

    test("names the configuration field 'configurator' on update", async () => {
      api.on("PATCH", "/api/v1/servers/5", { body: { server: { id: 5, status: "on" } } });

      await client.servers.update(5, { configuration: { configuratorId: 3, cpu: 4, ramMb: 8192, diskMb: 81920 } });

      expect(api.requests[0]?.body).toEqual({
        configurator: { configurator_id: 3, cpu: 4, ram: 8192, disk: 81920 },
      });
    });

    test("sends power actions", async () => {
      api.on("POST", "/api/v1/servers/5/action", { status: 204 });

      await client.servers.action(5, "hard_reboot");

      expect(api.requests[0]?.body).toEqual({ action: "hard_reboot" });
    });

    test("maps the recovery boot mode", async () => {
      api.on("POST", "/api/v1/servers/5/boot-mode", { status: 204 });

      await client.servers.setBootMode(5, "recovery");

      expect(api.requests[0]?.body).toEqual({ boot_mode: "recovery_disk" });
    });

    test("passes removal confirmation as query parameters", async () => {
      api.on("DELETE", "/api/v1/servers/5", { body: { server_delete: { hash: "abc123", is_moved_in_quarantine: false } } });

      const first = await client.servers.remove(5);
      const second = await client.servers.remove(5, { hash: "abc123", code: "9999" });

      expect(extractDeleteHash(first)).toBe("abc123");
      expect(second).toBeDefined();
      expect(api.requests[0]?.query.toString()).toBe("");
      expect(api.requests[1]?.query.toString()).toBe("hash=abc123&code=9999");
    });

    test("waits for a status", async () => {
      const clock = new FakeClock();
      api.on(
        "GET",
        "/api/v1/servers/5",
        sequence(
          { body: { server: { id: 5, status: "starting" } } },
          { body: { server: { id: 5, status: "on" } } }
        )
      );

      const result = await client.servers.waitForStatus(5, "on", { intervalMs: 2000, sleep: clock.sleep });

      expect(result.status).toBe("on");
      expect(result.attempts).toBe(2);
      expect(clock.sleeps).toEqual([2000]);
    });

    test("gives up after maxAttempts", async () => {
      const clock = new FakeClock();
      api.on("GET", "/api/v1/servers/5", { body: { server: { id: 5, status: "off" } } });

      await expect(
        client.servers.waitForStatus(5, "on", { intervalMs: 1, maxAttempts: 3, sleep: clock.sleep })
      ).rejects.toBeInstanceOf(PollTimeoutError);
      expect(api.calls("GET", "/api/v1/servers/5")).toHaveLength(3);
    });

    test("waits for a disk backup to finish", async () => {
      const clock = new FakeClock();
      api.on(
        "GET",
        "/api/v1/servers/5/disks/7/backups/3",
        sequence({ body: { backup: { id: 3, status: "precreate" } } }, { body: { backup: { id: 3, status: "done" } } })
      );

      const result = await client.servers.waitForBackup(5, 7, 3, undefined, { intervalMs: 1, sleep: clock.sleep });

      expect(result.status).toBe("done");
    });

    test("turns on weekly automatic backups", async () => {
      api.on("PATCH", "/api/v1/servers/5/disks/7/auto-backups", {
        body: { auto_backups_settings: { is_enabled: true, copy_count: 3 } },
      });

      await client.servers.updateAutoBackup(5, 7, {
        enabled: true,
        copyCount: 3,
        startAt: "2026-01-05T00:00:00Z",
        interval: "week",
        dayOfWeek: 1,
      });

      expect(api.requests[0]?.body).toEqual({
        is_enabled: true,
        copy_count: 3,
        creation_start_at: "2026-01-05T00:00:00Z",
        interval: "week",
        day_of_week: 1,
      });
    });

    test("leaves is_enabled out of an auto-backup update unless given", async () => {
      api.on("PATCH", "/api/v1/servers/5/disks/7/auto-backups", { body: { auto_backups_settings: {} } });

      await client.servers.updateAutoBackup(5, 7, { copyCount: 1, startAt: "2026-01-05T00:00:00Z", interval: "day" });

      expect(api.requests[0]?.body).toEqual({ copy_count: 1, creation_start_at: "2026-01-05T00:00:00Z", interval: "day" });
    });

    test("changes the comment of a backup", async () => {
      api.on("PATCH", "/api/v1/servers/5/disks/7/backups/3", { body: { backup: { id: 3, comment: "before upgrade" } } });

      const result = await client.servers.updateBackup(5, 7, 3, "before upgrade");

      expect(result?.backup.comment).toBe("before upgrade");
      expect(api.requests[0]?.body).toEqual({ comment: "before upgrade" });
    });
  });

  describe("databases", () => {
    test("sends MySQL 8 as 'mysql'", async () => {
      api.on("POST", "/api/v1/dbs", { status: 201, body: { db: { id: 4, status: "starting" } } });

      await client.databases.create({ name: "app", dbms: "mysql8", presetId: 403, password: "test-secret" });

      expect(api.requests[0]?.body).toEqual({
        name: "app",
        type: "mysql",
        login: null,
        password: "test-secret",
        hash_type: null,
        preset_id: 403,
        config_parameters: null,
      });
    });
  });

  describe("vpcs", () => {
    test("uses the v2 API for create and validates the subnet first", async () => {
      api.on("POST", "/api/v2/vpcs", { status: 201, body: { vpc: { id: "network-1" } } });

      await client.vpcs.create({ name: "private", subnet: "192.168.10.0/24", location: "ru-1" });
      expect(() => client.vpcs.create({ name: "bad", subnet: "1.1.1.0/24", location: "ru-1" })).toThrow(
        ValidationError
      );

      expect(api.requests).toHaveLength(1);
      expect(api.requests[0]?.body).toEqual({ name: "private", subnet_v4: "192.168.10.0/24", location: "ru-1" });
    });

    test("removes through the v1 API", async () => {
      api.on("DELETE", "/api/v1/vpcs/network-1", { status: 204 });

      await client.vpcs.remove("network-1");

      expect(api.calls("DELETE", "/api/v1/vpcs/network-1")).toHaveLength(1);
    });
  });

  describe("firewall", () => {
    test("creates groups with the DROP policy by default", async () => {
      api.on("POST", "/api/v1/firewall/groups", { status: 201, body: { group: { id: "g1" } } });

      await client.firewall.createGroup("web");

      expect(api.requests[0]?.query.get("policy")).toBe("DROP");
      expect(api.requests[0]?.body).toEqual({ name: "web" });
    });

    test("drops the port of ICMP rules", async () => {
      api.on("POST", "/api/v1/firewall/groups/g1/rules", { status: 201, body: { rule: { id: "r1" } } });

      await client.firewall.createRule("g1", {
        direction: "ingress",
        protocol: "icmp",
        cidr: "0.0.0.0/0",
        port: "22",
      });

      expect(api.requests[0]?.body).toEqual({ direction: "ingress", protocol: "icmp", cidr: "0.0.0.0/0" });
    });

    test("links resources by type", async () => {
      api.on("POST", "/api/v1/firewall/groups/g1/resources/:id", { status: 201, body: { resource: { id: 10 } } });

      await client.firewall.link("g1", 10, "dbaas");

      expect(api.requests[0]?.path).toBe("/api/v1/firewall/groups/g1/resources/10");
      expect(api.requests[0]?.query.get("resource_type")).toBe("dbaas");
    });
  });

  describe("projects", () => {
    test("moves a resource between projects", async () => {
      api.on("PUT", "/api/v1/projects/1/resources/transfer", { body: { resource: { id: 5 } } });

      await client.projects.moveResource(1, 2, 5, "server");

      expect(api.requests[0]?.body).toEqual({ to_project: 2, resource_id: 5, resource_type: "server" });
    });
  });

  describe("floating IPs", () => {
    test("binds and unbinds", async () => {
      api.on("POST", "/api/v1/floating-ips/:id/bind", { status: 204 });
      api.on("POST", "/api/v1/floating-ips/:id/unbind", { status: 204 });

      await client.floatingIps.attach("ip-1", "server", 5);
      await client.floatingIps.detach("ip-1");

      expect(api.requests.map((r) => r.path)).toEqual([
        "/api/v1/floating-ips/ip-1/bind",
        "/api/v1/floating-ips/ip-1/unbind",
      ]);
      expect(api.requests[0]?.body).toEqual({ resource_type: "server", resource_id: 5 });
    });
  });

  describe("clusters", () => {
    test("returns the kubeconfig as text", async () => {
      api.on("GET", "/api/v1/k8s/clusters/3/kubeconfig", { text: "apiVersion: v1\nkind: Config\n" });

      await expect(client.clusters.kubeconfig(3)).resolves.toBe("apiVersion: v1\nkind: Config\n");
    });

    test("scales a node group up and down", async () => {
      api.on("POST", "/api/v1/k8s/clusters/3/groups/4/nodes", { status: 201, body: { nodes: [], meta: { total: 3 } } });
      api.on("DELETE", "/api/v1/k8s/clusters/3/groups/4/nodes", { body: { nodes: [], meta: { total: 2 } } });

      const up = await client.clusters.addNodes(3, 4, 2);
      await client.clusters.removeNodes(3, 4);

      expect(up?.meta?.total).toBe(3);
      expect(api.requests.map((r) => r.body)).toEqual([{ count: 2 }, { count: 1 }]);
    });
  });
});

describe("extractDeleteHash", () => {
  test("finds the hash of any *_delete key", () => {
    expect(extractDeleteHash({ dbs_delete: { hash: "h1" } })).toBe("h1");
    expect(extractDeleteHash({ bucket_delete: { hash: "" } })).toBeUndefined();
    expect(extractDeleteHash({ server: { hash: "h2" } })).toBeUndefined();
    expect(extractDeleteHash(undefined)).toBeUndefined();
  });
});
