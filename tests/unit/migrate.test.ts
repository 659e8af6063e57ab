import os from "os";
import path from "path";
import fs from "fs-extra";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { runMigration } from "../../src/commands/migrate";
import { resolveConfig, MigrationConfig, CliOptions } from "../../src/config/settings";
import { DuplicateTitleError } from "../../src/errors";
import { FakeGateway } from "../support/fake-gateway";
import { exitCodeFor, EXIT_FAILED_UNITS } from "../../src/cli";

const FIXTURE = path.resolve(__dirname, "../fixtures/kong-dump.json");

describe("runMigration", () => {
  let workDir: string;
  let dataDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "migrate-run-"));
    dataDir = path.join(workDir, "json-data");
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  const config = (opts: CliOptions = {}): MigrationConfig =>
    resolveConfig({ dataDir, dumpFile: FIXTURE, ...opts }, { TYK_AUTH_TOKEN: "test-tyk" });

  it("writes the combined and per-API artifacts", async () => {
    await runMigration(config(), { client: new FakeGateway() });

    const files = (await fs.readdir(dataDir)).sort();
    expect(files).toEqual([
      "kong-dump.json",
      "kong-oas.json",
      "migration-report.md",
      "oas-billing.json",
      "oas-legacy-reports.json",
      "oas-orders.json",
    ]);

    const combined = await fs.readJson(path.join(dataDir, "kong-oas.json"));
    expect(combined).toHaveLength(3);

    const orders = await fs.readJson(path.join(dataDir, "oas-orders.json"));
    expect(orders["x-tyk-api-gateway"]).toEqual({
      info: { name: "orders", state: { active: true, internal: false } },
      server: { listenPath: { strip: true, value: "/orders" } },
      upstream: { url: "http://orders.internal/api" },
    });

    const reports = await fs.readJson(path.join(dataDir, "oas-legacy-reports.json"));
    expect(reports["x-tyk-api-gateway"].server.listenPath.value).toBeNull();
    expect(reports["x-tyk-api-gateway"].upstream.url).toBe("http://reports.internal");
  });

  it("imports what it can and reports the rest", async () => {
    const gateway = new FakeGateway();

    const { result, status } = await runMigration(config(), { client: gateway });

    expect(status).toBe("failure");
    expect(result).toMatchObject({ total: 3, succeeded: 2, skipped: 0, failed: 1 });
    expect(result.failures).toEqual([{ id: "legacy-reports", reason: "missing listen path" }]);
    expect(gateway.createCalls).toEqual(["orders", "billing"]);
  });

  it("is idempotent across runs", async () => {
    const gateway = new FakeGateway();
    await runMigration(config(), { client: gateway });

    const { result } = await runMigration(config(), { client: gateway });

    expect(result).toMatchObject({ succeeded: 0, skipped: 2, failed: 1 });
    expect(gateway.created).toHaveLength(2);
  });

  it("renders a report listing every API", async () => {
    const { reportFile } = await runMigration(config(), { client: new FakeGateway() });

    expect(reportFile).toBe(path.join(dataDir, "migration-report.md"));
    const report = await fs.readFile(path.join(dataDir, "migration-report.md"), "utf8");
    const lines = report.split("\n");
    expect(lines).toContain("- Status: **FAILURE**");
    expect(lines).toContain("| 3 | 2 | 0 | 1 | 0 |");
    expect(lines).toContain(
      "| orders | orders | 1.0.0 | `/orders` | http://orders.internal/api | true | false | imported (api-1) |"
    );
    expect(lines).toContain(
      "| legacy-reports | legacy reports | 1.0.0 | _none_ | http://reports.internal | true | false | failed |"
    );
    expect(lines).toContain("- `legacy-reports`: missing listen path");
  });

  it("imports nothing on a dry run", async () => {
    const gateway = new FakeGateway();

    const { result, status } = await runMigration(config({ dryRun: true }), { client: gateway });

    expect(status).toBe("dry-run");
    expect(gateway.existsCalls).toEqual([]);
    expect(result.pending).toEqual(["orders", "billing", "legacy-reports"]);
    expect(result.total).toBe(0);
  });

  it("fails a dry run that dropped an unnamed service", async () => {
    const dump = path.join(workDir, "unnamed.json");
    await fs.writeJson(dump, {
      services: [
        { name: "svc-a", protocol: "http", host: "a", path: "/", routes: [{ paths: ["/a"] }] },
        { protocol: "http", host: "b", path: "/", routes: [{ paths: ["/b"] }] },
      ],
    });

    const { result, status } = await runMigration(config({ dumpFile: dump, dryRun: true }), {});

    expect(result.failures).toEqual([{ id: "services[1]", reason: "service has no name" }]);
    expect(status).toBe("failure");
    expect(exitCodeFor(status)).toBe(EXIT_FAILED_UNITS);
  });

  it("runs the export when no dump is supplied", async () => {
    const exportDump = vi.fn(async (c: MigrationConfig) => {
      const out = path.join(c.dataDir, "kong-dump.json");
      await fs.copy(FIXTURE, out);
      return out;
    });
    const cfg = resolveConfig({ dataDir }, { KONNECT_TOKEN: "test-konnect", TYK_AUTH_TOKEN: "test-tyk" });

    const { units } = await runMigration(cfg, { client: new FakeGateway(), exportDump });

    expect(exportDump).toHaveBeenCalledOnce();
    expect(units.map((u) => u.key)).toEqual(["orders", "billing", "legacy-reports"]);
  });

  it("clears leftovers from an earlier run", async () => {
    await fs.outputFile(path.join(dataDir, "oas-stale.json"), "{}");

    await runMigration(config({ dryRun: true }), {});

    expect(await fs.pathExists(path.join(dataDir, "oas-stale.json"))).toBe(false);
  });

  it("leaves existing files alone with --keep-data-dir", async () => {
    await fs.outputFile(path.join(dataDir, "notes.txt"), "keep me");

    await runMigration(config({ dryRun: true, keepDataDir: true }), {});

    expect(await fs.readFile(path.join(dataDir, "notes.txt"), "utf8")).toBe("keep me");
    expect(await fs.pathExists(path.join(dataDir, "oas-orders.json"))).toBe(true);
  });

  it("keeps a supplied dump that lives in the data dir", async () => {
    const inside = path.join(dataDir, "kong-dump.json");
    await fs.copy(FIXTURE, inside);

    const { units } = await runMigration(config({ dumpFile: inside, dryRun: true }), {});

    expect(units).toHaveLength(3);
    expect(await fs.readJson(inside)).toMatchObject({ services: expect.any(Array) });
  });

  it("stops before importing when duplicate titles are rejected", async () => {
    const dump = path.join(workDir, "dup.json");
    await fs.writeJson(dump, {
      services: [
        { name: "svc-a", protocol: "http", host: "a1", path: "/", routes: [{ paths: ["/a1"] }] },
        { name: "svc-a", protocol: "http", host: "a2", path: "/", routes: [{ paths: ["/a2"] }] },
      ],
    });
    const gateway = new FakeGateway();

    await expect(
      runMigration(config({ dumpFile: dump, onDuplicate: "reject" }), { client: gateway })
    ).rejects.toBeInstanceOf(DuplicateTitleError);
    expect(gateway.existsCalls).toEqual([]);
  });

  it("imports both duplicates under distinct keys by default", async () => {
    const dump = path.join(workDir, "dup.json");
    await fs.writeJson(dump, {
      services: [
        { name: "svc-a", protocol: "http", host: "a1", path: "/", routes: [{ paths: ["/a1"] }] },
        { name: "svc-a", protocol: "http", host: "a2", path: "/", routes: [{ paths: ["/a2"] }] },
      ],
    });
    const gateway = new FakeGateway();

    const { result } = await runMigration(config({ dumpFile: dump }), { client: gateway });

    expect(result.outcomes.map((o) => o.key)).toEqual(["svc-a", "svc-a-2"]);
    expect(result.succeeded).toBe(2);
    expect(await fs.pathExists(path.join(dataDir, "oas-svc-a-2.json"))).toBe(true);
  });

  it("rejects a dump without a services list it can read", async () => {
    const dump = path.join(workDir, "bad.json");
    await fs.writeJson(dump, { services: "nope" });

    await expect(runMigration(config({ dumpFile: dump }), {})).rejects.toThrow(`Failed to read Kong dump ${dump}: services:`);
  });
});
