import { EventEmitter } from "events";
import os from "os";
import path from "path";
import fs from "fs-extra";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { resolveConfig } from "../../src/config/settings";
import { ExportError } from "../../src/errors";

const spawnMock = vi.hoisted(() => vi.fn());
vi.mock("child_process", () => ({ spawn: spawnMock }));

import { deckArgs, exportKongConfig } from "../../src/commands/export";

type FakeChild = EventEmitter & { stderr: EventEmitter };

function fakeChild(run: (child: FakeChild) => void) {
  const child: FakeChild = Object.assign(new EventEmitter(), { stderr: new EventEmitter() });
  setImmediate(() => run(child));
  return child;
}

describe("exportKongConfig", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "migrate-export-"));
  });

  afterEach(async () => {
    await fs.remove(dataDir);
  });

  const config = () =>
    resolveConfig(
      { dataDir, konnectControlPlane: "staging" },
      { KONNECT_TOKEN: "test-konnect", TYK_AUTH_TOKEN: "test-tyk" }
    );

  it("builds the deck dump command line", () => {
    expect(deckArgs(config(), "/out/kong-dump.json")).toEqual([
      "--konnect-addr",
      "https://us.api.konghq.com",
      "--konnect-control-plane-name",
      "staging",
      "--konnect-token",
      "test-konnect",
      "--format",
      "json",
      "-o",
      "/out/kong-dump.json",
      "gateway",
      "dump",
      "--yes",
    ]);
  });

  it("returns the dump file deck wrote", async () => {
    const outFile = path.join(dataDir, "kong-dump.json");
    spawnMock.mockImplementationOnce(() =>
      fakeChild((child) => {
        fs.writeJsonSync(outFile, { services: [] });
        child.emit("close", 0);
      })
    );

    await expect(exportKongConfig(config())).resolves.toBe(outFile);
    expect(spawnMock).toHaveBeenCalledWith("deck", deckArgs(config(), outFile), expect.anything());
  });

  it("fails with deck's stderr on a non-zero exit", async () => {
    spawnMock.mockImplementationOnce(() =>
      fakeChild((child) => {
        child.stderr.emit("data", Buffer.from("Error: invalid token\n"));
        child.emit("close", 1);
      })
    );

    const pending = exportKongConfig(config());
    await expect(pending).rejects.toBeInstanceOf(ExportError);
    await expect(pending).rejects.toMatchObject({
      message: "deck exited with code 1: Error: invalid token",
      exitCode: 1,
    });
  });

  it("fails when deck is not installed", async () => {
    spawnMock.mockImplementationOnce(() =>
      fakeChild((child) => child.emit("error", new Error("spawn deck ENOENT")))
    );

    await expect(exportKongConfig(config())).rejects.toThrow("Could not run deck: spawn deck ENOENT");
  });

  it("fails when deck exits cleanly without writing the dump", async () => {
    spawnMock.mockImplementationOnce(() => fakeChild((child) => child.emit("close", 0)));

    await expect(exportKongConfig(config())).rejects.toThrow("was not written");
  });
});
