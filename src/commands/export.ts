// src/commands/export.ts
import { spawn } from "child_process";
import path from "path";
import fs from "fs-extra";
import { MigrationConfig, DUMP_FILE_NAME } from "../config/settings";
import { ExportError } from "../errors";
import { logger } from "../utils/logger";

export function deckArgs(config: MigrationConfig, outFile: string): string[] {
  return [
    "--konnect-addr",
    config.konnect.addr,
    "--konnect-control-plane-name",
    config.konnect.controlPlane,
    "--konnect-token",
    config.konnect.token,
    "--format",
    "json",
    "-o",
    outFile,
    "gateway",
    "dump",
    "--yes",
  ];
}

/**
 * Export the Kong control plane with `deck gateway dump` into the data dir.
 * Returns the path of the dump file.
 */
export async function exportKongConfig(config: MigrationConfig, deckBin = "deck"): Promise<string> {
  const outFile = path.join(config.dataDir, DUMP_FILE_NAME);
  logger.info("Exporting Kong configuration...");
  logger.debug(`${deckBin} gateway dump -> ${outFile}`);

  const stderr: string[] = [];
  const code = await new Promise<number | null>((resolve, reject) => {
    const child = spawn(deckBin, deckArgs(config, outFile), { stdio: ["ignore", "inherit", "pipe"] });
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk.toString("utf8")));
    child.on("error", (err) => reject(new ExportError(`Could not run ${deckBin}: ${err.message}`, null, err)));
    child.on("close", (exitCode) => resolve(exitCode));
  });

  if (code !== 0) {
    const detail = stderr.join("").trim();
    throw new ExportError(`${deckBin} exited with code ${code}${detail ? `: ${detail}` : ""}`, code);
  }
  if (!(await fs.pathExists(outFile))) {
    throw new ExportError(`${deckBin} finished but ${outFile} was not written`, code);
  }
  return outFile;
}
