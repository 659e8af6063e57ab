// src/commands/migrate.ts
import path from "path";
import { MigrationConfig, COMBINED_FILE_NAME, DUMP_FILE_NAME, REPORT_FILE_NAME } from "../config/settings";
import { loadSourceRecordSet } from "../parser/dump.parser";
import { SourceRecordSet } from "../model/source";
import { transformServices } from "../model/mapper";
import { splitDefinitions, Unit } from "../model/splitter";
import { unitFileName } from "../adapters/tyk/naming";
import { TargetGatewayClient, TykDashboardClient } from "../adapters/tyk/client";
import { exportKongConfig } from "./export";
import { BatchResult, BatchStatus, buildResult, importUnits, batchStatus } from "./import";
import { loadTemplates } from "../render/template-loader";
import { buildReportRows, renderReport } from "../render/renderer";
import { prepareDataDir, writeJsonSafe } from "../utils/file";
import { logger } from "../utils/logger";

export type MigrateDeps = {
  client?: TargetGatewayClient;
  exportDump?: (config: MigrationConfig) => Promise<string>;
  templateDir?: string;
  signal?: AbortSignal;
};

export type MigrateResult = {
  dataDir: string;
  units: Unit[];
  result: BatchResult;
  status: BatchStatus | "dry-run";
  reportFile?: string;
};

/**
 * Full run: export (or read) the Kong dump, transform it into Tyk OAS
 * definitions, write one artifact per API, import them, write the report.
 */
export async function runMigration(config: MigrationConfig, deps: MigrateDeps = {}): Promise<MigrateResult> {
  logger.info("Starting Kong to Tyk migration...");

  // read a user-supplied dump before the data dir is emptied; it may live there
  const suppliedDump = config.dumpFile ? await loadSourceRecordSet(config.dumpFile) : undefined;

  logger.info(`Preparing data directory: ${config.dataDir}`);
  const dataDir = await prepareDataDir(config.dataDir, { keep: config.keepDataDir });

  let recordSet: SourceRecordSet;
  if (suppliedDump) {
    recordSet = suppliedDump;
    await writeJsonSafe(path.join(dataDir, DUMP_FILE_NAME), suppliedDump);
  } else {
    const exportDump = deps.exportDump ?? ((c: MigrationConfig) => exportKongConfig(c));
    recordSet = await loadSourceRecordSet(await exportDump(config));
  }

  logger.info("Transforming Kong configuration to OpenAPI specs...");
  const { definitions, sourceIndexes, issues } = transformServices(recordSet);
  for (const issue of issues) logger.error(`Skipping ${issue.id}: ${issue.reason}`);
  await writeJsonSafe(path.join(dataDir, COMBINED_FILE_NAME), definitions);

  logger.info("Splitting OpenAPI specs into individual files...");
  const units = splitDefinitions(definitions, { onDuplicate: config.onDuplicate, sourceIndexes });
  for (const unit of units) {
    await writeJsonSafe(path.join(dataDir, unitFileName(unit.key)), unit.definition);
  }
  logger.debug(`Wrote ${units.length} unit files`);

  let result: BatchResult;
  let status: BatchStatus | "dry-run";
  if (config.dryRun) {
    logger.info("Dry run: skipping import");
    result = buildResult(units, units.map(() => undefined), issues, undefined);
    // dropped records still count: a dry run is not clean when any failed
    status = result.failed > 0 ? "failure" : "dry-run";
  } else {
    logger.info("Importing OpenAPI specs into Tyk...");
    const client =
      deps.client ??
      new TykDashboardClient({
        dashboardUrl: config.tyk.dashboardUrl,
        authToken: config.tyk.authToken,
        timeoutMs: config.timeoutMs,
      });
    result = await importUnits(units, client, {
      concurrency: config.concurrency,
      transformIssues: issues,
      signal: deps.signal,
    });
    status = batchStatus(result);
  }

  const templates = await loadTemplates(deps.templateDir);
  const reportFile = path.join(dataDir, REPORT_FILE_NAME);
  const written = await renderReport(
    templates,
    {
      generatedAt: new Date().toISOString(),
      dashboardUrl: config.tyk.dashboardUrl,
      dryRun: config.dryRun,
      status,
      result,
      rows: buildReportRows(units, result),
    },
    reportFile
  );

  return { dataDir, units, result, status, reportFile: written ? reportFile : undefined };
}
