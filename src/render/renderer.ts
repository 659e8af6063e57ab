import path from "path";
import { TemplateSet } from "./template-loader";
import { BatchResult, BatchStatus, UnitOutcome } from "../commands/import";
import { Unit } from "../model/splitter";
import { isActive, isInternal, listenPathOf, titleOf, upstreamUrlOf, versionOf } from "../model/target";
import { writeFileSafe } from "../utils/file";
import { logger } from "../utils/logger";

export const REPORT_TEMPLATE = "report.md.hbs";

export type ReportContext = {
  generatedAt: string;
  dashboardUrl: string;
  dryRun: boolean;
  status: BatchStatus | "dry-run";
  result: BatchResult;
  rows: ReportRow[];
};

export type ReportRow = {
  key: string;
  title: string;
  version: string;
  listenPath: string | null;
  upstream: string;
  active: boolean;
  internal: boolean;
  outcome: string;
};

export function buildReportRows(units: readonly Unit[], result: BatchResult): ReportRow[] {
  const byKey = new Map(result.outcomes.map((o) => [o.key, o]));
  return units.map((u) => ({
    key: u.key,
    title: titleOf(u.definition),
    version: versionOf(u.definition),
    listenPath: listenPathOf(u.definition),
    upstream: upstreamUrlOf(u.definition),
    active: isActive(u.definition),
    internal: isInternal(u.definition),
    outcome: describeOutcome(byKey.get(u.key)),
  }));
}

function describeOutcome(o: UnitOutcome | undefined) {
  if (!o) return "not attempted";
  if (o.status === "imported") return o.id ? `imported (${o.id})` : "imported";
  return o.status;
}

/** Render the migration report into `outFile`; returns false without a template. */
export async function renderReport(templates: TemplateSet, context: ReportContext, outFile: string) {
  const template = templates[REPORT_TEMPLATE];
  if (!template) {
    logger.warn(`No ${REPORT_TEMPLATE} template; skipping report`);
    return false;
  }
  await writeFileSafe(outFile, template(context));
  logger.info(`Wrote report: ${path.relative(process.cwd(), outFile) || outFile}`);
  return true;
}
