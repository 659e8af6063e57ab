// src/commands/import.ts
import { TargetGatewayClient } from "../adapters/tyk/client";
import { Unit } from "../model/splitter";
import { listenPathOf } from "../model/target";
import { TransformIssue } from "../model/mapper";
import { LookupError, MigrationError, TransportError, errorMessage } from "../errors";
import { logger } from "../utils/logger";

export type UnitOutcome =
  | { key: string; status: "skipped"; listenPath: string }
  | { key: string; status: "imported"; listenPath: string; id?: string }
  | { key: string; status: "failed"; reason: string };

export type Failure = {
  id: string;
  reason: string;
};

export type BatchResult = {
  /** processed items: attempted units plus records the transform dropped */
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  failures: Failure[];
  outcomes: UnitOutcome[];
  /** units never attempted: the batch aborted, or this was a dry run */
  pending: string[];
  aborted?: MigrationError;
};

export type BatchStatus = "success" | "failure" | "fatal";

export type ImportOpts = {
  /** maximum units in flight; 1 keeps the original sequential order */
  concurrency?: number;
  /** transform failures to fold into the result */
  transformIssues?: TransformIssue[];
  signal?: AbortSignal;
};

/**
 * Drive every unit through exists -> create. Rejections are recorded and the
 * batch moves on; a transport or lookup failure stops new work, cancels
 * requests in flight and returns the partial result with `aborted` set.
 */
export async function importUnits(
  units: readonly Unit[],
  client: TargetGatewayClient,
  opts: ImportOpts = {}
): Promise<BatchResult> {
  const concurrency = Math.max(1, Math.floor(opts.concurrency ?? 1));
  const slots: Array<UnitOutcome | undefined> = new Array(units.length).fill(undefined);
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener("abort", onParentAbort, { once: true });
  if (opts.signal?.aborted) controller.abort(opts.signal.reason);

  let aborted: MigrationError | undefined;
  let next = 0;

  const worker = async () => {
    while (!controller.signal.aborted && next < units.length) {
      const i = next++;
      try {
        slots[i] = await importUnit(units[i], client, controller.signal);
      } catch (err) {
        if (!aborted) {
          aborted = asFatal(err, controller.signal);
          logger.error(`Aborting import at ${units[i].key}: ${aborted.message}`);
          controller.abort(aborted);
        }
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: Math.min(concurrency, units.length) }, worker));
  } finally {
    opts.signal?.removeEventListener("abort", onParentAbort);
  }

  if (!aborted && controller.signal.aborted) {
    aborted = cancelled(controller.signal);
  }

  return buildResult(units, slots, opts.transformIssues ?? [], aborted);
}

async function importUnit(unit: Unit, client: TargetGatewayClient, signal: AbortSignal): Promise<UnitOutcome> {
  const listenPath = listenPathOf(unit.definition);
  if (!listenPath) {
    logger.error(`Cannot import ${unit.key}: missing listen path`);
    return { key: unit.key, status: "failed", reason: "missing listen path" };
  }

  if (await client.exists(listenPath, signal)) {
    logger.info(`Skipping ${unit.key}: listen path ${listenPath} already exists`);
    return { key: unit.key, status: "skipped", listenPath };
  }

  logger.info(`Importing ${unit.key}...`);
  const outcome = await client.create(unit.definition, signal);
  if (outcome.status === "created") {
    logger.info(`Successfully imported ${unit.key}`);
    return { key: unit.key, status: "imported", listenPath, id: outcome.id };
  }

  logger.error(`Failed to import ${unit.key}. Response (${outcome.httpStatus}): ${outcome.body}`);
  return { key: unit.key, status: "failed", reason: `HTTP ${outcome.httpStatus}: ${outcome.body}` };
}

function asFatal(err: unknown, signal: AbortSignal): MigrationError {
  // once aborted, the failed request is a consequence, not the cause
  if (signal.aborted) return cancelled(signal);
  if (err instanceof TransportError || err instanceof LookupError) return err;
  if (err instanceof MigrationError) return err;
  return new MigrationError(`Unexpected import error: ${errorMessage(err)}`, { cause: err });
}

function cancelled(signal: AbortSignal): MigrationError {
  if (signal.reason instanceof MigrationError) return signal.reason;
  return new MigrationError(`Import cancelled: ${errorMessage(signal.reason)}`);
}

export function buildResult(
  units: readonly Unit[],
  slots: ReadonlyArray<UnitOutcome | undefined>,
  issues: TransformIssue[],
  aborted: MigrationError | undefined
): BatchResult {
  const outcomes = slots.filter((o): o is UnitOutcome => o !== undefined);
  const pending = units.filter((_, i) => slots[i] === undefined).map((u) => u.key);

  const failures: Failure[] = [
    ...issues.map((i) => ({ id: i.id, reason: i.reason })),
    ...outcomes.flatMap((o) => (o.status === "failed" ? [{ id: o.key, reason: o.reason }] : [])),
  ];
  const succeeded = outcomes.filter((o) => o.status === "imported").length;
  const skipped = outcomes.filter((o) => o.status === "skipped").length;

  return {
    total: succeeded + skipped + failures.length,
    succeeded,
    skipped,
    failed: failures.length,
    failures,
    outcomes,
    pending,
    aborted,
  };
}

export function batchStatus(result: BatchResult): BatchStatus {
  if (result.aborted) return "fatal";
  if (result.failed > 0) return "failure";
  return "success";
}
