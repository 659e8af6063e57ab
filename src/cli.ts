#!/usr/bin/env node
import { Command, Option } from "commander";
import { runMigration, MigrateResult } from "./commands/migrate";
import { BatchStatus } from "./commands/import";
import { CliOptions, DEFAULTS, loadDotenv, resolveConfig } from "./config/settings";
import { MigrationError, errorMessage } from "./errors";
import { logger } from "./utils/logger";

export const EXIT_OK = 0;
export const EXIT_FAILED_UNITS = 1;
export const EXIT_FATAL = 2;

export function exitCodeFor(status: BatchStatus | "dry-run") {
  if (status === "fatal") return EXIT_FATAL;
  if (status === "failure") return EXIT_FAILED_UNITS;
  return EXIT_OK;
}

export function printSummary({ result, status, reportFile }: MigrateResult) {
  logger.info(
    `Processed ${result.total}: imported ${result.succeeded}, skipped ${result.skipped}, failed ${result.failed}` +
      (result.pending.length ? `, not attempted ${result.pending.length}` : "")
  );
  if (result.failures.length) {
    logger.error("Failed:");
    for (const f of result.failures) logger.error(`  - ${f.id}: ${f.reason}`);
  }
  if (result.aborted) logger.error(`Migration aborted: ${result.aborted.message}`);
  if (reportFile) logger.info(`Report: ${reportFile}`);

  if (status === "success") logger.info("Migration completed successfully");
  else if (status === "dry-run") logger.info("Dry run completed");
}

function withConnectionOptions(cmd: Command) {
  return cmd
    .option("--konnect-addr <url>", `Kong Connect address (env KONNECT_ADDR, default: ${DEFAULTS.konnectAddr})`)
    .option(
      "--konnect-control-plane <name>",
      `Kong control plane name (env KONNECT_CONTROL_PLANE, default: ${DEFAULTS.konnectControlPlane})`
    )
    .option("--konnect-token <token>", "Kong Connect token (env KONNECT_TOKEN)")
    .option("--tyk-url <url>", `Tyk Dashboard URL (env TYK_DASHBOARD_URL, default: ${DEFAULTS.tykDashboardUrl})`)
    .option("--tyk-token <token>", "Tyk Dashboard auth token (env TYK_AUTH_TOKEN)")
    .option("--data-dir <path>", `Directory for JSON data, emptied on start unless --keep-data-dir (env DATA_DIR, default: ${DEFAULTS.dataDir})`)
    .option("--dump-file <path>", "Use an existing deck JSON dump instead of running deck")
    .option("--keep-data-dir", "Create the data directory if needed but do not empty it", false)
    .option("--concurrency <n>", `Imports in flight (env MIGRATE_CONCURRENCY, default: ${DEFAULTS.concurrency})`)
    .option("--timeout <ms>", `Per-request timeout (env MIGRATE_TIMEOUT_MS, default: ${DEFAULTS.timeoutMs})`)
    .addOption(
      new Option("--on-duplicate <policy>", "What to do with services sharing a name")
        .choices(["suffix", "reject"])
        .default("suffix")
    )
    .option("--env-file <path>", "Load environment variables from this file instead of .env");
}

/**
 * Turn the first SIGINT into a cooperative cancel: imports in flight are
 * aborted and the partial result is still reported.
 */
export function abortOnInterrupt() {
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Interrupted, cancelling remaining imports...");
    controller.abort(new Error("interrupted"));
  };
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener("SIGINT", onInterrupt);
    },
  };
}

async function run(opts: CliOptions & { envFile?: string }): Promise<number> {
  const interrupt = abortOnInterrupt();
  try {
    loadDotenv(opts.envFile);
    const config = resolveConfig(opts);
    const res = await runMigration(config, { signal: interrupt.signal });
    printSummary(res);
    return exitCodeFor(res.status);
  } catch (err) {
    logger.error(errorMessage(err));
    if (!(err instanceof MigrationError)) logger.debug(err);
    return EXIT_FATAL;
  } finally {
    interrupt.dispose();
  }
}

export function buildProgram() {
  const program = new Command();

  program
    .name("gateway-migrate")
    .description("Migrate Kong services to Tyk Dashboard API definitions")
    .version("0.1.0");

  withConnectionOptions(program.command("migrate", { isDefault: true }))
    .description("Export Kong, transform to Tyk OAS definitions and import them")
    .option("--dry-run", "Write artifacts and report but import nothing", false)
    .action(async (opts: CliOptions & { envFile?: string }) => {
      process.exitCode = await run(opts);
    });

  withConnectionOptions(program.command("transform"))
    .description("Transform an existing deck dump into Tyk OAS files without importing")
    .action(async (opts: CliOptions & { envFile?: string }) => {
      if (!opts.dumpFile) {
        logger.error("transform needs --dump-file");
        process.exitCode = EXIT_FATAL;
        return;
      }
      process.exitCode = await run({ ...opts, dryRun: true });
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      logger.error(errorMessage(err));
      process.exitCode = EXIT_FATAL;
    });
}
