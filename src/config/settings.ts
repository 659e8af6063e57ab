// src/config/settings.ts
import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors";

export const DEFAULTS = {
  konnectAddr: "https://us.api.konghq.com",
  konnectControlPlane: "default",
  tykDashboardUrl: "http://tyk-dashboard.localhost:3000",
  dataDir: "./json-data",
  concurrency: 1,
  timeoutMs: 30_000,
} as const;

export const DUMP_FILE_NAME = "kong-dump.json";
export const COMBINED_FILE_NAME = "kong-oas.json";
export const REPORT_FILE_NAME = "migration-report.md";

/** Values as they arrive from the command line; all optional. */
export type CliOptions = {
  konnectAddr?: string;
  konnectControlPlane?: string;
  konnectToken?: string;
  tykUrl?: string;
  tykToken?: string;
  dataDir?: string;
  dumpFile?: string;
  concurrency?: string;
  timeout?: string;
  onDuplicate?: string;
  dryRun?: boolean;
  keepDataDir?: boolean;
};

const ConfigSchema = z
  .object({
    konnect: z.object({
      addr: z.string().url(),
      controlPlane: z.string().min(1),
      token: z.string(),
    }),
    tyk: z.object({
      dashboardUrl: z.string().url(),
      authToken: z.string(),
    }),
    dataDir: z.string().min(1),
    dumpFile: z.string().min(1).optional(),
    concurrency: z.coerce.number().int().min(1).max(32),
    timeoutMs: z.coerce.number().int().positive(),
    onDuplicate: z.enum(["suffix", "reject"]),
    dryRun: z.boolean(),
    keepDataDir: z.boolean(),
  })
  .superRefine((cfg, ctx) => {
    // the token is only needed when deck runs
    if (!cfg.dumpFile && !cfg.konnect.token) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["konnect", "token"],
        message: "Kong Connect token (--konnect-token or KONNECT_TOKEN) is required unless --dump-file is given",
      });
    }
    if (!cfg.dryRun && !cfg.tyk.authToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["tyk", "authToken"],
        message: "Tyk Auth token (--tyk-token or TYK_AUTH_TOKEN) is required unless --dry-run is given",
      });
    }
  });

export type MigrationConfig = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

/** Load `.env` into process.env without overriding variables already set. */
export function loadDotenv(file?: string) {
  dotenv.config(file ? { path: file } : undefined);
}

/**
 * Resolve settings with precedence CLI flag > environment > default.
 * The result is passed explicitly to everything that needs it.
 */
export function resolveConfig(cli: CliOptions, env: Env = process.env): MigrationConfig {
  const pick = (flag: string | undefined, name: string) => (flag !== undefined ? flag : env[name]);

  const raw = {
    konnect: {
      addr: pick(cli.konnectAddr, "KONNECT_ADDR") || DEFAULTS.konnectAddr,
      controlPlane: pick(cli.konnectControlPlane, "KONNECT_CONTROL_PLANE") || DEFAULTS.konnectControlPlane,
      token: pick(cli.konnectToken, "KONNECT_TOKEN") ?? "",
    },
    tyk: {
      dashboardUrl: pick(cli.tykUrl, "TYK_DASHBOARD_URL") || DEFAULTS.tykDashboardUrl,
      authToken: pick(cli.tykToken, "TYK_AUTH_TOKEN") ?? "",
    },
    dataDir: path.resolve(pick(cli.dataDir, "DATA_DIR") || DEFAULTS.dataDir),
    dumpFile: cli.dumpFile ? path.resolve(cli.dumpFile) : undefined,
    concurrency: pick(cli.concurrency, "MIGRATE_CONCURRENCY") || DEFAULTS.concurrency,
    timeoutMs: pick(cli.timeout, "MIGRATE_TIMEOUT_MS") || DEFAULTS.timeoutMs,
    onDuplicate: cli.onDuplicate ?? "suffix",
    dryRun: cli.dryRun ?? false,
    keepDataDir: cli.keepDataDir ?? false,
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}
