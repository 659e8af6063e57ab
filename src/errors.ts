// src/errors.ts

/**
 * Base class for every error the migration raises on purpose.
 * `fatal` errors stop the run; anything else is reported per unit.
 */
export class MigrationError extends Error {
  readonly fatal: boolean;

  constructor(message: string, opts: { fatal?: boolean; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = new.target.name;
    this.fatal = opts.fatal ?? true;
  }
}

/** Missing or invalid settings. Raised before the pipeline starts. */
export class ConfigError extends MigrationError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.issues = issues;
  }
}

/** The external export tool could not produce a dump. */
export class ExportError extends MigrationError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null, cause?: unknown) {
    super(message, { cause });
    this.exitCode = exitCode;
  }
}

export class DumpParseError extends MigrationError {
  constructor(file: string, detail: string, cause?: unknown) {
    super(`Failed to read Kong dump ${file}: ${detail}`, { cause });
  }
}

export class DuplicateTitleError extends MigrationError {
  readonly titles: string[];

  constructor(titles: string[]) {
    super(`Duplicate API titles: ${titles.join(", ")}. Rename the services or use --on-duplicate suffix.`);
    this.titles = titles;
  }
}

/** The target could not be reached (connection refused, DNS, timeout). */
export class TransportError extends MigrationError {
  readonly url: string;

  constructor(url: string, detail: string, cause?: unknown) {
    super(`Request to ${url} failed: ${detail}`, { cause });
    this.url = url;
  }
}

/**
 * The existence check got an answer it cannot interpret. Proceeding would
 * risk creating a duplicate, so this is treated like a transport failure.
 */
export class LookupError extends MigrationError {
  readonly status: number;

  constructor(url: string, status: number, detail: string) {
    super(`Lookup ${url} returned ${status}: ${detail}`);
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
