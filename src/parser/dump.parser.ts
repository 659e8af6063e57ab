import fs from "fs-extra";
import { SourceRecordSet, SourceRecordSetSchema } from "../model/source";
import { DumpParseError, errorMessage } from "../errors";

/**
 * Read a deck JSON dump. Only the top-level shape is checked; per-service
 * problems are left to the transform so they count against single records.
 */
export async function loadSourceRecordSet(dumpFile: string): Promise<SourceRecordSet> {
  if (!(await fs.pathExists(dumpFile))) {
    throw new DumpParseError(dumpFile, "file not found");
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(dumpFile);
  } catch (err) {
    throw new DumpParseError(dumpFile, errorMessage(err), err);
  }

  const parsed = SourceRecordSetSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new DumpParseError(dumpFile, `${first.path.join(".") || "<root>"}: ${first.message}`);
  }
  return parsed.data;
}
