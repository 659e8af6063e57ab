import fs from "fs-extra";
import path from "path";

export async function writeFileSafe(filePath: string, content: string) {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content, "utf8");
}

export async function writeJsonSafe(filePath: string, value: unknown) {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeJson(filePath, value, { spaces: 2 });
}

/**
 * Empty (or create) the scratch directory. Refuses the filesystem root and
 * the working directory itself, since its whole content is deleted.
 * With `keep`, the directory is only created and existing files stay.
 */
export async function prepareDataDir(dir: string, opts: { keep?: boolean } = {}) {
  const resolved = path.resolve(dir);
  if (opts.keep) {
    await fs.ensureDir(resolved);
    return resolved;
  }
  if (resolved === path.parse(resolved).root || resolved === process.cwd()) {
    throw new Error(`Refusing to clear data directory ${resolved}`);
  }
  await fs.emptyDir(resolved);
  return resolved;
}
