import { readdir, rename, rm, writeFile } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { randomUUID } from "node:crypto";
import { basename, dirname, extname, join } from "node:path";

import { LoadError } from "../errors.js";

// One character per byte, so fixed columns are byte offsets and no byte is altered
export const PDB_ENCODING: BufferEncoding = "latin1";

export function hasExtension(path: string, extension: string): boolean {
  return path.toLowerCase().endsWith(extension.toLowerCase());
}

/** File name without directory and without its last extension. */
export function fileStem(path: string): string {
  const base = basename(path);
  return base.slice(0, base.length - extname(base).length);
}

/**
 * Regular files directly inside `dir` whose name ends with `extension`
 * (case-insensitive), sorted by name.
 */
export async function listStructureFiles(dir: string, extension: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    throw new LoadError(`Cannot read directory: ${dir}`, { file: dir, cause: e });
  }
  return entries
    .filter((ent) => ent.isFile() && hasExtension(ent.name, extension))
    .map((ent) => ent.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Writes `content` to a temporary file beside `path` and renames it over
 * `path`, so readers see either the old file or the complete new one.
 */
export async function writeFileAtomic(path: string, content: string, encoding: BufferEncoding = "utf8"): Promise<void> {
  const tmp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(tmp, content, encoding);
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
