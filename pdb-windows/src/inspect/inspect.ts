import { readdir, readFile } from "node:fs/promises";
import { parsePdb, type Structure } from "pdb-structure";

import { runBatch, type BatchReport } from "../batch/runBatch.js";
import { resolveListingConfig, type ListingConfigInput } from "../config.js";
import { LoadError, toLoadError } from "../errors.js";
import { PDB_ENCODING, fileStem, listStructureFiles } from "../utils/files.js";
import type { Logger } from "../utils/logger.js";

/**
 * One line per model, then one indented line per chain with its residue count.
 */
export function describeStructure(structure: Structure): string[] {
  const lines: string[] = [];
  for (const model of structure.models) {
    lines.push(`model ${model.serial}`);
    for (const chain of model.chains) {
      lines.push(`  chain ${chain.id}: ${chain.residues.length} residues`);
    }
  }
  return lines;
}

export interface InspectResult {
  file: string;
  lines: string[];
}

export async function inspectDirectory(
  config: ListingConfigInput,
  deps: { logger?: Logger; signal?: AbortSignal } = {},
): Promise<BatchReport<InspectResult>> {
  const resolved = resolveListingConfig(config);
  const files = await listStructureFiles(resolved.inputDir, resolved.extension);
  return runBatch(
    files,
    async (file) => {
      let structure: Structure;
      try {
        structure = parsePdb(await readFile(file, PDB_ENCODING), { id: fileStem(file) });
      } catch (err) {
        throw toLoadError(file, err);
      }
      return { file, lines: describeStructure(structure) };
    },
    { signal: deps.signal, logger: deps.logger, label: "inspect" },
  );
}

/** Every unordered pair of distinct items, in listing order. */
export function* pairwiseCombinations<T>(items: readonly T[]): Generator<[T, T]> {
  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      const a = items[i];
      const b = items[j];
      if (a !== undefined && b !== undefined) yield [a, b];
    }
  }
}

/** Names of all regular files in `dir`, paired. */
export async function listFilePairs(dir: string): Promise<Array<[string, string]>> {
  let names: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    names = entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (err) {
    throw new LoadError(`Cannot read directory: ${dir}`, { file: dir, cause: err });
  }
  return Array.from(pairwiseCombinations(names));
}
