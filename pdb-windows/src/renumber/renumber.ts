import { readFile, stat } from "node:fs/promises";
import {
  parseIntField,
  readResidueNumberField,
  recordKind,
  writeRightJustified,
  RESIDUE_NUMBER_FIELD,
} from "pdb-structure";

import { runBatch, type BatchReport } from "../batch/runBatch.js";
import { resolveRenumberConfig, type RenumberConfigInput } from "../config.js";
import { FormatError, errorMessage, toLoadError, toWriteError } from "../errors.js";
import { PDB_ENCODING, listStructureFiles, writeFileAtomic } from "../utils/files.js";
import { getLogger, type Logger } from "../utils/logger.js";

export interface RenumberedLines {
  lines: string[];
  /** Distinct residues counted on ATOM records. */
  residues: number;
  /** ATOM and TER lines whose residue number field was rewritten. */
  rewritten: number;
  warnings: FormatError[];
}

/**
 * Rewrites the residue number field (columns 23-26) of ATOM and TER records
 * so ATOM residues run contiguously from 1 in order of first appearance.
 *
 * A change of the field on an ATOM line starts the next residue number. A
 * change on a TER line is remembered without advancing the counter, and the
 * TER line takes the current number. A field that is not an integer always
 * counts as a change. Lines too short to carry the field are left as they are.
 *
 * @throws {FormatError} when the residue count no longer fits in four columns
 */
export function renumberLines(lines: readonly string[]): RenumberedLines {
  const out: string[] = [];
  const warnings: FormatError[] = [];
  let currentIdentifier: string | null = null;
  let currentNumber = 0;
  let rewritten = 0;

  for (const [index, raw] of lines.entries()) {
    const kind = recordKind(raw);
    if (kind !== "ATOM" && kind !== "TER") {
      out.push(raw);
      continue;
    }

    // columns are counted without the CR of a CRLF terminator
    const cr = raw.endsWith("\r") ? "\r" : "";
    const line = cr ? raw.slice(0, -1) : raw;
    const field = readResidueNumberField(line);
    if (field === null) {
      warnings.push(new FormatError(`${kind} record too short for a residue number`, index + 1));
      out.push(raw);
      continue;
    }

    if (field !== currentIdentifier || parseIntField(field) === null) {
      currentIdentifier = field;
      // TODO: decide whether a TER that names a new residue should advance the counter
      if (kind === "ATOM") currentNumber++;
    }

    try {
      out.push(writeRightJustified(line, RESIDUE_NUMBER_FIELD, currentNumber) + cr);
    } catch (err) {
      throw new FormatError(`residue number ${currentNumber} does not fit in columns 23-26`, index + 1, { cause: err });
    }
    rewritten++;
  }

  return { lines: out, residues: currentNumber, rewritten, warnings };
}

/** Line terminators, CRs included, come back exactly as they went in. */
export function renumberText(text: string): Omit<RenumberedLines, "lines"> & { text: string } {
  const { lines, ...rest } = renumberLines(text.split("\n"));
  return { text: lines.join("\n"), ...rest };
}

export interface RenumberResult {
  file: string;
  residues: number;
  rewritten: number;
  changed: boolean;
  warnings: string[];
}

/**
 * Renumbers one file, replacing it through a temporary file and a rename.
 * An unchanged file is not rewritten.
 *
 * @throws {LoadError} when the file is missing or unreadable
 * @throws {FormatError} when the residue count overflows the field
 * @throws {WriteError} when the replacement cannot be written
 */
export async function renumberFile(file: string, options: { logger?: Logger } = {}): Promise<RenumberResult> {
  const log = getLogger(options.logger);

  let text: string;
  try {
    text = await readFile(file, PDB_ENCODING);
  } catch (err) {
    throw toLoadError(file, err);
  }

  let result: ReturnType<typeof renumberText>;
  try {
    result = renumberText(text);
  } catch (err) {
    if (err instanceof FormatError) throw new FormatError(err.detail, err.lineNumber, { file, cause: err });
    throw err;
  }
  const warnings = result.warnings.map((w) => w.message);
  for (const w of warnings) log.warn(w, { file });

  const changed = result.text !== text;
  if (changed) {
    try {
      await writeFileAtomic(file, result.text, PDB_ENCODING);
    } catch (err) {
      throw toWriteError(file, err);
    }
  }
  log.info(`${file}: ${result.residues} residues`, { changed });
  return { file, residues: result.residues, rewritten: result.rewritten, changed, warnings };
}

export interface RenumberDeps {
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Renumbers `config.target`: the file itself, or every structure file in it
 * when it is a directory.
 */
export async function renumberTargets(
  config: RenumberConfigInput,
  deps: RenumberDeps = {},
): Promise<BatchReport<RenumberResult>> {
  const resolved = resolveRenumberConfig(config);

  let isDirectory = false;
  try {
    isDirectory = (await stat(resolved.target)).isDirectory();
  } catch (err) {
    // a target that cannot be inspected is reported by renumberFile as a per-file failure
    getLogger(deps.logger).debug(`cannot stat ${resolved.target}: ${errorMessage(err)}`);
  }
  const files = isDirectory ? await listStructureFiles(resolved.target, resolved.extension) : [resolved.target];

  return runBatch(files, (file) => renumberFile(file, { logger: deps.logger }), {
    concurrency: resolved.concurrency,
    signal: deps.signal,
    logger: deps.logger,
    label: "renumber",
  });
}
