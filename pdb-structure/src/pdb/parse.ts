import type { AtomRecord, Chain, Model, Residue, Structure } from "../types/structure.js";
import { WarningCollector } from "../utils/warnings.js";
import { parseFloatField, parseIntField, recordKind, sliceColumns as slice } from "./columns.js";

export class PdbParseError extends Error {
  readonly lineNumber?: number;

  constructor(message: string, lineNumber?: number) {
    super(lineNumber != null ? `Line ${lineNumber}: ${message}` : message);
    this.name = "PdbParseError";
    this.lineNumber = lineNumber;
  }
}

export interface ParseOptions {
  // Identifier stored on the Structure (usually the file's base name)
  id?: string;
  // Keep HETATM residues (ligands, waters) in their chains. Default true.
  includeHetero?: boolean;
  // Select which MODEL to parse (serial from the MODEL record). If no MODEL records are present, the whole file is model 1.
  modelSelection?: number;
  // When multiple altLocs exist for the same atom site:
  // 'all' (default) => keep every line; 'occupancy' => keep only the highest-occupancy site
  altLocPolicy?: "all" | "occupancy";
}

interface ChainBuilder {
  chain: Chain;
  residueByKey: Map<string, Residue>;
}

interface ModelBuilder {
  model: Model;
  chainById: Map<string, ChainBuilder>;
}

/**
 * Parses PDB text into a Structure → Model → Chain → Residue tree, keeping
 * file order at every level. Residues are grouped by (resSeq, iCode, resName)
 * within their chain; a chain ID that reappears later in the same model
 * (e.g. waters after TER) extends the existing chain.
 */
export function parsePdb(pdbText: string, options: ParseOptions = {}): Structure {
  const { id = "", includeHetero = true, modelSelection, altLocPolicy = "all" } = options;
  const W = new WarningCollector();

  const models: ModelBuilder[] = [];
  const modelBySerial = new Map<number, ModelBuilder>();

  let modelCount = 0;
  let currentModel: number | null = null;
  let seenModelRecords = false;
  let atomCount = 0;
  let lineNum = 0;

  const builderFor = (serial: number): ModelBuilder => {
    let mb = modelBySerial.get(serial);
    if (!mb) {
      mb = { model: { serial, chains: [] }, chainById: new Map() };
      modelBySerial.set(serial, mb);
      models.push(mb);
    }
    return mb;
  };

  // Single-pass line scanner (avoid split and second pass)
  for (let i = 0, n = pdbText.length; i < n; ) {
    let j = pdbText.indexOf("\n", i);
    if (j === -1) j = n;
    let line = pdbText.substring(i, j);
    if (line.endsWith("\r")) line = line.slice(0, -1);
    i = j + 1;
    lineNum++;

    const rec = slice(line, 0, 6).toUpperCase();
    if (rec.startsWith("MODEL")) {
      seenModelRecords = true;
      modelCount++;
      currentModel = parseIntField(slice(line, 10, 14)) ?? modelCount; // fallback to ordinal order
      continue;
    }
    if (rec.startsWith("ENDMDL")) {
      currentModel = null;
      continue;
    }

    const kind = recordKind(rec);
    if (kind !== "ATOM" && kind !== "HETATM") continue;
    if (kind === "HETATM" && !includeHetero) continue;

    let modelSerial = 1;
    if (seenModelRecords) {
      if (currentModel === null) {
        W.add("ATOM/HETATM outside a MODEL block skipped", lineNum);
        continue;
      }
      if (modelSelection != null && currentModel !== modelSelection) continue;
      modelSerial = currentModel;
    }

    const atom = readAtom(line, kind === "HETATM", lineNum);
    if (atom === null) {
      W.add("missing coordinates in ATOM/HETATM", lineNum);
      continue;
    }
    atomCount++;

    const mb = builderFor(modelSerial);
    let cb = mb.chainById.get(atom.chainID);
    if (!cb) {
      cb = { chain: { id: atom.chainID, residues: [] }, residueByKey: new Map() };
      mb.chainById.set(atom.chainID, cb);
      mb.model.chains.push(cb.chain);
    }

    const rKey = `${atom.resSeq}|${atom.iCode}|${atom.resName}`;
    let residue = cb.residueByKey.get(rKey);
    if (!residue) {
      residue = {
        ordinal: cb.chain.residues.length + 1,
        seq: atom.resSeq,
        iCode: atom.iCode,
        name: atom.resName,
        hetero: atom.hetero,
        atoms: [],
      };
      cb.residueByKey.set(rKey, residue);
      cb.chain.residues.push(residue);
    }
    residue.atoms.push(atom);
  }

  if (atomCount === 0) {
    throw new PdbParseError("No ATOM or HETATM records found");
  }

  if (altLocPolicy === "occupancy") {
    for (const { model } of models) {
      for (const chain of model.chains) {
        for (const residue of chain.residues) resolveAltLocs(residue, W);
      }
    }
  }

  return {
    id,
    models: models.map((mb) => mb.model),
    metadata: { modelCount: Math.max(1, modelCount), warnings: W.toArray() },
  };
}

function readAtom(line: string, hetero: boolean, lineNumber: number): AtomRecord | null {
  const resSeqText = slice(line, 22, 26);
  const resSeq = parseIntField(resSeqText);
  if (resSeq === null) {
    throw new PdbParseError(`Invalid or missing residue number "${resSeqText}"`, lineNumber);
  }
  const x = parseFloatField(slice(line, 30, 38));
  const y = parseFloatField(slice(line, 38, 46));
  const z = parseFloatField(slice(line, 46, 54));
  if (x == null || y == null || z == null) return null;

  return {
    serial: parseIntField(slice(line, 6, 11)) ?? 0,
    name: slice(line, 12, 16),
    altLoc: slice(line, 16, 17).trim(),
    resName: slice(line, 17, 20).trim(),
    chainID: slice(line, 21, 22).trim() || " ",
    resSeq,
    iCode: slice(line, 26, 27).trim(),
    x,
    y,
    z,
    occupancy: parseFloatField(slice(line, 54, 60)),
    tempFactor: parseFloatField(slice(line, 60, 66)),
    hetero,
    lineNumber,
    line,
  };
}

function resolveAltLocs(residue: Residue, W: WarningCollector): void {
  if (!residue.atoms.some((a) => a.altLoc !== "")) return;
  const bestByName = new Map<string, AtomRecord>();
  for (const a of residue.atoms) {
    const prev = bestByName.get(a.name);
    if (prev == null || (a.occupancy ?? 1.0) > (prev.occupancy ?? 1.0)) bestByName.set(a.name, a);
  }
  const kept = Array.from(bestByName.values());
  const dropped = residue.atoms.length - kept.length;
  if (dropped > 0) {
    W.add(`AltLoc resolution: kept highest-occupancy sites in ${residue.name} ${residue.seq}${residue.iCode}, dropped ${dropped} atoms`);
    residue.atoms = kept;
  }
}
