import type { Residue } from "../types/structure.js";
import { ATOM_SERIAL_FIELD, writeRightJustified } from "./columns.js";

/**
 * Serializes a run of residues from one chain as a standalone PDB file:
 * the atom lines copied through with serials renumbered from 1, a TER record
 * for the last residue, then END.
 */
export function formatResidues(residues: readonly Residue[], chainId: string): string {
  const last = residues[residues.length - 1];
  if (!last) throw new RangeError("Cannot format an empty residue selection");

  const out: string[] = [];
  let serial = 0;
  for (const residue of residues) {
    for (const atom of residue.atoms) {
      out.push(writeRightJustified(atom.line, ATOM_SERIAL_FIELD, ++serial));
    }
  }
  out.push(formatTer(serial + 1, last, chainId));
  out.push("END");
  return out.join("\n") + "\n";
}

// TER   sssss      RRR CNNNNI
export function formatTer(serial: number, residue: Residue, chainId: string): string {
  const line =
    "TER   " +
    String(serial).padStart(5) +
    "      " +
    residue.name.padStart(3) +
    " " +
    (chainId || " ").charAt(0) +
    String(residue.seq).padStart(4) +
    (residue.iCode || " ");
  return line.trimEnd();
}
