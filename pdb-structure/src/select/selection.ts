import type { Chain, Residue } from "../types/structure.js";

/**
 * Number of residues in a chain, counted by iterating them.
 */
export function chainLength(chain: Pick<Chain, "residues">): number {
  let n = 0;
  for (const _ of chain.residues) n++;
  return n;
}

/**
 * Residues whose ordinal lies in [start, end] (1-based, inclusive).
 * @throws RangeError if the range is empty or reaches outside the chain
 */
export function selectResidueRange(chain: Chain, start: number, end: number): Residue[] {
  const length = chainLength(chain);
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start || end > length) {
    throw new RangeError(`Residue range ${start}-${end} is outside chain ${chain.id} (1-${length})`);
  }
  return chain.residues.filter((r) => r.ordinal >= start && r.ordinal <= end);
}
