import { readFile } from "node:fs/promises";
import {
  formatResidues,
  parsePdb,
  selectResidueRange,
  type Chain,
  type ParseOptions,
  type Residue,
} from "pdb-structure";

import { PDB_ENCODING, fileStem, writeFileAtomic } from "../utils/files.js";

/**
 * The part of a loaded chain the segmenter relies on: where it sits and its
 * residues in file order.
 */
export interface ChainView {
  readonly model: number;
  readonly chainId: string;
  residues(): Iterable<unknown>;
}

export interface LoadedStructure<C extends ChainView = ChainView> {
  id: string;
  chains: C[];
  warnings: string[];
}

/**
 * Loads structure files and serializes residue ranges of their chains. The
 * segmenter depends on nothing else, so any parser can back it.
 */
export interface StructureBackend<C extends ChainView = ChainView> {
  load(file: string): Promise<LoadedStructure<C>>;
  /** Writes residues with ordinals [start, end] of `chain` to `dest`. */
  writeRange(chain: C, start: number, end: number, dest: string): Promise<void>;
}

export interface PdbChainView extends ChainView {
  readonly chain: Chain;
  residues(): Iterable<Residue>;
}

export function createPdbBackend(parseOptions: Omit<ParseOptions, "id"> = {}): StructureBackend<PdbChainView> {
  return {
    async load(file) {
      const text = await readFile(file, PDB_ENCODING);
      const structure = parsePdb(text, { ...parseOptions, id: fileStem(file) });
      const chains: PdbChainView[] = [];
      for (const model of structure.models) {
        for (const chain of model.chains) {
          chains.push({ model: model.serial, chainId: chain.id, chain, residues: () => chain.residues });
        }
      }
      return { id: structure.id, chains, warnings: structure.metadata.warnings };
    },

    async writeRange(view, start, end, dest) {
      const residues = selectResidueRange(view.chain, start, end);
      await writeFileAtomic(dest, formatResidues(residues, view.chainId), PDB_ENCODING);
    },
  };
}
