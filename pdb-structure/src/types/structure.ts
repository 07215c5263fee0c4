export interface AtomRecord {
  serial: number;
  name: string;
  altLoc: string;
  resName: string;
  chainID: string;
  resSeq: number;
  iCode: string;
  x: number;
  y: number;
  z: number;
  occupancy: number | null;
  tempFactor: number | null;
  hetero: boolean;
  lineNumber: number;
  line: string; // source line without its terminator, copied through on write
}

export interface Residue {
  /** 1-based position within the chain, in file order. */
  ordinal: number;
  /** Residue sequence number as recorded in the file. */
  seq: number;
  iCode: string;
  name: string;
  hetero: boolean;
  atoms: AtomRecord[];
}

export interface Chain {
  id: string;
  residues: Residue[];
}

export interface Model {
  serial: number;
  chains: Chain[];
}

export interface Structure {
  id: string;
  models: Model[];
  metadata: {
    modelCount: number;
    warnings: string[];
  };
}
