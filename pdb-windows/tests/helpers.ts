import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface AtomSpec {
  record?: "ATOM" | "HETATM";
  serial?: number;
  chain?: string;
  resSeq: number | string; // strings go into columns 23-26 as written
  resName?: string;
  x?: number;
}

export function atom(spec: AtomSpec): string {
  const { record = "ATOM", serial = 1, chain = "A", resSeq, resName = "GLY", x = 0 } = spec;
  return (
    record.padEnd(6) +
    String(serial).padStart(5) +
    "  CA  " +
    resName +
    " " +
    chain +
    String(resSeq).padStart(4) +
    "    " +
    x.toFixed(3).padStart(8) +
    "   0.000   0.000  1.00  0.00           C"
  );
}

export function ter(serial: number, resSeq: number | string, chain = "A", resName = "GLY"): string {
  return "TER   " + String(serial).padStart(5) + "      " + resName + " " + chain + String(resSeq).padStart(4);
}

/** A chain of `count` residues, one CA each, numbered from `firstSeq`; atom x = residue index. */
export function chainAtoms(chain: string, count: number, firstSeq = 1): string[] {
  return Array.from({ length: count }, (_, k) => atom({ serial: k + 1, chain, resSeq: firstSeq + k, x: k }));
}

export function pdbText(lines: string[]): string {
  return [...lines, "END"].join("\n") + "\n";
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "pdb-windows-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeText(dir: string, name: string, text: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, text, "utf8");
  return path;
}

/** Residue number fields of the ATOM and TER lines, trimmed. */
export function residueNumbers(text: string): string[] {
  return text
    .split("\n")
    .filter((l) => l.startsWith("ATOM") || l.startsWith("TER"))
    .map((l) => l.substring(22, 26).trim());
}
