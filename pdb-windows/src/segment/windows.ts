import type { ChainView } from "../backend/structureBackend.js";

/** A run of residue ordinals [start, end], 1-based and inclusive. */
export interface WindowSpan {
  start: number;
  end: number;
}

export interface ChainWindow<C extends ChainView = ChainView> extends WindowSpan {
  chain: C;
}

/**
 * Every full window of `windowSize` residues in a chain of `length` residues,
 * sliding by one. A chain shorter than the window yields none; the tail is
 * never emitted as a partial window.
 */
export function planWindows(length: number, windowSize: number): WindowSpan[] {
  const spans: WindowSpan[] = [];
  for (let start = 1; start + windowSize - 1 <= length; start++) {
    spans.push({ start, end: start + windowSize - 1 });
  }
  return spans;
}

export function countResidues(chain: ChainView): number {
  let n = 0;
  for (const _ of chain.residues()) n++;
  return n;
}

export function* iterateWindows<C extends ChainView>(chains: Iterable<C>, windowSize: number): Generator<ChainWindow<C>> {
  for (const chain of chains) {
    for (const span of planWindows(countResidues(chain), windowSize)) {
      yield { chain, ...span };
    }
  }
}

export interface WindowNameFields {
  basename: string;
  model: number;
  chain: string;
  start: number;
  end: number;
}

/**
 * Expands {basename}, {model}, {chain}, {start} and {end} in `template`.
 * A blank chain ID is written as "_". Unknown placeholders are left as is.
 */
export function windowFileName(template: string, fields: WindowNameFields): string {
  const values: Record<string, string> = {
    basename: fields.basename,
    model: String(fields.model),
    chain: fields.chain.trim() || "_",
    start: String(fields.start),
    end: String(fields.end),
  };
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match);
}
