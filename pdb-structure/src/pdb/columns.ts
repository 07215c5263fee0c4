export type RecordKind = "ATOM" | "HETATM" | "TER" | "OTHER";

/** A fixed column span, 0-based and end-exclusive. */
export interface ColumnField {
  start: number;
  end: number;
}

// PDB columns 7-11 and 23-26 (1-based)
export const ATOM_SERIAL_FIELD: ColumnField = { start: 6, end: 11 };
export const RESIDUE_NUMBER_FIELD: ColumnField = { start: 22, end: 26 };

export function recordKind(line: string): RecordKind {
  if (line.startsWith("ATOM")) return "ATOM";
  if (line.startsWith("HETATM")) return "HETATM";
  if (line.startsWith("TER")) return "TER";
  return "OTHER";
}

export function sliceColumns(line: string, start: number, end: number): string {
  // start and end are 0-based, end-exclusive; a short line yields what it has
  return line.length > start ? line.substring(start, Math.min(end, line.length)) : "";
}

/**
 * Raw text of the residue sequence number field, or null when the line
 * stops before the end of the field.
 */
export function readResidueNumberField(line: string): string | null {
  if (line.length < RESIDUE_NUMBER_FIELD.end) return null;
  return line.substring(RESIDUE_NUMBER_FIELD.start, RESIDUE_NUMBER_FIELD.end);
}

/**
 * Replaces `field` with `value` right-justified to the field width.
 * Every byte outside the field is kept as is.
 */
export function writeRightJustified(line: string, field: ColumnField, value: string | number): string {
  const width = field.end - field.start;
  const text = String(value);
  if (text.length > width) {
    throw new RangeError(`Value "${text}" does not fit in a ${width}-column field`);
  }
  if (line.length < field.end) {
    throw new RangeError(`Line of length ${line.length} ends before column ${field.end}`);
  }
  return line.substring(0, field.start) + text.padStart(width) + line.substring(field.end);
}

export function parseIntField(s: string): number | null {
  const t = s.trim();
  if (!/^[+-]?\d+$/.test(t)) return null;
  return parseInt(t, 10);
}

export function parseFloatField(s: string): number | null {
  const t = s.trim();
  if (!t) return null;
  const v = Number(t);
  return Number.isFinite(v) ? v : null;
}
