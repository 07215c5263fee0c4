export * from "./types/structure.js";
export { parsePdb, PdbParseError, type ParseOptions } from "./pdb/parse.js";
export { formatResidues, formatTer } from "./pdb/write.js";
export {
  recordKind,
  sliceColumns,
  readResidueNumberField,
  writeRightJustified,
  parseIntField,
  parseFloatField,
  ATOM_SERIAL_FIELD,
  RESIDUE_NUMBER_FIELD,
  type RecordKind,
  type ColumnField,
} from "./pdb/columns.js";
export { chainLength, selectResidueRange } from "./select/selection.js";
export { WarningCollector } from "./utils/warnings.js";
