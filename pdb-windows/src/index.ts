export * from "./errors.js";
export * from "./config.js";
export { createConsoleLogger, getLogger, silentLogger, type Logger, type LogLevel, type LogData } from "./utils/logger.js";
export { listStructureFiles, writeFileAtomic, fileStem, PDB_ENCODING } from "./utils/files.js";
export {
  createPdbBackend,
  type ChainView,
  type LoadedStructure,
  type PdbChainView,
  type StructureBackend,
} from "./backend/structureBackend.js";
export { runBatch, type BatchOptions, type BatchReport, type FileOutcome } from "./batch/runBatch.js";
export { planWindows, iterateWindows, countResidues, windowFileName, type WindowSpan, type ChainWindow, type WindowNameFields } from "./segment/windows.js";
export {
  segmentFile,
  segmentDirectory,
  type SegmentResult,
  type SegmentFileOptions,
  type SegmentDeps,
  type WrittenWindow,
} from "./segment/segmenter.js";
export {
  renumberLines,
  renumberText,
  renumberFile,
  renumberTargets,
  type RenumberedLines,
  type RenumberResult,
  type RenumberDeps,
} from "./renumber/renumber.js";
export { describeStructure, inspectDirectory, pairwiseCombinations, listFilePairs, type InspectResult } from "./inspect/inspect.js";
export { main, USAGE, type CliIo } from "./cli.js";
