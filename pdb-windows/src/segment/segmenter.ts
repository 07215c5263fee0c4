import { mkdir } from "node:fs/promises";
import { join } from "node:path";

import {
  createPdbBackend,
  type ChainView,
  type LoadedStructure,
  type StructureBackend,
} from "../backend/structureBackend.js";
import { runBatch, type BatchReport } from "../batch/runBatch.js";
import {
  DEFAULT_MULTI_MODEL_NAME_TEMPLATE,
  DEFAULT_NAME_TEMPLATE,
  resolveSegmentConfig,
  type SegmentConfigInput,
} from "../config.js";
import { WriteError, toLoadError, toWriteError } from "../errors.js";
import { fileStem, listStructureFiles } from "../utils/files.js";
import { getLogger, type Logger } from "../utils/logger.js";
import { iterateWindows, windowFileName } from "./windows.js";

export interface WrittenWindow {
  model: number;
  chain: string;
  start: number;
  end: number;
  path: string;
}

export interface SegmentResult {
  file: string;
  windows: WrittenWindow[];
  warnings: string[];
}

export interface SegmentFileOptions<C extends ChainView = ChainView> {
  outDir: string;
  windowSize: number;
  // Defaults to DEFAULT_NAME_TEMPLATE, or DEFAULT_MULTI_MODEL_NAME_TEMPLATE when the file holds several models
  nameTemplate?: string;
  backend: StructureBackend<C>;
  logger?: Logger;
}

/**
 * Loads one structure file and writes every full window of every chain of
 * every model to `outDir`, once per (chain, start). Every window gets its own
 * path; a template that maps two windows of the file to one path fails the
 * file before anything is written.
 *
 * @throws {LoadError} when the file cannot be read or parsed
 * @throws {WriteError} on a path collision, or when the output directory or a window file cannot be written
 */
export async function segmentFile<C extends ChainView>(file: string, options: SegmentFileOptions<C>): Promise<SegmentResult> {
  const { outDir, windowSize, backend } = options;
  const log = getLogger(options.logger);

  let loaded: LoadedStructure<C>;
  try {
    loaded = await backend.load(file);
  } catch (err) {
    throw toLoadError(file, err);
  }
  for (const w of loaded.warnings) log.warn(w, { file });

  const basename = fileStem(file);
  const multiModel = new Set(loaded.chains.map((c) => c.model)).size > 1;
  const nameTemplate = options.nameTemplate ?? (multiModel ? DEFAULT_MULTI_MODEL_NAME_TEMPLATE : DEFAULT_NAME_TEMPLATE);

  const planned: Array<{ chain: C; window: WrittenWindow }> = [];
  const owners = new Map<string, string>();
  for (const { chain, start, end } of iterateWindows(loaded.chains, windowSize)) {
    const path = join(outDir, windowFileName(nameTemplate, { basename, model: chain.model, chain: chain.chainId, start, end }));
    const label = `window ${start}-${end} of model ${chain.model} chain ${chain.chainId}`;
    const owner = owners.get(path);
    if (owner !== undefined) {
      throw new WriteError(`Name template "${nameTemplate}" maps ${owner} and ${label} to ${path}`, { file: path });
    }
    owners.set(path, label);
    planned.push({ chain, window: { model: chain.model, chain: chain.chainId, start, end, path } });
  }

  try {
    await mkdir(outDir, { recursive: true });
  } catch (err) {
    throw toWriteError(outDir, err);
  }

  const windows: WrittenWindow[] = [];
  for (const { chain, window } of planned) {
    try {
      await backend.writeRange(chain, window.start, window.end, window.path);
    } catch (err) {
      throw toWriteError(window.path, err);
    }
    windows.push(window);
    log.debug("window written", { file, chain: window.chain, start: window.start, end: window.end });
  }

  log.info(`${basename}: ${windows.length} windows`, { file });
  return { file, windows, warnings: [...loaded.warnings] };
}

export interface SegmentDeps<C extends ChainView = ChainView> {
  backend?: StructureBackend<C>;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Segments every structure file in `config.inputDir`. Per-file failures
 * are recorded in the report and do not stop the batch.
 */
export async function segmentDirectory(
  config: SegmentConfigInput,
  deps: SegmentDeps = {},
): Promise<BatchReport<SegmentResult>> {
  const resolved = resolveSegmentConfig(config);
  const backend: StructureBackend = deps.backend ?? createPdbBackend();
  const files = await listStructureFiles(resolved.inputDir, resolved.extension);
  getLogger(deps.logger).debug(`found ${files.length} structure files`, { dir: resolved.inputDir });

  return runBatch(
    files,
    (file) =>
      segmentFile(file, {
        outDir: resolved.outDir ?? resolved.inputDir,
        windowSize: resolved.windowSize,
        nameTemplate: resolved.nameTemplate,
        backend,
        logger: deps.logger,
      }),
    { concurrency: resolved.concurrency, signal: deps.signal, logger: deps.logger, label: "segment" },
  );
}
