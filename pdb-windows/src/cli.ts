import { parseArgs } from "node:util";
import { type } from "arktype";

import { createPdbBackend } from "./backend/structureBackend.js";
import type { BatchReport } from "./batch/runBatch.js";
import { ConfigError, PdbToolError, errorMessage } from "./errors.js";
import { inspectDirectory, listFilePairs } from "./inspect/inspect.js";
import { renumberTargets } from "./renumber/renumber.js";
import { segmentDirectory } from "./segment/segmenter.js";
import { createConsoleLogger, type Logger } from "./utils/logger.js";

export const USAGE = `Usage: pdb-windows <command> <path> [options]

Commands:
  segment <dir>          write every residue window of every chain as its own file
  renumber <file|dir>    renumber residues from 1 in place
  inspect <dir>          print the models and chains of each structure file
  pairs <dir>            print every unordered pair of files

Options:
  --out-dir <dir>        segment: output directory (default: input directory)
  --window-size <n>      segment: residues per window (default: 9)
  --name-template <t>    segment: {basename} {model} {chain} {start} {end}
                         (default: {basename}_{chain}_{start}.pdb, {basename}_m{model}_{chain}_{start}.pdb
                         for files with several models)
  --skip-hetero          segment: leave HETATM residues out of the chains
  --altloc <policy>      segment: all | occupancy (default: all)
  --model <n>            segment: only this MODEL
  --ext <ext>            structure file extension (default: .pdb)
  --concurrency <n>      files processed at once (default: 1)
  --verbose | --quiet    more or less logging
  -h, --help             show this help`;

const AltLocPolicy = type("'all' | 'occupancy'");

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  logger?: Logger;
  signal?: AbortSignal;
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(line + "\n"),
  stderr: (line) => process.stderr.write(line + "\n"),
};

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "out-dir": { type: "string" },
      "window-size": { type: "string" },
      "name-template": { type: "string" },
      "skip-hetero": { type: "boolean" },
      altloc: { type: "string" },
      model: { type: "string" },
      ext: { type: "string" },
      concurrency: { type: "string" },
      verbose: { type: "boolean" },
      quiet: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/** Failing files on stderr; 1 if any failed, 130 if the run was interrupted. */
function finish<T>(report: BatchReport<T>, io: CliIo): number {
  for (const { file, error } of report.failed) io.stderr(`failed: ${file}: ${error.message}`);
  if (!report.ok) return 1;
  return report.cancelled > 0 ? 130 : 0;
}

/**
 * Runs the command line and resolves to the process exit code: 0 on full
 * success, 1 when any file failed, 2 on usage or configuration errors.
 */
export async function main(argv: string[], io: CliIo = processIo): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    io.stderr(errorMessage(err));
    io.stderr(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const [command, target, ...extra] = positionals;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (command === undefined || target === undefined || extra.length > 0) {
    io.stderr(USAGE);
    return 2;
  }

  const logger = io.logger ?? createConsoleLogger(values.verbose ? "debug" : values.quiet ? "error" : "info");
  const concurrency = toNumber(values.concurrency);

  try {
    switch (command) {
      case "segment": {
        const altLocPolicy = AltLocPolicy(values.altloc ?? "all");
        if (altLocPolicy instanceof type.errors) throw new ConfigError(`Invalid --altloc: ${altLocPolicy.summary}`);
        const modelSelection = toNumber(values.model);
        if (modelSelection !== undefined && !(Number.isInteger(modelSelection) && modelSelection > 0)) {
          throw new ConfigError(`Invalid --model: ${values.model ?? ""}`);
        }
        const report = await segmentDirectory(
          {
            inputDir: target,
            outDir: values["out-dir"],
            windowSize: toNumber(values["window-size"]),
            nameTemplate: values["name-template"],
            extension: values.ext,
            concurrency,
          },
          {
            backend: createPdbBackend({
              includeHetero: !values["skip-hetero"],
              altLocPolicy,
              modelSelection,
            }),
            logger,
            signal: io.signal,
          },
        );
        const windows = report.outcomes.reduce((n, o) => n + (o.status === "ok" ? o.value.windows.length : 0), 0);
        io.stdout(`segmented ${report.succeeded} of ${report.outcomes.length} files into ${windows} windows`);
        return finish(report, io);
      }
      case "renumber": {
        const report = await renumberTargets({ target, extension: values.ext, concurrency }, { logger, signal: io.signal });
        io.stdout(`renumbered ${report.succeeded} of ${report.outcomes.length} files`);
        return finish(report, io);
      }
      case "inspect": {
        const report = await inspectDirectory({ inputDir: target, extension: values.ext }, { logger, signal: io.signal });
        for (const o of report.outcomes) {
          if (o.status !== "ok") continue;
          io.stdout(`file: ${o.file}`);
          for (const line of o.value.lines) io.stdout(line);
        }
        return finish(report, io);
      }
      case "pairs": {
        for (const [a, b] of await listFilePairs(target)) io.stdout(`${a} ${b}`);
        return 0;
      }
      default:
        io.stderr(`Unknown command: ${command}`);
        io.stderr(USAGE);
        return 2;
    }
  } catch (err) {
    io.stderr(errorMessage(err));
    if (err instanceof ConfigError) return 2;
    if (err instanceof PdbToolError) return 1;
    throw err;
  }
}
