import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createPdbBackend, type ChainView, type StructureBackend } from "../src/backend/structureBackend.js";
import { DEFAULT_NAME_TEMPLATE } from "../src/config.js";
import { ConfigError, LoadError, WriteError } from "../src/errors.js";
import { segmentDirectory, segmentFile } from "../src/segment/segmenter.js";
import { silentLogger } from "../src/utils/logger.js";
import { atom, chainAtoms, makeTempDir, pdbText, removeDir, residueNumbers, ter, writeText } from "./helpers.js";

interface RecordedWrite {
  chain: string;
  start: number;
  end: number;
  dest: string;
}

function fakeBackend(chains: Array<{ chainId: string; length: number; model?: number }>) {
  const writes: RecordedWrite[] = [];
  const backend: StructureBackend = {
    async load() {
      return {
        id: "fake",
        chains: chains.map(
          ({ chainId, length, model = 1 }): ChainView => ({
            model,
            chainId,
            residues: () => Array.from({ length }, (_, i) => i + 1),
          }),
        ),
        warnings: [],
      };
    },
    async writeRange(chain, start, end, dest) {
      writes.push({ chain: chain.chainId, start, end, dest });
    },
  };
  return { backend, writes };
}

describe("segmentFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("writes each window as a standalone PDB file", async () => {
    const file = await writeText(dir, "x.pdb", pdbText(chainAtoms("A", 10)));
    const out = join(dir, "out");

    const result = await segmentFile(file, {
      outDir: out,
      windowSize: 9,
      nameTemplate: DEFAULT_NAME_TEMPLATE,
      backend: createPdbBackend(),
      logger: silentLogger,
    });

    expect(result.windows).toEqual([
      { model: 1, chain: "A", start: 1, end: 9, path: join(out, "x_A_1.pdb") },
      { model: 1, chain: "A", start: 2, end: 10, path: join(out, "x_A_2.pdb") },
    ]);
    expect(result.warnings).toEqual([]);
    expect((await readdir(out)).sort()).toEqual(["x_A_1.pdb", "x_A_2.pdb"]);

    const expected = [
      ...Array.from({ length: 9 }, (_, k) => atom({ serial: k + 1, resSeq: k + 2, x: k + 1 })),
      ter(10, 10),
      "END",
    ];
    expect(await readFile(join(out, "x_A_2.pdb"), "utf8")).toBe(expected.join("\n") + "\n");
  });

  it("writes one window for a chain of exactly nine residues and none for eight", async () => {
    const nine = await writeText(dir, "nine.pdb", pdbText(chainAtoms("A", 9)));
    const eight = await writeText(dir, "eight.pdb", pdbText(chainAtoms("A", 8)));
    const options = {
      outDir: join(dir, "out"),
      windowSize: 9,
      nameTemplate: DEFAULT_NAME_TEMPLATE,
      backend: createPdbBackend(),
      logger: silentLogger,
    };

    expect((await segmentFile(nine, options)).windows.map((w) => w.start)).toEqual([1]);
    expect((await segmentFile(eight, options)).windows).toEqual([]);
    expect(await readdir(join(dir, "out"))).toEqual(["nine_A_1.pdb"]);
  });

  it("segments every model", async () => {
    const lines = ["MODEL        1", ...chainAtoms("A", 9), "ENDMDL", "MODEL        2", ...chainAtoms("A", 9), "ENDMDL"];
    const file = await writeText(dir, "nmr.pdb", pdbText(lines));

    const result = await segmentFile(file, {
      outDir: dir,
      windowSize: 9,
      nameTemplate: "{basename}_m{model}_{start}.pdb",
      backend: createPdbBackend(),
      logger: silentLogger,
    });

    expect(result.windows.map((w) => w.path)).toEqual([join(dir, "nmr_m1_1.pdb"), join(dir, "nmr_m2_1.pdb")]);
  });

  it("leaves hetero residues out when the backend skips them", async () => {
    const lines = [...chainAtoms("A", 9), atom({ record: "HETATM", serial: 10, resSeq: 101, resName: "HOH" })];
    const file = await writeText(dir, "lig.pdb", pdbText(lines));
    const base = { outDir: dir, windowSize: 9, nameTemplate: DEFAULT_NAME_TEMPLATE, logger: silentLogger };

    const all = await segmentFile(file, { ...base, backend: createPdbBackend() });
    const protein = await segmentFile(file, { ...base, backend: createPdbBackend({ includeHetero: false }) });

    expect(all.windows).toHaveLength(2);
    expect(protein.windows).toHaveLength(1);
  });

  it("writes once per chain and start", async () => {
    const { backend, writes } = fakeBackend([
      { chainId: "A", length: 10 },
      { chainId: "B", length: 9 },
      { chainId: "C", length: 3 },
    ]);

    await segmentFile("/data/two.pdb", {
      outDir: dir,
      windowSize: 9,
      nameTemplate: "{basename}_{chain}_{start}.pdb",
      backend,
      logger: silentLogger,
    });

    expect(writes).toEqual([
      { chain: "A", start: 1, end: 9, dest: join(dir, "two_A_1.pdb") },
      { chain: "A", start: 2, end: 10, dest: join(dir, "two_A_2.pdb") },
      { chain: "B", start: 1, end: 9, dest: join(dir, "two_B_1.pdb") },
    ]);
  });

  it("gives every chain its own files under the default names", async () => {
    const file = await writeText(dir, "two.pdb", pdbText([...chainAtoms("A", 10), ...chainAtoms("B", 10)]));

    const result = await segmentFile(file, {
      outDir: dir,
      windowSize: 9,
      backend: createPdbBackend(),
      logger: silentLogger,
    });

    expect(result.windows.map((w) => `${w.chain}:${w.start}`)).toEqual(["A:1", "A:2", "B:1", "B:2"]);
    expect((await readdir(dir)).sort()).toEqual(["two.pdb", "two_A_1.pdb", "two_A_2.pdb", "two_B_1.pdb", "two_B_2.pdb"]);
    expect(residueNumbers(await readFile(join(dir, "two_A_2.pdb"), "utf8"))[0]).toBe("2");
    expect((await readFile(join(dir, "two_B_1.pdb"), "utf8")).split("\n")[0]?.substring(21, 22)).toBe("B");
  });

  it("adds the model to the default names of a multi-model file", async () => {
    const lines = ["MODEL        1", ...chainAtoms("A", 9), "ENDMDL", "MODEL        2", ...chainAtoms("A", 9), "ENDMDL"];
    const file = await writeText(dir, "nmr.pdb", pdbText(lines));

    const result = await segmentFile(file, { outDir: dir, windowSize: 9, backend: createPdbBackend(), logger: silentLogger });

    expect(result.windows.map((w) => w.path)).toEqual([join(dir, "nmr_m1_A_1.pdb"), join(dir, "nmr_m2_A_1.pdb")]);
  });

  it("fails before writing when a template maps two windows to one path", async () => {
    const { backend, writes } = fakeBackend([
      { chainId: "A", length: 10 },
      { chainId: "B", length: 9 },
    ]);
    const out = join(dir, "out");
    const clash = join(out, "two_1.pdb");

    const promise = segmentFile("/data/two.pdb", {
      outDir: out,
      windowSize: 9,
      nameTemplate: "{basename}_{start}.pdb",
      backend,
      logger: silentLogger,
    });

    await expect(promise).rejects.toBeInstanceOf(WriteError);
    await expect(promise).rejects.toMatchObject({
      file: clash,
      message: `Name template "{basename}_{start}.pdb" maps window 1-9 of model 1 chain A and window 1-9 of model 1 chain B to ${clash}`,
    });
    expect(writes).toEqual([]);
    await expect(readdir(out)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("raises LoadError for a missing file", async () => {
    const missing = join(dir, "missing.pdb");
    const promise = segmentFile(missing, {
      outDir: dir,
      windowSize: 9,
      nameTemplate: DEFAULT_NAME_TEMPLATE,
      backend: createPdbBackend(),
      logger: silentLogger,
    });

    await expect(promise).rejects.toBeInstanceOf(LoadError);
    await expect(promise).rejects.toMatchObject({ notFound: true, file: missing, message: `File not found: ${missing}` });
  });

  it("raises WriteError when the output directory cannot be created", async () => {
    const blocker = await writeText(dir, "blocker", "not a directory");
    const { backend } = fakeBackend([{ chainId: "A", length: 9 }]);

    const promise = segmentFile("/data/one.pdb", {
      outDir: blocker,
      windowSize: 9,
      nameTemplate: DEFAULT_NAME_TEMPLATE,
      backend,
      logger: silentLogger,
    });

    await expect(promise).rejects.toBeInstanceOf(WriteError);
    await expect(promise).rejects.toMatchObject({ file: blocker });
  });

  it("raises WriteError naming the window that failed", async () => {
    const backend: StructureBackend = {
      ...fakeBackend([{ chainId: "A", length: 9 }]).backend,
      async writeRange() {
        throw new Error("disk full");
      },
    };
    const dest = join(dir, "one_A_1.pdb");

    await expect(
      segmentFile("/data/one.pdb", {
        outDir: dir,
        windowSize: 9,
        nameTemplate: DEFAULT_NAME_TEMPLATE,
        backend,
        logger: silentLogger,
      }),
    ).rejects.toThrow(new WriteError(`Cannot write ${dest}: disk full`));
  });
});

describe("segmentDirectory", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("writes windows beside the inputs by default", async () => {
    await writeText(dir, "x.pdb", pdbText(chainAtoms("A", 9)));

    const report = await segmentDirectory({ inputDir: dir }, { logger: silentLogger });

    expect(report.ok).toBe(true);
    expect(report.succeeded).toBe(1);
    expect((await readdir(dir)).sort()).toEqual(["x.pdb", "x_A_1.pdb"]);
  });

  it("writes L-8 distinct windows for every chain of a multi-chain file", async () => {
    await writeText(dir, "two.pdb", pdbText([...chainAtoms("A", 10), ...chainAtoms("B", 12)]));
    const out = join(dir, "out");

    const report = await segmentDirectory({ inputDir: dir, outDir: out }, { logger: silentLogger });

    expect(report.ok).toBe(true);
    const outcome = report.outcomes[0];
    expect(outcome?.status === "ok" ? outcome.value.windows.length : -1).toBe(2 + 4);
    expect(await readdir(out)).toHaveLength(6);
  });

  it("keeps going past a malformed file", async () => {
    const bad = await writeText(dir, "bad.pdb", "HEADER    NOTHING TO SEE\n");
    const good = await writeText(dir, "good.pdb", pdbText(chainAtoms("A", 10)));
    await writeText(dir, "notes.txt", "ignored");
    const out = join(dir, "out");

    const report = await segmentDirectory({ inputDir: dir, outDir: out, concurrency: 2 }, { logger: silentLogger });

    expect(report.ok).toBe(false);
    expect(report.succeeded).toBe(1);
    expect(report.failed.map((f) => f.file)).toEqual([bad]);
    expect(report.failed[0]?.error).toBeInstanceOf(LoadError);
    expect(report.failed[0]?.error.message).toBe(`Cannot load ${bad}: No ATOM or HETATM records found`);

    const second = report.outcomes[1];
    expect(second?.file).toBe(good);
    expect(second?.status === "ok" ? second.value.windows.length : -1).toBe(2);
    expect((await readdir(out)).sort()).toEqual(["good_A_1.pdb", "good_A_2.pdb"]);
  });

  it("only picks up files with the configured extension", async () => {
    await writeText(dir, "a.ent", pdbText(chainAtoms("A", 9)));
    await writeText(dir, "b.pdb", pdbText(chainAtoms("A", 9)));

    const report = await segmentDirectory(
      { inputDir: dir, outDir: join(dir, "out"), extension: ".ent" },
      { logger: silentLogger },
    );

    expect(report.outcomes.map((o) => o.file)).toEqual([join(dir, "a.ent")]);
  });

  it("rejects invalid options before touching the disk", async () => {
    await expect(segmentDirectory({ inputDir: dir, windowSize: 0 })).rejects.toBeInstanceOf(ConfigError);
    await expect(segmentDirectory({ inputDir: dir, nameTemplate: "{basename}.pdb" })).rejects.toThrow(
      /^Invalid segment options/,
    );
    await expect(segmentDirectory({ inputDir: "" })).rejects.toBeInstanceOf(ConfigError);
  });

  it("raises LoadError for a missing input directory", async () => {
    await expect(segmentDirectory({ inputDir: join(dir, "nope") }, { logger: silentLogger })).rejects.toThrow(
      new LoadError(`Cannot read directory: ${join(dir, "nope")}`),
    );
  });

  it("starts no file once cancelled", async () => {
    await writeText(dir, "a.pdb", pdbText(chainAtoms("A", 9)));
    await writeText(dir, "b.pdb", pdbText(chainAtoms("A", 9)));
    const controller = new AbortController();
    controller.abort();

    const report = await segmentDirectory(
      { inputDir: dir, outDir: join(dir, "out") },
      { logger: silentLogger, signal: controller.signal },
    );

    expect(report.cancelled).toBe(2);
    expect(report.succeeded).toBe(0);
    expect(report.ok).toBe(true);
    expect((await readdir(dir)).sort()).toEqual(["a.pdb", "b.pdb"]);
  });
});
