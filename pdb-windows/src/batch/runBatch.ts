import { errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../utils/logger.js";

export type FileOutcome<T> =
  | { file: string; status: "ok"; value: T }
  | { file: string; status: "failed"; error: Error }
  | { file: string; status: "cancelled" };

export interface BatchReport<T> {
  /** One outcome per input file, in input order. */
  outcomes: FileOutcome<T>[];
  succeeded: number;
  failed: Array<{ file: string; error: Error }>;
  cancelled: number;
  /** True when no file failed. */
  ok: boolean;
}

export interface BatchOptions {
  // Files processed at once. Files are independent, so any value is safe.
  concurrency?: number;
  // Checked before each file starts; a file already started runs to completion.
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
}

/**
 * Runs `task` over `files` with a bounded pool, recording a per-file outcome.
 * A failure in one file never stops the others.
 */
export async function runBatch<T>(
  files: readonly string[],
  task: (file: string) => Promise<T>,
  options: BatchOptions = {},
): Promise<BatchReport<T>> {
  const { concurrency = 1, signal, label = "task" } = options;
  const log = getLogger(options.logger);
  const total = files.length;
  const outcomes: FileOutcome<T>[] = files.map((file): FileOutcome<T> => ({ file, status: "cancelled" }));
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < total) {
      const index = nextIndex++;
      const file = files[index];
      if (file === undefined) break;
      if (signal?.aborted) continue;
      try {
        const value = await task(file);
        outcomes[index] = { file, status: "ok", value };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(errorMessage(err));
        outcomes[index] = { file, status: "failed", error };
        log.error(`${label} failed`, error, { file });
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, total));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  const failed: BatchReport<T>["failed"] = [];
  let succeeded = 0;
  let cancelled = 0;
  for (const o of outcomes) {
    if (o.status === "ok") succeeded++;
    else if (o.status === "failed") failed.push({ file: o.file, error: o.error });
    else cancelled++;
  }
  if (cancelled > 0) log.warn(`${label} cancelled before ${cancelled} of ${total} files`);
  log.info(`${label} completed`, { succeeded, failed: failed.length, cancelled });

  return { outcomes, succeeded, failed, cancelled, ok: failed.length === 0 };
}
