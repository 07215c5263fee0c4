import { type } from "arktype";

import { ConfigError } from "./errors.js";

export const DEFAULT_WINDOW_SIZE = 9;
export const DEFAULT_EXTENSION = ".pdb";
export const DEFAULT_NAME_TEMPLATE = "{basename}_{chain}_{start}.pdb";
// Used instead of the default when a file holds more than one model
export const DEFAULT_MULTI_MODEL_NAME_TEMPLATE = "{basename}_m{model}_{chain}_{start}.pdb";

const SegmentConfigSchema = type({
  inputDir: "string>0",
  "outDir?": "string>0",
  extension: "string>0",
  windowSize: "0 < number.integer <= 100000",
  "nameTemplate?": "string>0",
  concurrency: "0 < number.integer <= 256",
}).narrow((config, ctx) => {
  // Without {start} every window of a chain would land on the same path
  if (config.nameTemplate !== undefined && !config.nameTemplate.includes("{start}")) {
    return ctx.reject({
      expected: "a name template containing {start}",
      actual: config.nameTemplate,
      message: `nameTemplate must contain {start} (was "${config.nameTemplate}")`,
    });
  }
  return true;
});

const RenumberConfigSchema = type({
  target: "string>0",
  extension: "string>0",
  concurrency: "0 < number.integer <= 256",
});

const ListingConfigSchema = type({
  inputDir: "string>0",
  extension: "string>0",
});

export type SegmentConfig = typeof SegmentConfigSchema.infer;
export type RenumberConfig = typeof RenumberConfigSchema.infer;
export type ListingConfig = typeof ListingConfigSchema.infer;

export interface SegmentConfigInput {
  inputDir: string;
  // Defaults to inputDir
  outDir?: string;
  extension?: string;
  windowSize?: number;
  // Defaults to DEFAULT_NAME_TEMPLATE, or DEFAULT_MULTI_MODEL_NAME_TEMPLATE per multi-model file
  nameTemplate?: string;
  concurrency?: number;
}

export interface RenumberConfigInput {
  // A single structure file or a directory of them
  target: string;
  extension?: string;
  concurrency?: number;
}

export interface ListingConfigInput {
  inputDir: string;
  extension?: string;
}

/**
 * Applies defaults and validates a segmenter configuration.
 * @throws {ConfigError} when a field is out of range
 */
export function resolveSegmentConfig(input: SegmentConfigInput): SegmentConfig {
  const result = SegmentConfigSchema({
    inputDir: input.inputDir,
    ...(input.outDir !== undefined ? { outDir: input.outDir } : {}),
    extension: input.extension ?? DEFAULT_EXTENSION,
    windowSize: input.windowSize ?? DEFAULT_WINDOW_SIZE,
    ...(input.nameTemplate !== undefined ? { nameTemplate: input.nameTemplate } : {}),
    concurrency: input.concurrency ?? 1,
  });
  if (result instanceof type.errors) {
    throw new ConfigError(`Invalid segment options: ${result.summary}`);
  }
  return result;
}

export function resolveRenumberConfig(input: RenumberConfigInput): RenumberConfig {
  const result = RenumberConfigSchema({
    target: input.target,
    extension: input.extension ?? DEFAULT_EXTENSION,
    concurrency: input.concurrency ?? 1,
  });
  if (result instanceof type.errors) {
    throw new ConfigError(`Invalid renumber options: ${result.summary}`);
  }
  return result;
}

export function resolveListingConfig(input: ListingConfigInput): ListingConfig {
  const result = ListingConfigSchema({
    inputDir: input.inputDir,
    extension: input.extension ?? DEFAULT_EXTENSION,
  });
  if (result instanceof type.errors) {
    throw new ConfigError(`Invalid listing options: ${result.summary}`);
  }
  return result;
}
