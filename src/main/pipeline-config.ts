import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { ErrorPolicy, LogLevel, PreprocessOptions, RunLogger } from "../core/contracts.js";
import { resolveConcurrency } from "./file-utils.js";

export type LesionPipelineConfig = {
  version: string;
  dataset: {
    root: string;
    image_suffix: string;
    mask_suffix: string;
  };
  preprocess: {
    target_resolution: { height: number; width: number };
    clip_range: [number, number];
    output_range: [number, number];
    stats_channel: number;
  };
  runner: {
    on_error: ErrorPolicy;
    concurrency: number;
    limit: number | null;
  };
  logging: {
    level: LogLevel;
    per_sample_logs: boolean;
    keep_logs: boolean;
  };
};

const rangeSchema = z.tuple([z.number(), z.number()]);

const overridesSchema = z
  .object({
    version: z.string(),
    dataset: z
      .object({
        root: z.string().min(1),
        image_suffix: z.string().min(1),
        mask_suffix: z.string().min(1),
      })
      .partial(),
    preprocess: z
      .object({
        target_resolution: z
          .object({
            height: z.number().int().positive(),
            width: z.number().int().positive(),
          })
          .partial(),
        clip_range: rangeSchema,
        output_range: rangeSchema,
        stats_channel: z.number().int().min(0).max(2),
      })
      .partial(),
    runner: z
      .object({
        on_error: z.enum(["skip", "abort"]),
        concurrency: z.number().int().positive(),
        limit: z.number().int().nonnegative().nullable(),
      })
      .partial(),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]),
        per_sample_logs: z.boolean(),
        keep_logs: z.boolean(),
      })
      .partial(),
  })
  .partial()
  .strict();

export type PipelineConfigOverrides = z.infer<typeof overridesSchema>;

export type PipelineConfigSources = {
  configPath: string;
  loadedFromFile: boolean;
  overrides?: PipelineConfigOverrides;
  envOverrides: PipelineConfigOverrides;
};

export const defaultConfig: LesionPipelineConfig = {
  version: "0.1.0",
  dataset: {
    root: "data",
    image_suffix: ".jpg",
    mask_suffix: "_superpixels.png",
  },
  preprocess: {
    target_resolution: { height: 128, width: 128 },
    clip_range: [-5, 5],
    output_range: [0, 1],
    stats_channel: 0,
  },
  runner: { on_error: "skip", concurrency: 4, limit: null },
  logging: { level: "info", per_sample_logs: false, keep_logs: true },
};

const resolveConfigPath = (configPath?: string): string =>
  configPath ??
  process.env.LESION_PIPELINE_CONFIG_PATH ??
  path.join(process.cwd(), "config", "pipeline.yaml");

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const applyOverrides = (
  base: LesionPipelineConfig,
  overrides?: PipelineConfigOverrides
): LesionPipelineConfig => ({
  version: overrides?.version ?? base.version,
  dataset: { ...base.dataset, ...overrides?.dataset },
  preprocess: {
    ...base.preprocess,
    ...overrides?.preprocess,
    target_resolution: {
      ...base.preprocess.target_resolution,
      ...overrides?.preprocess?.target_resolution,
    },
  },
  runner: { ...base.runner, ...overrides?.runner },
  logging: { ...base.logging, ...overrides?.logging },
});

export const parseConfigOverrides = (raw: unknown, source: string): PipelineConfigOverrides => {
  const parsed = overridesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid pipeline config in ${source}: ${issues}`);
  }
  return parsed.data;
};

export type LoadedPipelineConfig = {
  config: LesionPipelineConfig;
  configPath: string;
  loadedFromFile: boolean;
};

/** A missing file yields the defaults; an unreadable or malformed one throws. */
export const loadPipelineConfig = async (configPath?: string): Promise<LoadedPipelineConfig> => {
  const resolvedPath = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return { config: defaultConfig, configPath: resolvedPath, loadedFromFile: false };
    }
    throw error;
  }

  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) {
    return { config: defaultConfig, configPath: resolvedPath, loadedFromFile: false };
  }
  const overrides = parseConfigOverrides(parsed, resolvedPath);
  return {
    config: applyOverrides(defaultConfig, overrides),
    configPath: resolvedPath,
    loadedFromFile: true,
  };
};

const readEnvOverrides = (env: Record<string, string | undefined>): PipelineConfigOverrides => {
  const envOverrides: PipelineConfigOverrides = {};

  const dataRoot = env.LESION_DATA_ROOT?.trim();
  if (dataRoot) {
    envOverrides.dataset = { root: dataRoot };
  }

  const height = Number(env.LESION_TARGET_HEIGHT);
  const width = Number(env.LESION_TARGET_WIDTH);
  if (Number.isInteger(height) && Number.isInteger(width) && height > 0 && width > 0) {
    envOverrides.preprocess = { target_resolution: { height, width } };
  }

  const level = env.LESION_LOG_LEVEL?.trim().toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    envOverrides.logging = { level };
  }

  if (env.LESION_CONCURRENCY !== undefined) {
    const concurrency = resolveConcurrency(env.LESION_CONCURRENCY, 0);
    if (concurrency > 0) {
      envOverrides.runner = { concurrency };
    }
  }

  return envOverrides;
};

export const resolvePipelineConfig = (
  baseConfig: LesionPipelineConfig,
  options?: {
    overrides?: PipelineConfigOverrides;
    env?: Record<string, string | undefined>;
    configPath?: string;
    loadedFromFile?: boolean;
  }
): { resolvedConfig: LesionPipelineConfig; sources: PipelineConfigSources } => {
  const overrides = options?.overrides;
  const envOverrides = readEnvOverrides(options?.env ?? {});
  const resolvedConfig = applyOverrides(applyOverrides(baseConfig, overrides), envOverrides);

  return {
    resolvedConfig,
    sources: {
      configPath: options?.configPath ?? resolveConfigPath(),
      loadedFromFile: options?.loadedFromFile ?? false,
      overrides,
      envOverrides,
    },
  };
};

export const toPreprocessOptions = (
  config: LesionPipelineConfig,
  logger?: RunLogger
): PreprocessOptions => ({
  targetResolution: { ...config.preprocess.target_resolution },
  clipRange: [config.preprocess.clip_range[0], config.preprocess.clip_range[1]],
  outputRange: [config.preprocess.output_range[0], config.preprocess.output_range[1]],
  statsChannel: config.preprocess.stats_channel,
  logger,
});
