import type {
  PipelineStage,
  PreprocessOptions,
  PreprocessingPipeline,
  RasterSample,
  ResolvedPreprocessOptions,
  Sample,
  TensorSample,
} from "../core/contracts.js";
import {
  assertResolution,
  assertStatsChannel,
  assertValueRange,
  requireTensor,
} from "../core/validation.js";
import { createNormalizeStage } from "./foreground-normalize.js";
import { createNullLogger } from "./logger.js";
import { DEFAULT_CLIP_RANGE, DEFAULT_OUTPUT_RANGE, createClampStage } from "./range-clamp.js";
import { createResampleStage } from "./resample.js";
import { createTensorizeStage } from "./tensorize.js";

export const DEFAULT_TARGET_RESOLUTION = { height: 128, width: 128 } as const;

const resolveOptions = (options: PreprocessOptions): ResolvedPreprocessOptions => {
  const clipRange = options.clipRange ?? DEFAULT_CLIP_RANGE;
  const outputRange = options.outputRange ?? DEFAULT_OUTPUT_RANGE;
  const statsChannel = options.statsChannel ?? 0;

  assertResolution(options.targetResolution, "target resolution");
  assertValueRange(clipRange, "clip range");
  assertValueRange(outputRange, "output range");
  assertStatsChannel(statsChannel);

  const resolved: ResolvedPreprocessOptions = {
    targetResolution: Object.freeze({
      height: options.targetResolution.height,
      width: options.targetResolution.width,
    }),
    clipRange: [clipRange[0], clipRange[1]],
    outputRange: [outputRange[0], outputRange[1]],
    statsChannel,
  };
  return Object.freeze(resolved);
};

/**
 * Resample, tensorize, normalize, clamp. The order is fixed: statistics and background
 * zeroing both read the mask, so it has to share the image's post-resize geometry first.
 */
export const createPreprocessingPipeline = (options: PreprocessOptions): PreprocessingPipeline => {
  const resolved = resolveOptions(options);
  const logger = options.logger ?? createNullLogger();

  const stages: readonly PipelineStage[] = Object.freeze([
    createResampleStage(resolved.targetResolution),
    createTensorizeStage(),
    createNormalizeStage({ channel: resolved.statsChannel, logger }),
    createClampStage(resolved.clipRange, resolved.outputRange),
  ]);

  const process = (input: RasterSample): TensorSample => {
    let sample: Sample = input;
    for (const stage of stages) {
      sample = stage.apply(sample);
      logger.debug("stage-complete", { stage: stage.name, kind: sample.kind });
    }
    return requireTensor(sample, "clamp");
  };

  return { options: resolved, stages, process };
};

export const createDefaultPipeline = (
  logger?: PreprocessOptions["logger"]
): PreprocessingPipeline =>
  createPreprocessingPipeline({ targetResolution: DEFAULT_TARGET_RESOLUTION, logger });
