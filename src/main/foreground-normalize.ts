import type {
  ForegroundStats,
  ImageTensor,
  MaskTensor,
  PipelineStage,
  RunLogger,
  TensorSample,
} from "../core/contracts.js";
import { DegenerateStatisticsError } from "../core/errors.js";
import {
  assertStatsChannel,
  assertTensorGeometry,
  requireTensor,
} from "../core/validation.js";

/**
 * Mean and population standard deviation of plane `channel` over the positions where
 * `mask > 0`. The mask plane and the image plane share the same row-major indexing.
 * Throws `DegenerateStatisticsError` when nothing is selected or the spread is zero.
 */
export const computeForegroundStats = (
  image: ImageTensor,
  mask: MaskTensor,
  channel = 0
): ForegroundStats => {
  assertStatsChannel(channel, "normalize");
  assertTensorGeometry({ kind: "tensor", image, mask }, "normalize");
  const [, height, width] = image.shape;
  const plane = height * width;
  const offset = channel * plane;

  let count = 0;
  let sum = 0;
  for (let i = 0; i < plane; i++) {
    if (mask.data[i] > 0) {
      sum += image.data[offset + i];
      count += 1;
    }
  }
  if (count === 0) {
    throw new DegenerateStatisticsError("Mask selects no foreground pixels", "normalize");
  }

  const mean = sum / count;
  let squared = 0;
  for (let i = 0; i < plane; i++) {
    if (mask.data[i] > 0) {
      const delta = image.data[offset + i] - mean;
      squared += delta * delta;
    }
  }

  const std = Math.sqrt(squared / count);
  if (!Number.isFinite(std) || std === 0) {
    throw new DegenerateStatisticsError(
      `Foreground has zero variance over ${count} pixels`,
      "normalize"
    );
  }

  return { mean, std, count };
};

export const normalizeSample = (
  sample: TensorSample,
  channel = 0
): { sample: TensorSample; stats: ForegroundStats } => {
  const stats = computeForegroundStats(sample.image, sample.mask, channel);
  const { mean, std } = stats;
  const source = sample.image.data;
  const data = new Float32Array(source.length);
  for (let i = 0; i < source.length; i++) {
    data[i] = (source[i] - mean) / std;
  }

  return {
    sample: {
      kind: "tensor",
      image: { shape: [...sample.image.shape], data },
      mask: sample.mask,
    },
    stats,
  };
};

export const createNormalizeStage = (options?: {
  channel?: number;
  logger?: RunLogger;
}): PipelineStage => {
  const channel = options?.channel ?? 0;
  assertStatsChannel(channel, "normalize");
  const logger = options?.logger;
  return {
    name: "normalize",
    apply: (input) => {
      const { sample, stats } = normalizeSample(requireTensor(input, "normalize"), channel);
      logger?.debug("foreground-stats", { channel, ...stats });
      return sample;
    },
  };
};
