import type { PipelineStage, TensorSample, ValueRange } from "../core/contracts.js";
import { assertTensorGeometry, assertValueRange, requireTensor } from "../core/validation.js";

export const DEFAULT_CLIP_RANGE: ValueRange = [-5, 5];
export const DEFAULT_OUTPUT_RANGE: ValueRange = [0, 1];

/**
 * Clip to `clipRange`, map it linearly onto `outputRange`, then zero every element whose
 * mask label is 0. Zeroing runs last: after rescaling, 0 is not an "off" value by itself.
 */
export const clampSample = (
  sample: TensorSample,
  clipRange: ValueRange = DEFAULT_CLIP_RANGE,
  outputRange: ValueRange = DEFAULT_OUTPUT_RANGE
): TensorSample => {
  assertValueRange(clipRange, "clip range", "clamp");
  assertValueRange(outputRange, "output range", "clamp");
  assertTensorGeometry(sample, "clamp");

  const [clipMin, clipMax] = clipRange;
  const [outMin, outMax] = outputRange;
  const clipSpan = clipMax - clipMin;
  const outSpan = outMax - outMin;

  const [channels, height, width] = sample.image.shape;
  const plane = height * width;
  const source = sample.image.data;
  const mask = sample.mask.data;
  const data = new Float32Array(source.length);

  for (let c = 0; c < channels; c++) {
    const offset = c * plane;
    for (let i = 0; i < plane; i++) {
      const clipped = Math.min(clipMax, Math.max(clipMin, source[offset + i]));
      const rescaled = ((clipped - clipMin) / clipSpan) * outSpan + outMin;
      const bounded = Math.min(outMax, Math.max(outMin, rescaled));
      data[offset + i] = mask[i] === 0 ? 0 : bounded;
    }
  }

  return {
    kind: "tensor",
    image: { shape: [channels, height, width], data },
    mask: sample.mask,
  };
};

export const createClampStage = (
  clipRange: ValueRange = DEFAULT_CLIP_RANGE,
  outputRange: ValueRange = DEFAULT_OUTPUT_RANGE
): PipelineStage => {
  assertValueRange(clipRange, "clip range", "clamp");
  assertValueRange(outputRange, "output range", "clamp");
  const clip: ValueRange = [clipRange[0], clipRange[1]];
  const output: ValueRange = [outputRange[0], outputRange[1]];
  return {
    name: "clamp",
    apply: (sample) => clampSample(requireTensor(sample, "clamp"), clip, output),
  };
};
