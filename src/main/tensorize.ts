import type { PipelineStage, RasterSample, TensorSample } from "../core/contracts.js";
import { ShapeMismatchError } from "../core/errors.js";
import { RGB_CHANNELS, requireRaster } from "../core/validation.js";

const MAX_INTENSITY = 255;

/**
 * HWC bytes become CHW floats in [0, 1]. Mask labels are copied as-is into a single
 * [H, W] plane; they are categories, not intensities.
 */
export const tensorizeSample = (sample: RasterSample): TensorSample => {
  const { image, mask } = sample;
  const { width, height } = image;
  const plane = width * height;

  if (mask.width !== width || mask.height !== height) {
    throw new ShapeMismatchError(
      `Image tensor ${height}x${width} does not match mask tensor ${mask.height}x${mask.width}`,
      "tensorize"
    );
  }
  if (image.data.length !== plane * RGB_CHANNELS || mask.data.length !== plane) {
    throw new ShapeMismatchError(
      `Buffers of ${image.data.length} and ${mask.data.length} values do not fit ${height}x${width}`,
      "tensorize"
    );
  }

  const imageData = new Float32Array(RGB_CHANNELS * plane);
  for (let i = 0; i < plane; i++) {
    const src = i * RGB_CHANNELS;
    for (let c = 0; c < RGB_CHANNELS; c++) {
      imageData[c * plane + i] = image.data[src + c] / MAX_INTENSITY;
    }
  }

  return {
    kind: "tensor",
    image: { shape: [RGB_CHANNELS, height, width], data: imageData },
    mask: { shape: [height, width], data: Float32Array.from(mask.data) },
  };
};

export const createTensorizeStage = (): PipelineStage => ({
  name: "tensorize",
  apply: (sample) => tensorizeSample(requireRaster(sample, "tensorize")),
});
