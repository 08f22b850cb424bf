import type {
  RasterSample,
  Resolution,
  Sample,
  StageName,
  TensorSample,
  ValueRange,
} from "./contracts.js";
import {
  InvalidGeometryError,
  InvalidRangeError,
  ShapeMismatchError,
  UnexpectedSampleError,
} from "./errors.js";

export const RGB_CHANNELS = 3;

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const isPositiveInteger = (value: unknown): value is number =>
  isFiniteNumber(value) && Number.isInteger(value) && value > 0;

export const assertResolution = (value: Resolution, label: string, stage?: StageName): void => {
  if (!isPositiveInteger(value.height) || !isPositiveInteger(value.width)) {
    throw new InvalidGeometryError(
      `Invalid ${label}: expected positive integer height and width, got ${value.height}x${value.width}`,
      stage
    );
  }
};

export const assertValueRange = (value: ValueRange, label: string, stage?: StageName): void => {
  const [min, max] = value;
  if (!isFiniteNumber(min) || !isFiniteNumber(max)) {
    throw new InvalidRangeError(`Invalid ${label}: bounds must be finite numbers`, stage);
  }
  if (min >= max) {
    throw new InvalidRangeError(`Invalid ${label}: min ${min} must be below max ${max}`, stage);
  }
};

export const assertStatsChannel = (value: number, stage?: StageName): void => {
  if (!Number.isInteger(value) || value < 0 || value >= RGB_CHANNELS) {
    throw new InvalidRangeError(
      `Invalid stats channel: expected 0..${RGB_CHANNELS - 1}, got ${value}`,
      stage
    );
  }
};

/** Extents must be positive, equal for image and mask, and match the buffer lengths. */
export const assertRasterGeometry = (sample: RasterSample, stage?: StageName): void => {
  const { image, mask } = sample;
  assertResolution({ height: image.height, width: image.width }, "image extent", stage);
  assertResolution({ height: mask.height, width: mask.width }, "mask extent", stage);
  if (image.width !== mask.width || image.height !== mask.height) {
    throw new InvalidGeometryError(
      `Image extent ${image.height}x${image.width} does not match mask extent ${mask.height}x${mask.width}`,
      stage
    );
  }
  if (image.data.length !== image.width * image.height * RGB_CHANNELS) {
    throw new InvalidGeometryError(
      `Image buffer holds ${image.data.length} bytes, expected ${image.width * image.height * RGB_CHANNELS}`,
      stage
    );
  }
  if (mask.data.length !== mask.width * mask.height) {
    throw new InvalidGeometryError(
      `Mask buffer holds ${mask.data.length} bytes, expected ${mask.width * mask.height}`,
      stage
    );
  }
};

export const assertTensorGeometry = (sample: TensorSample, stage?: StageName): void => {
  const [channels, height, width] = sample.image.shape;
  const [maskH, maskW] = sample.mask.shape;
  if (channels !== RGB_CHANNELS || height !== maskH || width !== maskW) {
    throw new ShapeMismatchError(
      `Image tensor ${channels}x${height}x${width} does not pair with mask tensor ${maskH}x${maskW}`,
      stage
    );
  }
  if (
    sample.image.data.length !== channels * height * width ||
    sample.mask.data.length !== height * width
  ) {
    throw new ShapeMismatchError("Tensor buffer length does not match its shape", stage);
  }
};

export const requireRaster = (sample: Sample, stage: StageName): RasterSample => {
  if (sample.kind !== "raster") {
    throw new UnexpectedSampleError(`Stage ${stage} expects a raster sample`, stage);
  }
  return sample;
};

export const requireTensor = (sample: Sample, stage: StageName): TensorSample => {
  if (sample.kind !== "tensor") {
    throw new UnexpectedSampleError(`Stage ${stage} expects a tensor sample`, stage);
  }
  return sample;
};
