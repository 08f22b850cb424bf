import type {
  PipelineStage,
  RasterImage,
  RasterMask,
  RasterSample,
  Resolution,
} from "../core/contracts.js";
import {
  RGB_CHANNELS,
  assertRasterGeometry,
  assertResolution,
  requireRaster,
} from "../core/validation.js";

type Contribution = {
  start: number;
  weights: Float64Array;
};

const triangle = (x: number): number => {
  const ax = Math.abs(x);
  return ax < 1 ? 1 - ax : 0;
};

const toByte = (value: number): number => Math.max(0, Math.min(255, Math.round(value)));

/**
 * Per-output-pixel source windows for a triangle (bilinear) filter. Output centres map to
 * `(o + 0.5) * in / out`; when shrinking, the support widens by the scale factor so each
 * output pixel averages every source pixel it covers.
 */
const buildBilinearContributions = (inSize: number, outSize: number): Contribution[] => {
  const scale = inSize / outSize;
  const filterScale = Math.max(scale, 1);
  const contributions = new Array<Contribution>(outSize);

  for (let o = 0; o < outSize; o++) {
    const center = (o + 0.5) * scale;
    const start = Math.max(0, Math.trunc(center - filterScale + 0.5));
    const end = Math.min(inSize, Math.trunc(center + filterScale + 0.5));
    const weights = new Float64Array(Math.max(0, end - start));
    let total = 0;
    for (let i = 0; i < weights.length; i++) {
      const w = triangle((start + i - center + 0.5) / filterScale);
      weights[i] = w;
      total += w;
    }
    if (total > 0) {
      for (let i = 0; i < weights.length; i++) {
        weights[i] /= total;
      }
    }
    contributions[o] = { start, weights };
  }

  return contributions;
};

const buildNearestIndices = (inSize: number, outSize: number): Int32Array => {
  const indices = new Int32Array(outSize);
  const scale = inSize / outSize;
  for (let o = 0; o < outSize; o++) {
    indices[o] = Math.min(inSize - 1, Math.floor((o + 0.5) * scale));
  }
  return indices;
};

export const resizeBilinear = (image: RasterImage, target: Resolution): RasterImage => {
  const { width: inW, height: inH, data } = image;
  const { width: outW, height: outH } = target;

  if (inW === outW && inH === outH) {
    return { width: outW, height: outH, data: Uint8Array.from(data) };
  }

  // Horizontal pass into a float buffer, then vertical pass; rounding happens once at the end.
  const columns = buildBilinearContributions(inW, outW);
  const horizontal = new Float64Array(inH * outW * RGB_CHANNELS);
  for (let y = 0; y < inH; y++) {
    const srcRow = y * inW * RGB_CHANNELS;
    const dstRow = y * outW * RGB_CHANNELS;
    for (let x = 0; x < outW; x++) {
      const { start, weights } = columns[x];
      for (let c = 0; c < RGB_CHANNELS; c++) {
        let sum = 0;
        for (let i = 0; i < weights.length; i++) {
          sum += weights[i] * data[srcRow + (start + i) * RGB_CHANNELS + c];
        }
        horizontal[dstRow + x * RGB_CHANNELS + c] = sum;
      }
    }
  }

  const rows = buildBilinearContributions(inH, outH);
  const out = new Uint8Array(outH * outW * RGB_CHANNELS);
  const stride = outW * RGB_CHANNELS;
  for (let y = 0; y < outH; y++) {
    const { start, weights } = rows[y];
    for (let offset = 0; offset < stride; offset++) {
      let sum = 0;
      for (let i = 0; i < weights.length; i++) {
        sum += weights[i] * horizontal[(start + i) * stride + offset];
      }
      out[y * stride + offset] = toByte(sum);
    }
  }

  return { width: outW, height: outH, data: out };
};

export const resizeNearest = (mask: RasterMask, target: Resolution): RasterMask => {
  const { width: inW, height: inH, data } = mask;
  const { width: outW, height: outH } = target;
  const xs = buildNearestIndices(inW, outW);
  const ys = buildNearestIndices(inH, outH);
  const out = new Uint8Array(outW * outH);
  for (let y = 0; y < outH; y++) {
    const srcRow = ys[y] * inW;
    for (let x = 0; x < outW; x++) {
      out[y * outW + x] = data[srcRow + xs[x]];
    }
  }
  return { width: outW, height: outH, data: out };
};

export const resampleSample = (sample: RasterSample, target: Resolution): RasterSample => {
  assertResolution(target, "target resolution", "resample");
  assertRasterGeometry(sample, "resample");
  return {
    kind: "raster",
    image: resizeBilinear(sample.image, target),
    mask: resizeNearest(sample.mask, target),
  };
};

export const createResampleStage = (target: Resolution): PipelineStage => {
  assertResolution(target, "target resolution", "resample");
  const resolution: Resolution = { height: target.height, width: target.width };
  return {
    name: "resample",
    apply: (sample) => resampleSample(requireRaster(sample, "resample"), resolution),
  };
};
