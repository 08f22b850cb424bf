import type { RasterSample, TensorSample } from "../core/contracts.js";

type Rgb = [number, number, number];

export const makeRasterSample = (
  width: number,
  height: number,
  options: {
    pixel?: (x: number, y: number) => Rgb;
    label?: (x: number, y: number) => number;
    maskWidth?: number;
    maskHeight?: number;
  } = {}
): RasterSample => {
  const pixel = options.pixel ?? (() => [0, 0, 0]);
  const label = options.label ?? (() => 1);
  const maskWidth = options.maskWidth ?? width;
  const maskHeight = options.maskHeight ?? height;

  const image = new Uint8Array(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      image.set(pixel(x, y), (y * width + x) * 3);
    }
  }
  const mask = new Uint8Array(maskWidth * maskHeight);
  for (let y = 0; y < maskHeight; y++) {
    for (let x = 0; x < maskWidth; x++) {
      mask[y * maskWidth + x] = label(x, y);
    }
  }

  return {
    kind: "raster",
    image: { width, height, data: image },
    mask: { width: maskWidth, height: maskHeight, data: mask },
  };
};

/** `planes` holds one row-major plane per channel; `labels` one value per pixel. */
export const makeTensorSample = (
  height: number,
  width: number,
  planes: [number[], number[], number[]],
  labels: number[]
): TensorSample => ({
  kind: "tensor",
  image: { shape: [3, height, width], data: Float32Array.from(planes.flat()) },
  mask: { shape: [height, width], data: Float32Array.from(labels) },
});

export const centeredSquare =
  (size: number, side: number) =>
  (x: number, y: number): number => {
    const start = Math.floor((size - side) / 2);
    const inside = x >= start && x < start + side && y >= start && y < start + side;
    return inside ? 1 : 0;
  };

export const uniqueValues = (data: ArrayLike<number>): number[] =>
  [...new Set(Array.from(data))].sort((a, b) => a - b);

/** Deterministic generator for property-style tests. */
export const createRng = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
};
