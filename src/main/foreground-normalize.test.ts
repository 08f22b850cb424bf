import { describe, expect, it, vi } from "vitest";
import {
  DegenerateStatisticsError,
  InvalidRangeError,
  ShapeMismatchError,
} from "../core/errors.js";
import { createNullLogger } from "./logger.js";
import { makeTensorSample } from "../test/fixtures.js";
import {
  computeForegroundStats,
  createNormalizeStage,
  normalizeSample,
} from "./foreground-normalize.js";
import { clampSample } from "./range-clamp.js";

const sample = makeTensorSample(
  1,
  4,
  [
    [1, 2, 3, 10],
    [0, 5, 5, 5],
    [4, 6, 8, 100],
  ],
  [1, 1, 1, 0]
);

describe("computeForegroundStats", () => {
  it("uses only foreground positions of the reference channel", () => {
    const stats = computeForegroundStats(sample.image, sample.mask);

    expect(stats.count).toBe(3);
    expect(stats.mean).toBe(2);
    expect(stats.std).toBeCloseTo(Math.sqrt(2 / 3), 10);
  });

  it("reads whichever channel it is pointed at", () => {
    const stats = computeForegroundStats(sample.image, sample.mask, 2);

    expect(stats.mean).toBe(6);
    expect(stats.std).toBeCloseTo(Math.sqrt(8 / 3), 10);
  });

  it("treats any strictly positive label as foreground", () => {
    const fractional = makeTensorSample(1, 3, [[2, 4, 9], [0, 0, 0], [0, 0, 0]], [0.5, 7, 0]);

    const stats = computeForegroundStats(fractional.image, fractional.mask);

    expect(stats).toEqual({ mean: 3, std: 1, count: 2 });
  });

  it("raises instead of returning NaN statistics", () => {
    const empty = makeTensorSample(1, 2, [[0.1, 0.2], [0, 0], [0, 0]], [0, 0]);
    const flat = makeTensorSample(1, 3, [[0.4, 0.4, 0.9], [0, 0, 0], [0, 0, 0]], [1, 1, 0]);

    expect(() => computeForegroundStats(empty.image, empty.mask)).toThrow(
      "Mask selects no foreground pixels"
    );
    expect(() => computeForegroundStats(flat.image, flat.mask)).toThrow(DegenerateStatisticsError);
    expect(() => computeForegroundStats(flat.image, flat.mask)).toThrow(
      "Foreground has zero variance over 2 pixels"
    );
  });

  it("rejects a mask whose buffer does not cover the image plane", () => {
    const short = { shape: sample.mask.shape, data: Float32Array.from([1, 1, 1]) };

    expect(() => computeForegroundStats(sample.image, short)).toThrow(ShapeMismatchError);
  });

  it("rejects a channel outside the image", () => {
    expect(() => computeForegroundStats(sample.image, sample.mask, 3)).toThrow(InvalidRangeError);
  });
});

describe("normalizeSample", () => {
  it("applies one mean and std to every element of every channel", () => {
    const std = Math.sqrt(2 / 3);
    const { sample: result, stats } = normalizeSample(sample);

    expect(stats.mean).toBe(2);
    expect(result.image.shape).toEqual([3, 1, 4]);
    expect(result.image.data[0]).toBeCloseTo(-1 / std, 5);
    expect(result.image.data[3]).toBeCloseTo(8 / std, 5);
    expect(result.image.data[5]).toBeCloseTo(3 / std, 5);
    expect(result.image.data[11]).toBeCloseTo(98 / std, 4);
  });

  it("passes the mask through and leaves the input image alone", () => {
    const before = Float32Array.from(sample.image.data);
    const { sample: result } = normalizeSample(sample);

    expect(result.mask).toBe(sample.mask);
    expect(result.image.data).not.toBe(sample.image.data);
    expect(sample.image.data).toEqual(before);
  });

  it("fails on an empty foreground", () => {
    const empty = makeTensorSample(1, 2, [[0.1, 0.2], [0, 0], [0, 0]], [0, 0]);

    expect(() => normalizeSample(empty)).toThrow(DegenerateStatisticsError);
    expect(() => normalizeSample(empty)).toThrow("no foreground");
  });

  it("fails on a constant foreground instead of dividing by zero", () => {
    const flat = makeTensorSample(1, 3, [[0.4, 0.4, 0.9], [0, 0, 0], [0, 0, 0]], [1, 1, 0]);

    expect(() => normalizeSample(flat)).toThrow(DegenerateStatisticsError);
    expect(() => normalizeSample(flat)).toThrow("zero variance");
  });

  it("sends a value ten deviations above the mean to the top of the output range", () => {
    // 100 zeros and a single 1: that 1 sits sqrt(100) = 10 deviations above the mean.
    const width = 102;
    const plane = Array.from({ length: width }, (_, i) => (i === 0 ? 1 : 0));
    const labels = Array.from({ length: width }, (_, i) => (i <= 100 ? 1 : 0));
    const spike = makeTensorSample(1, width, [plane, [...plane], [...plane]], labels);

    const { sample: normalized } = normalizeSample(spike);
    const clamped = clampSample(normalized, [-5, 5], [0, 1]);

    expect(normalized.image.data[0]).toBeCloseTo(10, 4);
    expect(clamped.image.data[0]).toBe(1);
    expect(clamped.image.data[1]).toBeCloseTo(0.49, 5);
    expect(clamped.image.data[101]).toBe(0);
  });
});

describe("createNormalizeStage", () => {
  it("logs the statistics it used", () => {
    const logger = { ...createNullLogger(), debug: vi.fn() };
    const stage = createNormalizeStage({ channel: 2, logger });

    stage.apply(sample);

    expect(logger.debug).toHaveBeenCalledWith("foreground-stats", {
      channel: 2,
      mean: 6,
      std: Math.sqrt(8 / 3),
      count: 3,
    });
  });

  it("validates the channel when it is created", () => {
    expect(() => createNormalizeStage({ channel: -1 })).toThrow(InvalidRangeError);
  });
});
