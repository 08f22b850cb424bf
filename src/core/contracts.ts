export type Resolution = {
  height: number;
  width: number;
};

export type ValueRange = readonly [min: number, max: number];

export interface RasterImage {
  width: number;
  height: number;
  /** Interleaved RGB, 3 bytes per pixel, row-major. */
  data: Uint8Array;
}

export interface RasterMask {
  width: number;
  height: number;
  /** One label per pixel, row-major. */
  data: Uint8Array;
}

export interface RasterSample {
  kind: "raster";
  image: RasterImage;
  mask: RasterMask;
}

export interface ImageTensor {
  shape: [channels: 3, height: number, width: number];
  /** Channel-first, plane-major: index = c * H * W + y * W + x. */
  data: Float32Array;
}

export interface MaskTensor {
  shape: [height: number, width: number];
  data: Float32Array;
}

export interface TensorSample {
  kind: "tensor";
  image: ImageTensor;
  mask: MaskTensor;
}

export type Sample = RasterSample | TensorSample;

export type StageName = "resample" | "tensorize" | "normalize" | "clamp";

export interface PipelineStage {
  name: StageName;
  apply: (sample: Sample) => Sample;
}

export interface ForegroundStats {
  mean: number;
  std: number;
  count: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type RunLogger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  sample: (sampleId: string, level: LogLevel, message: string, meta?: Record<string, unknown>) => void;
  finalize: () => Promise<void>;
};

export interface PreprocessOptions {
  targetResolution: Resolution;
  clipRange?: ValueRange;
  outputRange?: ValueRange;
  /** Image plane the foreground statistics are read from. */
  statsChannel?: number;
  logger?: RunLogger;
}

export type ResolvedPreprocessOptions = Readonly<{
  targetResolution: Readonly<Resolution>;
  clipRange: ValueRange;
  outputRange: ValueRange;
  statsChannel: number;
}>;

export interface PreprocessingPipeline {
  readonly options: ResolvedPreprocessOptions;
  readonly stages: readonly PipelineStage[];
  process: (sample: RasterSample) => TensorSample;
}

export type DatasetSplit = "training" | "validation" | "test";

export type LoadedSample = {
  id: string;
  sample: RasterSample;
};

export interface SampleSource {
  size: number;
  load: (index: number) => Promise<LoadedSample>;
}

export type ErrorPolicy = "skip" | "abort";

export type SampleFailure = {
  id: string;
  code: string;
  message: string;
  stage?: StageName;
};

export type RunSummary = {
  total: number;
  processed: number;
  failed: SampleFailure[];
  durationMs: number;
};

export type RunProgressEvent = {
  id: string;
  processed: number;
  failed: number;
  total: number;
};
