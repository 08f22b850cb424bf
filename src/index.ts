export type {
  DatasetSplit,
  ErrorPolicy,
  ForegroundStats,
  ImageTensor,
  LoadedSample,
  MaskTensor,
  PipelineStage,
  PreprocessOptions,
  PreprocessingPipeline,
  RasterImage,
  RasterMask,
  RasterSample,
  Resolution,
  ResolvedPreprocessOptions,
  RunProgressEvent,
  RunSummary,
  Sample,
  SampleFailure,
  SampleSource,
  StageName,
  TensorSample,
  ValueRange,
} from "./core/contracts.js";
export {
  DegenerateStatisticsError,
  InvalidGeometryError,
  InvalidRangeError,
  PreprocessError,
  ShapeMismatchError,
  UnexpectedSampleError,
  isPreprocessError,
  type PreprocessErrorCode,
} from "./core/errors.js";
export { createResampleStage, resampleSample, resizeBilinear, resizeNearest } from "./main/resample.js";
export { createTensorizeStage, tensorizeSample } from "./main/tensorize.js";
export {
  computeForegroundStats,
  createNormalizeStage,
  normalizeSample,
} from "./main/foreground-normalize.js";
export {
  DEFAULT_CLIP_RANGE,
  DEFAULT_OUTPUT_RANGE,
  clampSample,
  createClampStage,
} from "./main/range-clamp.js";
export {
  DEFAULT_TARGET_RESOLUTION,
  createDefaultPipeline,
  createPreprocessingPipeline,
} from "./main/preprocess-pipeline.js";
export {
  DATASET_SPLITS,
  DEFAULT_PAIR_NAMING,
  createLesionDataset,
  decodeRasterSample,
  listLesionPairs,
  parseDatasetSplit,
  type LesionDataset,
  type LesionPair,
  type PairNaming,
} from "./main/lesion-dataset.js";
export { runPreprocessing, writeRunReport } from "./main/preprocess-runner.js";
export {
  defaultConfig,
  loadPipelineConfig,
  resolvePipelineConfig,
  toPreprocessOptions,
  type LesionPipelineConfig,
} from "./main/pipeline-config.js";
export { createNullLogger, createRunLogger, type RunLogger } from "./main/logger.js";
export { loadEnv } from "./main/config.js";
