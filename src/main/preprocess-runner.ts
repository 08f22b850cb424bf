import type {
  ErrorPolicy,
  LoadedSample,
  PreprocessingPipeline,
  RunLogger,
  RunProgressEvent,
  RunSummary,
  SampleFailure,
  SampleSource,
  TensorSample,
} from "../core/contracts.js";
import { isPreprocessError } from "../core/errors.js";
import { runWithConcurrency, writeJsonAtomic } from "./file-utils.js";
import { createNullLogger } from "./logger.js";
import { getRunReportPath } from "./run-paths.js";

export type RunPreprocessingOptions = {
  source: SampleSource;
  pipeline: PreprocessingPipeline;
  logger?: RunLogger;
  limit?: number;
  onError?: ErrorPolicy;
  concurrency?: number;
  onProgress?: (event: RunProgressEvent) => void;
  /** Called in completion order, which follows index order only when concurrency is 1. */
  onSample?: (id: string, sample: TensorSample, index: number) => void;
};

const resolveTotal = (size: number, limit?: number): number => {
  if (limit === undefined || !Number.isFinite(limit)) return size;
  return Math.max(0, Math.min(size, Math.floor(limit)));
};

/**
 * Loads and preprocesses every sample of `source`. Pipeline errors are recorded per sample;
 * under "abort" the first one is rethrown. Load failures are not pipeline errors and always
 * propagate. A failing run settles only after the samples in flight have, and those samples
 * are not processed or reported.
 */
export const runPreprocessing = async (options: RunPreprocessingOptions): Promise<RunSummary> => {
  const { source, pipeline } = options;
  const logger = options.logger ?? createNullLogger();
  const policy = options.onError ?? "skip";
  const total = resolveTotal(source.size, options.limit);
  const startedAt = Date.now();
  const failures = new Array<SampleFailure | undefined>(total).fill(undefined);
  let processed = 0;
  let failedCount = 0;
  let aborted = false;

  logger.info("run-start", {
    total,
    policy,
    targetResolution: pipeline.options.targetResolution,
    clipRange: pipeline.options.clipRange,
    outputRange: pipeline.options.outputRange,
  });

  const indices = Array.from({ length: total }, (_, index) => index);
  await runWithConcurrency(indices, options.concurrency ?? 1, async (index) => {
    let loaded: LoadedSample;
    try {
      loaded = await source.load(index);
    } catch (error) {
      aborted = true;
      throw error;
    }
    // Samples whose load was in flight when the run aborted are dropped unprocessed.
    if (aborted) return;
    const { id, sample } = loaded;
    try {
      const result = pipeline.process(sample);
      processed += 1;
      logger.sample(id, "info", "sample-processed", { shape: result.image.shape });
      options.onSample?.(id, result, index);
    } catch (error) {
      if (!isPreprocessError(error)) {
        aborted = true;
        throw error;
      }
      const failure: SampleFailure = {
        id,
        code: error.code,
        message: error.message,
        ...(error.stage ? { stage: error.stage } : {}),
      };
      failures[index] = failure;
      failedCount += 1;
      logger.warn("sample-failed", { ...failure });
      logger.sample(id, "error", "sample-failed", { ...failure });
      if (policy === "abort") {
        aborted = true;
        throw error;
      }
    }
    options.onProgress?.({ id, processed, failed: failedCount, total });
  });

  const summary: RunSummary = {
    total,
    processed,
    failed: failures.filter((failure): failure is SampleFailure => failure !== undefined),
    durationMs: Date.now() - startedAt,
  };
  logger.info("run-complete", {
    processed: summary.processed,
    failed: summary.failed.length,
    durationMs: summary.durationMs,
  });
  return summary;
};

export const writeRunReport = async (
  runDir: string,
  summary: RunSummary,
  context: { runId: string; split: string; pipeline: PreprocessingPipeline }
): Promise<string> => {
  const reportPath = getRunReportPath(runDir);
  await writeJsonAtomic(reportPath, {
    runId: context.runId,
    split: context.split,
    generatedAt: new Date().toISOString(),
    options: context.pipeline.options,
    summary,
  });
  return reportPath;
};
