/**
 * Runs one dataset split through the preprocessing pipeline and writes a run report.
 *
 *   npm run preprocess -- [split=training] [limit]
 */

import crypto from "node:crypto";
import path from "node:path";
import { loadEnv } from "../src/main/config.js";
import { createLesionDataset } from "../src/main/lesion-dataset.js";
import { createRunLogger } from "../src/main/logger.js";
import {
  loadPipelineConfig,
  resolvePipelineConfig,
  toPreprocessOptions,
} from "../src/main/pipeline-config.js";
import { createPreprocessingPipeline } from "../src/main/preprocess-pipeline.js";
import { runPreprocessing, writeRunReport } from "../src/main/preprocess-runner.js";
import { getRunDir } from "../src/main/run-paths.js";
import { createProgressReporter, devLog, info, note, section, startStep } from "./cli.js";

const PREVIEW_COUNT = 4;

loadEnv();

async function main(): Promise<void> {
  const split = process.argv[2] ?? "training";
  const limitArg = process.argv[3] ? Number.parseInt(process.argv[3], 10) : undefined;

  const loaded = await loadPipelineConfig();
  const { resolvedConfig: config, sources } = resolvePipelineConfig(loaded.config, {
    env: process.env,
    configPath: loaded.configPath,
    loadedFromFile: loaded.loadedFromFile,
  });
  devLog(`Env overrides: ${JSON.stringify(sources.envOverrides)}`);

  const runId =
    process.env.LESION_RUN_ID ?? `run-${Date.now()}-${crypto.randomUUID().split("-")[0]}`;
  const runDir = getRunDir(path.join(process.cwd(), "pipeline-results"), runId);
  const logger = createRunLogger(runDir, config.logging);

  section("LESION PREPROCESSING");
  info(`Split: ${split}`);
  info(`Data root: ${config.dataset.root}`);
  info(`Config: ${sources.configPath}${sources.loadedFromFile ? "" : " (defaults)"}`);
  const { height, width } = config.preprocess.target_resolution;
  info(`Target: ${height}x${width}`);
  info(`Run dir: ${runDir}`);

  let exitCode = 0;
  try {
    const pipeline = createPreprocessingPipeline(toPreprocessOptions(config, logger));

    const scanStep = startStep("Scan dataset");
    const dataset = await createLesionDataset({
      dataRoot: config.dataset.root,
      split,
      naming: { imageSuffix: config.dataset.image_suffix, maskSuffix: config.dataset.mask_suffix },
    });
    scanStep.end("ok", `${dataset.size} pairs`);

    const progress = createProgressReporter("Preprocess");
    const previews: string[] = [];
    const summary = await runPreprocessing({
      source: dataset,
      pipeline,
      logger,
      limit: limitArg ?? config.runner.limit ?? undefined,
      onError: config.runner.on_error,
      concurrency: config.runner.concurrency,
      onSample: (id, sample, index) => {
        if (index < PREVIEW_COUNT) {
          previews[index] = `${index} ${id} image=${sample.image.shape.join("x")} mask=${sample.mask.shape.join("x")}`;
        }
      },
      onProgress: (event) => progress.update(event),
    });
    progress.end(summary.failed.length > 0 ? "warn" : "ok", `${summary.processed}/${summary.total}`);

    previews.filter(Boolean).forEach((line) => info(line));
    summary.failed.forEach((failure) => note(`${failure.id}: ${failure.code} ${failure.message}`));

    const reportPath = await writeRunReport(runDir, summary, { runId, split, pipeline });
    info(`Report: ${reportPath}`);
  } catch (error) {
    logger.error("run-failed", { error: error instanceof Error ? error.message : String(error) });
    console.error(error);
    exitCode = 1;
  } finally {
    await logger.finalize();
  }
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
