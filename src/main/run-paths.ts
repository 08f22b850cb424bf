import path from "node:path";

export const getRunDir = (outputDir: string, runId: string): string =>
  path.join(outputDir, "runs", runId);

export const getRunLogDir = (runDir: string): string => path.join(runDir, "logs");

export const getRunReportPath = (runDir: string): string => path.join(runDir, "report.json");

export const getSampleLogPath = (runDir: string, sampleId: string): string =>
  path.join(getRunLogDir(runDir), "samples", `${sampleId}.log`);
