import fs from "node:fs/promises";
import path from "node:path";
import type { LogLevel, RunLogger } from "../core/contracts.js";
import { getRunLogDir, getSampleLogPath } from "./run-paths.js";

export type { LogLevel, RunLogger };

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoggerConfig = {
  level?: string;
  per_sample_logs?: boolean;
  keep_logs?: boolean;
};

export const normalizeLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "debug") return "debug";
  if (normalized === "warn" || normalized === "warning") return "warn";
  if (normalized === "error") return "error";
  return "info";
};

const safeStringify = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ message: "Failed to serialize log payload" });
  }
};

const writeLine = async (filePath: string, payload: Record<string, unknown>): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  await fs.appendFile(filePath, `${safeStringify(payload)}\n`);
};

export const createRunLogger = (runDir: string, config?: LoggerConfig): RunLogger => {
  const level = normalizeLevel(config?.level);
  const perSample = config?.per_sample_logs ?? false;
  const keepLogs = config?.keep_logs ?? true;
  const logDir = getRunLogDir(runDir);
  const runLogPath = path.join(logDir, "run.log");

  // Appends are chained so lines land in call order and finalize() can wait for them.
  let pending: Promise<void> = Promise.resolve();
  let writeError: unknown = null;

  const enqueue = (filePath: string, payload: Record<string, unknown>): void => {
    pending = pending
      .then(() => writeLine(filePath, payload))
      .catch((error: unknown) => {
        writeError ??= error;
      });
  };

  const shouldLog = (entryLevel: LogLevel): boolean =>
    LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT[level];

  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!shouldLog(entryLevel)) return;
    enqueue(runLogPath, {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...(meta ?? {}),
    });
  };

  const logSample = (
    sampleId: string,
    entryLevel: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (!perSample || !shouldLog(entryLevel)) return;
    enqueue(getSampleLogPath(runDir, sampleId), {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      sampleId,
      message,
      ...(meta ?? {}),
    });
  };

  const finalize = async (): Promise<void> => {
    await pending;
    if (writeError) {
      throw new Error(`Failed to write run logs under ${logDir}`, { cause: writeError });
    }
    if (keepLogs) return;
    await fs.rm(logDir, { recursive: true, force: true });
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    sample: logSample,
    finalize,
  };
};

export const createNullLogger = (): RunLogger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  sample: () => undefined,
  finalize: async () => undefined,
});
