import { describe, it, expect } from "vitest";
import path from "node:path";
import { getRunDir, getRunLogDir, getRunReportPath, getSampleLogPath } from "./run-paths.js";

describe("run-paths", () => {
  it("builds run-scoped artifact paths", () => {
    const runDir = getRunDir("/tmp/lesion-output", "run-123");

    expect(runDir).toBe(path.join("/tmp/lesion-output", "runs", "run-123"));
    expect(getRunLogDir(runDir)).toBe(path.join(runDir, "logs"));
    expect(getRunReportPath(runDir)).toBe(path.join(runDir, "report.json"));
    expect(getSampleLogPath(runDir, "ISIC_0001")).toBe(
      path.join(runDir, "logs", "samples", "ISIC_0001.log")
    );
  });
});
