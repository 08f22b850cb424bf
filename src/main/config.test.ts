import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadEnv, parseEnv } from "./config.js";

const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), "lesion-env-"));

describe("parseEnv", () => {
  it("handles exports, quotes, comments and escaped newlines", () => {
    const parsed = parseEnv(
      [
        "# comment",
        "LESION_DATA_ROOT=/srv/isic",
        'export LESION_RUN_ID="run-7"',
        "LESION_LOG_LEVEL=debug # inline",
        "QUOTED='hash # kept'",
        "MULTI=line1\\nline2",
        "EMPTY=",
        "=novalue",
        "INVALIDLINE",
      ].join("\n")
    );

    expect(parsed).toEqual({
      LESION_DATA_ROOT: "/srv/isic",
      LESION_RUN_ID: "run-7",
      LESION_LOG_LEVEL: "debug",
      QUOTED: "hash # kept",
      MULTI: "line1\nline2",
      EMPTY: "",
    });
  });
});

describe("loadEnv", () => {
  it("loads .env then .env.local from the project root without overriding set values", () => {
    const root = makeTempDir();
    fs.writeFileSync(path.join(root, "package.json"), "{}");
    const envPath = path.join(root, ".env");
    const localPath = path.join(root, ".env.local");
    fs.writeFileSync(envPath, "LESION_DATA_ROOT=/srv/isic\nLESION_TARGET_HEIGHT=64");
    fs.writeFileSync(localPath, "LESION_DATA_ROOT=/srv/other\nLESION_TARGET_WIDTH=48");

    const cwd = path.join(root, "scripts", "nested");
    fs.mkdirSync(cwd, { recursive: true });

    const env: Record<string, string> = { LESION_TARGET_HEIGHT: "96" };
    const result = loadEnv({ cwd, env });

    expect(result.loadedFiles).toEqual([envPath, localPath]);
    expect(result.appliedKeys).toEqual(["LESION_DATA_ROOT", "LESION_TARGET_WIDTH"]);
    expect(env).toEqual({
      LESION_DATA_ROOT: "/srv/isic",
      LESION_TARGET_HEIGHT: "96",
      LESION_TARGET_WIDTH: "48",
    });
  });

  it("skips env paths that are not files", () => {
    const root = makeTempDir();
    const cwd = path.join(root, "nested");
    fs.mkdirSync(cwd, { recursive: true });
    fs.mkdirSync(path.join(cwd, ".env"));

    const env: Record<string, string> = {};
    const result = loadEnv({ cwd, env });

    expect(result.loadedFiles).toEqual([]);
    expect(Object.keys(env)).toHaveLength(0);
  });
});
