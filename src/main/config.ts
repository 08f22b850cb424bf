import fs from "node:fs";
import path from "node:path";

type LoadEnvResult = {
  loadedFiles: string[];
  appliedKeys: string[];
};

const ENV_FILES = [".env", ".env.local"];

const unquote = (value: string): string => {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  const hashIndex = value.indexOf("#");
  return hashIndex === -1 ? value : value.slice(0, hashIndex).trim();
};

const parseEnvLine = (line: string): [string, string] | null => {
  let trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  if (trimmed.startsWith("export ")) trimmed = trimmed.slice(7).trim();

  const eqIndex = trimmed.indexOf("=");
  if (eqIndex <= 0) return null;
  const key = trimmed.slice(0, eqIndex).trim();
  if (!key) return null;

  const value = unquote(trimmed.slice(eqIndex + 1).trim()).replace(/\\n/g, "\n");
  return [key, value];
};

export const parseEnv = (raw: string): Record<string, string> => {
  const entries: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const entry = parseEnvLine(line);
    if (entry) entries[entry[0]] = entry[1];
  }
  return entries;
};

/** Nearest ancestor (up to six levels) holding a package.json; falls back to `startDir`. */
const findProjectRoot = (startDir: string): string => {
  let current = startDir;
  for (let i = 0; i < 6; i += 1) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return startDir;
};

/** Variables already present in `env` win over file values; `.env.local` cannot override `.env`. */
export const loadEnv = (options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): LoadEnvResult => {
  const env = options.env ?? process.env;
  const root = findProjectRoot(options.cwd ?? process.cwd());
  const loadedFiles: string[] = [];
  const appliedKeys: string[] = [];

  for (const name of ENV_FILES) {
    const filePath = path.join(root, name);
    let stat: fs.Stats;
    try {
      stat = fs.statSync(filePath);
    } catch {
      continue;
    }
    if (!stat.isFile()) continue;

    const parsed = parseEnv(fs.readFileSync(filePath, "utf-8"));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] !== undefined) continue;
      env[key] = value;
      appliedKeys.push(key);
    }
    loadedFiles.push(filePath);
  }

  return { loadedFiles, appliedKeys };
};
