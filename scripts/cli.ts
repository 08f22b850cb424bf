/* eslint-disable no-console */

type StepStatus = "ok" | "warn" | "fail";

type Step = {
  end: (status?: StepStatus, detail?: string) => void;
};

type ProgressUpdate = {
  processed: number;
  failed: number;
  total: number;
};

type ProgressReporter = {
  update: (update: ProgressUpdate, force?: boolean) => void;
  end: (status?: StepStatus, detail?: string) => void;
};

const supportsColor = Boolean(process.stdout.isTTY);
const devLogs = process.env.LESION_DEV_LOGS === "1" || process.env.LESION_DEV_LOGS === "true";

const colorize = (code: string) => (value: string) =>
  supportsColor ? `\u001b[${code}m${value}\u001b[0m` : value;

const dim = colorize("2");
const green = colorize("32");
const yellow = colorize("33");
const red = colorize("31");
const cyan = colorize("36");

const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(2)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${(seconds - minutes * 60).toFixed(1)}s`;
};

const timestamp = (): string =>
  new Date().toTimeString().slice(0, 8);

const statusLabel = (status: StepStatus): string => {
  if (status === "ok") return green("ok");
  if (status === "warn") return yellow("warn");
  return red("fail");
};

export const section = (title: string): void => {
  const rule = "=".repeat(Math.max(48, Math.min(80, title.length + 12)));
  console.log(`\n${rule}`);
  console.log(cyan(title));
  console.log(rule);
};

export const info = (message: string): void => {
  console.log(`  ${message}`);
};

export const note = (message: string): void => {
  console.log(dim(`  ${message}`));
};

export const devLog = (message: string): void => {
  if (!devLogs) return;
  console.log(dim(`  [dev] ${message}`));
};

export const startStep = (label: string): Step => {
  const startedAt = Date.now();
  console.log(`${dim(timestamp())} [start] ${label}`);
  return {
    end: (status: StepStatus = "ok", detail?: string) => {
      const suffix = detail ? ` - ${detail}` : "";
      const duration = formatDuration(Date.now() - startedAt);
      console.log(`${dim(timestamp())} [${statusLabel(status)}] ${label}${suffix} ${dim(`(${duration})`)}`);
    },
  };
};

export const createProgressReporter = (
  label: string,
  options?: { minIntervalMs?: number }
): ProgressReporter => {
  const minIntervalMs = options?.minIntervalMs ?? 250;
  const startedAt = Date.now();
  let lastEmit = 0;

  const format = ({ processed, failed, total }: ProgressUpdate): string => {
    const done = processed + failed;
    const pct = total > 0 ? Math.min(100, (done / total) * 100) : 0;
    const elapsed = (Date.now() - startedAt) / 1000;
    const rate = elapsed > 0 ? ` • ${(done / elapsed).toFixed(2)} samples/sec` : "";
    const failures = failed > 0 ? ` • ${failed} failed` : "";
    return `${label}: ${done}/${total} (${pct.toFixed(1)}%)${failures}${rate}`;
  };

  const update = (progress: ProgressUpdate, force = false): void => {
    const now = Date.now();
    if (!force && now - lastEmit < minIntervalMs) return;
    lastEmit = now;
    const line = format(progress);
    if (process.stdout.isTTY) {
      process.stdout.clearLine(0);
      process.stdout.cursorTo(0);
      process.stdout.write(line);
    } else {
      console.log(`  ${line}`);
    }
  };

  const end = (status: StepStatus = "ok", detail?: string): void => {
    if (process.stdout.isTTY) {
      process.stdout.clearLine(0);
      process.stdout.cursorTo(0);
    }
    const suffix = detail ? ` - ${detail}` : "";
    console.log(`${dim(timestamp())} [${statusLabel(status)}] ${label}${suffix}`);
  };

  return { update, end };
};
