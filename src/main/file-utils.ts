import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

export const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  const data = JSON.stringify(payload, null, 2);
  await fs.writeFile(tempPath, data);
  await fs.rename(tempPath, filePath);
};

export const resolveConcurrency = (
  value: string | number | undefined,
  fallback: number,
  max = 32
): number => {
  const parsed = typeof value === "number" ? value : Number.parseInt(value ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1) return fallback;
  return Math.min(max, Math.floor(parsed));
};

/**
 * Runs `worker` over `items` with at most `concurrency` in flight; results keep input order.
 * The first rejection stops every lane from picking up further items. It is rethrown once the
 * items already in flight have settled.
 */
export const runWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let cursor = 0;
  const errors: unknown[] = [];

  const next = async (): Promise<void> => {
    while (errors.length === 0 && cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        if (errors.length === 0) errors.push(error);
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => next()));
  if (errors.length > 0) throw errors[0];
  return results;
};
