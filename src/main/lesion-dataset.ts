import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import type {
  DatasetSplit,
  LoadedSample,
  RasterSample,
  SampleSource,
} from "../core/contracts.js";

export const DATASET_SPLITS: readonly DatasetSplit[] = ["training", "validation", "test"];

export type PairNaming = {
  imageSuffix: string;
  maskSuffix: string;
};

export const DEFAULT_PAIR_NAMING: PairNaming = {
  imageSuffix: ".jpg",
  maskSuffix: "_superpixels.png",
};

export type LesionPair = {
  id: string;
  imagePath: string;
  maskPath: string;
};

export type LesionDataset = SampleSource & {
  split: DatasetSplit;
  root: string;
  entries: readonly LesionPair[];
  [Symbol.asyncIterator]: () => AsyncGenerator<LoadedSample, void, undefined>;
};

export const isDatasetSplit = (value: unknown): value is DatasetSplit =>
  typeof value === "string" && DATASET_SPLITS.some((split) => split === value);

export const parseDatasetSplit = (value: string): DatasetSplit => {
  if (!isDatasetSplit(value)) {
    throw new Error(
      `Invalid dataset split "${value}". Must be one of ${DATASET_SPLITS.map((s) => `"${s}"`).join(", ")}`
    );
  }
  return value;
};

export const resolveSplitDir = (dataRoot: string, split: DatasetSplit): string =>
  path.join(dataRoot, split);

/** Images sorted by file name; each one names its mask by swapping the suffix. */
export const listLesionPairs = async (
  splitDir: string,
  naming: PairNaming = DEFAULT_PAIR_NAMING
): Promise<LesionPair[]> => {
  const entries = await fs.readdir(splitDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(naming.imageSuffix))
    .map((entry) => entry.name)
    .sort()
    .map((name) => {
      const id = name.slice(0, name.length - naming.imageSuffix.length);
      return {
        id,
        imagePath: path.join(splitDir, name),
        maskPath: path.join(splitDir, `${id}${naming.maskSuffix}`),
      };
    });
};

export const decodeRasterSample = async (
  imagePath: string,
  maskPath: string
): Promise<RasterSample> => {
  const [image, mask] = await Promise.all([
    sharp(imagePath)
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true }),
    sharp(maskPath).removeAlpha().greyscale().raw().toBuffer({ resolveWithObject: true }),
  ]);

  if (image.info.channels !== 3) {
    throw new Error(`Expected 3 colour channels in ${imagePath}, decoded ${image.info.channels}`);
  }
  if (mask.info.channels !== 1) {
    throw new Error(`Expected a single greyscale band in ${maskPath}, decoded ${mask.info.channels}`);
  }

  return {
    kind: "raster",
    image: { width: image.info.width, height: image.info.height, data: new Uint8Array(image.data) },
    mask: { width: mask.info.width, height: mask.info.height, data: new Uint8Array(mask.data) },
  };
};

export const createLesionDataset = async (options: {
  dataRoot: string;
  split: string;
  naming?: PairNaming;
}): Promise<LesionDataset> => {
  const split = parseDatasetSplit(options.split);
  const root = resolveSplitDir(options.dataRoot, split);
  const entries = await listLesionPairs(root, options.naming);

  const load = async (index: number): Promise<LoadedSample> => {
    if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
      throw new RangeError(`Sample index ${index} out of range for ${entries.length} entries`);
    }
    const entry = entries[index];
    return { id: entry.id, sample: await decodeRasterSample(entry.imagePath, entry.maskPath) };
  };

  return {
    split,
    root,
    entries,
    size: entries.length,
    load,
    async *[Symbol.asyncIterator]() {
      for (let index = 0; index < entries.length; index++) {
        yield await load(index);
      }
    },
  };
};
