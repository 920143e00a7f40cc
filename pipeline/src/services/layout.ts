import fs from "node:fs";
import path from "node:path";

import { DatasetIOError } from "../lib/errors.js";
import {
  SPLIT_NAMES,
  type DatasetLayout,
  type Partition,
  type SplitName,
} from "../lib/types.js";

export const INPUT_DIR_NAME = "input";
export const FRAMES_DIR_NAME = "extracted_frames";
export const DISTORTED_DIR_NAME = "distorted";
export const DATABASE_FILE_NAME = "database.db";
export const SPARSE_DIR_NAME = "sparse";
export const FIRST_MODEL_DIR_NAME = "0";

export const splitListFileName = (split: SplitName): string =>
  `${split}_list.txt`;

export const ensureDir = (dirPath: string): void => {
  try {
    fs.mkdirSync(dirPath, { recursive: true });
  } catch (error: unknown) {
    throw new DatasetIOError("create directory", dirPath, error);
  }
};

/** Resolve every path of the dataset tree without touching the disk. */
export const resolveLayout = (
  outputDir: string,
  isVideo: boolean,
): DatasetLayout => {
  const root = path.resolve(outputDir);
  const distortedDir = path.join(root, DISTORTED_DIR_NAME);
  const sparseDir = path.join(distortedDir, SPARSE_DIR_NAME);

  return {
    root,
    inputDir: path.join(root, INPUT_DIR_NAME),
    ...(isVideo ? { framesDir: path.join(root, FRAMES_DIR_NAME) } : {}),
    distortedDir,
    databasePath: path.join(distortedDir, DATABASE_FILE_NAME),
    sparseDir,
    modelDir: path.join(sparseDir, FIRST_MODEL_DIR_NAME),
    splitListFiles: {
      train: path.join(root, splitListFileName("train")),
      val: path.join(root, splitListFileName("val")),
      test: path.join(root, splitListFileName("test")),
    },
  };
};

/**
 * Create the dataset skeleton. Existing directories and their contents
 * are left untouched, so re-running against a previous output is safe.
 */
export const buildLayout = (
  outputDir: string,
  isVideo: boolean,
): DatasetLayout => {
  const layout = resolveLayout(outputDir, isVideo);

  ensureDir(layout.root);
  ensureDir(layout.inputDir);
  ensureDir(layout.distortedDir);
  ensureDir(layout.sparseDir);
  if (layout.framesDir) {
    ensureDir(layout.framesDir);
  }

  return layout;
};

/**
 * Persist each subset as newline-joined filenames. There is no trailing
 * newline, so an empty subset yields an empty file.
 */
export const writeSplitLists = (
  layout: DatasetLayout,
  partition: Partition,
): void => {
  for (const split of SPLIT_NAMES) {
    const listFile = layout.splitListFiles[split];
    try {
      fs.writeFileSync(listFile, partition[split].join("\n"), "utf8");
    } catch (error: unknown) {
      throw new DatasetIOError("write split list", listFile, error);
    }
  }
};
