import fs from "node:fs";
import path from "node:path";

import { DatasetIOError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  RECOGNIZED_IMAGE_EXTENSIONS,
  type ImageFile,
  type ImageSet,
} from "../lib/types.js";

export const compareStrings = (left: string, right: string): number => {
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
};

export const isRecognizedImage = (
  fileName: string,
  extensions: readonly string[] = RECOGNIZED_IMAGE_EXTENSIONS,
): boolean => extensions.includes(path.extname(fileName).toLowerCase());

// Symlinks count when they resolve to a file; dangling ones are skipped.
const isFileEntry = (dir: string, entry: fs.Dirent): boolean => {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  const target = fs.statSync(path.join(dir, entry.name), {
    throwIfNoEntry: false,
  });
  return target?.isFile() ?? false;
};

/**
 * Files directly inside `dir` (or symlinks to files) with a recognized
 * image extension, sorted by code point. Subdirectories are never entered.
 */
export const listImages = (
  dir: string,
  extensions: readonly string[] = RECOGNIZED_IMAGE_EXTENSIONS,
): ImageSet => {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error: unknown) {
    throw new DatasetIOError("list", dir, error);
  }

  return entries
    .filter(
      (entry) =>
        isRecognizedImage(entry.name, extensions) && isFileEntry(dir, entry),
    )
    .map((entry): ImageFile => ({
      name: entry.name,
      path: path.join(dir, entry.name),
      extension: path.extname(entry.name).toLowerCase(),
    }))
    .sort((left, right) => compareStrings(left.name, right.name));
};

const copyPreservingMetadata = (source: string, destination: string): void => {
  fs.copyFileSync(source, destination);
  const stats = fs.statSync(source);
  fs.chmodSync(destination, stats.mode);
  fs.utimesSync(destination, stats.atime, stats.mtime);
};

/**
 * Copy recognized images from `sourceDir` into `inputDir`, keeping names,
 * mode and timestamps. Files copied before a failure stay in place.
 */
export const collectImages = (
  sourceDir: string,
  inputDir: string,
  extensions: readonly string[] = RECOGNIZED_IMAGE_EXTENSIONS,
): number => {
  const images = listImages(sourceDir, extensions);
  let copiedCount = 0;

  for (const image of images) {
    const destination = path.join(inputDir, image.name);
    if (path.resolve(image.path) === path.resolve(destination)) {
      continue;
    }

    try {
      copyPreservingMetadata(image.path, destination);
    } catch (error: unknown) {
      throw new DatasetIOError("copy image to", destination, error);
    }
    copiedCount += 1;
  }

  logger.info({ sourceDir, inputDir, copiedCount }, "collected images");
  return copiedCount;
};
