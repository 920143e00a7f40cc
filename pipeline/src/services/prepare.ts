import fs from "node:fs";

import { InputNotFoundError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { execFileRunner, type CommandRunner } from "../lib/process.js";
import type {
  DatasetLayout,
  InputType,
  Partition,
  SplitRatios,
} from "../lib/types.js";
import { collectImages, listImages } from "./collector.js";
import { extractFrames } from "./frames.js";
import { buildLayout, writeSplitLists } from "./layout.js";
import {
  runReconstruction,
  type ReconstructionOptions,
  type ReconstructionResult,
} from "./reconstruction.js";
import { splitImagesWithSeed, validateRatios } from "./splitter.js";

export interface PrepareDatasetOptions {
  input: string;
  output: string;
  inputType: InputType;
  fps: number;
  ratios: SplitRatios;
  seed: number;
  runColmap: boolean;
  frameJpegQuality?: number;
  ffmpegBin?: string;
  reconstruction?: ReconstructionOptions;
}

export interface PrepareDatasetResult {
  layout: DatasetLayout;
  copiedCount: number;
  partition: Partition;
  /** Absent when reconstruction was skipped. */
  reconstruction?: ReconstructionResult;
}

const statOrUndefined = (target: string): fs.Stats | undefined =>
  fs.statSync(target, { throwIfNoEntry: false });

/** Video input must be a file and photo input a directory. */
export const assertInputExists = (input: string, inputType: InputType): void => {
  const stats = statOrUndefined(input);
  if (inputType === "video") {
    if (!stats?.isFile()) {
      throw new InputNotFoundError(input, "file");
    }
    return;
  }

  if (!stats?.isDirectory()) {
    throw new InputNotFoundError(input, "directory");
  }
};

/**
 * Build the dataset tree under `output`: sample or copy images into
 * `input/`, persist the train/val/test lists and, unless disabled, run
 * the reconstruction stages into `distorted/`.
 */
export const prepareDataset = (
  options: PrepareDatasetOptions,
  runner: CommandRunner = execFileRunner,
): PrepareDatasetResult => {
  assertInputExists(options.input, options.inputType);
  validateRatios(options.ratios);

  const layout = buildLayout(options.output, options.inputType === "video");

  let sourceDir = options.input;
  if (layout.framesDir) {
    extractFrames(
      {
        videoPath: options.input,
        outputDir: layout.framesDir,
        fps: options.fps,
        jpegQuality: options.frameJpegQuality,
        ffmpegBin: options.ffmpegBin,
      },
      runner,
    );
    sourceDir = layout.framesDir;
  }

  const copiedCount = collectImages(sourceDir, layout.inputDir);
  const partition = splitImagesWithSeed(
    listImages(layout.inputDir),
    options.ratios,
    options.seed,
  );
  writeSplitLists(layout, partition);

  const reconstruction = options.runColmap
    ? runReconstruction(layout, runner, options.reconstruction)
    : undefined;

  logger.info({ root: layout.root, copiedCount }, "dataset ready");
  return {
    layout,
    copiedCount,
    partition,
    ...(reconstruction ? { reconstruction } : {}),
  };
};
