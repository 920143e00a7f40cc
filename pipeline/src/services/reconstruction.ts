import fs from "node:fs";

import { env } from "../config/env.js";
import { ExternalToolError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  execFileRunner,
  runExternal,
  type CommandRunner,
  type ExternalInvocation,
} from "../lib/process.js";
import type {
  DatasetLayout,
  ReconstructionStageName,
  ReconstructionState,
} from "../lib/types.js";

export const COLMAP_CAMERA_MODEL = "OPENCV";

export interface ReconstructionOptions {
  colmapBin?: string;
  useGpu?: boolean;
  /** Observes every state transition, including the terminal one. */
  onStateChange?: (state: ReconstructionState) => void;
}

export interface ReconstructionResult {
  stagesRun: ReconstructionStageName[];
  /** False when the mapper produced no `sparse/0` model. */
  converted: boolean;
}

type ReconstructionPaths = Pick<
  DatasetLayout,
  "inputDir" | "databasePath" | "sparseDir" | "modelDir"
>;

type ReconstructionInvocation = ExternalInvocation & {
  stage: ReconstructionStageName;
};

interface StageSettings {
  colmapBin: string;
  useGpu: boolean;
}

const gpuFlag = (useGpu: boolean): string => (useGpu ? "1" : "0");

export const buildFeatureExtraction = (
  paths: ReconstructionPaths,
  { colmapBin, useGpu }: StageSettings,
): ReconstructionInvocation => ({
  stage: "feature_extraction",
  command: colmapBin,
  args: [
    "feature_extractor",
    "--database_path",
    paths.databasePath,
    "--image_path",
    paths.inputDir,
    "--ImageReader.single_camera",
    "1",
    "--ImageReader.camera_model",
    COLMAP_CAMERA_MODEL,
    "--SiftExtraction.use_gpu",
    gpuFlag(useGpu),
  ],
});

export const buildFeatureMatching = (
  paths: ReconstructionPaths,
  { colmapBin, useGpu }: StageSettings,
): ReconstructionInvocation => ({
  stage: "feature_matching",
  command: colmapBin,
  args: [
    "exhaustive_matcher",
    "--database_path",
    paths.databasePath,
    "--SiftMatching.use_gpu",
    gpuFlag(useGpu),
  ],
});

export const buildSparseReconstruction = (
  paths: ReconstructionPaths,
  { colmapBin }: StageSettings,
): ReconstructionInvocation => ({
  stage: "sparse_reconstruction",
  command: colmapBin,
  args: [
    "mapper",
    "--database_path",
    paths.databasePath,
    "--image_path",
    paths.inputDir,
    "--output_path",
    paths.sparseDir,
  ],
});

/** Rewrites the binary model under `sparse/0` as text, in place. */
export const buildModelConversion = (
  paths: ReconstructionPaths,
  { colmapBin }: StageSettings,
): ReconstructionInvocation => ({
  stage: "model_conversion",
  command: colmapBin,
  args: [
    "model_converter",
    "--input_path",
    paths.modelDir,
    "--output_path",
    paths.modelDir,
    "--output_type",
    "TXT",
  ],
});

/**
 * Run extraction, matching and mapping in order, then convert the first
 * model when the mapper produced one. The first failing stage raises
 * `ExternalToolError` and nothing after it runs.
 */
export const runReconstruction = (
  paths: ReconstructionPaths,
  runner: CommandRunner = execFileRunner,
  options: ReconstructionOptions = {},
): ReconstructionResult => {
  const settings: StageSettings = {
    colmapBin: options.colmapBin ?? env.COLMAP_BIN,
    useGpu: options.useGpu ?? env.COLMAP_USE_GPU,
  };
  const transition = (state: ReconstructionState): void => {
    options.onStateChange?.(state);
  };
  const stagesRun: ReconstructionStageName[] = [];

  const runStage = (
    state: ReconstructionState,
    invocation: ReconstructionInvocation,
  ): void => {
    const { stage } = invocation;
    transition(state);
    logger.info({ stage }, "running reconstruction stage");
    try {
      runExternal(runner, invocation);
    } catch (error: unknown) {
      if (error instanceof ExternalToolError) {
        transition({ status: "failed", stage, exitStatus: error.exitStatus });
      }
      throw error;
    }
    stagesRun.push(stage);
  };

  transition({ status: "not_started" });
  runStage({ status: "extracting" }, buildFeatureExtraction(paths, settings));
  runStage({ status: "matching" }, buildFeatureMatching(paths, settings));
  runStage({ status: "mapping" }, buildSparseReconstruction(paths, settings));

  if (!fs.existsSync(paths.modelDir)) {
    logger.warn(
      { modelDir: paths.modelDir },
      "mapper produced no model; skipping text conversion",
    );
    transition({ status: "done", converted: false });
    return { stagesRun, converted: false };
  }

  runStage({ status: "converting" }, buildModelConversion(paths, settings));
  transition({ status: "done", converted: true });
  return { stagesRun, converted: true };
};
