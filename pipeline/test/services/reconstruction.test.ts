import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { after, test } from "node:test";

import { ExternalToolError } from "../../src/lib/errors.js";
import type { ReconstructionState } from "../../src/lib/types.js";
import { buildLayout } from "../../src/services/layout.js";
import { runReconstruction } from "../../src/services/reconstruction.js";
import { makeTempDir, removeDir } from "../helpers/fs.js";
import {
  argValue,
  createRecordingRunner,
  subcommands,
  type RecordedCall,
} from "../helpers/runner.js";

const tempRoot = makeTempDir();

after(() => {
  removeDir(tempRoot);
});

const COLMAP_OPTIONS = { colmapBin: "colmap", useGpu: true };

/** Stand-in mapper that writes the first model directory. */
const mapperProducesModel =
  (sparseDir: string) =>
  (call: RecordedCall): number => {
    if (call.args[0] === "mapper") {
      fs.mkdirSync(path.join(sparseDir, "0"), { recursive: true });
    }
    return 0;
  };

test("runs all four stages in order when the mapper produces a model", () => {
  const layout = buildLayout(path.join(tempRoot, "full"), false);
  const { runner, calls } = createRecordingRunner(
    mapperProducesModel(layout.sparseDir),
  );

  const result = runReconstruction(layout, runner, COLMAP_OPTIONS);

  assert.deepEqual(result, {
    stagesRun: [
      "feature_extraction",
      "feature_matching",
      "sparse_reconstruction",
      "model_conversion",
    ],
    converted: true,
  });
  assert.deepEqual(subcommands(calls), [
    "feature_extractor",
    "exhaustive_matcher",
    "mapper",
    "model_converter",
  ]);
});

test("passes database, image, camera and GPU options to each stage", () => {
  const layout = buildLayout(path.join(tempRoot, "arguments"), false);
  const { runner, calls } = createRecordingRunner(
    mapperProducesModel(layout.sparseDir),
  );

  runReconstruction(layout, runner, COLMAP_OPTIONS);
  const [extract, match, map, convert] = calls;

  assert.deepEqual(extract?.args, [
    "feature_extractor",
    "--database_path",
    layout.databasePath,
    "--image_path",
    layout.inputDir,
    "--ImageReader.single_camera",
    "1",
    "--ImageReader.camera_model",
    "OPENCV",
    "--SiftExtraction.use_gpu",
    "1",
  ]);
  assert.deepEqual(match?.args, [
    "exhaustive_matcher",
    "--database_path",
    layout.databasePath,
    "--SiftMatching.use_gpu",
    "1",
  ]);
  assert.equal(map && argValue(map, "--output_path"), layout.sparseDir);
  assert.equal(map && argValue(map, "--image_path"), layout.inputDir);
  assert.deepEqual(convert?.args, [
    "model_converter",
    "--input_path",
    layout.modelDir,
    "--output_path",
    layout.modelDir,
    "--output_type",
    "TXT",
  ]);
});

test("useGpu false disables GPU extraction and matching", () => {
  const layout = buildLayout(path.join(tempRoot, "cpu"), false);
  const { runner, calls } = createRecordingRunner();

  runReconstruction(layout, runner, { colmapBin: "colmap", useGpu: false });

  assert.equal(calls[0] && argValue(calls[0], "--SiftExtraction.use_gpu"), "0");
  assert.equal(calls[1] && argValue(calls[1], "--SiftMatching.use_gpu"), "0");
});

test("a failed feature extraction stops the pipeline and names the stage", () => {
  const layout = buildLayout(path.join(tempRoot, "extract-fails"), false);
  const { runner, calls } = createRecordingRunner((call) =>
    call.args[0] === "feature_extractor" ? 2 : 0,
  );
  const states: ReconstructionState[] = [];

  assert.throws(
    () =>
      runReconstruction(layout, runner, {
        ...COLMAP_OPTIONS,
        onStateChange: (state) => states.push(state),
      }),
    (error: unknown) =>
      error instanceof ExternalToolError &&
      error.stage === "feature_extraction" &&
      error.exitStatus === 2,
  );
  assert.deepEqual(subcommands(calls), ["feature_extractor"]);
  assert.deepEqual(states, [
    { status: "not_started" },
    { status: "extracting" },
    { status: "failed", stage: "feature_extraction", exitStatus: 2 },
  ]);
});

test("a failed mapper skips conversion even if a model directory exists", () => {
  const layout = buildLayout(path.join(tempRoot, "mapper-fails"), false);
  fs.mkdirSync(layout.modelDir, { recursive: true });
  const { runner, calls } = createRecordingRunner((call) =>
    call.args[0] === "mapper" ? 1 : 0,
  );

  assert.throws(
    () => runReconstruction(layout, runner, COLMAP_OPTIONS),
    { name: "ExternalToolError", message: /^sparse_reconstruction failed/ },
  );
  assert.deepEqual(subcommands(calls), [
    "feature_extractor",
    "exhaustive_matcher",
    "mapper",
  ]);
});

test("completes without conversion when the mapper produces no model", () => {
  const layout = buildLayout(path.join(tempRoot, "no-model"), false);
  const { runner, calls } = createRecordingRunner();
  const states: ReconstructionState[] = [];

  const result = runReconstruction(layout, runner, {
    ...COLMAP_OPTIONS,
    onStateChange: (state) => states.push(state),
  });

  assert.deepEqual(result, {
    stagesRun: ["feature_extraction", "feature_matching", "sparse_reconstruction"],
    converted: false,
  });
  assert.deepEqual(subcommands(calls), [
    "feature_extractor",
    "exhaustive_matcher",
    "mapper",
  ]);
  assert.deepEqual(states.at(-1), { status: "done", converted: false });
});
