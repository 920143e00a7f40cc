#!/usr/bin/env node
import process from "node:process";

import { CliUsageError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { checkDependencies } from "../services/dependencies.js";
import { prepareDataset } from "../services/prepare.js";
import {
  PREPARE_USAGE,
  getPrepareConfig,
  parsePrepareCliArgs,
} from "./lib/prepare-cli.js";

const run = async (): Promise<void> => {
  const args = parsePrepareCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(PREPARE_USAGE);
    return;
  }

  const config = getPrepareConfig(args);

  if (!config.skipDependencyCheck) {
    checkDependencies({
      inputType: config.type,
      skipColmap: config.skipColmap,
    });
  }

  const result = prepareDataset({
    input: config.input,
    output: config.output,
    inputType: config.type,
    fps: config.fps,
    ratios: { trainRatio: config.trainRatio, valRatio: config.valRatio },
    seed: config.seed,
    runColmap: !config.skipColmap,
  });

  const { train, val, test } = result.partition;
  console.log(
    `📥 Copied ${result.copiedCount} image(s) into ${result.layout.inputDir}`,
  );
  console.log(
    `📊 Train: ${train.length} | Val: ${val.length} | Test: ${test.length}`,
  );

  if (result.reconstruction) {
    if (result.reconstruction.converted) {
      console.log("✅ COLMAP processing complete");
    } else {
      console.warn(
        `⚠️ COLMAP produced no model under ${result.layout.modelDir}; text conversion skipped.`,
      );
    }
  }

  console.log(`✅ Dataset ready: ${result.layout.root}`);
};

void run().catch((error: unknown) => {
  logger.error({ err: error }, "dataset preparation failed");
  console.error(`❌ Dataset preparation failed: ${errorMessage(error)}`);
  if (error instanceof CliUsageError) {
    console.error(PREPARE_USAGE);
  }
  process.exitCode = 1;
});
