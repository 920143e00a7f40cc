export { env, parseEnvironment, type Environment } from "./config/env.js";
export {
  CliUsageError,
  DatasetIOError,
  DatasetPrepError,
  ExternalToolError,
  InputNotFoundError,
  InvalidRatiosError,
  MissingDependencyError,
  type DatasetPrepErrorCode,
} from "./lib/errors.js";
export { createLogger, logger, type Logger } from "./lib/logger.js";
export {
  execFileRunner,
  formatCommand,
  runExternal,
  type CommandRunner,
  type ExitOutcome,
  type ExternalInvocation,
} from "./lib/process.js";
export {
  MersenneTwister,
  createSeededRandom,
  shuffleInPlace,
  type RandomGenerator,
} from "./lib/random.js";
export * from "./lib/types.js";
export { collectImages, listImages } from "./services/collector.js";
export { checkDependencies } from "./services/dependencies.js";
export { extractFrames, FRAME_FILE_PATTERN } from "./services/frames.js";
export {
  buildLayout,
  resolveLayout,
  writeSplitLists,
} from "./services/layout.js";
export {
  assertInputExists,
  prepareDataset,
  type PrepareDatasetOptions,
  type PrepareDatasetResult,
} from "./services/prepare.js";
export {
  runReconstruction,
  type ReconstructionOptions,
  type ReconstructionResult,
} from "./services/reconstruction.js";
export {
  splitImages,
  splitImagesWithSeed,
  validateRatios,
} from "./services/splitter.js";
