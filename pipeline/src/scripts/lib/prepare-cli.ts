import { ZodError } from "zod";

import { env, type Environment } from "../../config/env.js";
import { CliUsageError } from "../../lib/errors.js";
import {
  prepareOptionsSchema,
  type PrepareOptions,
} from "../../schemas/options.js";

export const PREPARE_USAGE = `Usage: prepare-dataset --input <path> --output <dir> --type <video|photos> [options]

Prepare a video or photo folder as a COLMAP dataset with train/val/test lists.

Options:
  --input <path>            Video file or directory of images
  --output <dir>            Output directory for the processed dataset
  --type <video|photos>     Input type
  --fps <n>                 Frames per second for video extraction (default: 2)
  --train-ratio <r>         Training set ratio (default: 0.8)
  --val-ratio <r>           Validation set ratio (default: 0.1)
  --seed <n>                Shuffle seed (default: SPLIT_SEED or 42)
  --skip-colmap             Skip COLMAP processing
  --skip-dependency-check   Skip checking for ffmpeg and colmap
  -h, --help                Show this message`;

type ValueFlag =
  | "input"
  | "output"
  | "type"
  | "fps"
  | "train-ratio"
  | "val-ratio"
  | "seed";

const VALUE_FLAGS: readonly ValueFlag[] = [
  "input",
  "output",
  "type",
  "fps",
  "train-ratio",
  "val-ratio",
  "seed",
];

const FLAG_BY_OPTION: Record<string, string> = {
  input: "--input",
  output: "--output",
  type: "--type",
  fps: "--fps",
  trainRatio: "--train-ratio",
  valRatio: "--val-ratio",
  seed: "--seed",
};

export interface PrepareCliArgs {
  input?: string;
  output?: string;
  type?: string;
  fps?: string;
  trainRatio?: string;
  valRatio?: string;
  seed?: string;
  skipColmap: boolean;
  skipDependencyCheck: boolean;
  help: boolean;
}

const isValueFlag = (name: string): name is ValueFlag =>
  VALUE_FLAGS.some((flag) => flag === name);

const assignValue = (
  args: PrepareCliArgs,
  flag: ValueFlag,
  value: string,
): void => {
  switch (flag) {
    case "input":
      args.input = value;
      return;
    case "output":
      args.output = value;
      return;
    case "type":
      args.type = value;
      return;
    case "fps":
      args.fps = value;
      return;
    case "train-ratio":
      args.trainRatio = value;
      return;
    case "val-ratio":
      args.valRatio = value;
      return;
    case "seed":
      args.seed = value;
      return;
  }
};

/**
 * Accepts `--flag=value` and `--flag value`; underscores in flag names
 * are read as dashes, so `--train_ratio` works too.
 */
export const parsePrepareCliArgs = (argv: string[]): PrepareCliArgs => {
  const args: PrepareCliArgs = {
    skipColmap: false,
    skipDependencyCheck: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "-h" || token === "--help") {
      args.help = true;
      continue;
    }

    if (!token.startsWith("--")) {
      throw new CliUsageError(`unexpected argument: ${token}`);
    }

    const [rawName, inlineValue] = token.slice(2).split(/=(.*)/s, 2);
    const name = rawName.replace(/_/g, "-");

    if (name === "skip-colmap") {
      args.skipColmap = true;
      continue;
    }
    if (name === "skip-dependency-check") {
      args.skipDependencyCheck = true;
      continue;
    }
    if (!isValueFlag(name)) {
      throw new CliUsageError(`unknown argument: ${token}`);
    }

    let value: string | undefined = inlineValue;
    if (value === undefined) {
      const next: string | undefined = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliUsageError(`missing value for --${name}`);
      }
      value = next;
      i += 1;
    }
    if (value.trim() === "") {
      throw new CliUsageError(`missing value for --${name}`);
    }

    assignValue(args, name, value);
  }

  return args;
};

const formatIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => {
      const key = String(issue.path[0] ?? "");
      return `${FLAG_BY_OPTION[key] ?? key}: ${issue.message}`;
    })
    .join("; ");

/** Validate parsed flags and fill in defaults. */
export const getPrepareConfig = (
  args: PrepareCliArgs,
  environment: Pick<Environment, "SPLIT_SEED"> = env,
): PrepareOptions => {
  try {
    return prepareOptionsSchema.parse({
      input: args.input,
      output: args.output,
      type: args.type,
      fps: args.fps,
      trainRatio: args.trainRatio,
      valRatio: args.valRatio,
      seed: args.seed ?? environment.SPLIT_SEED,
      skipColmap: args.skipColmap,
      skipDependencyCheck: args.skipDependencyCheck,
    });
  } catch (error: unknown) {
    if (error instanceof ZodError) {
      throw new CliUsageError(formatIssues(error));
    }
    throw error;
  }
};
