import type { ExternalStageName } from "./types.js";

export type DatasetPrepErrorCode =
  | "INPUT_NOT_FOUND"
  | "EXTERNAL_TOOL_FAILED"
  | "DATASET_IO"
  | "INVALID_RATIOS"
  | "CLI_USAGE"
  | "MISSING_DEPENDENCY";

export class DatasetPrepError extends Error {
  readonly code: DatasetPrepErrorCode;

  constructor(
    code: DatasetPrepErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputNotFoundError extends DatasetPrepError {
  readonly inputPath: string;

  constructor(inputPath: string, expected: "file" | "directory") {
    super(
      "INPUT_NOT_FOUND",
      expected === "file"
        ? `Video file not found: ${inputPath}`
        : `Image directory not found: ${inputPath}`,
    );
    this.inputPath = inputPath;
  }
}

export class ExternalToolError extends DatasetPrepError {
  readonly stage: ExternalStageName;
  readonly command: string;
  /** `null` when the process could not be started or was killed by a signal. */
  readonly exitStatus: number | null;

  constructor(
    stage: ExternalStageName,
    command: string,
    exitStatus: number | null,
    options?: ErrorOptions,
  ) {
    const status =
      exitStatus === null
        ? "did not run to completion"
        : `exit status ${exitStatus}`;
    super(
      "EXTERNAL_TOOL_FAILED",
      `${stage} failed (${status}): ${command}`,
      options,
    );
    this.stage = stage;
    this.command = command;
    this.exitStatus = exitStatus;
  }
}

export class DatasetIOError extends DatasetPrepError {
  readonly path: string;

  constructor(action: string, path: string, cause: unknown) {
    super("DATASET_IO", `Failed to ${action} ${path}: ${errorMessage(cause)}`, {
      cause,
    });
    this.path = path;
  }
}

export class InvalidRatiosError extends DatasetPrepError {
  constructor(trainRatio: number, valRatio: number) {
    super(
      "INVALID_RATIOS",
      `Split ratios must be within [0, 1] and sum to at most 1 (train=${trainRatio}, val=${valRatio}).`,
    );
  }
}

export class CliUsageError extends DatasetPrepError {
  constructor(message: string) {
    super("CLI_USAGE", message);
  }
}

export class MissingDependencyError extends DatasetPrepError {
  readonly tool: string;
  readonly installHint: string;

  constructor(tool: string, installHint: string) {
    super("MISSING_DEPENDENCY", `${tool} not found. Install: ${installHint}`);
    this.tool = tool;
    this.installHint = installHint;
  }
}

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
