import { execFileSync } from "node:child_process";

import { ExternalToolError } from "./errors.js";
import type { ExternalStageName } from "./types.js";

export interface ExitOutcome {
  /** `null` when the process never started or ended on a signal. */
  exitStatus: number | null;
  error?: Error;
}

export interface RunOptions {
  /** Capture output instead of streaming it to the terminal. */
  quiet?: boolean;
}

/** Blocking subprocess capability shared by every external stage. */
export interface CommandRunner {
  run: (
    command: string,
    args: readonly string[],
    options?: RunOptions,
  ) => ExitOutcome;
}

export interface ExternalInvocation {
  stage: ExternalStageName;
  command: string;
  args: string[];
}

const readExitStatus = (error: unknown): number | null => {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return null;
};

export const execFileRunner: CommandRunner = {
  run: (command, args, options = {}) => {
    try {
      execFileSync(command, args, {
        stdio: options.quiet ? "pipe" : "inherit",
      });
      return { exitStatus: 0 };
    } catch (error: unknown) {
      return {
        exitStatus: readExitStatus(error),
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  },
};

export const isSuccess = (outcome: ExitOutcome): boolean =>
  outcome.exitStatus === 0;

export const formatCommand = (
  command: string,
  args: readonly string[],
): string =>
  [command, ...args]
    .map((token) => (/\s/.test(token) ? JSON.stringify(token) : token))
    .join(" ");

/** Run one external stage and raise `ExternalToolError` unless it exits 0. */
export const runExternal = (
  runner: CommandRunner,
  invocation: ExternalInvocation,
): void => {
  const outcome = runner.run(invocation.command, invocation.args);
  if (isSuccess(outcome)) {
    return;
  }

  throw new ExternalToolError(
    invocation.stage,
    formatCommand(invocation.command, invocation.args),
    outcome.exitStatus,
    outcome.error ? { cause: outcome.error } : undefined,
  );
};
