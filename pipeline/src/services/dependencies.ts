import { env } from "../config/env.js";
import { MissingDependencyError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  execFileRunner,
  isSuccess,
  type CommandRunner,
} from "../lib/process.js";
import type { InputType } from "../lib/types.js";

export interface DependencyProbe {
  tool: string;
  command: string;
  args: string[];
  installHint: string;
}

export interface DependencyCheckOptions {
  inputType: InputType;
  skipColmap: boolean;
  ffmpegBin?: string;
  colmapBin?: string;
}

export const dependencyProbes = ({
  inputType,
  skipColmap,
  ffmpegBin = env.FFMPEG_BIN,
  colmapBin = env.COLMAP_BIN,
}: DependencyCheckOptions): DependencyProbe[] => {
  const probes: DependencyProbe[] = [];

  if (inputType === "video") {
    probes.push({
      tool: "ffmpeg",
      command: ffmpegBin,
      args: ["-version"],
      installHint: "sudo apt-get install ffmpeg",
    });
  }

  if (!skipColmap) {
    probes.push({
      tool: "COLMAP",
      command: colmapBin,
      args: ["-h"],
      installHint: "sudo apt-get install colmap",
    });
  }

  return probes;
};

/** Probe each required tool once; the first missing one aborts the run. */
export const checkDependencies = (
  options: DependencyCheckOptions,
  runner: CommandRunner = execFileRunner,
): void => {
  for (const probe of dependencyProbes(options)) {
    const outcome = runner.run(probe.command, probe.args, { quiet: true });
    if (!isSuccess(outcome)) {
      throw new MissingDependencyError(probe.tool, probe.installHint);
    }
    logger.debug({ tool: probe.tool, command: probe.command }, "dependency found");
  }
};
