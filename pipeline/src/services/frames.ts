import path from "node:path";

import { env } from "../config/env.js";
import { logger } from "../lib/logger.js";
import {
  execFileRunner,
  runExternal,
  type CommandRunner,
  type ExternalInvocation,
} from "../lib/process.js";
import { ensureDir } from "./layout.js";

/** ffmpeg output pattern; yields frame_0001.jpg, frame_0002.jpg, ... */
export const FRAME_FILE_PATTERN = "frame_%04d.jpg";

export interface FrameExtractionOptions {
  videoPath: string;
  outputDir: string;
  fps: number;
  jpegQuality?: number;
  ffmpegBin?: string;
}

export const buildFrameExtractionInvocation = ({
  videoPath,
  outputDir,
  fps,
  jpegQuality = env.FRAME_JPEG_QUALITY,
  ffmpegBin = env.FFMPEG_BIN,
}: FrameExtractionOptions): ExternalInvocation => ({
  stage: "frame_extraction",
  command: ffmpegBin,
  args: [
    "-i",
    videoPath,
    "-vf",
    `fps=${fps}`,
    "-qscale:v",
    String(jpegQuality),
    path.join(outputDir, FRAME_FILE_PATTERN),
  ],
});

/**
 * Sample still frames from a video into `outputDir`. The caller checks
 * that the video exists; the frames are discovered later by listing
 * the directory.
 */
export const extractFrames = (
  options: FrameExtractionOptions,
  runner: CommandRunner = execFileRunner,
): void => {
  ensureDir(options.outputDir);
  logger.info(
    { videoPath: options.videoPath, fps: options.fps },
    "extracting frames",
  );
  runExternal(runner, buildFrameExtractionInvocation(options));
};
