import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const boolFromString = (value: string): boolean =>
  ["1", "true", "yes", "on"].includes(value.toLowerCase());

const environmentSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  FFMPEG_BIN: z.string().min(1).default("ffmpeg"),
  COLMAP_BIN: z.string().min(1).default("colmap"),
  COLMAP_USE_GPU: z.string().default("true").transform(boolFromString),
  // ffmpeg -qscale:v; 2 is the best JPEG quality, 31 the worst.
  FRAME_JPEG_QUALITY: z.coerce.number().int().min(2).max(31).default(2),
  SPLIT_SEED: z.coerce.number().int().min(0).default(42),
});

export type Environment = z.infer<typeof environmentSchema>;

export const parseEnvironment = (
  rawEnv: NodeJS.ProcessEnv = process.env,
): Environment => environmentSchema.parse(rawEnv);

export const env = parseEnvironment();
