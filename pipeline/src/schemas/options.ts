import { z } from "zod";

// Ratios may overshoot 1 by float noise (0.7 + 0.3).
const RATIO_SUM_EPSILON = 1e-9;

export const prepareOptionsSchema = z
  .object({
    input: z.string().trim().min(1),
    output: z.string().trim().min(1),
    type: z.enum(["video", "photos"]),
    fps: z.coerce.number().int().positive().default(2),
    trainRatio: z.coerce.number().min(0).max(1).default(0.8),
    valRatio: z.coerce.number().min(0).max(1).default(0.1),
    seed: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
    skipColmap: z.boolean().default(false),
    skipDependencyCheck: z.boolean().default(false),
  })
  .refine(
    (options) =>
      options.trainRatio + options.valRatio <= 1 + RATIO_SUM_EPSILON,
    {
      message: "train and val ratios must sum to at most 1",
      path: ["valRatio"],
    },
  );

export type PrepareOptions = z.infer<typeof prepareOptionsSchema>;
