import { InvalidRatiosError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  createSeededRandom,
  shuffleInPlace,
  type RandomGenerator,
} from "../lib/random.js";
import type { ImageSet, Partition, SplitRatios } from "../lib/types.js";

// Tolerates ratios such as 0.7 + 0.3 that overshoot 1 by float noise.
const RATIO_SUM_EPSILON = 1e-9;

export const validateRatios = ({ trainRatio, valRatio }: SplitRatios): void => {
  const inRange = (ratio: number): boolean =>
    Number.isFinite(ratio) && ratio >= 0 && ratio <= 1;

  if (
    !inRange(trainRatio) ||
    !inRange(valRatio) ||
    trainRatio + valRatio > 1 + RATIO_SUM_EPSILON
  ) {
    throw new InvalidRatiosError(trainRatio, valRatio);
  }
};

/**
 * Shuffle a copy of the image names and cut it at independently floored
 * boundaries, so any rounding remainder lands in the test subset.
 */
export const splitImages = (
  images: ImageSet,
  ratios: SplitRatios,
  rng: RandomGenerator,
): Partition => {
  validateRatios(ratios);

  const names = images.map((image) => image.name);
  shuffleInPlace(names, rng);

  const total = names.length;
  const trainEnd = Math.floor(total * ratios.trainRatio);
  const valEnd = Math.min(total, trainEnd + Math.floor(total * ratios.valRatio));

  return {
    train: names.slice(0, trainEnd),
    val: names.slice(trainEnd, valEnd),
    test: names.slice(valEnd),
  };
};

/** Split with a generator created for this call only. */
export const splitImagesWithSeed = (
  images: ImageSet,
  ratios: SplitRatios,
  seed: number,
): Partition => {
  const partition = splitImages(images, ratios, createSeededRandom(seed));
  logger.info(
    {
      seed,
      train: partition.train.length,
      val: partition.val.length,
      test: partition.test.length,
    },
    "split dataset",
  );
  return partition;
};
