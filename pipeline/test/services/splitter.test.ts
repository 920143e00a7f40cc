import assert from "node:assert/strict";
import { test } from "node:test";

import { InvalidRatiosError } from "../../src/lib/errors.js";
import { createSeededRandom } from "../../src/lib/random.js";
import type { ImageSet } from "../../src/lib/types.js";
import {
  splitImages,
  splitImagesWithSeed,
  validateRatios,
} from "../../src/services/splitter.js";

const imageSet = (names: string[]): ImageSet =>
  names.map((name) => ({
    name,
    path: `/dataset/input/${name}`,
    extension: name.slice(name.lastIndexOf(".")).toLowerCase(),
  }));

const frames = (count: number): ImageSet =>
  imageSet(
    Array.from(
      { length: count },
      (_, index) => `frame_${String(index + 1).padStart(4, "0")}.jpg`,
    ),
  );

test("ten frames split 8/1/1 with floor-based cut points", () => {
  const partition = splitImagesWithSeed(
    frames(10),
    { trainRatio: 0.8, valRatio: 0.1 },
    42,
  );

  assert.deepEqual(partition, {
    train: [
      "frame_0008.jpg",
      "frame_0004.jpg",
      "frame_0003.jpg",
      "frame_0009.jpg",
      "frame_0006.jpg",
      "frame_0007.jpg",
      "frame_0010.jpg",
      "frame_0005.jpg",
    ],
    val: ["frame_0001.jpg"],
    test: ["frame_0002.jpg"],
  });
});

test("rounding slack accumulates into the test subset", () => {
  const partition = splitImagesWithSeed(
    frames(3),
    { trainRatio: 0.5, valRatio: 0.5 },
    42,
  );

  // floor(1.5) = 1 train, floor(1.5) = 1 val, remainder to test.
  assert.deepEqual(partition, {
    train: ["frame_0002.jpg"],
    val: ["frame_0001.jpg"],
    test: ["frame_0003.jpg"],
  });
});

test("an empty image set yields three empty subsets", () => {
  assert.deepEqual(
    splitImagesWithSeed([], { trainRatio: 0.8, valRatio: 0.1 }, 42),
    { train: [], val: [], test: [] },
  );
});

test("partitions are complete and pairwise disjoint", () => {
  const images = imageSet(
    Array.from({ length: 37 }, (_, index) => `img_${index}.png`),
  );
  const ratios = [
    { trainRatio: 0.8, valRatio: 0.1 },
    { trainRatio: 0.7, valRatio: 0.3 },
    { trainRatio: 0, valRatio: 0 },
    { trainRatio: 1, valRatio: 0 },
    { trainRatio: 0.33, valRatio: 0.33 },
  ];

  for (const ratio of ratios) {
    const { train, val, test: testSplit } = splitImagesWithSeed(images, ratio, 11);
    const all = [...train, ...val, ...testSplit];

    assert.equal(all.length, images.length);
    assert.equal(new Set(all).size, images.length);
    assert.deepEqual(
      [...all].sort(),
      images.map((image) => image.name).sort(),
    );
    assert.equal(train.length, Math.floor(images.length * ratio.trainRatio));
  }
});

test("the same seed and input order reproduce the same partition", () => {
  const images = imageSet(
    Array.from({ length: 20 }, (_, index) => `img_${String(index).padStart(2, "0")}.png`),
  );
  const ratios = { trainRatio: 0.8, valRatio: 0.1 };

  const first = splitImages(images, ratios, createSeededRandom(42));
  const second = splitImages(images, ratios, createSeededRandom(42));

  assert.deepEqual(first, second);
  assert.deepEqual(first.val, ["img_07.png", "img_08.png"]);
  assert.deepEqual(first.test, ["img_00.png", "img_03.png"]);
});

test("splitImages does not reorder the caller's image set", () => {
  const images = frames(5);
  const before = images.map((image) => image.name);

  splitImages(images, { trainRatio: 0.6, valRatio: 0.2 }, createSeededRandom(1));

  assert.deepEqual(
    images.map((image) => image.name),
    before,
  );
});

test("validateRatios rejects ratios that would leave a negative test share", () => {
  assert.throws(
    () => validateRatios({ trainRatio: 0.9, valRatio: 0.2 }),
    InvalidRatiosError,
  );
  assert.throws(
    () => validateRatios({ trainRatio: -0.1, valRatio: 0.2 }),
    InvalidRatiosError,
  );
  assert.throws(
    () => validateRatios({ trainRatio: Number.NaN, valRatio: 0 }),
    InvalidRatiosError,
  );
  assert.doesNotThrow(() => validateRatios({ trainRatio: 0.7, valRatio: 0.3 }));
  assert.doesNotThrow(() => validateRatios({ trainRatio: 0, valRatio: 1 }));
});
