export type InputType = "video" | "photos";
export type SplitName = "train" | "val" | "test";

export const SPLIT_NAMES: readonly SplitName[] = ["train", "val", "test"];

export const RECOGNIZED_IMAGE_EXTENSIONS: readonly string[] = [
  ".png",
  ".jpg",
  ".jpeg",
];

export interface ImageFile {
  name: string;
  path: string;
  /** Lower-cased, including the leading dot. */
  extension: string;
}

/** Image files of one directory, in enumeration order. */
export type ImageSet = readonly ImageFile[];

export interface SplitRatios {
  trainRatio: number;
  valRatio: number;
}

export type Partition = Record<SplitName, string[]>;

export interface DatasetLayout {
  root: string;
  inputDir: string;
  /** Present only for video input. */
  framesDir?: string;
  distortedDir: string;
  databasePath: string;
  sparseDir: string;
  /** First reconstructed model; exists only when the mapper converged. */
  modelDir: string;
  splitListFiles: Record<SplitName, string>;
}

export type ReconstructionStageName =
  | "feature_extraction"
  | "feature_matching"
  | "sparse_reconstruction"
  | "model_conversion";

export type ExternalStageName = "frame_extraction" | ReconstructionStageName;

export type ReconstructionState =
  | { status: "not_started" }
  | { status: "extracting" }
  | { status: "matching" }
  | { status: "mapping" }
  | { status: "converting" }
  | { status: "done"; converted: boolean }
  | {
      status: "failed";
      stage: ReconstructionStageName;
      exitStatus: number | null;
    };
