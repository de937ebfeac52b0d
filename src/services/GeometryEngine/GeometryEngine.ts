import type {
  CorrectionFactor,
  FaceRegion,
  PhotoRecord,
  RawFace,
  RotationDegrees,
} from "@/types";

export const rotationPolicies = ["catalog", "exif", "combined"] as const;

/**
 * catalog：只採用相片庫記錄的旋轉。
 * exif：只採用母片 EXIF Orientation。
 * combined：依序套用兩者的轉換（見 combineRotations）。
 */
export type RotationPolicy = (typeof rotationPolicies)[number];

export type RotationInputs = {
  catalogRotation: RotationDegrees;
  exifRotation: RotationDegrees;
};

export type ResolvedRotation = {
  rotation: RotationDegrees;
  /** 兩個來源皆非 0 */
  conflict: boolean;
};

export type PhotoRegions = ResolvedRotation & {
  master: FaceRegion[];
  /** 沒有編修版時為 null */
  edited: FaceRegion[] | null;
};

export interface GeometryEngine {
  normalize(
    face: RawFace,
    rotation: RotationDegrees,
    correction?: CorrectionFactor
  ): FaceRegion;

  resolveRotation(inputs: RotationInputs): ResolvedRotation;

  masterRegions(record: PhotoRecord, rotation: RotationDegrees): FaceRegion[];

  editedRegions(record: PhotoRecord, rotation: RotationDegrees): FaceRegion[];

  regionsFor(record: PhotoRecord, inputs: RotationInputs): PhotoRegions;
}
