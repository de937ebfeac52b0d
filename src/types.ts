export type RotationDegrees = 0 | 90 | 180 | 270;

export type MediaKind = "still" | "video";

export type Size = { width: number; height: number };

/** 臉部座標的校正倍率，寬高分別套用 */
export type CorrectionFactor = { width: number; height: number };

export const identityCorrection: CorrectionFactor = { width: 1, height: 1 };

export type Point = { x: number; y: number };

/** 以原始（未旋轉）母片為基準、y 軸由下往上的相對座標 */
export type RawFaceRect = {
  topLeft: Point;
  topRight: Point;
  bottomLeft: Point;
  bottomRight: Point;
};

export type FaceIdentity = {
  name: string | null;
  email: string | null;
};

export type RawFace = FaceIdentity & {
  faceKey: number | null;
  rect: RawFaceRect;
};

/** y 軸由上往下、相對於顯示影像的矩形 */
export type RelativeRect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type FaceRegion = RelativeRect & {
  centerX: number;
  centerY: number;
  name: string;
  email: string | null;
};

export type CatalogDate = {
  date: Date;
  timeZone: string | null;
};

export type PhotoEvent = {
  name: string;
  startDate: Date | null;
  endDate: Date | null;
};

export type PhotoLocation = {
  latitude: number | null;
  longitude: number | null;
  placeName: string | null;
};

export type EditOperation =
  | {
      kind: "crop";
      name: string;
      /** 以母片像素計，x 由左、y 由下起算 */
      x: number;
      y: number;
      width: number;
      height: number;
    }
  | { kind: "straighten"; name: string; angle: number }
  | { kind: "other"; name: string };

export type PhotoRecord = Readonly<{
  versionId: number;
  versionUuid: string;
  masterUuid: string;
  versionNumber: number;

  event: PhotoEvent | null;
  /** 相對於 Masters/ 的路徑 */
  masterPath: string;
  mediaKind: MediaKind;

  caption: string | null;
  description: string | null;
  rating: number;
  hidden: boolean;
  flagged: boolean;
  inTrash: boolean;
  isOriginal: boolean;

  dateTaken: CatalogDate | null;
  dateImported: CatalogDate | null;
  dateModified: CatalogDate | null;

  master: Size;
  processed: Size | null;
  rotation: RotationDegrees;
  correction: CorrectionFactor;

  location: PhotoLocation | null;

  keywords: readonly string[];
  albums: readonly string[];
  edits: readonly EditOperation[];

  faces: readonly RawFace[];
  /** 相片庫在裁切/拉直後另存的臉部矩形，可能為空 */
  editedFaces: readonly RawFace[];
}>;
