export const rawExtensions = [
  ".nef",
  ".arw",
  ".cr2",
  ".cr3",
  ".crw",
  ".dcr",
  ".dng",
  ".orf",
  ".raw",
  ".rw2",
  ".raf",
] as const;

export const jpgExtensions = [".jpg", ".jpeg"] as const;

export const photoExtensions = [
  ...jpgExtensions,
  ".heic",
  ".heif",
  ".png",
  ".bmp",
  ".gif",
  ".tif",
  ".tiff",
  ...rawExtensions,
] as const;

/** 相片庫內的資料夾與資料庫位置 */
export const libraryLayout = {
  masters: "Masters",
  previews: "Previews",
  libraryDb: "Database/apdb/Library.apdb",
  propertiesDb: "Database/apdb/Properties.apdb",
  facesDb: "Database/apdb/Faces.db",
} as const;

/** 輸出目錄內的固定名稱 */
export const exportLayout = {
  withoutEvent: "00_ImagesWithoutEvents",
  lostAndFound: "Lost and Found",
  missingLog: "missing.log",
  sidecarExtension: ".xmp",
} as const;

/** 編修版預覽檔一律輸出為 JPEG */
export const previewExtension = ".jpg";

/** 相片庫時間以 2001-01-01 UTC 起算的秒數儲存 */
export const catalogEpoch = new Date("2001-01-01T00:00:00.000Z");

export const statusKeywords = {
  hidden: "Status/Hidden",
  flagged: "Status/Flagged",
  original: "Status/Original",
  trashed: "Status/Trashed",
} as const;

export type SensorCorrectionRule = {
  extension: string;
  recordedHeight: number;
  width: number;
  height: number;
};

/**
 * 相片庫對部分 RAW 記錄了錯誤的尺寸。
 * 命中規則時以實際尺寸取代，並換算臉部座標的校正倍率。
 */
export const sensorCorrectionRules: readonly SensorCorrectionRule[] = [
  { extension: ".rw2", recordedHeight: 2520, width: 3792, height: 2538 },
];

/** 編修資料中用來辨識欄位的標籤 */
export const editFieldTags = {
  cropX: "inputXOrigin",
  cropY: "inputYOrigin",
  cropWidth: "inputWidth",
  cropHeight: "inputHeight",
  straightenAngle: "inputRotation",
} as const;

export const editOperationNames = {
  crop: "RKCropOperation",
  straighten: "RKStraightenCropOperation",
} as const;
