export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** EXIF Orientation，1 為正常方向 */
  orientation?: number;

  /** 相機型號 */
  cameraModel?: string;

  /** 影像寬高（像素） */
  imageWidth?: number;
  imageHeight?: number;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
