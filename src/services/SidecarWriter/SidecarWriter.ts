import type { Result } from "~shared/utils/Result";

import type {
  CatalogDate,
  FaceRegion,
  PhotoLocation,
  PhotoRecord,
  Size,
} from "@/types";

/** 寫入附屬檔所需的全部內容，與檔案格式無關 */
export type SidecarDocument = {
  documentId: string;
  caption: string | null;
  description: string | null;
  rating: number;
  hidden: boolean;
  flagged: boolean;
  keywords: readonly string[];
  albums: readonly string[];
  dateTaken: CatalogDate | null;
  dateImported: CatalogDate | null;
  dateModified: CatalogDate | null;
  location: PhotoLocation | null;
  /** 編修操作名稱，依套用順序 */
  history: readonly string[];
  regions: readonly FaceRegion[];
  /** 臉部區域所依據的影像尺寸 */
  dimensions: Size | null;
};

export type SidecarError = {
  type: "WRITE_FAILED";
  path: string;
  message: string;
};

export interface SidecarWriter {
  /** 不覆寫既有檔案 */
  write(
    sidecarPath: string,
    document: SidecarDocument
  ): Promise<Result<void, SidecarError>>;
}

/**
 * 母片附屬檔以母片 uuid 為識別；編修版以版本 uuid 為識別並附上編修紀錄。
 */
export function sidecarDocumentFor(
  record: PhotoRecord,
  variant: "master" | "edited",
  regions: readonly FaceRegion[],
  dimensions: Size | null
): SidecarDocument {
  return {
    documentId: variant === "master" ? record.masterUuid : record.versionUuid,
    caption: record.caption,
    description: record.description,
    rating: record.rating,
    hidden: record.hidden,
    flagged: record.flagged,
    keywords: record.keywords,
    albums: record.albums,
    dateTaken: record.dateTaken,
    dateImported: record.dateImported,
    dateModified: record.dateModified,
    location: record.location,
    history: variant === "edited" ? record.edits.map((edit) => edit.name) : [],
    regions,
    dimensions,
  };
}
