import type {
  AdjustmentRow,
  AlbumMembershipRow,
  DescriptionRow,
  DetectedFaceRow,
  FaceNameRow,
  FolderRow,
  ImportGroupRow,
  KeywordAssignmentRow,
  MasterRow,
  PlaceRow,
  VersionFaceRow,
  VersionRow,
} from "./CatalogRows";

export type CatalogOpenError = {
  type: "CATALOG_UNREADABLE";
  path: string;
  message: string;
};

/**
 * 唯讀的相片庫資料來源，只負責查詢並回傳已驗證型別的資料列。
 */
export interface CatalogReader extends Disposable {
  listVersions(): VersionRow[];
  listMasters(): MasterRow[];
  listFolders(): FolderRow[];
  listImportGroups(): ImportGroupRow[];
  listKeywordAssignments(): KeywordAssignmentRow[];
  listAlbumMemberships(): AlbumMembershipRow[];
  listPlaces(): PlaceRow[];
  listDescriptions(): DescriptionRow[];
  listFaceNames(): FaceNameRow[];

  listAdjustments(versionUuid: string): AdjustmentRow[];
  listDetectedFaces(masterUuid: string): DetectedFaceRow[];
  listVersionFaces(versionId: number): VersionFaceRow[];

  close(): void;
}
