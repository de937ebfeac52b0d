import { type Static, type TSchema, Type as t } from "@sinclair/typebox";

const nullable = <T extends TSchema>(schema: T) => t.Union([schema, t.Null()]);

export const versionRowSchema = t.Object({
  id: t.Number(),
  uuid: t.String(),
  masterUuid: nullable(t.String()),
  projectUuid: nullable(t.String()),
  name: nullable(t.String()),
  versionNumber: t.Number(),
  rating: nullable(t.Number()),
  imageDate: nullable(t.Number()),
  timeZoneName: nullable(t.String()),
  latitude: nullable(t.Number()),
  longitude: nullable(t.Number()),
  isHidden: nullable(t.Number()),
  isFlagged: nullable(t.Number()),
  isOriginal: nullable(t.Number()),
  masterWidth: nullable(t.Number()),
  masterHeight: nullable(t.Number()),
  processedWidth: nullable(t.Number()),
  processedHeight: nullable(t.Number()),
  rotation: nullable(t.Number()),
  placeId: nullable(t.Number()),
});
export type VersionRow = Static<typeof versionRowSchema>;

export const masterRowSchema = t.Object({
  id: t.Number(),
  uuid: t.String(),
  imagePath: t.String(),
  type: nullable(t.String()),
  imageDate: nullable(t.Number()),
  fileModificationDate: nullable(t.Number()),
  importGroupUuid: nullable(t.String()),
  isInTrash: nullable(t.Number()),
});
export type MasterRow = Static<typeof masterRowSchema>;

/** 事件（roll）與相簿資料夾共用同一張表 */
export const folderRowSchema = t.Object({
  id: t.Number(),
  uuid: t.String(),
  name: nullable(t.String()),
  folderPath: nullable(t.String()),
  minImageDate: nullable(t.Number()),
  maxImageDate: nullable(t.Number()),
});
export type FolderRow = Static<typeof folderRowSchema>;

export const importGroupRowSchema = t.Object({
  uuid: t.String(),
  name: nullable(t.String()),
});
export type ImportGroupRow = Static<typeof importGroupRowSchema>;

export const keywordAssignmentRowSchema = t.Object({
  versionId: t.Number(),
  name: t.String(),
});
export type KeywordAssignmentRow = Static<typeof keywordAssignmentRowSchema>;

export const albumMembershipRowSchema = t.Object({
  versionId: t.Number(),
  albumName: nullable(t.String()),
  folderUuid: nullable(t.String()),
});
export type AlbumMembershipRow = Static<typeof albumMembershipRowSchema>;

export const placeRowSchema = t.Object({
  id: t.Number(),
  name: nullable(t.String()),
});
export type PlaceRow = Static<typeof placeRowSchema>;

export const descriptionRowSchema = t.Object({
  versionId: t.Number(),
  modDate: nullable(t.Number()),
  text: nullable(t.String()),
});
export type DescriptionRow = Static<typeof descriptionRowSchema>;

export const faceNameRowSchema = t.Object({
  faceKey: t.Number(),
  name: nullable(t.String()),
  fullName: nullable(t.String()),
  email: nullable(t.String()),
});
export type FaceNameRow = Static<typeof faceNameRowSchema>;

export const adjustmentRowSchema = t.Object({
  name: t.String(),
  adjIndex: nullable(t.Number()),
  data: nullable(t.Uint8Array()),
});
export type AdjustmentRow = Static<typeof adjustmentRowSchema>;

export const detectedFaceRowSchema = t.Object({
  id: t.Number(),
  faceKey: nullable(t.Number()),
  topLeftX: t.Number(),
  topLeftY: t.Number(),
  topRightX: t.Number(),
  topRightY: t.Number(),
  bottomLeftX: t.Number(),
  bottomLeftY: t.Number(),
  bottomRightX: t.Number(),
  bottomRightY: t.Number(),
  rejected: nullable(t.Number()),
});
export type DetectedFaceRow = Static<typeof detectedFaceRowSchema>;

/** 編修後另存的臉部矩形，相對座標且 y 由下往上 */
export const versionFaceRowSchema = t.Object({
  faceKey: nullable(t.Number()),
  rectLeft: t.Number(),
  rectBottom: t.Number(),
  rectWidth: t.Number(),
  rectHeight: t.Number(),
});
export type VersionFaceRow = Static<typeof versionFaceRowSchema>;
