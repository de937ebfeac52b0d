import type { EditOperation, PhotoRecord } from "@/types";

/** 影片與未編修的版本沒有另外的編修版影像 */
export function hasEditedRendition(record: PhotoRecord) {
  return record.versionNumber > 0 && record.mediaKind === "still";
}

/** 有多次裁切時以最後一次為準 */
export function cropOf(record: PhotoRecord) {
  let crop: Extract<EditOperation, { kind: "crop" }> | undefined;
  for (const edit of record.edits) {
    if (edit.kind === "crop") crop = edit;
  }
  return crop;
}
