import { cornersFromBottomUpRect } from "@/services/GeometryEngine";
import { type PhotoRecord, type RawFace, identityCorrection } from "@/types";

/** 以左/下/寬/高（y 由下往上）建立臉部 */
export function rawFace(
  rect: { left: number; bottom: number; width: number; height: number },
  identity: { name?: string; email?: string; faceKey?: number } = {}
): RawFace {
  return {
    faceKey: identity.faceKey ?? null,
    name: identity.name ?? null,
    email: identity.email ?? null,
    rect: cornersFromBottomUpRect(
      rect.left,
      rect.bottom,
      rect.width,
      rect.height
    ),
  };
}

export function buildPhotoRecord(
  overrides: Partial<PhotoRecord> = {}
): PhotoRecord {
  return {
    versionId: 1,
    versionUuid: "version-1",
    masterUuid: "master-1",
    versionNumber: 0,
    event: null,
    masterPath: "2015/04/27/IMG_0001.JPG",
    mediaKind: "still",
    caption: null,
    description: null,
    rating: 0,
    hidden: false,
    flagged: false,
    inTrash: false,
    isOriginal: false,
    dateTaken: null,
    dateImported: null,
    dateModified: null,
    master: { width: 1000, height: 800 },
    processed: null,
    rotation: 0,
    correction: identityCorrection,
    location: null,
    keywords: [],
    albums: [],
    edits: [],
    faces: [],
    editedFaces: [],
    ...overrides,
  };
}
