import type { Logger } from "~shared/Logger";

import {
  type CorrectionFactor,
  type FaceRegion,
  type PhotoRecord,
  type RawFace,
  type RelativeRect,
  type RotationDegrees,
  identityCorrection,
} from "@/types";
import { cropOf, hasEditedRendition } from "@/utils/photoRecord";

import {
  clampRect,
  combineRotations,
  cropRect,
  rectFromCorners,
  rotateRect,
  scaleRect,
  withCenter,
} from "./CoordinateTransform";
import type {
  GeometryEngine,
  PhotoRegions,
  ResolvedRotation,
  RotationInputs,
  RotationPolicy,
} from "./GeometryEngine";

const unknownPerson = "Unknown";

function toRegion(rect: RelativeRect, face: RawFace): FaceRegion {
  return {
    ...withCenter(clampRect(rect)),
    name: face.name ?? unknownPerson,
    email: face.email,
  };
}

export class GeometryEngineDefault implements GeometryEngine {
  private readonly logger: Logger;
  private readonly rotationPolicy: RotationPolicy;
  private readonly cropFallback: boolean;

  constructor(deps: {
    logger: Logger;
    rotationPolicy?: RotationPolicy;
    /** 編修版沒有另存臉部矩形時，依裁切範圍換算母片臉部 */
    cropFallback?: boolean;
  }) {
    this.logger = deps.logger.extend("GeometryEngineDefault");
    this.rotationPolicy = deps.rotationPolicy ?? "catalog";
    this.cropFallback = deps.cropFallback ?? false;
  }

  /** 垂直翻轉 → 旋轉 → 校正倍率 → 限制範圍 → 計算中心 */
  normalize(
    face: RawFace,
    rotation: RotationDegrees,
    correction: CorrectionFactor = identityCorrection
  ): FaceRegion {
    const rotated = rotateRect(rectFromCorners(face.rect), rotation);
    return toRegion(scaleRect(rotated, correction, rotation), face);
  }

  resolveRotation({
    catalogRotation,
    exifRotation,
  }: RotationInputs): ResolvedRotation {
    const conflict = catalogRotation !== 0 && exifRotation !== 0;
    if (conflict) {
      this.logger.warn({
        event: "rotation-conflict",
        catalogRotation,
        exifRotation,
        policy: this.rotationPolicy,
      })`相片庫與 EXIF 都記錄了旋轉，依 ${this.rotationPolicy} 規則處理`;
    }
    switch (this.rotationPolicy) {
      case "catalog":
        return { rotation: catalogRotation, conflict };
      case "exif":
        return { rotation: exifRotation, conflict };
      case "combined":
        return {
          rotation: combineRotations(catalogRotation, exifRotation),
          conflict,
        };
    }
  }

  masterRegions(record: PhotoRecord, rotation: RotationDegrees): FaceRegion[] {
    return record.faces.map((face) =>
      this.normalize(face, rotation, record.correction)
    );
  }

  editedRegions(record: PhotoRecord, rotation: RotationDegrees): FaceRegion[] {
    // 相片庫另存的矩形已是編修後影像的座標，只需翻轉 y 軸
    if (record.editedFaces.length > 0) {
      return record.editedFaces.map((face) =>
        toRegion(rectFromCorners(face.rect), face)
      );
    }

    const crop = cropOf(record);
    if (!this.cropFallback || !crop) {
      return this.masterRegions(record, rotation);
    }
    if (record.master.width <= 0 || record.master.height <= 0) {
      this.logger.warn({
        versionId: record.versionId,
      })`母片尺寸未知，無法依裁切換算臉部`;
      return this.masterRegions(record, rotation);
    }

    const regions: FaceRegion[] = [];
    for (const face of record.faces) {
      const inMaster = scaleRect(rectFromCorners(face.rect), record.correction);
      const inCrop = cropRect(inMaster, crop, record.master);
      const region = toRegion(rotateRect(inCrop, rotation), face);
      // 完全落在裁切範圍外
      if (region.width <= 0 || region.height <= 0) continue;
      regions.push(region);
    }
    return regions;
  }

  regionsFor(record: PhotoRecord, inputs: RotationInputs): PhotoRegions {
    const { rotation, conflict } = this.resolveRotation(inputs);
    return {
      rotation,
      conflict,
      master: this.masterRegions(record, rotation),
      edited: hasEditedRendition(record)
        ? this.editedRegions(record, rotation)
        : null,
    };
  }
}
