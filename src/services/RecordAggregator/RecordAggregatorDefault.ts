import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { sensorCorrectionRules, statusKeywords } from "@/constants";
import type {
  CatalogReader,
  DescriptionRow,
  FaceNameRow,
  FolderRow,
  MasterRow,
  VersionRow,
} from "@/services/CatalogReader";
import { decodeEditOperation, otherOperation } from "@/services/EditBlob";
import {
  cornersFromBottomUpRect,
  rotationFromDegrees,
} from "@/services/GeometryEngine/CoordinateTransform";
import {
  type CorrectionFactor,
  type EditOperation,
  type FaceIdentity,
  type PhotoEvent,
  type PhotoLocation,
  type PhotoRecord,
  type RawFace,
  type RotationDegrees,
  type Size,
  identityCorrection,
} from "@/types";
import {
  fromCatalogSeconds,
  parseImportGroupName,
  toCatalogDate,
} from "@/utils/catalogDate";

import type { AggregateIssue, RecordAggregator } from "./RecordAggregator";

const videoMasterType = "VIDT";

/** 每次執行只查一次的資料表，依鍵值建立索引 */
type Lookups = {
  masters: Map<string, MasterRow>;
  folders: Map<string, FolderRow>;
  foldersById: Map<number, FolderRow>;
  importGroups: Map<string, string | null>;
  keywords: Map<number, string[]>;
  albums: Map<number, string[]>;
  places: Map<number, string | null>;
  descriptions: Map<number, DescriptionRow>;
  faceNames: Map<number, FaceNameRow>;
};

function groupBy<T, K, V>(
  rows: readonly T[],
  keyOf: (row: T) => K,
  valueOf: (row: T) => V
) {
  const map = new Map<K, V[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const list = map.get(key);
    if (list) list.push(valueOf(row));
    else map.set(key, [valueOf(row)]);
  }
  return map;
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * 套用感光元件尺寸校正規則。
 * 未命中規則時尺寸不變，倍率為 1。
 */
export function applySensorCorrection(
  imagePath: string,
  recorded: Size
): { size: Size; correction: CorrectionFactor } {
  const ext = path.extname(imagePath).toLowerCase();
  const rule = sensorCorrectionRules.find(
    (r) => r.extension === ext && r.recordedHeight === recorded.height
  );
  if (!rule) return { size: recorded, correction: identityCorrection };
  return {
    size: { width: rule.width, height: rule.height },
    correction: {
      width: recorded.width > 0 ? rule.width / recorded.width : 1,
      height: rule.height / recorded.height,
    },
  };
}

/**
 * 相簿所在資料夾的 folderPath 形如 "1/5/12/"，每段數字是資料夾 id。
 * 轉為以資料夾名稱組成的階層路徑，最後接上相簿名稱。
 */
export function albumPath(
  albumName: string,
  folder: FolderRow | undefined,
  foldersById: ReadonlyMap<number, FolderRow>
): string {
  const segments = (folder?.folderPath ?? "")
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => {
      if (!/^\d+$/.test(segment)) return segment;
      return foldersById.get(Number(segment))?.name ?? segment;
    });
  return [...segments, albumName].join("/").replace(/^\/+|\/+$/g, "");
}

export class RecordAggregatorDefault implements RecordAggregator {
  private readonly reader: CatalogReader;
  private readonly logger: Logger;

  constructor(deps: { reader: CatalogReader; logger: Logger }) {
    this.reader = deps.reader;
    this.logger = deps.logger.extend("RecordAggregatorDefault");
  }

  *aggregate(): Generator<Result<PhotoRecord, AggregateIssue>> {
    const lookups = this.loadLookups();
    const versions = this.reader.listVersions();
    this.logger.info({
      emoji: "📚",
      versions: versions.length,
      masters: lookups.masters.size,
    })`已讀取相片庫，共 ${versions.length} 個版本`;

    for (const version of versions) {
      const master = version.masterUuid
        ? lookups.masters.get(version.masterUuid)
        : undefined;
      if (!master) {
        this.logger.warn({
          event: "master-not-found",
          versionId: version.id,
        })`版本 ${version.uuid} 找不到母片，略過`;
        const issue: AggregateIssue = {
          type: "MASTER_NOT_FOUND",
          versionId: version.id,
          versionUuid: version.uuid,
          masterUuid: version.masterUuid,
          message: `找不到母片 ${version.masterUuid ?? "(null)"}`,
        };
        yield err(issue);
        continue;
      }
      yield ok(this.buildRecord(version, master, lookups));
    }
  }

  private loadLookups(): Lookups {
    const folderRows = this.reader.listFolders();
    const folders = new Map(folderRows.map((f) => [f.uuid, f]));
    const foldersById = new Map(folderRows.map((f) => [f.id, f]));

    const albums = new Map<number, string[]>();
    for (const row of this.reader.listAlbumMemberships()) {
      const albumName = nonEmpty(row.albumName);
      if (!albumName) continue;
      const folder = row.folderUuid ? folders.get(row.folderUuid) : undefined;
      const fullPath = albumPath(albumName, folder, foldersById);
      const list = albums.get(row.versionId) ?? [];
      if (!list.includes(fullPath)) list.push(fullPath);
      albums.set(row.versionId, list);
    }

    // 同一版本有多筆說明時取最後修改的一筆
    const descriptions = new Map<number, DescriptionRow>();
    for (const row of this.reader.listDescriptions()) {
      const current = descriptions.get(row.versionId);
      if (
        !current ||
        (row.modDate ?? -Infinity) > (current.modDate ?? -Infinity)
      ) {
        descriptions.set(row.versionId, row);
      }
    }

    return {
      masters: new Map(this.reader.listMasters().map((m) => [m.uuid, m])),
      folders,
      foldersById,
      importGroups: new Map(
        this.reader.listImportGroups().map((g) => [g.uuid, g.name])
      ),
      keywords: groupBy(
        this.reader.listKeywordAssignments(),
        (row) => row.versionId,
        (row) => row.name
      ),
      albums,
      places: new Map(this.reader.listPlaces().map((p) => [p.id, p.name])),
      descriptions,
      faceNames: new Map(
        this.reader.listFaceNames().map((n) => [n.faceKey, n])
      ),
    };
  }

  private buildRecord(
    version: VersionRow,
    master: MasterRow,
    lookups: Lookups
  ): PhotoRecord {
    const logger = this.logger.append({ versionId: version.id });
    const description = lookups.descriptions.get(version.id);
    const importGroupName = master.importGroupUuid
      ? lookups.importGroups.get(master.importGroupUuid)
      : undefined;
    const importedAt = parseImportGroupName(importGroupName ?? null);

    const { size, correction } = applySensorCorrection(master.imagePath, {
      width: version.masterWidth ?? 0,
      height: version.masterHeight ?? 0,
    });
    if (correction !== identityCorrection) {
      logger.debug({ correction })`套用尺寸校正 ${master.imagePath}`;
    }

    const hidden = version.isHidden === 1;
    const flagged = version.isFlagged === 1;
    const isOriginal = version.isOriginal === 1;
    const inTrash = master.isInTrash === 1;

    return {
      versionId: version.id,
      versionUuid: version.uuid,
      masterUuid: master.uuid,
      versionNumber: version.versionNumber,
      event: this.resolveEvent(version, lookups, logger),
      masterPath: master.imagePath,
      mediaKind: master.type === videoMasterType ? "video" : "still",
      caption: nonEmpty(version.name),
      description: nonEmpty(description?.text),
      rating: Math.min(5, Math.max(0, Math.round(version.rating ?? 0))),
      hidden,
      flagged,
      inTrash,
      isOriginal,
      dateTaken: toCatalogDate(
        version.imageDate ?? master.imageDate,
        version.timeZoneName
      ),
      dateImported: importedAt ? { date: importedAt, timeZone: null } : null,
      dateModified: toCatalogDate(
        description?.modDate ?? master.fileModificationDate,
        version.timeZoneName
      ),
      master: size,
      processed:
        version.processedWidth && version.processedHeight
          ? { width: version.processedWidth, height: version.processedHeight }
          : null,
      rotation: this.resolveRotation(version, logger),
      correction,
      location: this.resolveLocation(version, lookups, logger),
      keywords: this.resolveKeywords(version.id, lookups, {
        hidden,
        flagged,
        isOriginal,
        inTrash,
      }),
      albums: lookups.albums.get(version.id) ?? [],
      edits: this.decodeEdits(version.uuid, logger),
      faces: this.reader
        .listDetectedFaces(master.uuid)
        .filter((row) => row.rejected !== 1)
        .map((row) => ({
          faceKey: row.faceKey,
          rect: {
            topLeft: { x: row.topLeftX, y: row.topLeftY },
            topRight: { x: row.topRightX, y: row.topRightY },
            bottomLeft: { x: row.bottomLeftX, y: row.bottomLeftY },
            bottomRight: { x: row.bottomRightX, y: row.bottomRightY },
          },
          ...this.identityOf(row.faceKey, lookups),
        })),
      editedFaces: this.reader.listVersionFaces(version.id).map(
        (row): RawFace => ({
          faceKey: row.faceKey,
          rect: cornersFromBottomUpRect(
            row.rectLeft,
            row.rectBottom,
            row.rectWidth,
            row.rectHeight
          ),
          ...this.identityOf(row.faceKey, lookups),
        })
      ),
    };
  }

  private resolveEvent(
    version: VersionRow,
    lookups: Lookups,
    logger: Logger
  ): PhotoEvent | null {
    if (!version.projectUuid) return null;
    const folder = lookups.folders.get(version.projectUuid);
    if (!folder) {
      logger.warn({
        event: "dangling-event",
        projectUuid: version.projectUuid,
      })`事件不存在，視為無事件`;
      return null;
    }
    const name = nonEmpty(folder.name);
    if (!name) return null;
    return {
      name,
      startDate:
        folder.minImageDate === null
          ? null
          : fromCatalogSeconds(folder.minImageDate),
      endDate:
        folder.maxImageDate === null
          ? null
          : fromCatalogSeconds(folder.maxImageDate),
    };
  }

  private resolveRotation(
    version: VersionRow,
    logger: Logger
  ): RotationDegrees {
    const degrees = version.rotation ?? 0;
    const rotation = rotationFromDegrees(degrees);
    if (rotation === undefined) {
      logger.warn({ degrees })`旋轉角度 ${degrees} 不是直角，視為 0`;
      return 0;
    }
    return rotation;
  }

  private resolveLocation(
    version: VersionRow,
    lookups: Lookups,
    logger: Logger
  ): PhotoLocation | null {
    let placeName: string | null = null;
    if (version.placeId !== null) {
      const place = lookups.places.get(version.placeId);
      if (place === undefined) {
        logger.warn({
          event: "dangling-place",
          placeId: version.placeId,
        })`地點不存在，視為無地點`;
      } else {
        placeName = nonEmpty(place);
      }
    }
    if (
      version.latitude === null &&
      version.longitude === null &&
      placeName === null
    ) {
      return null;
    }
    return {
      latitude: version.latitude,
      longitude: version.longitude,
      placeName,
    };
  }

  private resolveKeywords(
    versionId: number,
    lookups: Lookups,
    status: {
      hidden: boolean;
      flagged: boolean;
      isOriginal: boolean;
      inTrash: boolean;
    }
  ): string[] {
    const keywords = new Set(lookups.keywords.get(versionId) ?? []);
    if (status.hidden) keywords.add(statusKeywords.hidden);
    if (status.flagged) keywords.add(statusKeywords.flagged);
    if (status.isOriginal) keywords.add(statusKeywords.original);
    if (status.inTrash) keywords.add(statusKeywords.trashed);
    return [...keywords];
  }

  private decodeEdits(versionUuid: string, logger: Logger): EditOperation[] {
    return this.reader.listAdjustments(versionUuid).map((row) => {
      const decoded = decodeEditOperation(row.name, row.data);
      if (decoded.ok) return decoded.value;
      logger.warn({
        event: "malformed-edit",
        reason: decoded.error.type,
      })`編修資料 ${row.name} 無法解析：${decoded.error.message}`;
      return otherOperation(row.name);
    });
  }

  private identityOf(faceKey: number | null, lookups: Lookups): FaceIdentity {
    const row = faceKey === null ? undefined : lookups.faceNames.get(faceKey);
    return {
      name: nonEmpty(row?.fullName) ?? nonEmpty(row?.name),
      email: nonEmpty(row?.email),
    };
  }
}
