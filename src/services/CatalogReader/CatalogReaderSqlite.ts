import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import Database from "better-sqlite3";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { libraryLayout } from "@/constants";

import type { CatalogOpenError, CatalogReader } from "./CatalogReader";
import {
  type AdjustmentRow,
  type AlbumMembershipRow,
  type DescriptionRow,
  type DetectedFaceRow,
  type FaceNameRow,
  type FolderRow,
  type ImportGroupRow,
  type KeywordAssignmentRow,
  type MasterRow,
  type PlaceRow,
  type VersionFaceRow,
  type VersionRow,
  adjustmentRowSchema,
  albumMembershipRowSchema,
  descriptionRowSchema,
  detectedFaceRowSchema,
  faceNameRowSchema,
  folderRowSchema,
  importGroupRowSchema,
  keywordAssignmentRowSchema,
  masterRowSchema,
  placeRowSchema,
  versionFaceRowSchema,
  versionRowSchema,
} from "./CatalogRows";

type Databases = {
  library: Database.Database;
  properties: Database.Database;
  faces: Database.Database;
};

const sql = {
  versions: `
    SELECT v.modelId AS id
          ,v.uuid AS uuid
          ,v.masterUuid AS masterUuid
          ,v.projectUuid AS projectUuid
          ,v.name AS name
          ,v.versionNumber AS versionNumber
          ,v.mainRating AS rating
          ,v.imageDate AS imageDate
          ,v.imageTimeZoneName AS timeZoneName
          ,v.exifLatitude AS latitude
          ,v.exifLongitude AS longitude
          ,v.isHidden AS isHidden
          ,v.isFlagged AS isFlagged
          ,v.isOriginal AS isOriginal
          ,v.masterWidth AS masterWidth
          ,v.masterHeight AS masterHeight
          ,v.processedWidth AS processedWidth
          ,v.processedHeight AS processedHeight
          ,v.rotation AS rotation
          ,v.overridePlaceId AS placeId
      FROM RKVersion v
     ORDER BY v.modelId`,
  masters: `
    SELECT m.modelId AS id
          ,m.uuid AS uuid
          ,m.imagePath AS imagePath
          ,m.type AS type
          ,m.imageDate AS imageDate
          ,m.fileModificationDate AS fileModificationDate
          ,m.importGroupUuid AS importGroupUuid
          ,m.isInTrash AS isInTrash
      FROM RKMaster m`,
  folders: `
    SELECT f.modelId AS id
          ,f.uuid AS uuid
          ,f.name AS name
          ,f.folderPath AS folderPath
          ,f.minImageDate AS minImageDate
          ,f.maxImageDate AS maxImageDate
      FROM RKFolder f`,
  importGroups: `SELECT i.uuid AS uuid, i.name AS name FROM RKImportGroup i`,
  keywordAssignments: `
    SELECT kv.versionId AS versionId
          ,k.name AS name
      FROM RKKeywordForVersion kv
     INNER JOIN RKKeyword k ON kv.keywordId = k.modelId
     WHERE k.name IS NOT NULL`,
  albumMemberships: `
    SELECT av.versionId AS versionId
          ,a.name AS albumName
          ,a.folderUuid AS folderUuid
      FROM RKAlbumVersion av
     INNER JOIN RKAlbum a ON av.albumId = a.modelId`,
  adjustments: `
    SELECT a.name AS name
          ,a.adjIndex AS adjIndex
          ,a.data AS data
      FROM RKImageAdjustment a
     WHERE a.versionUuid = ?
     ORDER BY a.adjIndex`,
  versionFaces: `
    SELECT fc.faceKey AS faceKey
          ,fc.faceRectLeft AS rectLeft
          ,fc.faceRectTop AS rectBottom   -- y 由影像底部起算
          ,fc.faceRectWidth AS rectWidth
          ,fc.faceRectHeight AS rectHeight
      FROM RKVersionFaceContent fc
     WHERE fc.versionId = ?
     ORDER BY fc.faceIndex, fc.modelId`,
  places: `SELECT p.modelId AS id, p.defaultName AS name FROM RKPlace p`,
  descriptions: `
    SELECT i.versionId AS versionId
          ,i.modDate AS modDate
          ,s.stringProperty AS text
      FROM RKIptcProperty i
      LEFT JOIN RKUniqueString s ON i.stringId = s.modelId
     WHERE i.propertyKey = 'Caption/Abstract'
     ORDER BY i.versionId`,
  faceNames: `
    SELECT n.faceKey AS faceKey
          ,n.name AS name
          ,n.fullName AS fullName
          ,n.email AS email
      FROM RKFaceName n`,
  detectedFaces: `
    SELECT d.modelId AS id
          ,d.faceKey AS faceKey
          ,d.topLeftX AS topLeftX         ,d.topLeftY AS topLeftY
          ,d.topRightX AS topRightX       ,d.topRightY AS topRightY
          ,d.bottomLeftX AS bottomLeftX   ,d.bottomLeftY AS bottomLeftY
          ,d.bottomRightX AS bottomRightX ,d.bottomRightY AS bottomRightY
          ,d.rejected AS rejected
      FROM RKDetectedFace d
     WHERE d.masterUuid = ?
     ORDER BY d.modelId`,
} as const;

/**
 * 以 better-sqlite3 唯讀開啟 Library / Properties / Faces 三個資料庫。
 * 每一列都以 typebox schema 驗證，不符合的資料列略過並記錄警告。
 */
export class CatalogReaderSqlite implements CatalogReader {
  private readonly logger: Logger;

  private constructor(
    private readonly dbs: Databases,
    logger: Logger
  ) {
    this.logger = logger.extend("CatalogReaderSqlite");
  }

  static open(
    libraryRoot: string,
    logger: Logger
  ): Result<CatalogReaderSqlite, CatalogOpenError> {
    const opened: Database.Database[] = [];
    const openOne = (relative: string) => {
      const file = path.join(libraryRoot, relative);
      const db = new Database(file, { readonly: true, fileMustExist: true });
      opened.push(db);
      return db;
    };
    let current: string = libraryLayout.libraryDb;
    try {
      const library = openOne(current);
      current = libraryLayout.propertiesDb;
      const properties = openOne(current);
      current = libraryLayout.facesDb;
      const faces = openOne(current);
      return ok(new CatalogReaderSqlite({ library, properties, faces }, logger));
    } catch (error) {
      for (const db of opened) db.close();
      return err({
        type: "CATALOG_UNREADABLE",
        path: path.join(libraryRoot, current),
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  listVersions(): VersionRow[] {
    return this.all(this.dbs.library, versionRowSchema, "versions");
  }

  listMasters(): MasterRow[] {
    return this.all(this.dbs.library, masterRowSchema, "masters");
  }

  listFolders(): FolderRow[] {
    return this.all(this.dbs.library, folderRowSchema, "folders");
  }

  listImportGroups(): ImportGroupRow[] {
    return this.all(this.dbs.library, importGroupRowSchema, "importGroups");
  }

  listKeywordAssignments(): KeywordAssignmentRow[] {
    return this.all(
      this.dbs.library,
      keywordAssignmentRowSchema,
      "keywordAssignments"
    );
  }

  listAlbumMemberships(): AlbumMembershipRow[] {
    return this.all(
      this.dbs.library,
      albumMembershipRowSchema,
      "albumMemberships"
    );
  }

  listPlaces(): PlaceRow[] {
    return this.all(this.dbs.properties, placeRowSchema, "places");
  }

  listDescriptions(): DescriptionRow[] {
    return this.all(this.dbs.properties, descriptionRowSchema, "descriptions");
  }

  listFaceNames(): FaceNameRow[] {
    return this.all(this.dbs.faces, faceNameRowSchema, "faceNames");
  }

  listAdjustments(versionUuid: string): AdjustmentRow[] {
    return this.all(
      this.dbs.library,
      adjustmentRowSchema,
      "adjustments",
      versionUuid
    );
  }

  listDetectedFaces(masterUuid: string): DetectedFaceRow[] {
    return this.all(
      this.dbs.faces,
      detectedFaceRowSchema,
      "detectedFaces",
      masterUuid
    );
  }

  listVersionFaces(versionId: number): VersionFaceRow[] {
    return this.all(
      this.dbs.library,
      versionFaceRowSchema,
      "versionFaces",
      versionId
    );
  }

  close() {
    for (const db of Object.values(this.dbs)) {
      if (db.open) db.close();
    }
  }

  [Symbol.dispose]() {
    this.close();
  }

  private all<T extends TSchema>(
    db: Database.Database,
    schema: T,
    query: keyof typeof sql,
    ...params: Array<string | number>
  ): Static<T>[] {
    const rows: unknown[] = db.prepare(sql[query]).all(...params);
    return rows.filter((row): row is Static<T> => {
      if (Value.Check(schema, row)) return true;
      const first = Value.Errors(schema, row).First();
      this.logger.warn({
        query,
        path: first?.path,
        reason: first?.message,
      })`資料列格式不符，已略過`;
      return false;
    });
  }
}
