import Database from "better-sqlite3";
import { readFileSync } from "node:fs";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { libraryLayout } from "@/constants";

type Row = Record<string, string | number | Buffer | null>;

function schema(name: string) {
  return readFileSync(
    new URL(`../fixtures/catalog/${name}.sql`, import.meta.url),
    "utf8"
  );
}

function insert(db: Database.Database, table: string, row: Row) {
  const columns = Object.keys(row);
  const sql = `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${columns
    .map((c) => `@${c}`)
    .join(", ")})`;
  return Number(db.prepare(sql).run(row).lastInsertRowid);
}

/**
 * 在 test/tmp 下建立一個最小的相片庫：三個資料庫加上 Masters/ 與 Previews/。
 * 欄位只包含匯出流程實際查詢的部分。
 */
export class CatalogBuilder {
  private constructor(
    readonly root: string,
    private readonly library: Database.Database,
    private readonly properties: Database.Database,
    private readonly faces: Database.Database
  ) {}

  static async create(root: string) {
    await rm(root, { recursive: true, force: true });
    await mkdir(path.join(root, path.dirname(libraryLayout.libraryDb)), {
      recursive: true,
    });
    const open = (relative: string, schemaName: string) => {
      const db = new Database(path.join(root, relative));
      db.exec(schema(schemaName));
      return db;
    };
    return new CatalogBuilder(
      root,
      open(libraryLayout.libraryDb, "library"),
      open(libraryLayout.propertiesDb, "properties"),
      open(libraryLayout.facesDb, "faces")
    );
  }

  addMaster(row: { uuid: string; imagePath: string } & Row) {
    return insert(this.library, "RKMaster", { type: "IMGT", ...row });
  }

  addVersion(row: { uuid: string; masterUuid: string | null } & Row) {
    return insert(this.library, "RKVersion", {
      versionNumber: 0,
      mainRating: 0,
      isHidden: 0,
      isFlagged: 0,
      isOriginal: 0,
      rotation: 0,
      ...row,
    });
  }

  addFolder(row: { uuid: string; name: string | null } & Row) {
    return insert(this.library, "RKFolder", row);
  }

  addImportGroup(uuid: string, name: string) {
    return insert(this.library, "RKImportGroup", { uuid, name });
  }

  addKeyword(versionId: number, name: string) {
    const keywordId = insert(this.library, "RKKeyword", { name });
    insert(this.library, "RKKeywordForVersion", { versionId, keywordId });
  }

  addAlbum(versionId: number, name: string, folderUuid: string | null) {
    const albumId = insert(this.library, "RKAlbum", {
      uuid: `album-${name}`,
      name,
      folderUuid,
    });
    insert(this.library, "RKAlbumVersion", { versionId, albumId });
  }

  addAdjustment(
    versionUuid: string,
    name: string,
    adjIndex: number,
    data: Buffer | null
  ) {
    insert(this.library, "RKImageAdjustment", {
      versionUuid,
      name,
      adjIndex,
      data,
    });
  }

  /** left/bottom/width/height，y 由下往上 */
  addVersionFace(
    versionId: number,
    faceKey: number,
    rect: { left: number; bottom: number; width: number; height: number }
  ) {
    insert(this.library, "RKVersionFaceContent", {
      versionId,
      faceKey,
      faceIndex: 0,
      faceRectLeft: rect.left,
      faceRectTop: rect.bottom,
      faceRectWidth: rect.width,
      faceRectHeight: rect.height,
    });
  }

  addPlace(id: number, name: string) {
    insert(this.properties, "RKPlace", { modelId: id, defaultName: name });
  }

  addDescription(versionId: number, text: string, modDate: number | null) {
    const stringId = insert(this.properties, "RKUniqueString", {
      stringProperty: text,
    });
    insert(this.properties, "RKIptcProperty", {
      versionId,
      propertyKey: "Caption/Abstract",
      stringId,
      modDate,
    });
  }

  addFaceName(
    faceKey: number,
    names: { name?: string; fullName?: string; email?: string }
  ) {
    insert(this.faces, "RKFaceName", {
      faceKey,
      name: names.name ?? null,
      fullName: names.fullName ?? null,
      email: names.email ?? null,
    });
  }

  /** 以左上、右下角（y 由下往上）建立偵測框 */
  addDetectedFace(
    masterUuid: string,
    faceKey: number | null,
    topLeft: { x: number; y: number },
    bottomRight: { x: number; y: number },
    rejected = 0
  ) {
    insert(this.faces, "RKDetectedFace", {
      masterUuid,
      faceKey,
      topLeftX: topLeft.x,
      topLeftY: topLeft.y,
      topRightX: bottomRight.x,
      topRightY: topLeft.y,
      bottomLeftX: topLeft.x,
      bottomLeftY: bottomRight.y,
      bottomRightX: bottomRight.x,
      bottomRightY: bottomRight.y,
      rejected,
    });
  }

  async writeMaster(relativePath: string, content: string) {
    return this.writeFile(libraryLayout.masters, relativePath, content);
  }

  async writePreview(relativePath: string, content: string) {
    return this.writeFile(libraryLayout.previews, relativePath, content);
  }

  close() {
    this.library.close();
    this.properties.close();
    this.faces.close();
  }

  private async writeFile(base: string, relativePath: string, content: string) {
    const filePath = path.join(this.root, base, relativePath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
    return filePath;
  }
}
