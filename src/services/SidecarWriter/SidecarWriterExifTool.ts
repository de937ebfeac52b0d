import { type WriteTags, exiftool } from "exiftool-vendored";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { formatExifDate } from "@/utils/catalogDate";
import { exists } from "@/utils/helper";

import type {
  SidecarDocument,
  SidecarError,
  SidecarWriter,
} from "./SidecarWriter";

/** 相簿在階層標籤中的根節點 */
const albumTagRoot = "Albums";

export type SidecarTags = {
  tags: WriteTags;
  /** 沒有對應型別欄位的 digiKam 標籤，直接交給 exiftool */
  args: string[];
};

type HistoryEvent = { Action: string; When?: string; Parameters?: string };

/**
 * 附屬檔內容轉為 exiftool 的寫入欄位。
 * 空值不寫；臉部區域以中心點表示。
 */
export function sidecarTags(document: SidecarDocument): SidecarTags {
  const tags: WriteTags = {
    DocumentID: document.documentId,
    Rating: document.rating,
  };
  const args: string[] = [];

  if (document.caption) tags.Title = document.caption;
  if (document.description) tags.Description = document.description;
  if (document.keywords.length > 0) tags.Subject = [...document.keywords];
  if (document.albums.length > 0) {
    tags.HierarchicalSubject = document.albums.map((album) =>
      [albumTagRoot, ...album.split("/")].join("|")
    );
  }

  // PickLabel 1 = 退件、ColorLabel 1 = 紅色
  if (document.hidden) args.push("-XMP-digiKam:PickLabel=1");
  if (document.flagged) args.push("-XMP-digiKam:ColorLabel=1");

  if (document.dateTaken) {
    const taken = formatExifDate(document.dateTaken);
    tags.CreateDate = taken;
    tags.DateCreated = taken;
  }
  if (document.dateModified) {
    const modified = formatExifDate(document.dateModified);
    tags.ModifyDate = modified;
    tags.MetadataDate = modified;
  }

  const { location } = document;
  if (location?.latitude != null && location.longitude != null) {
    tags.GPSLatitude = location.latitude;
    tags.GPSLongitude = location.longitude;
  }
  if (location?.placeName) tags.Location = location.placeName;

  const history: HistoryEvent[] = [];
  if (document.dateImported) {
    history.push({
      Action: "imported",
      When: formatExifDate(document.dateImported),
    });
  }
  for (const name of document.history) {
    history.push({ Action: "edited", Parameters: name });
  }
  if (history.length > 0) tags.History = history;

  if (document.regions.length > 0) {
    tags.RegionInfo = {
      ...(document.dimensions
        ? {
            AppliedToDimensions: {
              W: document.dimensions.width,
              H: document.dimensions.height,
              Unit: "pixel",
            },
          }
        : {}),
      RegionList: document.regions.map((region) => ({
        Area: {
          X: region.centerX,
          Y: region.centerY,
          W: region.width,
          H: region.height,
          Unit: "normalized",
        },
        Name: region.name,
        Type: "Face",
      })),
    };
  }

  return { tags, args };
}

/**
 * 透過 exiftool 建立 .xmp 附屬檔。
 * 檔案已存在時不寫入，由呼叫端決定誰先認領。
 */
export class SidecarWriterExifTool implements SidecarWriter, AsyncDisposable {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("SidecarWriterExifTool");
  }

  async write(
    sidecarPath: string,
    document: SidecarDocument
  ): Promise<Result<void, SidecarError>> {
    if (await exists(sidecarPath)) {
      this.logger.warn({ sidecarPath })`附屬檔已存在，不覆寫`;
      return err({
        type: "WRITE_FAILED",
        path: sidecarPath,
        message: `附屬檔已存在: ${sidecarPath}`,
      });
    }
    const { tags, args } = sidecarTags(document);
    try {
      await mkdir(path.dirname(sidecarPath), { recursive: true });
      await exiftool.write(sidecarPath, tags, {
        writeArgs: ["-overwrite_original", ...args],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ sidecarPath })`無法寫入附屬檔：${message}`;
      return err({ type: "WRITE_FAILED", path: sidecarPath, message });
    }
    this.logger.debug({ event: "sidecar" })`已寫入 ${sidecarPath}`;
    return ok();
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
