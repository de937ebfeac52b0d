import { format } from "date-fns";
import type { Stats } from "node:fs";
import { link, mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { exportLayout, libraryLayout, previewExtension } from "@/constants";
import type { PhotoRecord } from "@/types";
import { statOrNull } from "@/utils/helper";
import { hasEditedRendition } from "@/utils/photoRecord";

import type {
  ExportPlanner,
  LinkOutcome,
  PlannerError,
  PlannerSummary,
} from "./ExportPlanner";
import { MissingFileReport } from "./MissingFileReport";

function safeSegment(name: string) {
  return name.replace(/[\\/]/g, "_");
}

/** 同一個 inode 即為同一個檔案，硬連結再次執行時會落在這裡 */
function isSameFile(a: Stats, b: Stats) {
  return a.ino === b.ino && a.dev === b.dev;
}

/** IMG_0001.JPG → IMG_0001_v2.JPG */
export function versionedPath(preferred: string, version: number) {
  if (version <= 1) return preferred;
  const ext = path.extname(preferred);
  return `${preferred.slice(0, preferred.length - ext.length)}_v${version}${ext}`;
}

/**
 * 決定每張相片的輸出位置並以硬連結建立檔案。
 * 來源不存在時寫入 missing.log；目的地被不同檔案佔用時改用 _v2、_v3…。
 * 只有編修版與自己的母片大小相同時才視為同一張，不另外建立檔案。
 */
export class ExportPlannerDefault implements ExportPlanner {
  private readonly libraryRoot: string;
  private readonly destinationRoot: string;
  private readonly logger: Logger;
  private readonly report: MissingFileReport;

  readonly knownFiles = new Set<string>();
  readonly writtenSidecars = new Set<string>();

  constructor(deps: {
    libraryRoot: string;
    destinationRoot: string;
    logger: Logger;
  }) {
    this.libraryRoot = path.resolve(deps.libraryRoot);
    this.destinationRoot = path.resolve(deps.destinationRoot);
    this.logger = deps.logger.extend("ExportPlannerDefault");
    this.report = new MissingFileReport(
      path.join(this.destinationRoot, exportLayout.missingLog),
      this.logger
    );
  }

  destinationDir(record: PhotoRecord): string {
    const { event } = record;
    if (!event) {
      return path.join(
        this.destinationRoot,
        exportLayout.withoutEvent,
        path.dirname(record.masterPath)
      );
    }
    const eventDir = safeSegment(event.name);
    if (!event.startDate) return path.join(this.destinationRoot, eventDir);
    return path.join(
      this.destinationRoot,
      format(event.startDate, "yyyy"),
      eventDir
    );
  }

  markReferenced(record: PhotoRecord) {
    this.knownFiles.add(this.masterSource(record));
  }

  async linkMaster(
    record: PhotoRecord
  ): Promise<Result<LinkOutcome, PlannerError>> {
    const source = this.masterSource(record);
    const sourceStat = await statOrNull(source);
    if (!sourceStat) return this.markMissing(source, record);

    this.knownFiles.add(source);
    const preferred = path.join(
      this.destinationDir(record),
      path.basename(record.masterPath)
    );
    return this.place(source, sourceStat, preferred);
  }

  async linkEdited(
    record: PhotoRecord
  ): Promise<Result<LinkOutcome, PlannerError> | null> {
    if (!hasEditedRendition(record)) return null;

    const dir = path.dirname(record.masterPath);
    const masterExt = path.extname(record.masterPath);
    const stem = path.basename(record.masterPath, masterExt);
    const previewName = `${stem}${previewExtension}`;
    const previewRoot = path.join(this.libraryRoot, libraryLayout.previews, dir);
    const candidates = [
      path.join(previewRoot, record.versionUuid, previewName),
      path.join(previewRoot, previewName),
    ];

    for (const source of candidates) {
      const sourceStat = await statOrNull(source);
      if (!sourceStat) continue;
      this.knownFiles.add(source);
      const ext =
        masterExt.toLowerCase() === previewExtension
          ? masterExt
          : previewExtension;
      const preferred = path.join(this.destinationDir(record), `${stem}${ext}`);
      const masterStat = await statOrNull(this.masterSource(record));
      return this.place(source, sourceStat, preferred, masterStat);
    }
    return this.markMissing(candidates[0], record);
  }

  sidecarPathFor(mediaPath: string) {
    return `${mediaPath}${exportLayout.sidecarExtension}`;
  }

  async claimSidecar(sidecarPath: string) {
    const resolved = path.resolve(sidecarPath);
    if (this.writtenSidecars.has(resolved)) return false;
    if (await statOrNull(resolved)) return false;
    this.writtenSidecars.add(resolved);
    return true;
  }

  async finish(): Promise<PlannerSummary> {
    await this.report.close();
    const missing = this.report.entries;
    if (missing.length > 0) {
      this.logger.warn({
        emoji: "🕳️",
        count: missing.length,
        filePath: this.report.filePath,
      })`共有 ${missing.length} 個來源檔不存在`;
    }
    return { missing };
  }

  private masterSource(record: PhotoRecord) {
    return path.join(this.libraryRoot, libraryLayout.masters, record.masterPath);
  }

  private async markMissing(
    source: string,
    record: PhotoRecord
  ): Promise<Result<LinkOutcome, PlannerError>> {
    this.logger.warn({
      event: "missing",
      versionId: record.versionId,
    })`找不到來源檔 ${source}`;
    await this.report.add(source);
    return ok({ status: "MISSING", source, destination: null });
  }

  /**
   * 目的地空著就建立連結；已有相同檔案則沿用；
   * 編修版遇到大小相同的自家母片也沿用；
   * 否則依序嘗試 _v2、_v3… 直到找到可用的名稱。
   */
  private async place(
    source: string,
    sourceStat: Stats,
    preferred: string,
    masterStat: Stats | null = null
  ): Promise<Result<LinkOutcome, PlannerError>> {
    for (let version = 1; ; version++) {
      const destination = versionedPath(preferred, version);
      const existing = await statOrNull(destination);
      if (existing) {
        const sameAsMaster =
          masterStat !== null &&
          isSameFile(existing, masterStat) &&
          existing.size === sourceStat.size;
        if (isSameFile(existing, sourceStat) || sameAsMaster) {
          return ok({ status: "EXISTING", source, destination });
        }
        continue;
      }
      try {
        await mkdir(path.dirname(destination), { recursive: true });
        await link(source, destination);
      } catch (error) {
        return err({
          type: "WRITE_FAILED",
          source,
          destination,
          message: error instanceof Error ? error.message : String(error),
        });
      }
      this.logger.debug({ event: "linked" })`${source} → ${destination}`;
      return ok({ status: "LINKED", source, destination });
    }
  }
}
