import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr } from "~shared/utils/Result";

import { libraryLayout } from "@/constants";
import type { ExifService } from "@/services/ExifService";
import type {
  ExportPlanner,
  LinkOutcome,
  PlannerError,
} from "@/services/ExportPlanner";
import {
  type GeometryEngine,
  rotationFromExifOrientation,
} from "@/services/GeometryEngine";
import type { OrphanScanner } from "@/services/OrphanScanner";
import type { RecordAggregator } from "@/services/RecordAggregator";
import {
  type SidecarWriter,
  sidecarDocumentFor,
} from "@/services/SidecarWriter";
import type {
  FaceRegion,
  PhotoRecord,
  RotationDegrees,
  Size,
} from "@/types";

import type {
  LibraryMigrationService,
  MigrationFilter,
  MigrationSummary,
} from "./LibraryMigrationService";

const progressInterval = 500;

/** 旋轉 90/270 度時顯示的寬高互換 */
function displayedSize(size: Size, rotation: RotationDegrees): Size | null {
  if (size.width <= 0 || size.height <= 0) return null;
  if (rotation === 90 || rotation === 270) {
    return { width: size.height, height: size.width };
  }
  return size;
}

/**
 * 依序處理每一筆相片紀錄：
 * 計算臉部區域 → 連結母片與附屬檔 → 連結編修版與附屬檔，
 * 全部完成後再把沒被引用的母片放進失物招領。
 */
export class LibraryMigrationServiceDefault implements LibraryMigrationService {
  private readonly aggregator: RecordAggregator;
  private readonly geometry: GeometryEngine;
  private readonly planner: ExportPlanner;
  private readonly sidecarWriter: SidecarWriter;
  private readonly orphanScanner: OrphanScanner;
  private readonly exifService: ExifService;
  private readonly libraryRoot: string;
  private readonly readExifOrientation: boolean;
  private readonly filter: MigrationFilter;
  private readonly logger: Logger;

  constructor(deps: {
    aggregator: RecordAggregator;
    geometry: GeometryEngine;
    planner: ExportPlanner;
    sidecarWriter: SidecarWriter;
    orphanScanner: OrphanScanner;
    exifService: ExifService;
    libraryRoot: string;
    readExifOrientation?: boolean;
    filter?: MigrationFilter;
    logger: Logger;
  }) {
    this.aggregator = deps.aggregator;
    this.geometry = deps.geometry;
    this.planner = deps.planner;
    this.sidecarWriter = deps.sidecarWriter;
    this.orphanScanner = deps.orphanScanner;
    this.exifService = deps.exifService;
    this.libraryRoot = deps.libraryRoot;
    this.readExifOrientation = deps.readExifOrientation ?? false;
    this.filter = deps.filter ?? {};
    this.logger = deps.logger.extend("LibraryMigrationServiceDefault");
  }

  async run(): Promise<MigrationSummary> {
    const summary: MigrationSummary = {
      records: 0,
      filtered: 0,
      issues: [],
      linked: 0,
      existing: 0,
      missing: [],
      sidecars: 0,
      failures: [],
      rotationConflicts: [],
      orphans: null,
    };

    for (const result of this.aggregator.aggregate()) {
      if (isErr(result)) {
        summary.issues.push(result.error);
        continue;
      }
      const record = result.value;
      this.planner.markReferenced(record);
      if (!this.accepts(record)) {
        summary.filtered++;
        continue;
      }
      await this.migrate(record, summary);
      summary.records++;
      if (summary.records % progressInterval === 0) {
        this.logger.info({
          emoji: "⏳",
          versionId: record.versionId,
        })`已處理 ${summary.records} 筆相片`;
      }
    }

    const planned = await this.planner.finish();
    summary.missing = planned.missing;

    const orphans = await this.orphanScanner.scan(this.planner.knownFiles);
    if (!isErr(orphans)) {
      summary.orphans = {
        linked: orphans.value.linked.length,
        skipped: orphans.value.skipped.length,
      };
    }

    this.logger.info({
      emoji: "✅",
      records: summary.records,
      linked: summary.linked,
      existing: summary.existing,
      missing: summary.missing.length,
      sidecars: summary.sidecars,
    })`轉移完成，共處理 ${summary.records} 筆相片`;
    return summary;
  }

  private accepts(record: PhotoRecord) {
    const { minVersionId, captionPattern } = this.filter;
    if (minVersionId !== undefined && record.versionId < minVersionId) {
      return false;
    }
    if (captionPattern && !captionPattern.test(record.caption ?? "")) {
      return false;
    }
    return true;
  }

  private async migrate(record: PhotoRecord, summary: MigrationSummary) {
    const exifRotation = await this.exifRotationOf(record);
    const regions = this.geometry.regionsFor(record, {
      catalogRotation: record.rotation,
      exifRotation,
    });
    if (regions.conflict) summary.rotationConflicts.push(record.versionId);

    const master = await this.planner.linkMaster(record);
    await this.handleLink(
      master,
      summary,
      record,
      "master",
      regions.master,
      displayedSize(record.master, regions.rotation)
    );

    const edited = await this.planner.linkEdited(record);
    if (!edited) return;
    await this.handleLink(
      edited,
      summary,
      record,
      "edited",
      regions.edited ?? [],
      record.processed ?? displayedSize(record.master, regions.rotation)
    );
  }

  private async handleLink(
    result: Result<LinkOutcome, PlannerError>,
    summary: MigrationSummary,
    record: PhotoRecord,
    variant: "master" | "edited",
    regions: readonly FaceRegion[],
    dimensions: Size | null
  ) {
    if (isErr(result)) {
      this.logger.warn({
        versionId: record.versionId,
        error: result.error,
      })`無法建立連結 ${result.error.destination}`;
      summary.failures.push(result.error);
      return;
    }
    const outcome = result.value;
    if (outcome.status === "MISSING") return;
    if (outcome.status === "LINKED") summary.linked++;
    else summary.existing++;

    const sidecarPath = this.planner.sidecarPathFor(outcome.destination);
    if (!(await this.planner.claimSidecar(sidecarPath))) return;
    const written = await this.sidecarWriter.write(
      sidecarPath,
      sidecarDocumentFor(record, variant, regions, dimensions)
    );
    if (isErr(written)) summary.failures.push(written.error);
    else summary.sidecars++;
  }

  private async exifRotationOf(record: PhotoRecord): Promise<RotationDegrees> {
    if (!this.readExifOrientation || record.mediaKind !== "still") return 0;
    const masterPath = path.join(
      this.libraryRoot,
      libraryLayout.masters,
      record.masterPath
    );
    const exif = await this.exifService.readExif(masterPath);
    if (isErr(exif)) {
      this.logger.debug({
        versionId: record.versionId,
        reason: exif.error.type,
      })`無法讀取 EXIF 方向`;
      return 0;
    }
    return rotationFromExifOrientation(exif.value.orientation);
  }
}
