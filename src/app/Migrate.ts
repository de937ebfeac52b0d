import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getMigrateConfig } from "@/config";
import { CatalogReaderSqlite } from "@/services/CatalogReader";
import { ExifServiceExifTool } from "@/services/ExifService";
import { ExportPlannerDefault } from "@/services/ExportPlanner";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  GeometryEngineDefault,
  type RotationPolicy,
  rotationPolicies,
} from "@/services/GeometryEngine";
import { LibraryMigrationServiceDefault } from "@/services/LibraryMigration";
import { OrphanScannerDefault } from "@/services/OrphanScanner";
import { RecordAggregatorDefault } from "@/services/RecordAggregator";
import { SidecarWriterExifTool } from "@/services/SidecarWriter";
import { expandHome } from "@/utils/helper";

type MigrateOptions = {
  minId?: string | number;
  caption?: string;
  rotationPolicy?: string;
  exifOrientation?: boolean;
  cropFaces?: boolean;
};

function parseRotationPolicy(value: string): RotationPolicy | undefined {
  return rotationPolicies.find((policy) => policy === value);
}

export function registerMigrate(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "<library> <destination>",
      "將相片庫轉為以事件分資料夾的硬連結目錄，並為每個檔案寫出 XMP"
    )
    .option("--min-id <n>", "只處理版本 id 大於等於 n 的相片")
    .option("--caption <pattern>", "只處理標題符合正規表示式的相片")
    .option(
      "--rotation-policy <policy>",
      "旋轉來源：catalog（預設）、exif 或 combined"
    )
    .option("--exif-orientation", "讀取母片 EXIF Orientation")
    .option("--crop-faces", "編修版沒有臉部資料時依裁切範圍換算")
    .action(
      async (library: string, destination: string, options: MigrateOptions) => {
        const config = getMigrateConfig();
        const logger = baseLogger.extend("migrate", { library, destination });
        const libraryRoot = expandHome(library);
        const destinationRoot = expandHome(destination);

        const rotationPolicy =
          options.rotationPolicy === undefined
            ? config.MIGRATE_ROTATION_POLICY
            : parseRotationPolicy(options.rotationPolicy);
        if (!rotationPolicy) {
          logger.error({
            emoji: "❌",
          })`不支援的旋轉來源 ${options.rotationPolicy}`;
          process.exit(1);
        }

        const minVersionId =
          options.minId === undefined
            ? config.MIGRATE_MIN_VERSION_ID
            : Number(options.minId);
        if (minVersionId !== undefined && !Number.isFinite(minVersionId)) {
          logger.error({ emoji: "❌" })`--min-id 必須是數字`;
          process.exit(1);
        }

        const captionSource = options.caption ?? config.MIGRATE_CAPTION_PATTERN;
        let captionPattern: RegExp | undefined;
        try {
          captionPattern = captionSource ? new RegExp(captionSource) : undefined;
        } catch (error) {
          logger.error({ emoji: "❌", error })`標題篩選條件不是合法的正規表示式`;
          process.exit(1);
        }

        const opened = CatalogReaderSqlite.open(libraryRoot, logger);
        if (isErr(opened)) {
          logger.error({ emoji: "❌", error: opened.error })`無法開啟相片庫`;
          process.exit(1);
        }
        const reader = opened.value;
        const exifService = new ExifServiceExifTool();
        const sidecarWriter = new SidecarWriterExifTool({ logger });

        try {
          const planner = new ExportPlannerDefault({
            libraryRoot,
            destinationRoot,
            logger,
          });
          const service = new LibraryMigrationServiceDefault({
            aggregator: new RecordAggregatorDefault({ reader, logger }),
            geometry: new GeometryEngineDefault({
              logger,
              rotationPolicy,
              cropFallback:
                options.cropFaces ?? config.MIGRATE_CROP_FACE_FALLBACK,
            }),
            planner,
            sidecarWriter,
            orphanScanner: new OrphanScannerDefault({
              scanner: new FileSystemScannerDefault(),
              libraryRoot,
              destinationRoot,
              logger,
            }),
            exifService,
            libraryRoot,
            readExifOrientation:
              options.exifOrientation ?? config.MIGRATE_READ_EXIF_ORIENTATION,
            filter: { minVersionId, captionPattern },
            logger,
          });

          const summary = await service.run();
          const reporter = new DumpWriterDefault(
            logger,
            config.MIGRATE_REPORT_DIR
          );
          await reporter.dump("migrate-summary", summary);

          if (summary.missing.length > 0) {
            logger.warn({
              emoji: "🕳️",
              count: summary.missing.length,
            })`以下 ${summary.missing.length} 個檔案不存在：\n${summary.missing.join("\n")}`;
          }
          if (summary.failures.length > 0) {
            logger.warn({
              emoji: "⚠️",
              count: summary.failures.length,
            })`有 ${summary.failures.length} 個檔案無法寫出，詳見報告`;
          }
        } finally {
          reader.close();
          await dispose(sidecarWriter);
          await dispose(exifService);
        }
      }
    );
}
