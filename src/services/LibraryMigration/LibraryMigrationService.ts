import type { PlannerError } from "@/services/ExportPlanner";
import type { AggregateIssue } from "@/services/RecordAggregator";
import type { SidecarError } from "@/services/SidecarWriter";

export type MigrationFilter = {
  /** 只處理 id 大於等於此值的版本 */
  minVersionId?: number;
  /** 只處理標題符合的版本 */
  captionPattern?: RegExp;
};

export type MigrationSummary = {
  /** 實際處理的相片紀錄 */
  records: number;
  /** 被篩選條件排除的紀錄 */
  filtered: number;
  issues: AggregateIssue[];
  linked: number;
  existing: number;
  missing: readonly string[];
  sidecars: number;
  failures: (PlannerError | SidecarError)[];
  /** 相片庫與 EXIF 旋轉同時存在的版本 id */
  rotationConflicts: number[];
  /** 母片資料夾無法掃描時為 null */
  orphans: { linked: number; skipped: number } | null;
};

export interface LibraryMigrationService {
  run(): Promise<MigrationSummary>;
}
