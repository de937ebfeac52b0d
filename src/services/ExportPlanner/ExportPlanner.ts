import type { Result } from "~shared/utils/Result";

import type { PhotoRecord } from "@/types";

export type LinkOutcome =
  | { status: "LINKED" | "EXISTING"; source: string; destination: string }
  | { status: "MISSING"; source: string; destination: null };

export type PlannerError = {
  type: "WRITE_FAILED";
  source: string;
  destination: string;
  message: string;
};

export type PlannerSummary = {
  missing: readonly string[];
};

export interface ExportPlanner {
  /** 本次執行已處理過的母片與預覽來源（絕對路徑） */
  readonly knownFiles: ReadonlySet<string>;
  /** 本次執行已寫出的附屬檔（絕對路徑） */
  readonly writtenSidecars: ReadonlySet<string>;

  destinationDir(record: PhotoRecord): string;

  /** 只登記母片已被引用，不建立連結；被篩掉的相片用來避開失物招領 */
  markReferenced(record: PhotoRecord): void;

  linkMaster(record: PhotoRecord): Promise<Result<LinkOutcome, PlannerError>>;

  /** 沒有編修版的相片回傳 null */
  linkEdited(
    record: PhotoRecord
  ): Promise<Result<LinkOutcome, PlannerError> | null>;

  sidecarPathFor(mediaPath: string): string;

  /** 先寫先贏：本次已寫過或磁碟上已存在時回傳 false */
  claimSidecar(sidecarPath: string): Promise<boolean>;

  finish(): Promise<PlannerSummary>;
}
