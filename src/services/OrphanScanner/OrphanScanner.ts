import type { Result } from "~shared/utils/Result";

import type { ScanError } from "@/services/FileSystemScanner";

export type OrphanScanSummary = {
  /** 新建立連結的檔案 */
  linked: string[];
  /** 失物招領區已存在的檔案 */
  skipped: string[];
  failed: { source: string; message: string }[];
};

export interface OrphanScanner {
  /**
   * 找出母片資料夾內從未被任何相片紀錄引用的影像，
   * 依原相對路徑連結到失物招領資料夾。
   */
  scan(
    knownFiles: ReadonlySet<string>
  ): Promise<Result<OrphanScanSummary, ScanError>>;
}
