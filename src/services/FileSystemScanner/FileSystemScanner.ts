import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  rootPath: string;
  message: string;
};

export type ScanOptions = {
  /** 預設為 true */
  recursive?: boolean;
  /** 允許的副檔名（不分大小寫，可省略開頭的點）；空陣列表示全部 */
  allowExts?: readonly string[];
};

export interface FileSystemScanner {
  /** 回傳排序後的檔案完整路徑 */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
