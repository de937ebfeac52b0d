import type { Result } from "~shared/utils/Result";

import type { PhotoRecord } from "@/types";

export type AggregateIssue = {
  type: "MASTER_NOT_FOUND";
  versionId: number;
  versionUuid: string;
  masterUuid: string | null;
  message: string;
};

export interface RecordAggregator {
  /**
   * 依版本 id 順序逐筆組出相片紀錄。
   * 找不到母片的版本以 issue 回報，不中斷後續資料。
   */
  aggregate(): Iterable<Result<PhotoRecord, AggregateIssue>>;
}
