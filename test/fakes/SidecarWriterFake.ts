import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  SidecarDocument,
  SidecarError,
  SidecarWriter,
} from "@/services/SidecarWriter";
import { exists } from "@/utils/helper";

/** 記錄寫入的內容，並在磁碟上留下佔位檔讓重複執行看得到 */
export class SidecarWriterFake implements SidecarWriter {
  readonly documents: Map<string, SidecarDocument> = new Map();

  async write(
    sidecarPath: string,
    document: SidecarDocument
  ): Promise<Result<void, SidecarError>> {
    if (await exists(sidecarPath)) {
      return err({
        type: "WRITE_FAILED",
        path: sidecarPath,
        message: `Already exists: ${sidecarPath}`,
      });
    }
    await mkdir(path.dirname(sidecarPath), { recursive: true });
    await writeFile(sidecarPath, document.documentId);
    this.documents.set(sidecarPath, document);
    return ok();
  }
}
