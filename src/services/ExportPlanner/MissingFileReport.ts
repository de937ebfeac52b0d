import { mkdir, open, rm } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

/**
 * 逐行記錄找不到的來源檔，同一路徑只記一次。
 * 第一次寫入時才建立檔案；結束時若沒有任何內容，刪除前次留下的舊檔。
 * 報告檔寫不進去時只記錄警告，清單仍保留在記憶體中。
 */
export class MissingFileReport {
  private handle: Promise<FileHandle> | undefined;
  private writable = true;
  private readonly lines: string[] = [];
  private readonly reported = new Set<string>();
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    logger: Logger
  ) {
    this.logger = logger.extend("MissingFileReport");
  }

  get entries(): readonly string[] {
    return this.lines;
  }

  async add(missingPath: string) {
    if (this.reported.has(missingPath)) return;
    this.reported.add(missingPath);
    this.lines.push(missingPath);
    if (!this.writable) return;

    try {
      this.handle ??= this.openFile();
      const handle = await this.handle;
      await handle.write(`${missingPath}\n`);
    } catch (error) {
      this.writable = false;
      this.handle = undefined;
      this.logger.warn({
        error,
        filePath: this.filePath,
      })`無法寫入缺檔清單，之後的缺檔只保留在摘要中`;
    }
  }

  async close() {
    try {
      if (this.lines.length === 0) {
        await rm(this.filePath, { force: true });
        return;
      }
      const pending = this.handle;
      this.handle = undefined;
      if (pending) await (await pending).close();
    } catch (error) {
      this.logger.warn({ error, filePath: this.filePath })`無法整理缺檔清單`;
    }
  }

  private async openFile() {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    return open(this.filePath, "w");
  }
}
