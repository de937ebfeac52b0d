import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";

/**
 * 將報告以 JSON 檔輸出到指定資料夾，檔名帶有時間戳記避免覆蓋。
 */
export class DumpWriterDefault {
  constructor(
    private readonly logger: Logger,
    private readonly dir = "dist/dumps"
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const fileName = `${format(new Date(), "yyyyMMdd-HHmmss")}-${sanitize(name)}.json`;
    const filePath = path.join(this.dir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", event: "dump", filePath })`已輸出報告 ${name}`;
    return filePath;
  }
}

function sanitize(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}
