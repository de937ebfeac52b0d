import { link, mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import { exportLayout, libraryLayout, photoExtensions } from "@/constants";
import type {
  FileSystemScanner,
  ScanError,
} from "@/services/FileSystemScanner";
import { exists } from "@/utils/helper";

import type { OrphanScanSummary, OrphanScanner } from "./OrphanScanner";

export class OrphanScannerDefault implements OrphanScanner {
  private readonly scanner: FileSystemScanner;
  private readonly mastersRoot: string;
  private readonly lostAndFound: string;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    libraryRoot: string;
    destinationRoot: string;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.mastersRoot = path.resolve(deps.libraryRoot, libraryLayout.masters);
    this.lostAndFound = path.resolve(
      deps.destinationRoot,
      exportLayout.lostAndFound
    );
    this.logger = deps.logger.extend("OrphanScannerDefault");
  }

  async scan(
    knownFiles: ReadonlySet<string>
  ): Promise<Result<OrphanScanSummary, ScanError>> {
    const scanned = await this.scanner.scan(this.mastersRoot, {
      allowExts: photoExtensions,
    });
    if (isErr(scanned)) {
      this.logger.error({
        error: scanned.error,
      })`無法掃描母片資料夾 ${this.mastersRoot}`;
      return scanned;
    }

    const summary: OrphanScanSummary = { linked: [], skipped: [], failed: [] };
    for (const source of scanned.value) {
      if (knownFiles.has(path.resolve(source))) continue;
      const destination = path.join(
        this.lostAndFound,
        path.relative(this.mastersRoot, source)
      );
      if (await exists(destination)) {
        summary.skipped.push(destination);
        continue;
      }
      try {
        await mkdir(path.dirname(destination), { recursive: true });
        await link(source, destination);
        summary.linked.push(destination);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn({ source })`無法建立連結：${message}`;
        summary.failed.push({ source, message });
      }
    }

    this.logger.info({
      emoji: "🧺",
      linked: summary.linked.length,
      skipped: summary.skipped.length,
    })`失物招領：新增 ${summary.linked.length} 個檔案`;
    return ok(summary);
  }
}
