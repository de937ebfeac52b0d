import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

function normalizeExt(ext: string) {
  const lower = ext.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = new Set((options?.allowExts ?? []).map(normalizeExt));
    try {
      const entries = await readdir(rootPath, {
        recursive: options?.recursive ?? true,
        withFileTypes: true,
      });
      const files = entries
        .filter((d) => {
          if (!d.isFile()) return false;
          if (allowExts.size === 0) return true;
          return allowExts.has(path.extname(d.name).toLowerCase());
        })
        .map((d) => path.join(d.parentPath, d.name))
        .sort();
      return ok(files);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        rootPath,
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
