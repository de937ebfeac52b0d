import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";

const tmpDir = "test/tmp/scanner";

describe("FileSystemScannerDefault", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "subdir"), { recursive: true });
    await writeFile(join(tmpDir, "a.txt"), "a");
    await writeFile(join(tmpDir, "subdir", "b.txt"), "b");
    await writeFile(join(tmpDir, "subdir", "c.JPG"), "c");
  });

  test("能遞迴列出所有檔案", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    expect(result.value).toEqual([
      join(tmpDir, "a.txt"),
      join(tmpDir, "subdir", "b.txt"),
      join(tmpDir, "subdir", "c.JPG"),
    ]);
  });

  test("可關閉遞迴", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, { recursive: false });

    expectOk(result);
    expect(result.value).toEqual([join(tmpDir, "a.txt")]);
  });

  test("副檔名篩選不分大小寫", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, { allowExts: ["jpg"] });

    expectOk(result);
    expect(result.value).toEqual([join(tmpDir, "subdir", "c.JPG")]);
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan("no_such_path");
    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
    expect(result.error.rootPath).toBe("no_such_path");
  });
});
