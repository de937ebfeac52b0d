import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectOk } from "~shared/testkit/ExpectResult";

import { ExportPlannerDefault, versionedPath } from "@/services/ExportPlanner";
import { exists } from "@/utils/helper";

import { buildPhotoRecord } from "~test/helpers/PhotoRecordBuilder";

const tmpDir = path.resolve("test/tmp/planner");
const libraryRoot = path.join(tmpDir, "library");
const destinationRoot = path.join(tmpDir, "export");
const logger = buildTestLogger();

const summerTrip = {
  name: "Summer Trip",
  startDate: new Date("2015-07-01T00:00:00Z"),
  endDate: null,
};

async function writeLibraryFile(relativePath: string, content: string) {
  const filePath = path.join(libraryRoot, relativePath);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  return filePath;
}

function buildPlanner() {
  return new ExportPlannerDefault({ libraryRoot, destinationRoot, logger });
}

beforeEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe("versionedPath", () => {
  test("第二個以後的版本加上 _vN", () => {
    expect(versionedPath("/a/IMG_0001.JPG", 1)).toBe("/a/IMG_0001.JPG");
    expect(versionedPath("/a/IMG_0001.JPG", 2)).toBe("/a/IMG_0001_v2.JPG");
    expect(versionedPath("/a/README", 3)).toBe("/a/README_v3");
  });
});

describe("ExportPlannerDefault.destinationDir", () => {
  test("有日期的事件放在年份資料夾下", () => {
    const planner = buildPlanner();
    const record = buildPhotoRecord({ event: summerTrip });
    expect(planner.destinationDir(record)).toBe(
      path.join(destinationRoot, "2015", "Summer Trip")
    );
  });

  test("事件名稱中的斜線改為底線", () => {
    const planner = buildPlanner();
    const record = buildPhotoRecord({
      event: { name: "Trip/Day 1", startDate: null, endDate: null },
    });
    expect(planner.destinationDir(record)).toBe(
      path.join(destinationRoot, "Trip_Day 1")
    );
  });

  test("沒有事件時依母片所在資料夾分類", () => {
    const planner = buildPlanner();
    const record = buildPhotoRecord({ masterPath: "2015/04/27/IMG_0001.JPG" });
    expect(planner.destinationDir(record)).toBe(
      path.join(destinationRoot, "00_ImagesWithoutEvents", "2015/04/27")
    );
  });
});

describe("ExportPlannerDefault.linkMaster", () => {
  test("建立硬連結並記錄來源", async () => {
    const source = await writeLibraryFile(
      "Masters/2015/04/27/IMG_0001.JPG",
      "master"
    );
    const planner = buildPlanner();
    const result = await planner.linkMaster(
      buildPhotoRecord({ event: summerTrip })
    );

    const destination = path.join(
      destinationRoot,
      "2015",
      "Summer Trip",
      "IMG_0001.JPG"
    );
    expectOk(result);
    expect(result.value).toEqual({ status: "LINKED", source, destination });
    expect((await stat(destination)).ino).toBe((await stat(source)).ino);
    expect([...planner.knownFiles]).toEqual([source]);
  });

  test("再次執行時沿用已存在的連結", async () => {
    await writeLibraryFile("Masters/2015/04/27/IMG_0001.JPG", "master");
    const record = buildPhotoRecord({ event: summerTrip });
    await buildPlanner().linkMaster(record);

    const result = await buildPlanner().linkMaster(record);
    expectOk(result);
    expect(result.value.status).toBe("EXISTING");
  });

  test("同名但內容不同時改用 _v2", async () => {
    await writeLibraryFile("Masters/2015/04/27/IMG_0001.JPG", "master");
    const other = await writeLibraryFile(
      "Masters/2016/01/01/IMG_0001.JPG",
      "another master"
    );
    const planner = buildPlanner();
    await planner.linkMaster(buildPhotoRecord({ event: summerTrip }));
    const result = await planner.linkMaster(
      buildPhotoRecord({
        versionId: 2,
        event: summerTrip,
        masterPath: "2016/01/01/IMG_0001.JPG",
      })
    );

    expectOk(result);
    expect(result.value).toEqual({
      status: "LINKED",
      source: other,
      destination: path.join(
        destinationRoot,
        "2015",
        "Summer Trip",
        "IMG_0001_v2.JPG"
      ),
    });
  });

  test("同名同大小但不是同一個檔案時仍改用 _v2", async () => {
    await writeLibraryFile("Masters/camA/P1000001.RW2", "raw1");
    const second = await writeLibraryFile("Masters/camB/P1000001.RW2", "raw2");
    const planner = buildPlanner();
    await planner.linkMaster(
      buildPhotoRecord({ event: summerTrip, masterPath: "camA/P1000001.RW2" })
    );
    const result = await planner.linkMaster(
      buildPhotoRecord({
        versionId: 2,
        event: summerTrip,
        masterPath: "camB/P1000001.RW2",
      })
    );

    const destination = path.join(
      destinationRoot,
      "2015",
      "Summer Trip",
      "P1000001_v2.RW2"
    );
    expectOk(result);
    expect(result.value).toEqual({
      status: "LINKED",
      source: second,
      destination,
    });
    expect(await readFile(destination, "utf8")).toBe("raw2");
  });

  test("來源不存在時寫入 missing.log", async () => {
    const planner = buildPlanner();
    const result = await planner.linkMaster(buildPhotoRecord());
    const source = path.join(libraryRoot, "Masters/2015/04/27/IMG_0001.JPG");

    expectOk(result);
    expect(result.value).toEqual({
      status: "MISSING",
      source,
      destination: null,
    });
    expect(planner.knownFiles.size).toBe(0);

    const summary = await planner.finish();
    expect(summary.missing).toEqual([source]);
    expect(
      await readFile(path.join(destinationRoot, "missing.log"), "utf8")
    ).toBe(`${source}\n`);
  });

  test("多個版本引用同一個缺少的母片時只記一行", async () => {
    const planner = buildPlanner();
    await planner.linkMaster(buildPhotoRecord());
    await planner.linkMaster(
      buildPhotoRecord({
        versionId: 2,
        versionUuid: "version-2",
        versionNumber: 1,
      })
    );
    const source = path.join(libraryRoot, "Masters/2015/04/27/IMG_0001.JPG");

    const summary = await planner.finish();
    expect(summary.missing).toEqual([source]);
    expect(
      await readFile(path.join(destinationRoot, "missing.log"), "utf8")
    ).toBe(`${source}\n`);
  });

  test("無法寫入 missing.log 時仍繼續並保留清單", async () => {
    await mkdir(path.join(destinationRoot, "missing.log"), { recursive: true });
    const planner = buildPlanner();
    const result = await planner.linkMaster(buildPhotoRecord());
    const source = path.join(libraryRoot, "Masters/2015/04/27/IMG_0001.JPG");

    expectOk(result);
    expect(result.value.status).toBe("MISSING");
    const summary = await planner.finish();
    expect(summary.missing).toEqual([source]);
  });

  test("被篩掉的相片仍登記母片為已引用", () => {
    const planner = buildPlanner();
    planner.markReferenced(buildPhotoRecord());
    expect([...planner.knownFiles]).toEqual([
      path.join(libraryRoot, "Masters/2015/04/27/IMG_0001.JPG"),
    ]);
  });

  test("沒有缺檔時刪除舊的 missing.log", async () => {
    await mkdir(destinationRoot, { recursive: true });
    await writeFile(path.join(destinationRoot, "missing.log"), "stale\n");
    const summary = await buildPlanner().finish();
    expect(summary.missing).toEqual([]);
    expect(await exists(path.join(destinationRoot, "missing.log"))).toBe(false);
  });
});

describe("ExportPlannerDefault.linkEdited", () => {
  test("未編修的版本沒有編修版", async () => {
    const planner = buildPlanner();
    expect(await planner.linkEdited(buildPhotoRecord())).toBeNull();
  });

  test("優先使用版本專屬的預覽，與母片同名時改用 _v2", async () => {
    await writeLibraryFile("Masters/2015/04/27/IMG_0001.JPG", "master");
    await writeLibraryFile("Previews/2015/04/27/IMG_0001.jpg", "shared");
    const preview = await writeLibraryFile(
      "Previews/2015/04/27/version-1/IMG_0001.jpg",
      "edited preview"
    );
    const planner = buildPlanner();
    const record = buildPhotoRecord({ versionNumber: 1, event: summerTrip });
    await planner.linkMaster(record);
    const result = await planner.linkEdited(record);

    expect(result).not.toBeNull();
    if (!result) return;
    expectOk(result);
    expect(result.value).toEqual({
      status: "LINKED",
      source: preview,
      destination: path.join(
        destinationRoot,
        "2015",
        "Summer Trip",
        "IMG_0001_v2.JPG"
      ),
    });
  });

  test("編修版與母片大小相同時沿用母片的連結", async () => {
    await writeLibraryFile("Masters/2015/04/27/IMG_0001.JPG", "master");
    await writeLibraryFile(
      "Previews/2015/04/27/version-1/IMG_0001.jpg",
      "abcdef"
    );
    const planner = buildPlanner();
    const record = buildPhotoRecord({ versionNumber: 1, event: summerTrip });
    await planner.linkMaster(record);
    const result = await planner.linkEdited(record);

    expect(result).not.toBeNull();
    if (!result) return;
    expectOk(result);
    expect(result.value).toMatchObject({
      status: "EXISTING",
      destination: path.join(
        destinationRoot,
        "2015",
        "Summer Trip",
        "IMG_0001.JPG"
      ),
    });
    expect(
      await exists(
        path.join(destinationRoot, "2015", "Summer Trip", "IMG_0001_v2.JPG")
      )
    ).toBe(false);
  });

  test("RAW 母片的編修版輸出為 .jpg，退回資料夾層級的預覽", async () => {
    const preview = await writeLibraryFile(
      "Previews/2015/04/27/DSC_0002.jpg",
      "preview"
    );
    const planner = buildPlanner();
    const result = await planner.linkEdited(
      buildPhotoRecord({
        versionNumber: 1,
        masterPath: "2015/04/27/DSC_0002.NEF",
      })
    );

    expect(result).not.toBeNull();
    if (!result) return;
    expectOk(result);
    expect(result.value).toEqual({
      status: "LINKED",
      source: preview,
      destination: path.join(
        destinationRoot,
        "00_ImagesWithoutEvents",
        "2015/04/27",
        "DSC_0002.jpg"
      ),
    });
  });

  test("找不到預覽時回報第一個候選路徑", async () => {
    const planner = buildPlanner();
    const result = await planner.linkEdited(
      buildPhotoRecord({ versionNumber: 1 })
    );

    expect(result).not.toBeNull();
    if (!result) return;
    expectOk(result);
    expect(result.value).toEqual({
      status: "MISSING",
      source: path.join(
        libraryRoot,
        "Previews/2015/04/27/version-1/IMG_0001.jpg"
      ),
      destination: null,
    });
  });
});

describe("ExportPlannerDefault.claimSidecar", () => {
  test("同一個附屬檔只能認領一次", async () => {
    const planner = buildPlanner();
    const sidecar = planner.sidecarPathFor(
      path.join(destinationRoot, "IMG_0001.JPG")
    );
    expect(sidecar).toBe(path.join(destinationRoot, "IMG_0001.JPG.xmp"));
    expect(await planner.claimSidecar(sidecar)).toBe(true);
    expect(await planner.claimSidecar(sidecar)).toBe(false);
  });

  test("磁碟上已有附屬檔時不覆寫", async () => {
    await mkdir(destinationRoot, { recursive: true });
    const sidecar = path.join(destinationRoot, "IMG_0001.JPG.xmp");
    await writeFile(sidecar, "<x:xmpmeta/>");
    expect(await buildPlanner().claimSidecar(sidecar)).toBe(false);
  });
});
