import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { GeometryEngineDefault } from "@/services/GeometryEngine";

import { expectRectClose } from "~test/helpers/expectRect";
import { buildPhotoRecord, rawFace } from "~test/helpers/PhotoRecordBuilder";

const logger = buildTestLogger();

const alice = rawFace(
  { left: 0.1, bottom: 0.5, width: 0.2, height: 0.3 },
  { name: "Alice", email: "alice@example.com" }
);

describe("GeometryEngineDefault", () => {
  test("旋轉 90 度後計算中心點", () => {
    const engine = new GeometryEngineDefault({ logger });
    const region = engine.normalize(alice, 90);
    expectRectClose(region, { x: 0.2, y: 0.1, width: 0.3, height: 0.2 });
    expect(region.centerX).toBeCloseTo(0.35, 6);
    expect(region.centerY).toBeCloseTo(0.2, 6);
    expect(region.name).toBe("Alice");
    expect(region.email).toBe("alice@example.com");
  });

  test("沒有名字的臉標為 Unknown", () => {
    const engine = new GeometryEngineDefault({ logger });
    const region = engine.normalize(
      rawFace({ left: 0, bottom: 0, width: 0.5, height: 0.5 }),
      0
    );
    expect(region.name).toBe("Unknown");
    expect(region.email).toBeNull();
  });

  test("套用校正倍率", () => {
    const engine = new GeometryEngineDefault({ logger });
    const region = engine.normalize(alice, 0, { width: 1, height: 0.5 });
    expectRectClose(region, { x: 0.1, y: 0.1, width: 0.2, height: 0.15 });
  });

  test("依規則決定旋轉來源", () => {
    const inputs = { catalogRotation: 90, exifRotation: 180 } as const;
    const catalog = new GeometryEngineDefault({ logger });
    const exif = new GeometryEngineDefault({ logger, rotationPolicy: "exif" });
    const combined = new GeometryEngineDefault({
      logger,
      rotationPolicy: "combined",
    });

    expect(catalog.resolveRotation(inputs)).toEqual({
      rotation: 90,
      conflict: true,
    });
    expect(exif.resolveRotation(inputs)).toEqual({
      rotation: 180,
      conflict: true,
    });
    expect(combined.resolveRotation(inputs)).toEqual({
      rotation: 270,
      conflict: true,
    });
    expect(
      exif.resolveRotation({ catalogRotation: 0, exifRotation: 90 })
    ).toEqual({ rotation: 90, conflict: false });
  });

  test("編修版另存的臉部只翻轉 y 軸", () => {
    const engine = new GeometryEngineDefault({ logger });
    const record = buildPhotoRecord({
      versionNumber: 1,
      rotation: 90,
      faces: [alice],
      editedFaces: [
        rawFace({ left: 0.4, bottom: 0.4, width: 0.2, height: 0.2 }),
      ],
    });
    const regions = engine.editedRegions(record, 90);
    expect(regions).toHaveLength(1);
    expectRectClose(regions[0], { x: 0.4, y: 0.4, width: 0.2, height: 0.2 });
  });

  test("未啟用裁切換算時沿用母片臉部", () => {
    const engine = new GeometryEngineDefault({ logger });
    const record = buildPhotoRecord({
      versionNumber: 1,
      faces: [alice],
      edits: [
        {
          kind: "crop",
          name: "RKCropOperation",
          x: 100,
          y: 200,
          width: 500,
          height: 400,
        },
      ],
    });
    expect(engine.editedRegions(record, 0)).toEqual(
      engine.masterRegions(record, 0)
    );
  });

  test("啟用裁切換算時換算到裁切範圍，並排除範圍外的臉", () => {
    const engine = new GeometryEngineDefault({ logger, cropFallback: true });
    const record = buildPhotoRecord({
      versionNumber: 1,
      master: { width: 1000, height: 800 },
      faces: [
        rawFace({ left: 0.2, bottom: 0.4, width: 0.1, height: 0.1 }, { name: "Bob" }),
        rawFace({ left: 0, bottom: 0, width: 0.05, height: 0.05 }, { name: "Carol" }),
      ],
      edits: [
        {
          kind: "crop",
          name: "RKCropOperation",
          x: 100,
          y: 200,
          width: 500,
          height: 400,
        },
      ],
    });
    const regions = engine.editedRegions(record, 0);
    expect(regions.map((r) => r.name)).toEqual(["Bob"]);
    expectRectClose(regions[0], { x: 0.2, y: 0.5, width: 0.2, height: 0.2 });
  });

  test("母片尺寸未知時不做裁切換算", () => {
    const engine = new GeometryEngineDefault({ logger, cropFallback: true });
    const record = buildPhotoRecord({
      versionNumber: 1,
      master: { width: 0, height: 0 },
      faces: [alice],
      edits: [
        {
          kind: "crop",
          name: "RKCropOperation",
          x: 0,
          y: 0,
          width: 10,
          height: 10,
        },
      ],
    });
    expect(engine.editedRegions(record, 0)).toEqual(
      engine.masterRegions(record, 0)
    );
  });

  test("只有編修過的靜態相片有編修版臉部", () => {
    const engine = new GeometryEngineDefault({ logger });
    const inputs = { catalogRotation: 0, exifRotation: 0 } as const;

    const original = engine.regionsFor(buildPhotoRecord({ faces: [alice] }), inputs);
    expect(original.master).toHaveLength(1);
    expect(original.edited).toBeNull();

    const edited = engine.regionsFor(
      buildPhotoRecord({ versionNumber: 1, faces: [alice] }),
      inputs
    );
    expect(edited.edited).toHaveLength(1);

    const video = engine.regionsFor(
      buildPhotoRecord({ versionNumber: 1, mediaKind: "video", faces: [alice] }),
      inputs
    );
    expect(video.edited).toBeNull();
  });
});
