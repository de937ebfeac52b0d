import { parseBuffer } from "bplist-parser";

import { type Result, err, ok } from "~shared/utils/Result";

import { editFieldTags, editOperationNames } from "@/constants";
import type { EditOperation } from "@/types";

export type PlainValue =
  | string
  | number
  | boolean
  | null
  | Date
  | Uint8Array
  | PlainValue[]
  | PlainMapping;

export type PlainMapping = { [key: string]: PlainValue };

export type EditDecodeError = {
  type: "PARSE_FAILED" | "NOT_AN_ARCHIVE" | "MISSING_FIELD";
  name: string;
  message: string;
};

type Uid = { UID: number };

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  );
}

function isUid(value: unknown): value is Uid {
  return (
    isRecord(value) &&
    Object.keys(value).length === 1 &&
    typeof value.UID === "number"
  );
}

/**
 * 將 keyed archive 的物件圖還原為一般的 mapping / array。
 * UID 參照會展開，NS.keys 與 NS.objects 會配對，遇到循環參照時截斷為 null。
 */
export class ArchiveResolver {
  constructor(private readonly objects: readonly unknown[]) {}

  resolve(value: unknown, seen: ReadonlySet<number> = new Set()): PlainValue {
    if (isUid(value)) {
      const index = value.UID;
      if (seen.has(index) || index < 0 || index >= this.objects.length) {
        return null;
      }
      const target = this.objects[index];
      if (target === "$null") return null;
      return this.resolve(target, new Set([...seen, index]));
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.resolve(item, seen));
    }
    if (value instanceof Date || value instanceof Uint8Array) return value;
    if (isRecord(value)) return this.resolveRecord(value, seen);
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      return value;
    }
    if (typeof value === "bigint") return Number(value);
    return null;
  }

  private resolveRecord(
    record: Record<string, unknown>,
    seen: ReadonlySet<number>
  ): PlainValue {
    const keys = record["NS.keys"];
    const objects = record["NS.objects"];
    if (Array.isArray(keys) && Array.isArray(objects)) {
      const mapping: PlainMapping = {};
      keys.forEach((keyRef, index) => {
        const key = this.resolve(keyRef, seen);
        if (typeof key !== "string") return;
        mapping[key] = this.resolve(objects[index], seen);
      });
      return mapping;
    }
    if (Array.isArray(objects)) {
      return objects.map((item) => this.resolve(item, seen));
    }
    const nsString = record["NS.string"];
    if (typeof nsString === "string") return nsString;

    const mapping: PlainMapping = {};
    for (const [key, entry] of Object.entries(record)) {
      if (key === "$class") continue;
      mapping[key] = this.resolve(entry, seen);
    }
    return mapping;
  }
}

/** 將 bplist 解析結果的最上層 archive 還原 */
export function dereferenceArchive(archive: unknown): PlainValue | undefined {
  if (!isRecord(archive)) return undefined;
  const objects = archive["$objects"];
  if (!Array.isArray(objects)) return undefined;
  const top = archive["$top"];
  const rootRef = isRecord(top) ? top.root : undefined;
  const resolver = new ArchiveResolver(objects);
  return resolver.resolve(rootRef ?? { UID: 1 });
}

/** 深度優先找出第一個帶有指定標籤且值為數字的欄位 */
export function findNumericTag(
  value: PlainValue,
  tag: string
): number | undefined {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findNumericTag(item, tag);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (
    value === null ||
    typeof value !== "object" ||
    value instanceof Date ||
    value instanceof Uint8Array
  ) {
    return undefined;
  }
  const direct = value[tag];
  if (typeof direct === "number" && Number.isFinite(direct)) return direct;
  for (const entry of Object.values(value)) {
    const found = findNumericTag(entry, tag);
    if (found !== undefined) return found;
  }
  return undefined;
}

export function otherOperation(name: string): EditOperation {
  return { kind: "other", name };
}

export function parseArchive(
  name: string,
  data: Uint8Array
): Result<PlainValue, EditDecodeError> {
  let parsed: unknown[];
  try {
    parsed = parseBuffer(Buffer.from(data));
  } catch (error) {
    return err({
      type: "PARSE_FAILED",
      name,
      message: error instanceof Error ? error.message : String(error),
    });
  }
  const graph = dereferenceArchive(parsed[0]);
  if (graph === undefined) {
    return err({
      type: "NOT_AN_ARCHIVE",
      name,
      message: "缺少 $objects，不是 keyed archive",
    });
  }
  return ok(graph);
}

/**
 * 由已還原的物件圖取出編修操作。
 * 只有裁切與拉直需要欄位值，其餘操作只保留名稱。
 */
export function editOperationFromGraph(
  name: string,
  graph: PlainValue
): Result<EditOperation, EditDecodeError> {
  const missing = (tag: string) =>
    err<EditDecodeError>({
      type: "MISSING_FIELD",
      name,
      message: `找不到欄位 ${tag}`,
    });

  switch (name) {
    case editOperationNames.crop: {
      const x = findNumericTag(graph, editFieldTags.cropX);
      if (x === undefined) return missing(editFieldTags.cropX);
      const y = findNumericTag(graph, editFieldTags.cropY);
      if (y === undefined) return missing(editFieldTags.cropY);
      const width = findNumericTag(graph, editFieldTags.cropWidth);
      if (width === undefined || width <= 0) {
        return missing(editFieldTags.cropWidth);
      }
      const height = findNumericTag(graph, editFieldTags.cropHeight);
      if (height === undefined || height <= 0) {
        return missing(editFieldTags.cropHeight);
      }
      const crop: EditOperation = { kind: "crop", name, x, y, width, height };
      return ok(crop);
    }
    case editOperationNames.straighten: {
      const angle = findNumericTag(graph, editFieldTags.straightenAngle);
      if (angle === undefined) return missing(editFieldTags.straightenAngle);
      const straighten: EditOperation = { kind: "straighten", name, angle };
      return ok(straighten);
    }
    default:
      return ok(otherOperation(name));
  }
}

export function decodeEditOperation(
  name: string,
  data: Uint8Array | null
): Result<EditOperation, EditDecodeError> {
  if (
    name !== editOperationNames.crop &&
    name !== editOperationNames.straighten
  ) {
    return ok(otherOperation(name));
  }
  if (!data || data.length === 0) {
    return err({ type: "PARSE_FAILED", name, message: "編修資料為空" });
  }
  const graph = parseArchive(name, data);
  if (!graph.ok) return graph;
  return editOperationFromGraph(name, graph.value);
}
