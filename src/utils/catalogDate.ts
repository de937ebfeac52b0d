import { addSeconds, differenceInSeconds, isValid, parse } from "date-fns";

import { catalogEpoch } from "@/constants";
import type { CatalogDate } from "@/types";

export function fromCatalogSeconds(seconds: number): Date {
  return addSeconds(catalogEpoch, seconds);
}

export function toCatalogSeconds(date: Date): number {
  return differenceInSeconds(date, catalogEpoch);
}

export function toCatalogDate(
  seconds: number | null | undefined,
  timeZone: string | null
): CatalogDate | null {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds)) {
    return null;
  }
  return { date: fromCatalogSeconds(seconds), timeZone };
}

/**
 * 匯入群組以 "yyyy-MM-dd @ HH:mm:ss" 命名，名稱即為匯入時間。
 */
export function parseImportGroupName(name: string | null): Date | null {
  if (!name) return null;
  const date = parse(name.trim(), "yyyy-MM-dd '@' HH:mm:ss", new Date());
  return isValid(date) ? date : null;
}

const utcSuffix = /\.\d{3}Z$/;

/**
 * 以時區名稱換算當地時間，輸出 "yyyy-MM-ddTHH:mm:ss+08:00"。
 * 沒有或無法辨識時區時以 UTC 表示。
 */
export function formatXmpDate({ date, timeZone }: CatalogDate): string {
  const utc = date.toISOString().replace(utcSuffix, "Z");
  if (!timeZone) return utc;

  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      timeZoneName: "longOffset",
    }).formatToParts(date);
  } catch (error) {
    if (error instanceof RangeError) return utc;
    throw error;
  }
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "";
  const offset = part("timeZoneName").replace("GMT", "") || "+00:00";
  return `${part("year")}-${part("month")}-${part("day")}T${part("hour")}:${part("minute")}:${part("second")}${offset}`;
}

/** exiftool 寫入日期時使用的 "yyyy:MM:dd HH:mm:ss+08:00" */
export function formatExifDate(value: CatalogDate): string {
  return formatXmpDate(value).replace(/^(\d{4})-(\d{2})-(\d{2})T/, "$1:$2:$3 ");
}
