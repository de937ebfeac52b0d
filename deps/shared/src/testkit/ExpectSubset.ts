import { expect } from "vitest";

/** 驗證 actual 至少包含 subset 中的所有欄位與值 */
export function expectHasSubset<T extends object>(
  actual: T,
  subset: Partial<T>
) {
  expect(actual).toMatchObject(subset);
}
