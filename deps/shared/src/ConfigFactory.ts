import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** 環境變數中的布林值，接受 true/false/1/0 */
export function envBoolean(options?: { default?: boolean }) {
  return t.Boolean(options);
}

/** 環境變數中的數字 */
export function envNumber(options?: {
  minimum?: number;
  maximum?: number;
  default?: number;
}) {
  return t.Number(options);
}

/**
 * 以 typebox schema 建立讀取設定的函式。
 * 值會先經過型別轉換與預設值補齊再驗證，結果只計算一次。
 */
export function buildConfigFactory<T extends TObject>(
  schema: T,
  source: () => Record<string, unknown>
): () => Static<T> {
  let cached: Static<T> | undefined;
  return () => {
    if (cached) return cached;
    const raw = Value.Default(schema, Value.Convert(schema, { ...source() }));
    if (!Value.Check(schema, raw)) {
      const first = Value.Errors(schema, raw).First();
      throw new ConfigError(
        `設定值錯誤 ${first?.path ?? ""}: ${first?.message ?? "unknown"}`,
        first?.path ?? ""
      );
    }
    cached = raw;
    return raw;
  };
}

export function buildConfigFactoryEnv<T extends TObject>(schema: T) {
  return buildConfigFactory(schema, () => ({ ...process.env }));
}
