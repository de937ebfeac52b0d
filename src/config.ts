import { Type as t } from "@sinclair/typebox";

import {
  buildConfigFactoryEnv,
  envBoolean,
  envNumber,
} from "~shared/ConfigFactory";

export const getMigrateConfig = buildConfigFactoryEnv(
  t.Object({
    /** 只處理 id 大於等於此值的版本，可用於中斷後續跑 */
    MIGRATE_MIN_VERSION_ID: t.Optional(envNumber({ minimum: 0 })),
    /** 只處理標題符合此正規表示式的版本 */
    MIGRATE_CAPTION_PATTERN: t.Optional(t.String()),
    MIGRATE_ROTATION_POLICY: t.Union(
      [t.Literal("catalog"), t.Literal("exif"), t.Literal("combined")],
      { default: "catalog" }
    ),
    MIGRATE_READ_EXIF_ORIENTATION: envBoolean({ default: false }),
    MIGRATE_CROP_FACE_FALLBACK: envBoolean({ default: false }),
    MIGRATE_REPORT_DIR: t.String({ default: "dist/reports" }),
  })
);

export type MigrateConfig = ReturnType<typeof getMigrateConfig>;
