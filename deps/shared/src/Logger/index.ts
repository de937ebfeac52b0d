import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";

import { LoggerConsole, defaultEmojiMap } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LoggerConsole";

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_DIR: t.Optional(t.String()),
    LOG_FILENAME: t.String({ default: "app.log" }),
  })
);

/**
 * 依環境變數建立預設 logger。
 * 設定 LOG_DIR 時額外寫出每日輪替的 log 檔。
 */
export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_DIR, LOG_FILENAME } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_DIR) {
    logger.attachTransport(
      new RfsTransport({
        filename: LOG_FILENAME,
        rfs: { path: LOG_DIR, interval: "1d", maxFiles: 14 },
      })
    );
  }
  return logger;
}
