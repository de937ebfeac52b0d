import { type LogLevel, LoggerConsole } from "../Logger";

/** 測試用 logger，預設只輸出 error，可用 TEST_LOG_LEVEL 調整 */
export function buildTestLogger(level?: LogLevel) {
  return new LoggerConsole(level ?? parseLevel(process.env.TEST_LOG_LEVEL));
}

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "error";
  }
}
