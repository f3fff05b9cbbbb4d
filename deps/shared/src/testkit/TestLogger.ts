import { isLoggerLevel } from "../Logger";
import { LoggerConsole } from "../Logger/LoggerConsole";

/**
 * 測試用 logger，預設靜音；設定 TEST_LOG_LEVEL 可在除錯時看到輸出。
 */
export function buildTestLogger(name = "test"): LoggerConsole {
  const level = process.env.TEST_LOG_LEVEL ?? "silent";
  return new LoggerConsole(isLoggerLevel(level) ? level : "silent").extend(
    name
  );
}
