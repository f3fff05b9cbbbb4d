import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { defaultEmojiMap, logLevels } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export * from "./LogTransport";
export { LoggerConsole } from "./LoggerConsole";

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      logLevels.map((level) => t.Literal(level)),
      { default: "info" }
    ),
    /** 設定後會另外寫入輪替日誌檔 */
    LOG_FILE: t.Optional(t.String()),
    LOG_DIR: t.String({ default: "logs" }),
  })
);

export function createDefaultLoggerFromEnv(): LoggerConsole {
  const config = getLoggerConfig();
  const logger = new LoggerConsole(config.LOG_LEVEL, [], {}, defaultEmojiMap);
  if (config.LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(config.LOG_FILE),
        rfs: { path: config.LOG_DIR },
      })
    );
  }
  return logger;
}
