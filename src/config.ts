import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    /** 計畫報告的輸出目錄，相對於執行時的工作目錄 */
    REPORT_DIR: t.String({ default: "dist/reports" }),
    REPORT_ENABLED: envBoolean({ default: true }),
  })
);
