import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
  parseEnv,
} from "~shared/ConfigFactory";

const schema = t.Object({
  PORT: t.Number({ default: 3000 }),
  DEBUG: envBoolean({ default: false }),
  NAME: t.String(),
  TAG: t.Optional(t.String()),
});

describe("ConfigFactory", () => {
  test("套用預設值並轉換型別", () => {
    expect(parseEnv(schema, { NAME: "frames", DEBUG: "true" })).toEqual({
      PORT: 3000,
      DEBUG: true,
      NAME: "frames",
    });
    expect(parseEnv(schema, { NAME: "frames", PORT: "8080" }).PORT).toBe(8080);
  });

  test("envBoolean 接受 1/0", () => {
    expect(parseEnv(schema, { NAME: "n", DEBUG: "1" }).DEBUG).toBe(true);
    expect(parseEnv(schema, { NAME: "n", DEBUG: "0" }).DEBUG).toBe(false);
  });

  test("空字串視為未設定", () => {
    expect(parseEnv(schema, { NAME: "n", PORT: "" }).PORT).toBe(3000);
  });

  test("只取 schema 宣告的 key", () => {
    expect(parseEnv(schema, { NAME: "n", OTHER: "x" })).toEqual({
      PORT: 3000,
      DEBUG: false,
      NAME: "n",
    });
  });

  test("缺少必要設定 → ConfigError", () => {
    let caught: unknown;
    try {
      parseEnv(schema, {});
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.some((issue) => issue.startsWith("NAME:"))).toBe(
        true
      );
    }
  });

  test("factory 每次呼叫都重新讀取來源", () => {
    const env: Record<string, string | undefined> = { NAME: "first" };
    const getConfig = buildConfigFactoryEnv(schema, () => env);
    expect(getConfig().NAME).toBe("first");
    env.NAME = "second";
    expect(getConfig().NAME).toBe("second");
  });
});
