import { describe, expect, test } from "vitest";

import { err, isErr, isOk, ok } from "~shared/utils/Result";

describe("Result", () => {
  test("ok / err", () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(ok()).toEqual({ ok: true, value: undefined });
    expect(err("boom")).toEqual({ ok: false, error: "boom" });
  });

  test("isOk / isErr", () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isOk(err("boom"))).toBe(false);
    expect(isErr(err("boom"))).toBe(true);
  });
});
