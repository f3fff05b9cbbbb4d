import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import {
  FileMoverGit,
  FileMoverRename,
  createFileMover,
} from "@/services/FileMover";

const tmpDir = "test/tmp/mover";

describe("FileMoverRename", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  test("在目錄內改名", async () => {
    await writeFile(join(tmpDir, "CKT template 90x90 light.png"), "frame");

    const mover = new FileMoverRename(tmpDir);
    const result = await mover.move(
      "CKT template 90x90 light.png",
      "ckt-template-90x90-full-light.png"
    );

    expect(result.ok).toBe(true);
    expect(await readdir(tmpDir)).toEqual(["ckt-template-90x90-full-light.png"]);
    expect(
      await readFile(join(tmpDir, "ckt-template-90x90-full-light.png"), "utf8")
    ).toBe("frame");
  });

  test("來源不存在 → MOVE_FAILED", async () => {
    const mover = new FileMoverRename(tmpDir);
    const result = await mover.move("missing.png", "other.png");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe("MOVE_FAILED");
      expect(result.error.message).toContain("ENOENT");
    }
  });
});

describe("createFileMover", () => {
  test("依模式建立對應的 mover", () => {
    expect(createFileMover("rename", tmpDir)).toBeInstanceOf(FileMoverRename);
    expect(createFileMover("git", tmpDir)).toBeInstanceOf(FileMoverGit);
  });
});
