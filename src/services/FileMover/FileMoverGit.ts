import { $ } from "execa";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileMover, MoveError } from "./FileMover";

/**
 * 以 `git mv` 改名，保留版本控制的歷史紀錄。
 */
export class FileMoverGit implements FileMover {
  constructor(private readonly directory: string) {}

  async move(from: string, to: string): Promise<Result<void, MoveError>> {
    try {
      await $({ cwd: this.directory })`git mv -- ${from} ${to}`;
      return ok();
    } catch (e) {
      return err({
        type: "MOVE_FAILED",
        // execa 的錯誤訊息已包含 git 的 stderr
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
