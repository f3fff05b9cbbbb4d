import { rename } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileMover, MoveError } from "./FileMover";

export class FileMoverRename implements FileMover {
  constructor(private readonly directory: string) {}

  async move(from: string, to: string): Promise<Result<void, MoveError>> {
    try {
      await rename(
        path.join(this.directory, from),
        path.join(this.directory, to)
      );
      return ok();
    } catch (e) {
      return err({
        type: "MOVE_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
