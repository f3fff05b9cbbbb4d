import type { Result } from "~shared/utils/Result";

export type MoveError = {
  type: "MOVE_FAILED";
  message: string;
};

export const moveModes = ["rename", "git"] as const;
export type MoveMode = (typeof moveModes)[number];

export interface FileMover {
  /**
   * 在綁定的目錄內將 from 改名為 to，兩者皆為檔名。
   * 不檢查目標是否存在；碰撞檢查由 planner 在執行前完成。
   */
  move(from: string, to: string): Promise<Result<void, MoveError>>;
}
