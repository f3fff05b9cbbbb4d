import type { Result } from "~shared/utils/Result";

import type { FileMover, MoveError } from "@/services/FileMover";
import type { RenameEntry, RenamePlan } from "@/types";

export interface RenamePlanner {
  /**
   * 由目錄快照產生改名計畫；驗證失敗時不得有任何副作用。
   *
   * @param fileNames 候選檔名（目錄內的一般檔案）
   * @param existingNames 目錄內所有已存在的名稱，預設與 fileNames 相同
   */
  plan(
    fileNames: readonly string[],
    existingNames?: Iterable<string>
  ): Result<RenamePlan, PlanError>;

  /**
   * 依計畫順序逐筆改名，遇到第一個失敗即停止，不回復已完成的改名。
   */
  execute(
    plan: RenamePlan,
    mover: FileMover
  ): Promise<Result<ExecuteSummary, ExecuteError>>;
}

/** 產生同一目標檔名的來源 */
export type TargetConflict = {
  target: string;
  sources: string[];
};

export type PlanError =
  | {
      /** 兩個以上的來源會得到相同的目標檔名 */
      type: "TARGET_COLLISION";
      message: string;
      conflicts: TargetConflict[];
      /** 驗證前的完整對照表，供回報使用 */
      proposed: RenameEntry[];
    }
  | {
      /** 目標檔名已被目錄內其他項目佔用 */
      type: "TARGET_EXISTS";
      message: string;
      conflicts: TargetConflict[];
      proposed: RenameEntry[];
    };

export type ExecuteSummary = {
  moved: RenameEntry[];
};

export type ExecuteError = {
  type: "MOVE_FAILED";
  message: string;
  entry: RenameEntry;
  /** 失敗前已完成、未回復的改名 */
  completed: RenameEntry[];
  cause: MoveError;
};
