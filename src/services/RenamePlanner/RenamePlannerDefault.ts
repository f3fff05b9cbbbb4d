import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { frameExtension } from "@/constants";
import type { FileMover } from "@/services/FileMover";
import { type FrameNameParser, buildFrameName } from "@/services/FrameNameParser";
import type { RenameEntry, RenamePlan } from "@/types";

import type {
  ExecuteError,
  ExecuteSummary,
  PlanError,
  RenamePlanner,
  TargetConflict,
} from "./RenamePlanner";

export class RenamePlannerDefault implements RenamePlanner {
  private readonly parser: FrameNameParser;
  private readonly extension: string;
  private readonly logger: Logger;

  constructor(deps: {
    parser: FrameNameParser;
    logger: Logger;
    extension?: string;
  }) {
    this.parser = deps.parser;
    this.extension = deps.extension ?? frameExtension;
    this.logger = deps.logger.extend("RenamePlannerDefault");
  }

  plan(
    fileNames: readonly string[],
    existingNames: Iterable<string> = fileNames
  ): Result<RenamePlan, PlanError> {
    // 固定排序，同一份輸入每次得到相同順序
    const names = [...new Set(fileNames)].sort();
    const entries: RenameEntry[] = [];
    const skipped: string[] = [];
    const unchanged: string[] = [];

    for (const name of names) {
      const descriptor = this.parser.parse(name);
      if (!descriptor) {
        skipped.push(name);
        continue;
      }
      const to = buildFrameName(descriptor, this.extension);
      if (to === name) {
        unchanged.push(name);
        continue;
      }
      entries.push({ from: name, to });
    }
    this.logger.debug({
      entries: entries.length,
      skipped: skipped.length,
      unchanged: unchanged.length,
    })`解析完成`;

    const collisions = findCollisions(entries);
    if (collisions.length > 0) {
      return err({
        type: "TARGET_COLLISION",
        message: `目標檔名重複: ${collisions.map((c) => c.target).join(", ")}`,
        conflicts: collisions,
        proposed: entries,
      });
    }

    // 計畫本身的來源會在執行時被移走，不算佔用
    const sources = new Set(entries.map((e) => e.from));
    // 不分大小寫比對：在不分大小寫的檔案系統上 `CKT-TEMPLATE-...` 也會被覆蓋
    const occupied = new Set(
      [...existingNames]
        .filter((name) => !sources.has(name))
        .map((name) => name.toLowerCase())
    );
    const existing: TargetConflict[] = entries
      .filter((e) => occupied.has(e.to.toLowerCase()))
      .map((e) => ({ target: e.to, sources: [e.from] }));
    if (existing.length > 0) {
      return err({
        type: "TARGET_EXISTS",
        message: `目標檔名已存在: ${existing.map((c) => c.target).join(", ")}`,
        conflicts: existing,
        proposed: entries,
      });
    }

    return ok({ entries, skipped, unchanged });
  }

  async execute(
    plan: RenamePlan,
    mover: FileMover
  ): Promise<Result<ExecuteSummary, ExecuteError>> {
    const completed: RenameEntry[] = [];
    for (const entry of plan.entries) {
      const moved = await mover.move(entry.from, entry.to);
      if (isErr(moved)) {
        return err({
          type: "MOVE_FAILED",
          message: `改名失敗 ${entry.from} → ${entry.to}: ${moved.error.message}`,
          entry,
          completed,
          cause: moved.error,
        });
      }
      completed.push(entry);
      this.logger.debug({ from: entry.from, to: entry.to })`已改名`;
    }
    return ok({ moved: completed });
  }
}

/**
 * 找出重複的目標檔名，依目標排序，來源維持計畫順序。
 */
function findCollisions(entries: readonly RenameEntry[]): TargetConflict[] {
  const byTarget = new Map<string, string[]>();
  for (const { from, to } of entries) {
    const sources = byTarget.get(to) ?? [];
    sources.push(from);
    byTarget.set(to, sources);
  }
  return [...byTarget.entries()]
    .filter(([, sources]) => sources.length > 1)
    .map(([target, sources]) => ({ target, sources }))
    .sort((a, b) => (a.target < b.target ? -1 : a.target > b.target ? 1 : 0));
}
