import type { CAC } from "cac";
import path from "node:path";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import {
  type FileMover,
  type MoveMode,
  createFileMover,
} from "@/services/FileMover";
import {
  type FileSystemScanner,
  FileSystemScannerDefault,
  type ScanError,
} from "@/services/FileSystemScanner";
import { FrameNameParserDefault } from "@/services/FrameNameParser";
import {
  type ExecuteError,
  type PlanError,
  type RenamePlanner,
  RenamePlannerDefault,
} from "@/services/RenamePlanner";
import type { RenameEntry, RenamePlan } from "@/types";
import { confirm, expandHome } from "@/utils/helper";

type RenameFramesOptions = {
  apply?: boolean;
  useGit?: boolean;
  yes?: boolean;
};

export type RenameFramesRequest = {
  directory: string;
  apply: boolean;
  mode: MoveMode;
  yes: boolean;
};

export type RenameFramesDeps = {
  logger: Logger;
  scanner?: FileSystemScanner;
  planner?: RenamePlanner;
  createMover?: (mode: MoveMode, directory: string) => FileMover;
  reporter?: DumpWriter;
  confirm?: (question: string) => Promise<boolean>;
};

/**
 * 一次執行的結果。
 * - planned：已產生計畫但未改名（乾跑、無事可做或使用者取消）
 * - done：全部改名完成
 * - aborted：掃描或驗證失敗（未改名），或執行中途失敗（部分已改名）
 */
export type RenameFramesOutcome =
  | {
      state: "planned";
      reason: "nothing-to-rename" | "dry-run" | "declined";
      plan: RenamePlan;
    }
  | { state: "done"; moved: RenameEntry[] }
  | {
      state: "aborted";
      reason: ScanError["type"] | PlanError["type"] | ExecuteError["type"];
      completed: RenameEntry[];
    };

export function registerRenameFrames(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "rename-frames [dir]",
      "將外框 PNG 改名為 ckt-<family>-<size>-<variant>-<tone>.png"
    )
    .option("--apply", "實際執行改名，預設只輸出計畫", { default: false })
    .option("--use-git", "以 git mv 改名（在 git repo 中建議使用）", {
      default: false,
    })
    .option("--yes", "略過確認，直接執行", { default: false })
    .action(async (dir: string | undefined, options: RenameFramesOptions) => {
      const logger = baseLogger.extend("rename-frames");
      const config = getAppConfig();
      const directory = path.resolve(expandHome(dir ?? "."));

      const outcome = await renameFrames(
        {
          directory,
          apply: options.apply ?? false,
          mode: options.useGit ? "git" : "rename",
          yes: options.yes ?? false,
        },
        {
          logger,
          reporter: config.REPORT_ENABLED
            ? new DumpWriterDefault(logger, config.REPORT_DIR)
            : undefined,
        }
      );
      if (outcome.state === "aborted") {
        process.exitCode = 1;
      }
    });
}

export async function renameFrames(
  request: RenameFramesRequest,
  deps: RenameFramesDeps
): Promise<RenameFramesOutcome> {
  const { directory, apply, mode } = request;
  const logger = deps.logger;
  const scanner = deps.scanner ?? new FileSystemScannerDefault();
  const planner =
    deps.planner ??
    new RenamePlannerDefault({ parser: new FrameNameParserDefault(), logger });
  const createMover = deps.createMover ?? createFileMover;
  const ask = deps.confirm ?? confirm;

  logger.info({ emoji: "📁", mode })`目錄: ${directory}`;

  // 1) 目錄快照，之後不再重新掃描
  const scanRes = await scanner.scan(directory);
  if (isErr(scanRes)) {
    logger.error({ error: scanRes.error })`讀取目錄失敗`;
    return { state: "aborted", reason: scanRes.error.type, completed: [] };
  }
  const snapshot = scanRes.value;

  // 2) 產生並驗證計畫
  const planRes = planner.plan(snapshot.files, snapshot.names);
  if (isErr(planRes)) {
    const error = planRes.error;
    reportMapping(logger, error.proposed);
    for (const conflict of error.conflicts) {
      logger.error({
        emoji: "🧨",
        sources: conflict.sources,
      })`${describePlanError(error)}: ${conflict.target}`;
    }
    await deps.reporter?.dump("rename-frames-issues", {
      directory,
      type: error.type,
      conflicts: error.conflicts,
      proposed: error.proposed,
    });
    logger.error({
      count: error.conflicts.length,
    })`發現 ${error.conflicts.length} 個目標檔名衝突，未改名任何檔案。中止。`;
    return { state: "aborted", reason: error.type, completed: [] };
  }
  const plan = planRes.value;

  if (plan.entries.length === 0) {
    logger.warn({
      emoji: "🟡",
      skipped: plan.skipped.length,
      unchanged: plan.unchanged.length,
    })`沒有需要改名的 PNG`;
    return { state: "planned", reason: "nothing-to-rename", plan };
  }

  // 3) 改名前先完整列出對照表
  reportMapping(logger, plan.entries);
  await deps.reporter?.dump("rename-frames-plan", {
    directory,
    mode,
    total: plan.entries.length,
    moves: plan.entries,
    skipped: plan.skipped,
    unchanged: plan.unchanged,
  });

  if (!apply) {
    logger.info({
      emoji: "👀",
      count: plan.entries.length,
    })`僅預覽，加上 --apply 才會實際改名`;
    return { state: "planned", reason: "dry-run", plan };
  }

  // 4) 確認
  const proceed =
    request.yes ||
    (await ask(`即將改名 ${plan.entries.length} 個檔案，是否繼續？ [y/N] `));
  if (!proceed) {
    logger.warn({ emoji: "⏹️" })`使用者取消`;
    return { state: "planned", reason: "declined", plan };
  }

  // 5) 逐筆執行，失敗即停止
  const executeRes = await planner.execute(
    plan,
    createMover(mode, directory)
  );
  if (isErr(executeRes)) {
    const error = executeRes.error;
    logger.error({
      from: error.entry.from,
      to: error.entry.to,
      completed: error.completed.length,
      error: error.cause,
    })`改名失敗，已完成的 ${error.completed.length} 筆不會回復，請手動確認`;
    return {
      state: "aborted",
      reason: error.type,
      completed: error.completed,
    };
  }

  logger.info({
    emoji: "✅",
    moved: executeRes.value.moved.length,
  })`改名完成`;
  return { state: "done", moved: executeRes.value.moved };
}

function reportMapping(logger: Logger, entries: readonly RenameEntry[]) {
  logger.info({ count: entries.length })`改名計畫（${entries.length} 筆）`;
  for (const { from, to } of entries) {
    logger.info({ emoji: "➡️" })`${from} → ${to}`;
  }
}

function describePlanError(error: PlanError) {
  switch (error.type) {
    case "TARGET_COLLISION":
      return "多個檔案會得到相同檔名";
    case "TARGET_EXISTS":
      return "目標檔名已存在";
  }
}
