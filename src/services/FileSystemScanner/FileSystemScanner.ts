import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

/**
 * 某一時間點的目錄內容，不遞迴。
 */
export type DirectorySnapshot = {
  /** 一般檔案的檔名 */
  files: string[];
  /** 所有項目的名稱（含資料夾等），用於判斷目標檔名是否已被佔用 */
  names: string[];
};

export interface FileSystemScanner {
  scan(dirPath: string): Promise<Result<DirectorySnapshot, ScanError>>;
}
