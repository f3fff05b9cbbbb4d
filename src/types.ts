/** 同一目錄內的一筆改名：兩者都是檔名，不含目錄 */
export type RenameEntry = { from: string; to: string };

export type RenamePlan = {
  /** 依來源檔名排序，執行時照此順序 */
  entries: RenameEntry[];
  /** 不符合命名慣例而略過的檔名 */
  skipped: string[];
  /** 已經是新命名、不需處理的檔名 */
  unchanged: string[];
};
