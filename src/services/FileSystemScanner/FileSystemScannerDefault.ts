import { readdir } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  DirectorySnapshot,
  FileSystemScanner,
  ScanError,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(dirPath: string): Promise<Result<DirectorySnapshot, ScanError>> {
    try {
      const dirents = await readdir(dirPath, { withFileTypes: true });
      return ok({
        files: dirents.filter((d) => d.isFile()).map((d) => d.name),
        names: dirents.map((d) => d.name),
      });
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
