import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

/**
 * 以 `<yyyyMMdd-HHmmss>-<name>.json` 寫入報告目錄。
 */
export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly outputDir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const fileName = `${format(this.now(), "yyyyMMdd-HHmmss")}-${name}.json`;
    const filePath = path.join(this.outputDir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
    this.logger.info({ emoji: "📝", event: "dump" })`報告已輸出 ${filePath}`;
    return filePath;
  }
}
