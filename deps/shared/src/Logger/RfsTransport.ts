import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./LogTransport";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/**
 * 以 JSON Lines 寫入可輪替的日誌檔。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
  }

  write(record: LogRecord): void {
    const { context, path, ...head } = record;
    const line = { ...head, path: path.join(":"), ...context };
    this.stream.write(JSON.stringify(line) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
