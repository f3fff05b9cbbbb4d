import type { LogLevel } from "./Logger";

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string[];
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

/**
 * 日誌輸出目的地。write 必須是同步呼叫；需要 flush 的實作在 dispose 時完成。
 */
export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    const type = "type" in error ? String(error.type) : "Error";
    return { name: type, message: String(error.message) };
  }
  return { name: "Error", message: String(error) };
}
