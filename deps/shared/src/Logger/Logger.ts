export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;

export type LoggerLevel = (typeof logLevels)[number];
export type LogLevel = Exclude<LoggerLevel, "silent">;

export type LogContext = {
  /** 事件名稱，會取代 level 顯示在路徑尾端 */
  event?: string;
  /** 覆寫輸出前綴的 emoji */
  emoji?: string;
  /** 附帶的錯誤，會輸出 stack */
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，name 會接在路徑之後 */
  extend(name: string, context?: LogContext): Logger;

  /** 合併 context，不改變路徑 */
  append(context: LogContext): Logger;
}

export type EmojiMap = Partial<Record<string, string>>;

export const defaultEmojiMap: EmojiMap = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  start: "🏁",
  done: "✅",
};

export function isLoggerLevel(value: string): value is LoggerLevel {
  return logLevels.some((level) => level === value);
}

export function levelRank(level: LoggerLevel): number {
  return logLevels.indexOf(level);
}
