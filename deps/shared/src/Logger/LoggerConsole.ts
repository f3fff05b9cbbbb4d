import kleur from "kleur";

import { dispose } from "../utils/Disposeable";

import {
  type EmojiMap,
  type LogContext,
  type LogLevel,
  type LogMethod,
  type Logger,
  type LoggerLevel,
  type TemplateLog,
  defaultEmojiMap,
  levelRank,
} from "./Logger";
import {
  type LogRecord,
  type LogTransport,
  serializeError,
} from "./LogTransport";

const consoleMethods: Record<LogLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * 輸出到 console 的 logger，並把每筆紀錄轉交給已掛上的 transport。
 *
 * 輸出格式：`<emoji> <path>:<event|level>: <message> <context JSON>`
 */
export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LoggerLevel,
    private readonly path: readonly string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    // 子 logger 共用同一個陣列，掛在 root 上的 transport 對所有子孫生效
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.buildLogMethod("trace");
    this.debug = this.buildLogMethod("debug");
    this.info = this.buildLogMethod("info");
    this.warn = this.buildLogMethod("warn");
    this.error = this.buildLogMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 釋放所有 transport；子 logger 共用同一批 transport，只需在 root 呼叫 */
  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await Promise.all(transports.map((transport) => dispose(transport)));
  }

  private buildLogMethod(level: LogLevel): LogMethod {
    const emit = (
      context: LogContext,
      plain: string,
      colored: string,
      values: Record<string, unknown>
    ) => this.emit(level, context, plain, colored, values);

    function log(message: string): void;
    function log(context: LogContext, message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof contextOrMessage === "string") {
        emit({}, contextOrMessage, contextOrMessage, {});
        return;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        emit(context, message, message, {});
        return;
      }
      const template: TemplateLog = (strings, ...values) => {
        let plain = strings[0] ?? "";
        let colored = plain;
        const recorded: Record<string, unknown> = {};
        values.forEach((value, index) => {
          const text = formatValue(value);
          plain += text + (strings[index + 1] ?? "");
          colored += kleur.green(text) + (strings[index + 1] ?? "");
          recorded[`__${index}`] = value;
        });
        emit(context, plain, colored, recorded);
      };
      return template;
    }

    return log;
  }

  private emit(
    level: LogLevel,
    callContext: LogContext,
    plain: string,
    colored: string,
    values: Record<string, unknown>
  ) {
    if (levelRank(level) < levelRank(this.level)) return;

    const { emoji, event, error, ...rest } = callContext;
    const {
      emoji: inheritedEmoji,
      event: inheritedEvent,
      error: inheritedError,
      ...inherited
    } = this.context;

    const resolvedEvent = event ?? inheritedEvent;
    const resolvedError = error ?? inheritedError;
    const resolvedEmoji = this.resolveEmoji(
      level,
      emoji,
      resolvedEvent,
      inheritedEmoji
    );
    const fields = { ...inherited, ...rest, ...values };

    const head = [...this.path, resolvedEvent ?? level].join(":");
    const tail =
      Object.keys(fields).length > 0 ? ` ${stringify(fields)}` : "";
    const write = consoleMethods[level];
    write(`${resolvedEmoji} ${head}: ${colored}${tail}`.trimStart());
    if (resolvedError !== undefined) {
      const serialized = serializeError(resolvedError);
      write(serialized.stack ?? `${serialized.name}: ${serialized.message}`);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: [...this.path],
      event: resolvedEvent,
      msg: plain,
      context: fields,
      err:
        resolvedError === undefined ? undefined : serializeError(resolvedError),
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  private resolveEmoji(
    level: LogLevel,
    emoji: string | undefined,
    event: string | undefined,
    inheritedEmoji: unknown
  ): string {
    if (emoji) return emoji;
    const byEvent = event ? this.emojiMap[event] : undefined;
    if (byEvent) return byEvent;
    const inherited =
      typeof inheritedEmoji === "string" ? inheritedEmoji : undefined;
    // info 以外的等級優先顯示等級本身的 emoji，避免警告被繼承的 emoji 蓋掉
    if (level !== "info") return this.emojiMap[level] ?? inherited ?? "";
    return inherited ?? this.emojiMap[level] ?? "";
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return stringify(value);
  return String(value);
}

function stringify(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (typeof v === "bigint") return v.toString();
    if (v instanceof Error) return serializeError(v);
    return v;
  });
}
