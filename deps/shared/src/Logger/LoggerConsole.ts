import kleur from "kleur";

import type {
  LogContext,
  LogLevel,
  LogRecord,
  LogTransport,
  Logger,
  TemplateLog,
} from "./Logger";
import { logLevels } from "./Logger";

export type EmojiMap = Partial<Record<string, string>>;

type StackHolder = { stack?: string };

const reservedKeys = new Set(["event", "emoji", "error"]);

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔬",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export class LoggerConsole implements Logger, AsyncDisposable {
  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    private readonly path: readonly string[] = []
  ) {}

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): TemplateLog;
  trace(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.entry("trace", LoggerConsole.prototype.trace, a, b);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): TemplateLog;
  debug(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.entry("debug", LoggerConsole.prototype.debug, a, b);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): TemplateLog;
  info(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.entry("info", LoggerConsole.prototype.info, a, b);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): TemplateLog;
  warn(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.entry("warn", LoggerConsole.prototype.warn, a, b);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): TemplateLog;
  error(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.entry("error", LoggerConsole.prototype.error, a, b);
  }

  extend(namespace: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, namespace]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private entry(
    level: LogLevel,
    caller: (...args: never[]) => unknown,
    a: LogContext | string | undefined,
    b: string | undefined
  ): TemplateLog | undefined {
    const holder: StackHolder = {};
    if (level === "error") Error.captureStackTrace(holder, caller);

    if (typeof a === "string") {
      this.write(level, {}, a, a, holder.stack);
      return undefined;
    }
    if (b !== undefined) {
      this.write(level, a ?? {}, b, b, holder.stack);
      return undefined;
    }
    const context = a ?? {};
    return (strings, ...values) => {
      let plain = strings[0] ?? "";
      let colored = plain;
      const valueContext: Record<string, unknown> = {};
      values.forEach((value, index) => {
        const text = String(value);
        plain += text + (strings[index + 1] ?? "");
        colored += kleur.green(text) + (strings[index + 1] ?? "");
        valueContext[`__${index}`] = value;
      });
      this.write(
        level,
        { ...context, ...valueContext },
        plain,
        colored,
        holder.stack
      );
    };
  }

  private enabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private resolveEmoji(level: LogLevel, context: LogContext) {
    const inherited =
      typeof this.context.emoji === "string" ? this.context.emoji : undefined;
    // 非 info 等級時，等級本身的 emoji 優先於繼承下來的 emoji
    return (
      context.emoji ??
      (context.event ? this.emojiMap[context.event] : undefined) ??
      (level !== "info" ? this.emojiMap[level] : undefined) ??
      inherited ??
      this.emojiMap[level] ??
      ""
    );
  }

  private write(
    level: LogLevel,
    context: LogContext,
    message: string,
    coloredMessage: string,
    capturedStack: string | undefined
  ) {
    if (!this.enabled(level)) return;

    const merged: LogContext = { ...this.context, ...context };
    const event = context.event ?? this.context.event;
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!reservedKeys.has(key)) extra[key] = value;
    }
    const err = toErrorInfo(context.error, message, level, capturedStack);

    const label = [...this.path, event ?? level].join(":");
    const extraText =
      Object.keys(extra).length > 0 ? ` ${safeStringify(extra)}` : "";
    const line = `${this.resolveEmoji(level, context)} ${label}: ${coloredMessage}${extraText}`;

    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        if (err?.stack) console.error(err.stack);
        break;
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...extra,
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: message,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

function toErrorInfo(
  error: unknown,
  message: string,
  level: LogLevel,
  capturedStack: string | undefined
): LogRecord["err"] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (error !== undefined) {
    return {
      name: "Error",
      message: typeof error === "string" ? error : safeStringify(error),
      stack: capturedStack,
    };
  }
  if (level === "error") {
    return { name: "Error", message, stack: capturedStack };
  }
  return undefined;
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch {
    return String(value);
  }
}
