/**
 * 统一日志模块。
 *
 *   import { logger } from "../utils/logger";
 *   logger.info("[emotion]", "分析完成", { wordCount });
 *
 * - 最低级别由 LOG_LEVEL 决定，可运行时 setLevel
 * - 每条日志带 ISO 时间戳
 * - 默认同时写控制台与 <LOG_DIR>/<启动时间>.log，LOG_FILE_ENABLED=false 时只写控制台
 */

import fs from "node:fs";
import path from "node:path";
import util from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export type LogTransport = (level: LogLevel, timestamp: string, args: unknown[]) => void;

const consoleTransport: LogTransport = (level, timestamp, args) => {
  const prefix = `${timestamp} [${level.toUpperCase()}]`;
  switch (level) {
    case "debug":
      console.debug(prefix, ...args);
      break;
    case "info":
      console.info(prefix, ...args);
      break;
    case "warn":
      console.warn(prefix, ...args);
      break;
    case "error":
      console.error(prefix, ...args);
      break;
  }
};

function formatLogArg(value: unknown): string {
  if (value instanceof Error) {
    return value.stack || value.message;
  }
  if (typeof value === "string") {
    return value;
  }
  return util.inspect(value, {
    depth: 5,
    breakLength: Infinity,
    compact: true,
  });
}

export function formatLogLine(level: LogLevel, timestamp: string, args: unknown[]): string {
  const payload = args.map((item) => formatLogArg(item)).join(" ");
  return `${timestamp} [${level.toUpperCase()}] ${payload}\n`;
}

const beijingDateTimeFormatter = new Intl.DateTimeFormat("en-GB", {
  timeZone: "Asia/Shanghai",
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
  hour: "2-digit",
  minute: "2-digit",
  second: "2-digit",
  hourCycle: "h23",
});

function beijingDateParts(date: Date): Record<string, string> {
  return beijingDateTimeFormatter
    .formatToParts(date)
    .reduce<Record<string, string>>((accumulator, part) => {
      if (part.type !== "literal") {
        accumulator[part.type] = part.value;
      }
      return accumulator;
    }, {});
}

/** 文件名安全的北京时间标签，如 2024-05-01T08-30-00 */
export function formatBeijingTimeTag(date: Date = new Date()): string {
  const parts = beijingDateParts(date);
  return `${parts.year}-${parts.month}-${parts.day}T${parts.hour}-${parts.minute}-${parts.second}`;
}

/** 面向阅读的北京时间，如 2024-05-01 08:30:00 */
export function formatBeijingDateTime(date: Date = new Date()): string {
  const parts = beijingDateParts(date);
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
}

function booleanEnv(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

function createFileTransport(): LogTransport {
  if (!booleanEnv(process.env.LOG_FILE_ENABLED, true)) {
    return () => undefined;
  }

  const logDir = path.resolve(process.cwd(), process.env.LOG_DIR?.trim() || "logs");
  const logFilePath = path.join(logDir, `${formatBeijingTimeTag()}.log`);
  try {
    fs.mkdirSync(logDir, { recursive: true });
  } catch (error) {
    console.error("初始化日志目录失败，已降级为仅控制台输出:", error);
    return () => undefined;
  }

  return (level, timestamp, args) => {
    try {
      fs.appendFileSync(logFilePath, formatLogLine(level, timestamp, args), "utf8");
    } catch (error) {
      console.error("写入日志文件失败:", error);
    }
  };
}

const fileTransport = createFileTransport();

const defaultTransport: LogTransport = (level, timestamp, args) => {
  consoleTransport(level, timestamp, args);
  fileTransport(level, timestamp, args);
};

export class Logger {
  private minLevel: LogLevel;
  private transport: LogTransport;

  constructor(level: LogLevel = "info", transport: LogTransport = defaultTransport) {
    this.minLevel = level;
    this.transport = transport;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /** 替换输出目标（测试中用于捕获日志） */
  setTransport(transport: LogTransport): void {
    this.transport = transport;
  }

  resetTransport(): void {
    this.transport = defaultTransport;
  }

  debug(...args: unknown[]): void {
    this.emit("debug", args);
  }

  info(...args: unknown[]): void {
    this.emit("info", args);
  }

  warn(...args: unknown[]): void {
    this.emit("warn", args);
  }

  error(...args: unknown[]): void {
    this.emit("error", args);
  }

  private emit(level: LogLevel, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    this.transport(level, new Date().toISOString(), args);
  }
}

export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL, "info"));
