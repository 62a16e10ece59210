/**
 * Leveled, scoped console logger for the story server.
 *
 * LOG_LEVEL filters, LOG_FORMAT picks `pretty` or `json` lines,
 * LOG_FILE (optional) mirrors every emitted line to a file.
 */

import fs from "node:fs";
import path from "node:path";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;
export const LOG_FORMATS = ["pretty", "json"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_ABBR: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  file?: string;
}

export interface Logger {
  trace(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

export function formatEntry(entry: LogEntry, format: LogFormat): string {
  if (format === "json") return JSON.stringify(entry);

  const time = entry.timestamp.slice(11, 19); // HH:MM:SS
  const scopeStr = entry.scope ? ` │ ${entry.scope}` : "";
  const dataStr = entry.data !== undefined ? ` │ ${safeStringify(entry.data)}` : "";
  return `${time} [${LEVEL_ABBR[entry.level]}]${scopeStr} ${entry.message}${dataStr}`;
}

function safeStringify(data: unknown): string {
  if (data instanceof Error) return data.message;
  try {
    return JSON.stringify(data);
  } catch {
    return "[unserializable]";
  }
}

class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(
    private readonly options: Required<Omit<LoggerOptions, "file">> & { file?: string },
    private readonly scope?: string,
  ) {
    this.threshold = LEVEL_RANK[options.level];
  }

  trace(message: string, data?: unknown) { this.emit("trace", message, data); }
  debug(message: string, data?: unknown) { this.emit("debug", message, data); }
  info(message: string, data?: unknown) { this.emit("info", message, data); }
  warn(message: string, data?: unknown) { this.emit("warn", message, data); }
  error(message: string, data?: unknown) { this.emit("error", message, data); }

  child(scope: string): Logger {
    return new ConsoleLogger(this.options, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private emit(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_RANK[level] < this.threshold) return;

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (this.scope) entry.scope = this.scope;
    if (data !== undefined) entry.data = data;
    const line = formatEntry(entry, this.options.format);

    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }

    if (this.options.file) {
      fs.appendFileSync(this.options.file, line + "\n", "utf-8");
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  // children share the root's options, so the log directory is made once here
  if (options.file) {
    fs.mkdirSync(path.dirname(path.resolve(options.file)), { recursive: true });
  }
  return new ConsoleLogger({
    level: options.level ?? "info",
    format: options.format ?? "pretty",
    file: options.file,
  });
}
