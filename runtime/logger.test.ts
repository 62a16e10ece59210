import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, formatEntry, type LogEntry } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

const entry: LogEntry = {
  timestamp: "2026-10-19T08:30:15.123Z",
  level: "warn",
  scope: "stories",
  message: "Story file not found: a.md",
  data: { filename: "a.md" },
};

describe("formatEntry", () => {
  it("pretty-prints time, level, scope, message and data", () => {
    expect(formatEntry(entry, "pretty")).toBe('08:30:15 [WRN] │ stories Story file not found: a.md │ {"filename":"a.md"}');
  });

  it("omits scope and data when absent", () => {
    expect(formatEntry({ timestamp: entry.timestamp, level: "info", message: "ready" }, "pretty")).toBe(
      "08:30:15 [INF] ready",
    );
  });

  it("prints errors by message", () => {
    expect(formatEntry({ ...entry, level: "error", data: new Error("EACCES") }, "pretty")).toBe(
      "08:30:15 [ERR] │ stories Story file not found: a.md │ EACCES",
    );
  });

  it("emits one JSON object per line in json format", () => {
    expect(JSON.parse(formatEntry(entry, "json"))).toEqual(entry);
  });
});

describe("createLogger", () => {
  it("drops entries below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger({ level: "warn" });
    logger.info("quiet");
    logger.warn("loud");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(/\[WRN\] loud$/);
  });

  it("routes errors to console.error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger().error("boom");
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("nests child scopes", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger({ level: "debug" }).child("mcp").child("tools").debug("called");
    expect(String(log.mock.calls[0]?.[0])).toMatch(/\[DBG\] │ mcp:tools called$/);
  });

  it("mirrors lines to a log file", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logger-test-"));
    const file = path.join(dir, "logs", "story_server.log");
    try {
      const logger = createLogger({ file });
      logger.info("saved");
      logger.child("http").info("listening");
      expect(fs.readFileSync(file, "utf-8")).toMatch(/^\d\d:\d\d:\d\d \[INF\] saved\n\d\d:\d\d:\d\d \[INF\] │ http listening\n$/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("creates the log directory once, not per child", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logger-test-"));
    try {
      const mkdir = vi.spyOn(fs, "mkdirSync");
      const logger = createLogger({ file: path.join(dir, "logs", "story_server.log") });
      logger.child("http").child("mcp").info("ready");
      logger.child("stories").info("ready");
      expect(mkdir).toHaveBeenCalledTimes(1);
      expect(mkdir).toHaveBeenCalledWith(path.join(dir, "logs"), { recursive: true });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
