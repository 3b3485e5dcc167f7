/**
 * Structured logging utility
 */

import fs from "fs";
import path from "path";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let levelOverride: LogLevel | null = null;
let logFile: string | null = null;

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function parseLogLevel(raw: string | undefined): LogLevel | null {
  if (!raw) return null;
  const value = raw.trim().toLowerCase();
  if (value === "warning") return "warn";
  if (value === "critical") return "error";
  return isLogLevel(value) ? value : null;
}

/**
 * Set the minimum level and an optional file that receives a copy of every line.
 * LOG_LEVEL and DEBUG still apply when no level is given.
 */
export function configureLogger(options: { level?: string; file?: string | null }): void {
  levelOverride = parseLogLevel(options.level);
  logFile = options.file ?? null;

  if (logFile) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
  }
}

function currentLevel(): LogLevel {
  if (process.env.DEBUG) return "debug";
  return levelOverride ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

function writeToFile(tag: string, msg: string, detail: string): void {
  if (!logFile) return;
  const line = `${new Date().toISOString()} [${tag}] ${msg}${detail ? ` ${detail}` : ""}\n`;
  fs.appendFileSync(logFile, line, "utf-8");
}

function describeError(error: unknown): string {
  if (error === undefined) return "";
  if (error instanceof Error) return error.stack ?? error.message;
  return JSON.stringify(error);
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("debug")) {
      const detail = meta ? JSON.stringify(meta) : "";
      console.log(`[DEBUG] ${msg}`, detail);
      writeToFile("DEBUG", msg, detail);
    }
  },

  info: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("info")) {
      const detail = meta ? JSON.stringify(meta) : "";
      console.log(`[INFO] ${msg}`, detail);
      writeToFile("INFO", msg, detail);
    }
  },

  warn: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("warn")) {
      const detail = meta ? JSON.stringify(meta) : "";
      console.warn(`[WARN] ${msg}`, detail);
      writeToFile("WARN", msg, detail);
    }
  },

  error: (msg: string, error?: unknown) => {
    console.error(`[ERROR] ${msg}`, error);
    writeToFile("ERROR", msg, describeError(error));
  },
};
