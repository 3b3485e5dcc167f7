/**
 * Tests for the logger
 */

import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { configureLogger, logger, parseLogLevel } from "../../src/lib/logger";

describe("logger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "paper-digest-log-"));
    vi.stubEnv("DEBUG", "");
    vi.stubEnv("LOG_LEVEL", "");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    configureLogger({});
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should map level names", () => {
    expect(parseLogLevel("INFO")).toBe("info");
    expect(parseLogLevel(" Warning ")).toBe("warn");
    expect(parseLogLevel("CRITICAL")).toBe("error");
    expect(parseLogLevel("toString")).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });

  it("should drop messages below the configured level", () => {
    configureLogger({ level: "WARNING" });

    logger.info("hidden");
    logger.warn("shown", { count: 2 });

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith("[WARN] shown", '{"count":2}');
  });

  it("should append lines to the log file", () => {
    const file = path.join(dir, "nested", "digest.log");
    configureLogger({ level: "DEBUG", file });

    logger.debug("first");
    logger.error("second", new Error("boom"));

    const lines = fs.readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[DEBUG\] first$/);
    expect(lines[1]).toMatch(/ \[ERROR\] second Error: boom$/);
  });
});
