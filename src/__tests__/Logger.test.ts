/**
 * Logger – level gating and line format
 */
import { createLogger, silentLogger } from "../utils/logger";
import type { LogLevel } from "../utils/logger";

type ConsoleMethod = "log" | "info" | "warn" | "error";

const SINK: Record<LogLevel, ConsoleMethod> = {
  debug: "log",
  info: "info",
  warn: "warn",
  error: "error",
};

let sinks: Record<ConsoleMethod, jest.SpyInstance>;

beforeEach(() => {
  sinks = {
    log: jest.spyOn(console, "log").mockImplementation(),
    info: jest.spyOn(console, "info").mockImplementation(),
    warn: jest.spyOn(console, "warn").mockImplementation(),
    error: jest.spyOn(console, "error").mockImplementation(),
  };
});

afterEach(() => {
  jest.restoreAllMocks();
});

function firstLine(method: ConsoleMethod): string {
  return String(sinks[method].mock.calls[0][0]);
}

// ─── Level gating ────────────────────────────────────────────────────────────

describe("createLogger levels", () => {
  it.each<[LogLevel, boolean, number]>([
    ["debug", true, 1],
    ["info", true, 1],
    ["debug", false, 0],
    ["info", false, 0],
    ["warn", false, 1],
    ["error", false, 1],
  ])("%s with debug=%s prints %i line(s)", (level, enabled, lines) => {
    createLogger(enabled)[level]("Resolved amount");
    expect(sinks[SINK[level]]).toHaveBeenCalledTimes(lines);
  });

  it("is quiet for debug and info by default", () => {
    const logger = createLogger();
    logger.debug("row bucket 12");
    logger.info("scan complete");
    expect(sinks.log).not.toHaveBeenCalled();
    expect(sinks.info).not.toHaveBeenCalled();
  });
});

// ─── Line format ─────────────────────────────────────────────────────────────

describe("createLogger format", () => {
  it("prefixes level and ISO timestamp", () => {
    createLogger(true).debug("Label 'Total' matched amount");
    expect(firstLine("log")).toMatch(
      /^\[ReceiptLens\]\[DEBUG\]\[\d{4}-\d{2}-\d{2}T[^\]]+\] Label 'Total' matched amount$/,
    );
  });

  it("tags the component scope after the prefix", () => {
    createLogger(true, "scanner").info("OCR via tesseract");
    expect(firstLine("info")).toMatch(
      /^\[ReceiptLens\]\[scanner\]\[INFO\]\[.+\] OCR via tesseract$/,
    );
  });

  it("passes extra arguments through untouched", () => {
    const detail = { fragmentIndex: 3 };
    createLogger(false, "engine").warn("provider failed", detail);
    expect(sinks.warn).toHaveBeenCalledWith(expect.stringContaining("[WARN]"), detail);
  });
});

describe("silentLogger", () => {
  it("still reports errors", () => {
    silentLogger.debug("hidden");
    silentLogger.error("OCR extraction failed");
    expect(sinks.log).not.toHaveBeenCalled();
    expect(firstLine("error")).toContain("[ERROR]");
  });
});
