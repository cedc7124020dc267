import { describe, expect, it } from "vitest";
import {
  createDefaultFormatter,
  createLogger,
  createSilentLogger,
  isLogThreshold,
  jsonFormatter,
  MemoryTransport,
  shouldLog,
  type LogEntry,
} from "./logger.js";

const entry: LogEntry = {
  timestamp: new Date("2024-01-02T03:04:05.000Z"),
  level: "warn",
  subsystem: "diagram-tf/parser",
  message: "Tier complete",
  metadata: { nodes: 2 },
  context: { runId: "abc123", tier: 1 },
};

describe("log levels", () => {
  it("compares levels against a threshold", () => {
    expect(shouldLog("warn", "info")).toBe(true);
    expect(shouldLog("debug", "info")).toBe(false);
    expect(shouldLog("fatal", "silent")).toBe(false);
  });

  it("recognizes threshold names", () => {
    expect(isLogThreshold("silent")).toBe(true);
    expect(isLogThreshold("verbose")).toBe(false);
  });
});

describe("formatters", () => {
  it("renders a plain line with context and metadata", () => {
    const format = createDefaultFormatter({ colors: false, timestamps: false });
    expect(format(entry)).toBe('WARN  [diagram-tf/parser] Tier complete (runId=abc123 tier=1) {"nodes":2}');
  });

  it("includes the timestamp when asked", () => {
    const format = createDefaultFormatter({ colors: false, includeMetadata: false });
    expect(format(entry)).toBe("2024-01-02T03:04:05.000Z WARN  [diagram-tf/parser] Tier complete (runId=abc123 tier=1)");
  });

  it("renders JSON lines", () => {
    expect(JSON.parse(jsonFormatter(entry))).toEqual({
      time: "2024-01-02T03:04:05.000Z",
      level: "warn",
      subsystem: "diagram-tf/parser",
      msg: "Tier complete",
      runId: "abc123",
      tier: 1,
      nodes: 2,
    });
  });
});

describe("createLogger", () => {
  it("filters by level", () => {
    const transport = new MemoryTransport();
    const logger = createLogger("test", { level: "warn", transports: [transport] });
    logger.info("hidden");
    logger.warn("shown");
    logger.error("also shown");
    expect(transport.messages()).toEqual(["shown", "also shown"]);
    expect(transport.messages("error")).toEqual(["also shown"]);
  });

  it("names children after their parent and shares transports", () => {
    const transport = new MemoryTransport();
    const child = createLogger("diagram-tf", { transports: [transport] }).child("registry");
    child.info("ready");
    expect(child.subsystem).toBe("diagram-tf/registry");
    expect(transport.entries[0]?.subsystem).toBe("diagram-tf/registry");
  });

  it("merges context into entries", () => {
    const transport = new MemoryTransport();
    const logger = createLogger("test", { transports: [transport] })
      .withContext({ runId: "r1" })
      .withContext({ tier: 2 });
    logger.info("tier");
    expect(transport.entries[0]?.context).toEqual({ runId: "r1", tier: 2 });
  });

  it("changes level at runtime", () => {
    const transport = new MemoryTransport();
    const logger = createLogger("test", { transports: [transport] });
    expect(logger.isLevelEnabled("debug")).toBe(false);
    logger.setLevel("debug");
    expect(logger.getLevel()).toBe("debug");
    logger.debug("now visible");
    expect(transport.messages()).toEqual(["now visible"]);
    transport.clear();
    expect(transport.entries).toEqual([]);
  });
});

describe("createSilentLogger", () => {
  it("drops everything", () => {
    const logger = createSilentLogger();
    expect(logger.getLevel()).toBe("silent");
    expect(logger.isLevelEnabled("fatal")).toBe(false);
  });
});
