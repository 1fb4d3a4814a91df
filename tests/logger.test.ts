import { describe, it, expect } from "vitest";
import { createLogger, parseLogLevel, safeStringify, type LogSink } from "../src/utils/logger";

function collect() {
  const lines: Array<[string, string]> = [];
  const sink: LogSink = {
    error: (m) => void lines.push(["error", m]),
    warn: (m) => void lines.push(["warn", m]),
    info: (m) => void lines.push(["info", m]),
    debug: (m) => void lines.push(["debug", m]),
  };
  return { lines, sink };
}

describe("Logger", () => {
  it("filters by level", () => {
    const { lines, sink } = collect();
    const log = createLogger({ name: "t", level: "warn", timestamp: false, sink });

    log.info("hidden");
    log.warn("careful");
    log.error("broken", { code: 1 });

    expect(lines).toEqual([
      ["warn", "[t] WARN: careful"],
      ["error", '[t] ERROR: broken {"code":1}'],
    ]);
  });

  it("routes debug and trace to the debug sink", () => {
    const { lines, sink } = collect();
    const log = createLogger({ name: "t", level: "trace", timestamp: false, sink });

    log.debug("d");
    log.trace("t");

    expect(lines).toEqual([
      ["debug", "[t] DEBUG: d"],
      ["debug", "[t] TRACE: t"],
    ]);
  });

  it("logs a keyed message once", () => {
    const { lines, sink } = collect();
    const log = createLogger({ name: "t", level: "info", timestamp: false, sink });

    log.logOnce("info", "k", "first");
    log.logOnce("info", "k", "second");

    expect(lines).toEqual([["info", "[t] INFO: first"]]);
  });

  it("times a block at debug", () => {
    const { lines, sink } = collect();
    const log = createLogger({ name: "t", level: "debug", timestamp: false, includePayload: false, sink });

    const ms = log.time("parse").end({ ignored: true });

    expect(ms).toBeGreaterThanOrEqual(0);
    expect(lines).toHaveLength(1);
    expect(lines[0][1]).toMatch(/^\[t\] DEBUG: parse took \d+\.\d{2}ms$/);
  });

  it("can change level at runtime", () => {
    const { lines, sink } = collect();
    const log = createLogger({ name: "t", level: "silent", timestamp: false, sink });

    log.error("dropped");
    log.setLevel("error");
    log.error("kept");

    expect(log.getLevel()).toBe("error");
    expect(lines).toEqual([["error", "[t] ERROR: kept"]]);
  });
});

describe("log helpers", () => {
  it("parses level names", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("nope")).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });

  it("stringifies payloads that JSON cannot", () => {
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;

    expect(safeStringify(cyclic)).toBe("[object Object]");
    expect(safeStringify(undefined)).toBe("undefined");
  });
});
