// src/utils/logger.ts
//
// Lox Logger (structured, lightweight)
// ------------------------------------
// Used by:
// - runner/run.ts and runner/repl.ts (stage timings, token/AST dumps)
// - lsp/server.ts (routed to the connection console)
// - cli.ts
//
// Exported API:
//   - Logger
//   - createLogger(options)
//   - parseLogLevel(text)
//
// Usage:
//   const log = createLogger({ name: "lox", level: "debug" });
//   log.info("Hello", { x: 1 });
//   const t = log.time("parse"); ... t.end();
//
// Levels:
//   silent < error < warn < info < debug < trace

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

export type LoggerOptions = {
  name?: string; // prefix
  level?: LogLevel;

  // Defaults to stderr for every level; stdout belongs to program output.
  sink?: LogSink;

  timestamp?: boolean;

  // Append a JSON rendering of the payload, when one is given
  includePayload?: boolean;
};

export type Timer = {
  /** Logs the elapsed time at debug and returns it in milliseconds. */
  end: (payload?: unknown) => number;
};

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export function parseLogLevel(text: string | undefined | null): LogLevel | null {
  if (!text) return null;
  const lower = text.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === lower) ?? null;
}

export const stderrLogSink: LogSink = {
  error: (msg) => console.error(msg),
  warn: (msg) => console.error(msg),
  info: (msg) => console.error(msg),
  debug: (msg) => console.error(msg),
};

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  private onceKeys = new Set<string>();

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "lox";
    this.level = options.level ?? "warn";
    this.timestamp = options.timestamp ?? true;
    this.includePayload = options.includePayload ?? true;
    this.sink = options.sink ?? stderrLogSink;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  public error(msg: string, payload?: unknown): void {
    this.emit("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.emit("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.emit("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.emit("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.emit("trace", msg, payload);
  }

  public logOnce(level: Exclude<LogLevel, "silent">, key: string, msg: string, payload?: unknown): void {
    if (this.onceKeys.has(key)) return;
    this.onceKeys.add(key);
    this.emit(level, msg, payload);
  }

  public time(label: string): Timer {
    const start = nowMs();

    return {
      end: (payload?: unknown) => {
        const ms = nowMs() - start;
        this.debug(`${label} took ${ms.toFixed(2)}ms`, payload);
        return ms;
      },
    };
  }

  private emit(level: Exclude<LogLevel, "silent">, msg: string, payload?: unknown): void {
    if (!this.isEnabled(level)) return;

    const line = this.formatLine(level, msg, payload);

    if (level === "error") this.sink.error(line);
    else if (level === "warn") this.sink.warn(line);
    else if (level === "info") this.sink.info(line);
    else this.sink.debug(line);
  }

  private formatLine(level: string, msg: string, payload?: unknown): string {
    const ts = this.timestamp ? `${isoTime()} ` : "";
    const prefix = `[${this.name}]`;
    const lv = level.toUpperCase();

    if (payload === undefined || !this.includePayload) {
      return `${ts}${prefix} ${lv}: ${msg}`;
    }

    return `${ts}${prefix} ${lv}: ${msg} ${safeStringify(payload)}`;
  }
}

/* =========================================================
   Factory
   ========================================================= */

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/* =========================================================
   Utilities
   ========================================================= */

export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // cycles, BigInt
    return String(value);
  }
}

export function nowMs(): number {
  return performance.now();
}

function isoTime(): string {
  // compact ISO without ms
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}
