import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Reporter, silentSink } from "../src/diagnostics/reporter";
import { createBufferedIO, EXIT_CODES, runFile, runSource } from "../src/runner/run";
import { createLogger } from "../src/utils/logger";

const quiet = createLogger({ level: "silent" });

describe("runSource", () => {
  it("prints the value and exits 0", () => {
    const io = createBufferedIO();
    const r = runSource("1 + 2", { io, logger: quiet });

    expect(r.exitCode).toBe(EXIT_CODES.ok);
    expect(r.ok).toBe(true);
    expect(r.value).toBe(3);
    expect(r.stdout).toBe("3\n");
    expect(io.stdout()).toBe("3\n");
    expect(io.stderr()).toBe("");
  });

  it("prints nil for a nil result", () => {
    const r = runSource("nil", { io: createBufferedIO(), logger: quiet });

    expect(r.value).toBeNull();
    expect(r.stdout).toBe("nil\n");
  });

  it("exits 65 on a syntax error", () => {
    const r = runSource("(1", { io: createBufferedIO(), logger: quiet });

    expect(r.exitCode).toBe(65);
    expect(r.stdout).toBe("");
    expect(r.stderr).toBe("[line: 1] Error at end of input: Expected ')' after expression.\n");
    expect(r.value).toBeUndefined();
  });

  it("exits 70 on a runtime error", () => {
    const r = runSource('"a" + 1', { io: createBufferedIO(), logger: quiet });

    expect(r.exitCode).toBe(70);
    expect(r.stderr).toBe("[line: 1] Error: Operands 'a' and '1' must both be numbers or both be strings for '+'.\n");
  });

  it("captures diagnostics of a shared run context", () => {
    const reporter = new Reporter(silentSink);
    const io = createBufferedIO();
    const r = runSource("(1", { io, reporter, logger: quiet });

    expect(r.stderr).toBe("[line: 1] Error at end of input: Expected ')' after expression.\n");
    expect(io.stderr()).toBe(r.stderr);
    expect(reporter.hadError).toBe(true);
  });

  it("prints the syntax tree before the value", () => {
    const r = runSource("-1 * 2", { io: createBufferedIO(), logger: quiet, printAst: true });

    expect(r.stdout).toBe("(* (- 1) 2)\n-2\n");
  });

  it("prints the token table before the value", () => {
    const r = runSource("7", { io: createBufferedIO(), logger: quiet, printTokens: true });
    const lines = r.stdout.trimEnd().split("\n");

    expect(lines[1]).toBe("│ # │ Kind   │ Lexeme │ Literal │ Line │");
    expect(lines[lines.length - 1]).toBe("7");
  });

  it("logs stage details at debug", () => {
    const logged: string[] = [];
    const push = (m: string) => void logged.push(m);
    const logger = createLogger({ level: "debug", timestamp: false, sink: { error: push, warn: push, info: push, debug: push } });

    runSource("1", { io: createBufferedIO(), logger, filename: "one.lox" });

    expect(logged[0]).toBe('[lox] DEBUG: running one.lox {"length":1}');
    expect(logged).toContain("[lox] DEBUG: scanned 2 tokens");
    expect(logged).toContain("[lox] DEBUG: ast\nLiteral 1");
  });
});

describe("runFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lox-run-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("runs the whole file as one unit", async () => {
    const file = path.join(dir, "calc.lox");
    fs.writeFileSync(file, "2 *\n3\n");

    const r = await runFile(file, { io: createBufferedIO(), logger: quiet });

    expect(r.exitCode).toBe(0);
    expect(r.stdout).toBe("6\n");
  });

  it("times the read at debug", async () => {
    const file = path.join(dir, "calc.lox");
    fs.writeFileSync(file, "2 *\n3\n");
    const logged: string[] = [];
    const push = (m: string) => void logged.push(m);
    const logger = createLogger({ level: "debug", timestamp: false, sink: { error: push, warn: push, info: push, debug: push } });

    await runFile(file, { io: createBufferedIO(), logger });

    expect(logged[0]).toMatch(/^\[lox\] DEBUG: read took \d+\.\d{2}ms \{"filePath":".+","length":6\}$/);
    expect(logged[1]).toBe('[lox] DEBUG: running ' + file + ' {"length":6}');
  });

  it("exits 74 when the file cannot be read", async () => {
    const io = createBufferedIO();
    const r = await runFile(path.join(dir, "missing.lox"), { io, logger: quiet });

    expect(r.exitCode).toBe(74);
    expect(io.stderr().startsWith(`Could not read '${path.join(dir, "missing.lox")}': `)).toBe(true);
  });
});
