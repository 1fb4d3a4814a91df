// src/runner/run.ts
//
// Lox Runner (Node)
// -----------------
// Runs Lox source end-to-end:
//
// 1) analyzeText()  -> scan + parse + evaluate, reporting through the run's Reporter
// 2) output         -> canonical value on stdout, diagnostics on stderr
//
// Used by:
// - the CLI (file runs and the REPL)
// - unit tests (capture stdout/stderr)
//
// Exports:
//   - runSource(source, options): RunResult
//   - runFile(filePath, options): Promise<RunResult>
//   - createDefaultNodeIO(): LoxIO
//   - createBufferedIO(): BufferedIO
//   - EXIT_CODES

import * as fs from "fs";

import { printAst, stringify } from "../core/printer";
import type { RuntimeValue } from "../core/evaluator";
import { tokenToString } from "../core/token";
import { dedupeDiagnostics, error, type Diagnostic } from "../diagnostics/errors";
import { Reporter } from "../diagnostics/reporter";
import { analyzeText, type LoxLanguageStageTimings } from "../language/lox.language";
import { createLogger, type Logger } from "../utils/logger";
import { renderAstTree, renderTokenTable } from "./terminal";

/* =========================================================
   Exit codes (sysexits)
   ========================================================= */

export const EXIT_CODES = {
  ok: 0,
  usage: 64,
  syntax: 65,
  runtime: 70,
  io: 74,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/* =========================================================
   Public types
   ========================================================= */

export type LoxIO = {
  // Each call is one line; the IO adds the newline.
  print: (text: string) => void;
  error: (text: string) => void;
};

export type RunOptions = {
  filename?: string; // for logs

  // Output host (default: process stdout/stderr)
  io?: LoxIO;

  // Run context. Pass one to share flags across calls (REPL). For the length of the run
  // its diagnostics go through `io`.
  reporter?: Reporter;

  logger?: Logger;

  // Debug dumps printed to stdout before the value
  printTokens?: boolean;
  printAst?: boolean;
};

export type RunResult = {
  ok: boolean;
  exitCode: ExitCode;

  // What this run wrote through its IO
  stdout: string;
  stderr: string;

  diagnostics: Diagnostic[];

  // Present when evaluation succeeded (null is nil)
  value?: RuntimeValue;

  timings: LoxLanguageStageTimings;
};

/* =========================================================
   Runner
   ========================================================= */

export function runSource(source: string, options: RunOptions = {}): RunResult {
  const stdoutBuf: string[] = [];
  const stderrBuf: string[] = [];

  const io = tee(options.io ?? createDefaultNodeIO(), stdoutBuf, stderrBuf);
  const reporter = options.reporter ?? new Reporter();
  const log = options.logger ?? createLogger({ name: "lox:run" });

  const previousSink = reporter.setSink((line) => io.error(line));
  const reportedBefore = reporter.diagnostics.length;

  try {
    log.debug(`running ${options.filename ?? "<input>"}`, { length: source.length });

    const analysis = analyzeText(source, { reporter, evaluate: true, warnTrailingTokens: false });
    const expression = analysis.expression;

    if (options.printTokens) dump(reporter, "table", () => renderTokenTable(analysis.tokens), io.print);
    if (options.printAst && expression) dump(reporter, "printer", () => printAst(expression), io.print);

    if (log.isEnabled("debug")) {
      log.debug(`scanned ${analysis.tokens.length} tokens`);
      log.trace(`tokens\n${analysis.tokens.map(tokenToString).join("\n")}`);
      if (expression) dump(reporter, "tree", () => renderAstTree(expression), (tree) => log.debug(`ast\n${tree}`));
      log.debug("timings", analysis.timings);
    }

    // includes dump failures reported after analysis
    const diagnostics = dedupeDiagnostics(reporter.diagnostics.slice(reportedBefore));

    const result = (exitCode: ExitCode, value?: RuntimeValue): RunResult => {
      const r: RunResult = {
        ok: exitCode === EXIT_CODES.ok,
        exitCode,
        stdout: stdoutBuf.join(""),
        stderr: stderrBuf.join(""),
        diagnostics,
        timings: analysis.timings,
      };
      if (value !== undefined) r.value = value;
      return r;
    };

    const internal = diagnostics.filter((d) => d.code === "INTERNAL_ERROR");
    if (internal.length > 0) {
      for (const d of internal) log.error(d.message);
      return result(EXIT_CODES.runtime);
    }

    if (reporter.hadError) return result(EXIT_CODES.syntax);

    const evaluation = analysis.evaluation;
    if (!evaluation || !evaluation.ok) return result(EXIT_CODES.runtime);

    io.print(stringify(evaluation.value));
    return result(EXIT_CODES.ok, evaluation.value);
  } finally {
    reporter.setSink(previousSink);
  }
}

/** Renders a debug dump; a crash while rendering is reported as INTERNAL_ERROR. */
function dump(reporter: Reporter, stage: string, render: () => string, write: (text: string) => void): void {
  let text: string;
  try {
    text = render();
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    reporter.note(error("INTERNAL_ERROR", `Internal ${stage} error: ${message}`, { line: 1, offset: 0, length: 0 }, "analysis"));
    return;
  }
  write(text);
}

export async function runFile(filePath: string, options: RunOptions = {}): Promise<RunResult> {
  const log = options.logger ?? createLogger({ name: "lox:run" });

  let source: string;
  const timer = log.time("read");
  try {
    source = await fs.promises.readFile(filePath, "utf8");
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    const line = `Could not read '${filePath}': ${message}`;

    const io = options.io ?? createDefaultNodeIO();
    io.error(line);
    timer.end({ filePath, failed: true });

    return {
      ok: false,
      exitCode: EXIT_CODES.io,
      stdout: "",
      stderr: line + "\n",
      diagnostics: [],
      timings: { scanMs: 0, parseMs: 0, evalMs: 0, totalMs: 0 },
    };
  }

  timer.end({ filePath, length: source.length });
  return runSource(source, { ...options, filename: options.filename ?? filePath, logger: log });
}

/* =========================================================
   IO hosts
   ========================================================= */

export function createDefaultNodeIO(): LoxIO {
  return {
    print: (text: string) => {
      process.stdout.write(ensureEndsWithNewline(text));
    },
    error: (text: string) => {
      process.stderr.write(ensureEndsWithNewline(text));
    },
  };
}

export type BufferedIO = LoxIO & {
  stdout: () => string;
  stderr: () => string;
};

/** In-memory IO for tests and embedding. */
export function createBufferedIO(): BufferedIO {
  const out: string[] = [];
  const err: string[] = [];

  return {
    print: (text) => out.push(ensureEndsWithNewline(text)),
    error: (text) => err.push(ensureEndsWithNewline(text)),
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

function tee(io: LoxIO, out: string[], err: string[]): LoxIO {
  return {
    print: (text) => {
      out.push(ensureEndsWithNewline(text));
      io.print(text);
    },
    error: (text) => {
      err.push(ensureEndsWithNewline(text));
      io.error(text);
    },
  };
}

function ensureEndsWithNewline(s: string): string {
  return s.endsWith("\n") ? s : s + "\n";
}
