// src/language/lox.language.ts
//
// Lox Language Service (high-level)
// ---------------------------------
// Single entrypoint for the runner, the REPL and the language server:
// - Scanner
// - Parser
// - Evaluator (skipped when the unit had a syntax error)
//
// Exports:
//   - analyzeText(source, options): LoxLanguageResult
//   - LoxLanguageOptions / LoxLanguageResult types
//
// Notes:
// - Pure TS logic; configuration is passed in through options by the host.
// - A crash inside a stage becomes an INTERNAL_ERROR diagnostic, never an exception.

import type { Expression } from "../core/ast";
import { Evaluator, type EvalResult } from "../core/evaluator";
import { Parser } from "../core/parser";
import { Scanner } from "../core/scanner";
import type { Token } from "../core/token";
import {
  dedupeDiagnostics,
  error,
  hasErrors,
  locationOfToken,
  Reporter,
  silentSink,
  spanOfToken,
  warn,
  type Diagnostic,
  type DiagnosticSource,
} from "../diagnostics";
import { nowMs } from "../utils/logger";

/* =========================================================
   Public types
   ========================================================= */

export type LoxLanguageOptions = {
  // Run context to report through. Defaults to a fresh, silent one.
  reporter?: Reporter;

  // If false, stop after parsing
  evaluate?: boolean;

  // Editor-only warning for tokens left after a complete expression
  warnTrailingTokens?: boolean;
};

export type LoxLanguageStageTimings = {
  scanMs: number;
  parseMs: number;
  evalMs: number;
  totalMs: number;
};

export type LoxLanguageResult = {
  // No error-severity diagnostics
  ok: boolean;

  tokens: Token[];
  expression: Expression | null;

  // null when evaluation was skipped
  evaluation: EvalResult | null;

  // Reported during this call, sorted and de-duplicated
  diagnostics: Diagnostic[];

  timings: LoxLanguageStageTimings;
};

/* =========================================================
   Main entrypoint
   ========================================================= */

export function analyzeText(source: string, options: LoxLanguageOptions = {}): LoxLanguageResult {
  const started = nowMs();

  const reporter = options.reporter ?? new Reporter(silentSink);
  const shouldEvaluate = options.evaluate ?? true;
  const warnTrailing = options.warnTrailingTokens ?? false;

  const reportedBefore = reporter.diagnostics.length;

  // -------- SCAN --------
  const t0 = nowMs();
  const tokens = safeScan(source, reporter);
  const scanMs = nowMs() - t0;

  // -------- PARSE --------
  const t1 = nowMs();
  const expression = tokens ? safeParse(tokens, reporter, warnTrailing) : null;
  const parseMs = nowMs() - t1;

  // -------- EVALUATE --------
  const t2 = nowMs();
  const evaluation = shouldEvaluate && expression && !reporter.hadError ? safeEvaluate(expression, reporter) : null;
  const evalMs = nowMs() - t2;

  const diagnostics = dedupeDiagnostics(reporter.diagnostics.slice(reportedBefore));

  return {
    ok: !hasErrors(diagnostics),
    tokens: tokens ?? [],
    expression,
    evaluation,
    diagnostics,
    timings: { scanMs, parseMs, evalMs, totalMs: nowMs() - started },
  };
}

/* =========================================================
   Safe wrappers (never throw)
   ========================================================= */

function safeScan(source: string, reporter: Reporter): Token[] | null {
  try {
    return new Scanner(source, reporter).scanTokens();
  } catch (e: unknown) {
    reportInternal(reporter, "scanner", e);
    return null;
  }
}

function safeParse(tokens: readonly Token[], reporter: Reporter, warnTrailing: boolean): Expression | null {
  try {
    const parser = new Parser(tokens, reporter);
    const expression = parser.parse();

    if (expression && warnTrailing && !parser.isAtEnd()) {
      const extra = parser.peek();
      reporter.note(
        warn(
          "PARSE_TRAILING_TOKENS",
          "Unexpected tokens after expression.",
          spanOfToken(extra),
          "analysis",
          locationOfToken(extra)
        )
      );
    }

    return expression;
  } catch (e: unknown) {
    reportInternal(reporter, "parser", e);
    return null;
  }
}

function safeEvaluate(expression: Expression, reporter: Reporter): EvalResult | null {
  try {
    const result = new Evaluator().evaluate(expression);
    if (!result.ok) reporter.runtimeError(result.error);
    return result;
  } catch (e: unknown) {
    reportInternal(reporter, "runtime", e);
    return null;
  }
}

function reportInternal(reporter: Reporter, stage: DiagnosticSource, e: unknown): void {
  const message = e instanceof Error ? e.message : String(e);
  reporter.note(error("INTERNAL_ERROR", `Internal ${stage} error: ${message}`, { line: 1, offset: 0, length: 0 }, stage));
}
