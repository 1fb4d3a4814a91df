// src/diagnostics/reporter.ts
//
// Run context for one top-level run (a file run, or a REPL session).
// Every stage reports through the Reporter it is handed; nothing is process-wide, so
// independent runs cannot see each other's flags.
//
// Flag lifecycle:
// - hadError (syntax/scan) gates evaluation and is cleared by beginUnit() between units.
// - hadRuntimeError is only cleared by reset(); the driver reads it once per run.

import type { Token } from "../core/token";
import type { LoxRuntimeError } from "../core/evaluator";
import {
  error as mkError,
  formatDiagnostic,
  locationOfToken,
  spanOfToken,
  type Diagnostic,
  type DiagnosticCode,
  type SourceSpan,
} from "./errors";

/** Receives one formatted line per reported diagnostic (the error channel). */
export type ErrorSink = (line: string) => void;

export const stderrSink: ErrorSink = (line) => {
  process.stderr.write(line + "\n");
};

export const silentSink: ErrorSink = () => {
  /* diagnostics are still collected */
};

export class Reporter {
  private syntaxError = false;
  private runtimeErrorFlag = false;
  private readonly collected: Diagnostic[] = [];

  constructor(private sink: ErrorSink = stderrSink) {}

  public get hadError(): boolean {
    return this.syntaxError;
  }

  public get hadRuntimeError(): boolean {
    return this.runtimeErrorFlag;
  }

  /** Diagnostics reported since the last beginUnit()/reset(). */
  public get diagnostics(): readonly Diagnostic[] {
    return this.collected;
  }

  /** Swaps the error channel and returns the previous one. */
  public setSink(sink: ErrorSink): ErrorSink {
    const previous = this.sink;
    this.sink = sink;
    return previous;
  }

  /* =========================================================
     Entry points
     ========================================================= */

  /** Scanner-level report: no location qualifier. */
  public error(code: DiagnosticCode, message: string, span: SourceSpan): void {
    this.syntaxError = true;
    this.emit(mkError(code, message, span, "scanner"));
  }

  public parseError(token: Token, code: DiagnosticCode, message: string): void {
    this.syntaxError = true;
    this.emit(mkError(code, message, spanOfToken(token), "parser", locationOfToken(token)));
  }

  public runtimeError(err: LoxRuntimeError): void {
    this.runtimeErrorFlag = true;
    this.emit(mkError("RUNTIME_TYPE_ERROR", err.message, spanOfToken(err.token), "runtime"));
  }

  /** Records a diagnostic without touching either flag (warnings, internal errors). */
  public note(d: Diagnostic): void {
    this.emit(d);
  }

  /* =========================================================
     Lifecycle
     ========================================================= */

  /** Start an independent input unit (next REPL line). */
  public beginUnit(): void {
    this.syntaxError = false;
    this.collected.length = 0;
  }

  public reset(): void {
    this.beginUnit();
    this.runtimeErrorFlag = false;
  }

  private emit(d: Diagnostic): void {
    this.collected.push(d);
    this.sink(formatDiagnostic(d));
  }
}
