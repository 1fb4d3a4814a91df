// src/diagnostics/errors.ts
//
// Lox diagnostics model + helpers
// -------------------------------
// One shared format for:
// - Scanner errors
// - Parser errors
// - Runtime errors
// - Analysis warnings (editor-only)
//
// The runner prints these with formatDiagnostic(); the language server converts them
// to LSP diagnostics. Codes are stable so hosts can filter on them.

import { TokenKind, type Token } from "../core/token";

export type Severity = "error" | "warning";

export type DiagnosticSource = "scanner" | "parser" | "runtime" | "analysis";

export type DiagnosticCode =
  | "SCAN_UNEXPECTED_CHARACTER"
  | "SCAN_UNTERMINATED_STRING"
  | "PARSE_EXPECTED_RPAREN"
  | "PARSE_EXPECTED_EXPRESSION"
  | "PARSE_TRAILING_TOKENS"
  | "RUNTIME_TYPE_ERROR"
  | "INTERNAL_ERROR";

/** Where a diagnostic points in the source. `line` is 1-based, `offset` 0-based. */
export type SourceSpan = {
  line: number;
  offset: number;
  length: number;
};

export type Diagnostic = SourceSpan & {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  source: DiagnosticSource;
  /** Location qualifier, e.g. "at ')'" or "at end of input". */
  where?: string;
};

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  code: DiagnosticCode,
  message: string,
  span: SourceSpan,
  source: DiagnosticSource,
  where?: string
): Diagnostic {
  const d: Diagnostic = { severity, code, message, source, line: span.line, offset: span.offset, length: span.length };
  if (where !== undefined) d.where = where;
  return d;
}

export function error(code: DiagnosticCode, message: string, span: SourceSpan, source: DiagnosticSource, where?: string): Diagnostic {
  return diag("error", code, message, span, source, where);
}

export function warn(code: DiagnosticCode, message: string, span: SourceSpan, source: DiagnosticSource, where?: string): Diagnostic {
  return diag("warning", code, message, span, source, where);
}

export function spanOfToken(token: Token): SourceSpan {
  return { line: token.line, offset: token.offset, length: token.lexeme.length };
}

/** "at end of input" for EOF, otherwise "at '<lexeme>'". */
export function locationOfToken(token: Token): string {
  return token.kind === TokenKind.EOF ? "at end of input" : `at '${token.lexeme}'`;
}

/* =========================================================
   Sorting
   ========================================================= */

export function sortDiagnostics(list: readonly Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    if (a.offset !== b.offset) return a.offset - b.offset;

    // errors before warnings at the same offset
    const sa = severityRank(a.severity);
    const sb = severityRank(b.severity);
    if (sa !== sb) return sb - sa;

    return a.code.localeCompare(b.code);
  });
}

function severityRank(s: Severity): number {
  switch (s) {
    case "error":
      return 2;
    case "warning":
      return 1;
  }
}

/* =========================================================
   De-duplication
   ========================================================= */

export function dedupeDiagnostics(list: readonly Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];

  for (const d of sortDiagnostics(list)) {
    const key = `${d.code}|${d.severity}|${d.offset}|${d.length}|${d.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }

  return out;
}

export function hasErrors(list: readonly Diagnostic[]): boolean {
  return list.some((d) => d.severity === "error");
}

/* =========================================================
   Pretty printing
   ========================================================= */

/** `[line: 3] Error at ')': Expected expression.` */
export function formatDiagnostic(d: Diagnostic): string {
  const label = d.severity === "error" ? "Error" : "Warning";
  const where = d.where ? ` ${d.where}` : "";
  return `[line: ${d.line}] ${label}${where}: ${d.message}`;
}
