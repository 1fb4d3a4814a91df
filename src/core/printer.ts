// src/core/printer.ts
//
// Text forms for trees and values.
//
// - printAst():     parenthesised prefix form, e.g. (+ 1 (* 2 3))
// - stringify():    canonical value rendering used for REPL/file output
// - formatNumber(): plain decimal text, never exponent notation

import { assertNeverNode, type Expression } from "./ast";
import type { LiteralValue } from "./token";

export function printAst(expr: Expression): string {
  switch (expr.kind) {
    case "BinaryExpression":
      return parenthesize(expr.operator.lexeme, expr.left, expr.right);
    case "GroupingExpression":
      return parenthesize("group", expr.expression);
    case "LiteralExpression":
      return stringify(expr.value);
    case "UnaryExpression":
      return parenthesize(expr.operator.lexeme, expr.right);
    default:
      return assertNeverNode(expr);
  }
}

function parenthesize(name: string, ...exprs: Expression[]): string {
  return `(${[name, ...exprs.map(printAst)].join(" ")})`;
}

/* =========================================================
   Values
   ========================================================= */

/** Canonical text of a literal or runtime value: nil, true/false, raw string, decimal number. */
export function stringify(value: LiteralValue): string {
  if (value === null) return "nil";
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "boolean") return value ? "true" : "false";
  return value;
}

export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Object.is(n, -0)) return "-0";

  const s = String(n);
  const e = s.indexOf("e");
  if (e < 0) return s;

  return expandExponent(s.slice(0, e), Number(s.slice(e + 1)));
}

// "1.25", 22 -> "125" followed by 20 zeros; "1.5", -7 -> "0.00000015"
function expandExponent(mantissa: string, exponent: number): string {
  const negative = mantissa.startsWith("-");
  const unsigned = negative ? mantissa.slice(1) : mantissa;

  const dot = unsigned.indexOf(".");
  const digits = unsigned.replace(".", "");
  const point = (dot < 0 ? unsigned.length : dot) + exponent;

  let out: string;
  if (point <= 0) out = "0." + "0".repeat(-point) + digits;
  else if (point >= digits.length) out = digits + "0".repeat(point - digits.length);
  else out = digits.slice(0, point) + "." + digits.slice(point);

  return negative ? "-" + out : out;
}
