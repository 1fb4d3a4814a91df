// src/core/evaluator.ts
//
// Lox Evaluator
// -------------
// Reduces one Expression to one RuntimeValue.
//
// Operand type mismatches come back as { ok: false, error } results; the caller decides
// whether to report them. Only broken invariants (an operator token that is not an operator)
// throw.

import { assertNeverNode, type BinaryExpression, type Expression, type UnaryExpression } from "./ast";
import { stringify } from "./printer";
import { TokenKind, type Token } from "./token";

/* =========================================================
   Runtime types
   ========================================================= */

export type RuntimeValue = string | number | boolean | null;

export class LoxRuntimeError extends Error {
  public readonly token: Token;

  constructor(token: Token, message: string) {
    super(message);
    this.name = "LoxRuntimeError";
    this.token = token;
  }

  public get line(): number {
    return this.token.line;
  }
}

export type EvalResult = { ok: true; value: RuntimeValue } | { ok: false; error: LoxRuntimeError };

function ok(value: RuntimeValue): EvalResult {
  return { ok: true, value };
}

function fail(token: Token, message: string): EvalResult {
  return { ok: false, error: new LoxRuntimeError(token, message) };
}

/* =========================================================
   Value rules
   ========================================================= */

/** nil and false are falsy; everything else (0 and "" included) is truthy. */
export function isTruthy(value: RuntimeValue): boolean {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  return true;
}

// Variants never compare equal to each other, so strict equality is the whole rule.
export function isEqual(a: RuntimeValue, b: RuntimeValue): boolean {
  return a === b;
}

function quote(v: RuntimeValue): string {
  return `'${stringify(v)}'`;
}

/* =========================================================
   Evaluator
   ========================================================= */

export class Evaluator {
  public evaluate(expr: Expression): EvalResult {
    switch (expr.kind) {
      case "LiteralExpression":
        return ok(expr.value);
      case "GroupingExpression":
        return this.evaluate(expr.expression);
      case "UnaryExpression":
        return this.evalUnary(expr);
      case "BinaryExpression":
        return this.evalBinary(expr);
      default:
        return assertNeverNode(expr);
    }
  }

  private evalUnary(expr: UnaryExpression): EvalResult {
    const right = this.evaluate(expr.right);
    if (!right.ok) return right;

    const op = expr.operator;
    const v = right.value;

    switch (op.kind) {
      case TokenKind.BANG:
        return ok(!isTruthy(v));
      case TokenKind.MINUS:
        if (typeof v !== "number") {
          return fail(op, `Operand ${quote(v)} must be a number to apply the '-' operator.`);
        }
        return ok(-v);
      default:
        throw new Error(`Unknown unary operator '${op.lexeme}' (${op.kind}).`);
    }
  }

  private evalBinary(expr: BinaryExpression): EvalResult {
    const left = this.evaluate(expr.left);
    if (!left.ok) return left;
    const right = this.evaluate(expr.right);
    if (!right.ok) return right;

    const op = expr.operator;
    const l = left.value;
    const r = right.value;

    switch (op.kind) {
      case TokenKind.EQUAL_EQUAL:
        return ok(isEqual(l, r));
      case TokenKind.BANG_EQUAL:
        return ok(!isEqual(l, r));

      case TokenKind.PLUS:
        if (typeof l === "number" && typeof r === "number") return ok(l + r);
        if (typeof l === "string" && typeof r === "string") return ok(l + r);
        return fail(op, `Operands ${quote(l)} and ${quote(r)} must both be numbers or both be strings for '+'.`);

      case TokenKind.MINUS:
      case TokenKind.STAR:
      case TokenKind.SLASH:
      case TokenKind.GREATER:
      case TokenKind.GREATER_EQUAL:
      case TokenKind.LESS:
      case TokenKind.LESS_EQUAL:
        if (typeof l !== "number" || typeof r !== "number") {
          return fail(op, `Operands ${quote(l)} and ${quote(r)} must both be numbers for '${op.lexeme}'.`);
        }
        return ok(arithmetic(op, l, r));

      default:
        throw new Error(`Unknown binary operator '${op.lexeme}' (${op.kind}).`);
    }
  }
}

function arithmetic(op: Token, l: number, r: number): RuntimeValue {
  switch (op.kind) {
    case TokenKind.MINUS:
      return l - r;
    case TokenKind.STAR:
      return l * r;
    case TokenKind.SLASH:
      return l / r;
    case TokenKind.GREATER:
      return l > r;
    case TokenKind.GREATER_EQUAL:
      return l >= r;
    case TokenKind.LESS:
      return l < r;
    case TokenKind.LESS_EQUAL:
      return l <= r;
    default:
      throw new Error(`Operator '${op.lexeme}' is not numeric.`);
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function evaluate(expr: Expression): EvalResult {
  return new Evaluator().evaluate(expr);
}
