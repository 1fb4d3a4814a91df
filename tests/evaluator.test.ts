import { describe, it, expect } from "vitest";
import { literal, unary } from "../src/core/ast";
import { evaluate, isTruthy, LoxRuntimeError, type EvalResult } from "../src/core/evaluator";
import { parseSource } from "../src/core/parser";
import { makeToken, TokenKind } from "../src/core/token";
import { Reporter, silentSink } from "../src/diagnostics/reporter";

function run(source: string): EvalResult {
  const expr = parseSource(source, new Reporter(silentSink));
  if (!expr) throw new Error(`did not parse: ${source}`);
  return evaluate(expr);
}

function valueOf(source: string) {
  const r = run(source);
  if (!r.ok) throw new Error(`runtime error: ${r.error.message}`);
  return r.value;
}

function errorOf(source: string): LoxRuntimeError {
  const r = run(source);
  if (r.ok) throw new Error(`expected a runtime error for ${source}`);
  return r.error;
}

describe("evaluator", () => {
  it("does arithmetic with precedence", () => {
    expect(valueOf("1 + 2")).toBe(3);
    expect(valueOf("2 * (3 + 4)")).toBe(14);
    expect(valueOf("10 / 4")).toBe(2.5);
    expect(valueOf("-3 - -3")).toBe(0);
  });

  it("concatenates strings", () => {
    expect(valueOf('"a" + "b"')).toBe("ab");
  });

  it("rejects mixed operands for +", () => {
    const err = errorOf('"a" + 1');
    expect(err.message).toBe("Operands 'a' and '1' must both be numbers or both be strings for '+'.");
    expect(err.token.lexeme).toBe("+");
    expect(err.line).toBe(1);
  });

  it("rejects a non-number for unary minus", () => {
    expect(errorOf('-"abc"').message).toBe("Operand 'abc' must be a number to apply the '-' operator.");
  });

  it("rejects non-numbers for comparison and arithmetic", () => {
    expect(errorOf("1 < nil").message).toBe("Operands '1' and 'nil' must both be numbers for '<'.");
    expect(errorOf("true * 2").message).toBe("Operands 'true' and '2' must both be numbers for '*'.");
  });

  it("stops at the first failing operand", () => {
    const err = errorOf("(1 + true) * 2");
    expect(err.token.lexeme).toBe("+");
  });

  it("reports the line of the operator", () => {
    expect(errorOf("1 +\n\n nil").line).toBe(1);
    expect(errorOf("1\n-\nnil").line).toBe(2);
  });

  it("treats only nil and false as falsy", () => {
    expect(valueOf("!nil")).toBe(true);
    expect(valueOf("!false")).toBe(true);
    expect(valueOf("!0")).toBe(false);
    expect(valueOf('!""')).toBe(false);
    expect(isTruthy(0)).toBe(true);
    expect(isTruthy(null)).toBe(false);
  });

  it("compares without coercion", () => {
    expect(valueOf("1 == 1")).toBe(true);
    expect(valueOf("1 == 1.0")).toBe(true);
    expect(valueOf('1 == "1"')).toBe(false);
    expect(valueOf("nil == nil")).toBe(true);
    expect(valueOf("nil == false")).toBe(false);
    expect(valueOf('"a" != "b"')).toBe(true);
    expect(valueOf("3 >= 3")).toBe(true);
  });

  it("follows IEEE 754 for division by zero", () => {
    expect(valueOf("1 / 0")).toBe(Infinity);
    expect(valueOf("-1 / 0")).toBe(-Infinity);
    expect(Number.isNaN(valueOf("0 / 0"))).toBe(true);
    expect(valueOf("0 / 0 == 0 / 0")).toBe(false);
  });

  it("throws on an operator token that is not an operator", () => {
    const plus = makeToken(TokenKind.PLUS, "+", null, 1, 0);
    expect(() => evaluate(unary(plus, literal(1)))).toThrow("Unknown unary operator '+' (PLUS).");
  });
});
