// src/core/ast.ts
//
// Lox AST (Abstract Syntax Tree)
// ------------------------------
//
//   Scanner   -> tokens
//   Parser    -> Expression (this file)
//   Evaluator -> RuntimeValue
//   Printer   -> debug text
//
// Every node owns its children outright: the tree is built bottom-up by the parser and is
// never shared or mutated afterwards.

import type { LiteralValue, Token } from "./token";

/* =========================================================
   Node kinds
   ========================================================= */

export const NODE_KINDS = ["BinaryExpression", "GroupingExpression", "LiteralExpression", "UnaryExpression"] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type NodeBase = {
  readonly kind: NodeKind;
};

/* =========================================================
   Expressions
   ========================================================= */

export type Expression = BinaryExpression | GroupingExpression | LiteralExpression | UnaryExpression;

export type BinaryExpression = NodeBase & {
  readonly kind: "BinaryExpression";
  readonly left: Expression;
  readonly operator: Token;
  readonly right: Expression;
};

export type GroupingExpression = NodeBase & {
  readonly kind: "GroupingExpression";
  readonly expression: Expression;
};

export type LiteralExpression = NodeBase & {
  readonly kind: "LiteralExpression";
  readonly value: LiteralValue;
};

export type UnaryExpression = NodeBase & {
  readonly kind: "UnaryExpression";
  readonly operator: Token;
  readonly right: Expression;
};

/* =========================================================
   Factories
   ========================================================= */

export function binary(left: Expression, operator: Token, right: Expression): BinaryExpression {
  return { kind: "BinaryExpression", left, operator, right };
}

export function grouping(expression: Expression): GroupingExpression {
  return { kind: "GroupingExpression", expression };
}

export function literal(value: LiteralValue): LiteralExpression {
  return { kind: "LiteralExpression", value };
}

export function unary(operator: Token, right: Expression): UnaryExpression {
  return { kind: "UnaryExpression", operator, right };
}

export function assertNeverNode(node: never): never {
  throw new Error(`Unhandled AST node: ${JSON.stringify(node)}`);
}
