// src/runner/terminal.ts
//
// Lox Terminal Helpers (render-only)
// ----------------------------------
// Pure rendering for the --tokens / --ast debug dumps. Returns strings; run.ts prints them.
//
// Exports:
//   - renderTable
//   - renderTokenTable
//   - renderTree
//   - renderAstTree

import type { Expression } from "../core/ast";
import { assertNeverNode } from "../core/ast";
import { stringify } from "../core/printer";
import type { LiteralValue, Token } from "../core/token";

/* =========================================================
   Table
   ========================================================= */

// Longer cells are cut
const MAX_CELL_WIDTH = 40;

/** First row is the header. */
export function renderTable(rows: readonly (readonly string[])[]): string {
  if (rows.length === 0) return "";

  const colCount = Math.max(...rows.map((r) => r.length));

  const widths = Array.from({ length: colCount }, (_, i) => {
    const w = Math.max(...rows.map((r) => (r[i] ?? "").length));
    return clampInt(w, 1, MAX_CELL_WIDTH);
  });

  const top = line("┌", "┬", "┐", widths);
  const mid = line("├", "┼", "┤", widths);
  const bot = line("└", "┴", "┘", widths);

  const formatRow = (r: readonly string[]) =>
    "│" +
    widths
      .map((w, i) => {
        const cell = (r[i] ?? "").slice(0, w);
        return " " + cell.padEnd(w, " ") + " ";
      })
      .join("│") +
    "│";

  const [header, ...body] = rows;
  return [top, formatRow(header), mid, ...body.map(formatRow), bot].join("\n");
}

function line(left: string, mid: string, right: string, widths: number[]): string {
  return left + widths.map((w) => "─".repeat(w + 2)).join(mid) + right;
}

export function renderTokenTable(tokens: readonly Token[]): string {
  const rows: string[][] = [["#", "Kind", "Lexeme", "Literal", "Line"]];

  tokens.forEach((t, i) => {
    rows.push([String(i), t.kind, t.lexeme, literalCell(t.literal), String(t.line)]);
  });

  return renderTable(rows);
}

function literalCell(value: LiteralValue): string {
  if (value === null) return "";
  if (typeof value === "string") return JSON.stringify(value);
  return stringify(value);
}

/* =========================================================
   Tree view
   ========================================================= */

export type TreeNode = {
  label: string;
  children?: readonly TreeNode[];
};

export type TreeOptions = {
  maxDepth?: number; // default 64
};

export function renderTree(root: TreeNode, opts: TreeOptions = {}): string {
  const maxDepth = clampInt(opts.maxDepth ?? 64, 1, 10_000);

  const out: string[] = [root.label];
  const children = root.children ?? [];
  children.forEach((c, i) => walkTree(c, "", i === children.length - 1, out, 1, maxDepth));
  return out.join("\n");
}

function walkTree(node: TreeNode, prefix: string, isLast: boolean, out: string[], depth: number, maxDepth: number): void {
  const pointer = isLast ? "└─ " : "├─ ";
  const nextPrefix = prefix + (isLast ? "   " : "│  ");

  if (depth > maxDepth) {
    out.push(prefix + pointer + "…");
    return;
  }

  out.push(prefix + pointer + node.label);

  const children = node.children ?? [];
  children.forEach((c, i) => walkTree(c, nextPrefix, i === children.length - 1, out, depth + 1, maxDepth));
}

export function astToTree(expr: Expression): TreeNode {
  switch (expr.kind) {
    case "BinaryExpression":
      return { label: `Binary ${expr.operator.lexeme}`, children: [astToTree(expr.left), astToTree(expr.right)] };
    case "GroupingExpression":
      return { label: "Grouping", children: [astToTree(expr.expression)] };
    case "LiteralExpression":
      return { label: `Literal ${literalLabel(expr.value)}` };
    case "UnaryExpression":
      return { label: `Unary ${expr.operator.lexeme}`, children: [astToTree(expr.right)] };
    default:
      return assertNeverNode(expr);
  }
}

function literalLabel(value: LiteralValue): string {
  return typeof value === "string" ? JSON.stringify(value) : stringify(value);
}

export function renderAstTree(expr: Expression, opts: TreeOptions = {}): string {
  return renderTree(astToTree(expr), opts);
}

/* =========================================================
   Util
   ========================================================= */

function clampInt(n: number, lo: number, hi: number): number {
  const x = Math.floor(n);
  if (!Number.isFinite(x)) return lo;
  return Math.max(lo, Math.min(hi, x));
}
