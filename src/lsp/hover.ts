// src/lsp/hover.ts
//
// Lox Hover Provider (language core)
// ----------------------------------
// Given the analysis of a document and a cursor offset, return hover markdown:
// - the token under the cursor (kind, lexeme, literal)
// - the value of the whole expression when evaluation is enabled and the document parsed
//
// Exports:
//   - getHover(request): HoverResult | null
//   - tokenAt(tokens, offset)

import type { EvalResult } from "../core/evaluator";
import { stringify } from "../core/printer";
import { TokenKind, type Token } from "../core/token";

export type HoverResult = {
  markdown: string;
  // Span of the hovered token
  offset: number;
  length: number;
};

export type HoverRequest = {
  tokens: readonly Token[];
  offset: number;

  // From analyzeText(); null when evaluation was skipped
  evaluation: EvalResult | null;
  showValue: boolean;
};

export function getHover(req: HoverRequest): HoverResult | null {
  const token = tokenAt(req.tokens, req.offset);
  if (!token) return null;

  const lines = [`### \`${token.lexeme}\``, ``, `**Kind:** \`${token.kind}\``];

  if (token.literal !== null) {
    const lit = typeof token.literal === "string" ? JSON.stringify(token.literal) : stringify(token.literal);
    lines.push(`**Literal:** \`${lit}\``);
  }

  if (req.showValue && req.evaluation) {
    lines.push(``);
    if (req.evaluation.ok) lines.push(`**Expression value:** \`${stringify(req.evaluation.value)}\``);
    else lines.push(`**Runtime error:** ${req.evaluation.error.message}`);
  }

  return { markdown: lines.join("\n"), offset: token.offset, length: token.lexeme.length };
}

/** The non-EOF token whose lexeme covers `offset`, if any. */
export function tokenAt(tokens: readonly Token[], offset: number): Token | null {
  for (const t of tokens) {
    if (t.kind === TokenKind.EOF) break;
    if (offset >= t.offset && offset < t.offset + t.lexeme.length) return t;
  }
  return null;
}
