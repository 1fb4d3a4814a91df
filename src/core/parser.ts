// src/core/parser.ts
//
// Lox Parser
// ----------
// Recursive descent over the token list, one method per grammar level:
//
//   expression  := equality
//   equality    := comparison ( ("!=" | "==") comparison )*
//   comparison  := term ( (">" | ">=" | "<" | "<=") term )*
//   term        := factor ( ("+" | "-") factor )*
//   factor      := unary ( ("/" | "*") unary )*
//   unary       := ("!" | "-") unary | primary
//   primary     := NUMBER | STRING | "true" | "false" | "nil" | "(" expression ")"
//
// Grammar methods never throw for bad input: they return a Parsed failure carrying the
// offending token, and parse() reports it once and synchronizes.
//
// Exports:
//   - parseTokens(tokens, reporter)
//   - parseSource(source, reporter)
//   - Parser class (advanced usage)

import { binary, grouping, literal, unary, type Expression } from "./ast";
import { TokenKind, type LiteralValue, type Token } from "./token";
import { scan } from "./scanner";
import { Reporter } from "../diagnostics/reporter";
import type { DiagnosticCode } from "../diagnostics/errors";

/* =========================================================
   Parse outcome
   ========================================================= */

export type ParseError = {
  token: Token;
  code: DiagnosticCode;
  message: string;
};

export type Parsed = { ok: true; expression: Expression } | { ok: false; error: ParseError };

function ok(expression: Expression): Parsed {
  return { ok: true, expression };
}

function fail(token: Token, code: DiagnosticCode, message: string): Parsed {
  return { ok: false, error: { token, code, message } };
}

/* =========================================================
   Operator tables
   ========================================================= */

const EQUALITY_OPS: readonly TokenKind[] = [TokenKind.BANG_EQUAL, TokenKind.EQUAL_EQUAL];
const COMPARISON_OPS: readonly TokenKind[] = [
  TokenKind.GREATER,
  TokenKind.GREATER_EQUAL,
  TokenKind.LESS,
  TokenKind.LESS_EQUAL,
];
const TERM_OPS: readonly TokenKind[] = [TokenKind.PLUS, TokenKind.MINUS];
const FACTOR_OPS: readonly TokenKind[] = [TokenKind.SLASH, TokenKind.STAR];
const UNARY_OPS: readonly TokenKind[] = [TokenKind.BANG, TokenKind.MINUS];

// Tokens that can begin a statement; synchronize() stops in front of them.
const STATEMENT_STARTS: ReadonlySet<TokenKind> = new Set([
  TokenKind.CLASS,
  TokenKind.FUN,
  TokenKind.VAR,
  TokenKind.FOR,
  TokenKind.IF,
  TokenKind.WHILE,
  TokenKind.PRINT,
  TokenKind.RETURN,
]);

/* =========================================================
   Parser
   ========================================================= */

export class Parser {
  private readonly tokens: readonly Token[];
  private readonly reporter: Reporter;
  private idx = 0;

  constructor(tokens: readonly Token[], reporter: Reporter) {
    const last = tokens[tokens.length - 1];
    if (last === undefined || last.kind !== TokenKind.EOF) {
      throw new Error("Parser requires a token sequence that ends with EOF.");
    }

    this.tokens = tokens;
    this.reporter = reporter;
  }

  /** One expression, or null after a reported syntax error. */
  public parse(): Expression | null {
    const result = this.expression();
    if (result.ok) return result.expression;

    const { token, code, message } = result.error;
    this.reporter.parseError(token, code, message);
    this.synchronize();
    return null;
  }

  public isAtEnd(): boolean {
    return this.peek().kind === TokenKind.EOF;
  }

  public peek(): Token {
    return this.tokens[this.idx];
  }

  /* =========================================================
     Grammar
     ========================================================= */

  private expression(): Parsed {
    return this.equality();
  }

  private equality(): Parsed {
    return this.leftAssociative(() => this.comparison(), EQUALITY_OPS);
  }

  private comparison(): Parsed {
    return this.leftAssociative(() => this.term(), COMPARISON_OPS);
  }

  private term(): Parsed {
    return this.leftAssociative(() => this.factor(), TERM_OPS);
  }

  private factor(): Parsed {
    return this.leftAssociative(() => this.unary(), FACTOR_OPS);
  }

  private unary(): Parsed {
    if (this.matchAny(UNARY_OPS)) {
      const operator = this.previous();
      const right = this.unary();
      if (!right.ok) return right;
      return ok(unary(operator, right.expression));
    }

    return this.primary();
  }

  private primary(): Parsed {
    const t = this.peek();

    switch (t.kind) {
      case TokenKind.NUMBER:
      case TokenKind.STRING:
      case TokenKind.TRUE:
      case TokenKind.FALSE:
        this.advance();
        return ok(literal(literalOf(t)));

      case TokenKind.NIL:
        this.advance();
        return ok(literal(null));

      case TokenKind.LEFT_PAREN: {
        this.advance();
        const inner = this.expression();
        if (!inner.ok) return inner;

        if (!this.match(TokenKind.RIGHT_PAREN)) {
          return fail(this.peek(), "PARSE_EXPECTED_RPAREN", "Expected ')' after expression.");
        }
        return ok(grouping(inner.expression));
      }

      default:
        return fail(t, "PARSE_EXPECTED_EXPRESSION", "Expected expression.");
    }
  }

  /** operand ( op operand )*, folded to the left. */
  private leftAssociative(operand: () => Parsed, operators: readonly TokenKind[]): Parsed {
    const first = operand();
    if (!first.ok) return first;

    let expr = first.expression;
    while (this.matchAny(operators)) {
      const operator = this.previous();
      const right = operand();
      if (!right.ok) return right;
      expr = binary(expr, operator, right.expression);
    }

    return ok(expr);
  }

  /* =========================================================
     Recovery
     ========================================================= */

  private synchronize(): void {
    this.advance();

    while (!this.isAtEnd()) {
      if (this.previous().kind === TokenKind.SEMICOLON) return;
      if (STATEMENT_STARTS.has(this.peek().kind)) return;
      this.advance();
    }
  }

  /* =========================================================
     Utilities
     ========================================================= */

  private previous(): Token {
    return this.tokens[Math.max(0, this.idx - 1)];
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.idx++;
    return this.previous();
  }

  private match(kind: TokenKind): boolean {
    if (this.peek().kind !== kind) return false;
    this.advance();
    return true;
  }

  private matchAny(kinds: readonly TokenKind[]): boolean {
    return kinds.some((k) => this.match(k));
  }
}

// The scanner only attaches literals to these kinds; anything else is a broken invariant.
function literalOf(t: Token): LiteralValue {
  const expected = t.kind === TokenKind.NUMBER ? "number" : t.kind === TokenKind.STRING ? "string" : "boolean";
  if (typeof t.literal !== expected) {
    throw new Error(`Token ${t.kind} '${t.lexeme}' carries a ${typeof t.literal} literal, expected ${expected}.`);
  }
  return t.literal;
}

/* =========================================================
   Public helpers
   ========================================================= */

export function parseTokens(tokens: readonly Token[], reporter: Reporter = new Reporter()): Expression | null {
  return new Parser(tokens, reporter).parse();
}

export function parseSource(source: string, reporter: Reporter = new Reporter()): Expression | null {
  return parseTokens(scan(source, reporter), reporter);
}
