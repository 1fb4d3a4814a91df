// src/core/token.ts
//
// Lox Token Model
// ---------------
// The lexical unit shared by the scanner, the parser and editor tooling.
// Tokens are immutable once the scanner has produced them.

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  // Single-character punctuation
  LEFT_PAREN = "LEFT_PAREN",
  RIGHT_PAREN = "RIGHT_PAREN",
  LEFT_BRACE = "LEFT_BRACE",
  RIGHT_BRACE = "RIGHT_BRACE",
  COMMA = "COMMA",
  DOT = "DOT",
  MINUS = "MINUS",
  PLUS = "PLUS",
  SEMICOLON = "SEMICOLON",
  SLASH = "SLASH",
  STAR = "STAR",

  // One or two character operators
  BANG = "BANG",
  BANG_EQUAL = "BANG_EQUAL",
  EQUAL = "EQUAL",
  EQUAL_EQUAL = "EQUAL_EQUAL",
  GREATER = "GREATER",
  GREATER_EQUAL = "GREATER_EQUAL",
  LESS = "LESS",
  LESS_EQUAL = "LESS_EQUAL",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  STRING = "STRING",
  NUMBER = "NUMBER",

  // Reserved words
  AND = "AND",
  CLASS = "CLASS",
  ELSE = "ELSE",
  FALSE = "FALSE",
  FUN = "FUN",
  FOR = "FOR",
  IF = "IF",
  NIL = "NIL",
  OR = "OR",
  PRINT = "PRINT",
  RETURN = "RETURN",
  SUPER = "SUPER",
  THIS = "THIS",
  TRUE = "TRUE",
  VAR = "VAR",
  WHILE = "WHILE",

  EOF = "EOF",
}

/* =========================================================
   Token Types
   ========================================================= */

/** `null` stands for "no literal". */
export type LiteralValue = string | number | boolean | null;

export type Token = {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly literal: LiteralValue;
  /** 1-based line the lexeme starts on. */
  readonly line: number;
  /** 0-based offset of the lexeme start. */
  readonly offset: number;
};

export function makeToken(kind: TokenKind, lexeme: string, literal: LiteralValue, line: number, offset: number): Token {
  return Object.freeze({ kind, lexeme, literal, line, offset });
}

/* =========================================================
   Keyword map
   ========================================================= */

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ["and", TokenKind.AND],
  ["class", TokenKind.CLASS],
  ["else", TokenKind.ELSE],
  ["false", TokenKind.FALSE],
  ["for", TokenKind.FOR],
  ["fun", TokenKind.FUN],
  ["if", TokenKind.IF],
  ["nil", TokenKind.NIL],
  ["or", TokenKind.OR],
  ["print", TokenKind.PRINT],
  ["return", TokenKind.RETURN],
  ["super", TokenKind.SUPER],
  ["this", TokenKind.THIS],
  ["true", TokenKind.TRUE],
  ["var", TokenKind.VAR],
  ["while", TokenKind.WHILE],
]);

export function keywordKind(text: string): TokenKind | null {
  return KEYWORDS.get(text) ?? null;
}

/** Debug form: `NUMBER 1.5 1.5`. */
export function tokenToString(token: Token): string {
  const literal = token.literal === null ? "null" : typeof token.literal === "string" ? JSON.stringify(token.literal) : String(token.literal);
  return `${token.kind} ${token.lexeme} ${literal}`;
}
