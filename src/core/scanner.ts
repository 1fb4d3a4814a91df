// src/core/scanner.ts
//
// Lox Scanner (Tokenizer)
// -----------------------
// Converts raw source text into an ordered, materialized token list ending in exactly one EOF.
//
// Syntax covered:
// - Punctuation: ( ) { } , . - + ; / *
// - Operators: ! != = == < <= > >=   (maximal munch, one character of lookahead)
// - Comments: // to end of line
// - Strings: "double quoted", may span lines; \" \\ \n \t \r escapes
// - Numbers: 123, 12.34   (a trailing '.' is not part of the number)
// - Identifiers and the reserved words in token.ts
//
// Scanning never fails. A bad character is reported and skipped; an unterminated string
// is reported and still produces a STRING token so the parser is not starved.

import { makeToken, keywordKind, TokenKind, type LiteralValue, type Token } from "./token";
import { Reporter } from "../diagnostics/reporter";
import type { SourceSpan } from "../diagnostics/errors";

export class Scanner {
  private readonly src: string;
  private readonly reporter: Reporter;

  private start = 0; // start of the current lexeme
  private current = 0; // next character to read
  private line = 1;
  private startLine = 1;

  private readonly tokens: Token[] = [];

  constructor(source: string, reporter: Reporter) {
    this.src = source;
    this.reporter = reporter;
  }

  public scanTokens(): Token[] {
    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startLine = this.line;
      this.scanToken();
    }

    this.tokens.push(makeToken(TokenKind.EOF, "", null, this.line, this.src.length));
    return this.tokens;
  }

  private scanToken(): void {
    const c = this.advance();

    switch (c) {
      case "(":
        return this.addToken(TokenKind.LEFT_PAREN);
      case ")":
        return this.addToken(TokenKind.RIGHT_PAREN);
      case "{":
        return this.addToken(TokenKind.LEFT_BRACE);
      case "}":
        return this.addToken(TokenKind.RIGHT_BRACE);
      case ",":
        return this.addToken(TokenKind.COMMA);
      case ".":
        return this.addToken(TokenKind.DOT);
      case "-":
        return this.addToken(TokenKind.MINUS);
      case "+":
        return this.addToken(TokenKind.PLUS);
      case ";":
        return this.addToken(TokenKind.SEMICOLON);
      case "*":
        return this.addToken(TokenKind.STAR);

      case "!":
        return this.addToken(this.match("=") ? TokenKind.BANG_EQUAL : TokenKind.BANG);
      case "=":
        return this.addToken(this.match("=") ? TokenKind.EQUAL_EQUAL : TokenKind.EQUAL);
      case "<":
        return this.addToken(this.match("=") ? TokenKind.LESS_EQUAL : TokenKind.LESS);
      case ">":
        return this.addToken(this.match("=") ? TokenKind.GREATER_EQUAL : TokenKind.GREATER);

      case "/":
        if (this.match("/")) {
          while (this.peek() !== "\n" && !this.isAtEnd()) this.advance();
          return;
        }
        return this.addToken(TokenKind.SLASH);

      // Trivia (advance() already counted the newline)
      case " ":
      case "\r":
      case "\t":
      case "\n":
        return;

      case '"':
        return this.string();

      default:
        if (isDigit(c)) return this.number();
        if (isIdentStart(c)) return this.identifier();
        return this.unexpected(c);
    }
  }

  /* =========================================================
     Literals
     ========================================================= */

  private string(): void {
    let value = "";

    while (!this.isAtEnd() && this.peek() !== '"') {
      const c = this.advance();

      if (c === "\\" && !this.isAtEnd()) {
        const esc = this.advance();
        value += decodeEscape(esc) ?? "\\" + esc;
        continue;
      }

      value += c;
    }

    if (this.isAtEnd()) {
      this.reporter.error("SCAN_UNTERMINATED_STRING", "Unterminated string.", this.lexemeSpan());
      this.addToken(TokenKind.STRING, value);
      return;
    }

    this.advance(); // closing quote
    this.addToken(TokenKind.STRING, value);
  }

  private number(): void {
    while (isDigit(this.peek())) this.advance();

    // fraction needs at least one digit after the dot
    if (this.peek() === "." && isDigit(this.peekNext())) {
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }

    this.addToken(TokenKind.NUMBER, Number(this.lexeme()));
  }

  private identifier(): void {
    while (isIdentPart(this.peek())) this.advance();

    const kind = keywordKind(this.lexeme()) ?? TokenKind.IDENTIFIER;

    if (kind === TokenKind.TRUE) return this.addToken(kind, true);
    if (kind === TokenKind.FALSE) return this.addToken(kind, false);
    this.addToken(kind);
  }

  private unexpected(c: string): void {
    // keep a surrogate pair together so it is reported once
    if (isHighSurrogate(c) && isLowSurrogate(this.peek())) this.advance();

    this.reporter.error(
      "SCAN_UNEXPECTED_CHARACTER",
      `Unexpected character '${printable(this.lexeme())}'.`,
      this.lexemeSpan()
    );
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isAtEnd(): boolean {
    return this.current >= this.src.length;
  }

  private advance(): string {
    const c = this.src.charAt(this.current);
    this.current++;
    if (c === "\n") this.line++;
    return c;
  }

  private match(expected: string): boolean {
    if (this.isAtEnd() || this.src.charAt(this.current) !== expected) return false;
    this.current++;
    return true;
  }

  private peek(): string {
    return this.isAtEnd() ? "\0" : this.src.charAt(this.current);
  }

  private peekNext(): string {
    return this.current + 1 >= this.src.length ? "\0" : this.src.charAt(this.current + 1);
  }

  private lexeme(): string {
    return this.src.slice(this.start, this.current);
  }

  private lexemeSpan(): SourceSpan {
    return { line: this.startLine, offset: this.start, length: this.current - this.start };
  }

  private addToken(kind: TokenKind, literal: LiteralValue = null): void {
    this.tokens.push(makeToken(kind, this.lexeme(), literal, this.startLine, this.start));
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function scan(source: string, reporter: Reporter = new Reporter()): Token[] {
  return new Scanner(source, reporter).scanTokens();
}

/* =========================================================
   Character utilities
   ========================================================= */

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isIdentStart(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

function isHighSurrogate(c: string): boolean {
  const code = c.charCodeAt(0);
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(c: string): boolean {
  const code = c.charCodeAt(0);
  return code >= 0xdc00 && code <= 0xdfff;
}

function decodeEscape(c: string): string | null {
  switch (c) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    case '"':
      return '"';
    case "\\":
      return "\\";
    default:
      return null;
  }
}

function printable(c: string): string {
  if (c === "\0") return "\\0";
  return c;
}
