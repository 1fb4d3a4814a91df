import { describe, it, expect } from "vitest";
import { stringify } from "../src/core/printer";
import { scan } from "../src/core/scanner";
import { TokenKind, tokenToString } from "../src/core/token";
import { Reporter, silentSink } from "../src/diagnostics/reporter";

function kinds(source: string): TokenKind[] {
  return scan(source, new Reporter(silentSink)).map((t) => t.kind);
}

describe("scanner", () => {
  it("scans single-character punctuation", () => {
    expect(kinds("(){},.-+;/*")).toEqual([
      TokenKind.LEFT_PAREN,
      TokenKind.RIGHT_PAREN,
      TokenKind.LEFT_BRACE,
      TokenKind.RIGHT_BRACE,
      TokenKind.COMMA,
      TokenKind.DOT,
      TokenKind.MINUS,
      TokenKind.PLUS,
      TokenKind.SEMICOLON,
      TokenKind.SLASH,
      TokenKind.STAR,
      TokenKind.EOF,
    ]);
  });

  it("prefers two-character operators", () => {
    expect(kinds("! != = == < <= > >=")).toEqual([
      TokenKind.BANG,
      TokenKind.BANG_EQUAL,
      TokenKind.EQUAL,
      TokenKind.EQUAL_EQUAL,
      TokenKind.LESS,
      TokenKind.LESS_EQUAL,
      TokenKind.GREATER,
      TokenKind.GREATER_EQUAL,
      TokenKind.EOF,
    ]);
  });

  it("skips comments and counts lines", () => {
    const tokens = scan("1 + 2 // two\n3", new Reporter(silentSink));

    expect(tokens.map(tokenToString)).toEqual(["NUMBER 1 1", "PLUS + null", "NUMBER 2 2", "NUMBER 3 3", "EOF  null"]);
    expect(tokens[3].line).toBe(2);
    expect(tokens[3].offset).toBe(13);
  });

  it("renders number literals back as the same decimal", () => {
    const cases: [string, string][] = [
      ["0", "0"],
      ["100", "100"],
      ["1.0", "1"],
      ["0.5", "0.5"],
      ["3.14159", "3.14159"],
      ["123456789.25", "123456789.25"],
    ];

    for (const [lexeme, text] of cases) {
      const [token] = scan(lexeme, new Reporter(silentSink));
      expect(token.kind).toBe(TokenKind.NUMBER);
      expect(stringify(token.literal)).toBe(text);
    }
  });

  it("reads fractional numbers but leaves a trailing dot alone", () => {
    const [frac] = scan("12.5", new Reporter(silentSink));
    expect(frac.literal).toBe(12.5);

    const tokens = scan("1.", new Reporter(silentSink));
    expect(tokens.map((t) => [t.kind, t.lexeme])).toEqual([
      [TokenKind.NUMBER, "1"],
      [TokenKind.DOT, "."],
      [TokenKind.EOF, ""],
    ]);
  });

  it("keeps the start line for strings that span lines", () => {
    const tokens = scan('"a\nb" + 1', new Reporter(silentSink));

    expect(tokens[0].kind).toBe(TokenKind.STRING);
    expect(tokens[0].literal).toBe("a\nb");
    expect(tokens[0].line).toBe(1);
    expect(tokens[1].line).toBe(2);
  });

  it("decodes escapes and keeps unknown ones verbatim", () => {
    const [tab] = scan('"tab\\t"', new Reporter(silentSink));
    expect(tab.literal).toBe("tab\t");
    expect(tab.lexeme).toBe('"tab\\t"');

    const [odd] = scan('"\\q"', new Reporter(silentSink));
    expect(odd.literal).toBe("\\q");
  });

  it("does not close a string on an escaped quote", () => {
    const reporter = new Reporter(silentSink);
    const tokens = scan('"a\\"', reporter);

    expect(tokens.map((t) => t.kind)).toEqual([TokenKind.STRING, TokenKind.EOF]);
    expect(tokens[0].literal).toBe('a"');
    expect(reporter.diagnostics.map((d) => d.code)).toEqual(["SCAN_UNTERMINATED_STRING"]);
  });

  it("reports an unterminated string and still yields a STRING token", () => {
    const lines: string[] = [];
    const reporter = new Reporter((l) => lines.push(l));
    const tokens = scan('"abc', reporter);

    expect(tokens.map((t) => t.kind)).toEqual([TokenKind.STRING, TokenKind.EOF]);
    expect(tokens[0].literal).toBe("abc");
    expect(reporter.hadError).toBe(true);
    expect(reporter.diagnostics[0]).toMatchObject({
      code: "SCAN_UNTERMINATED_STRING",
      line: 1,
      offset: 0,
      length: 4,
    });
    expect(lines).toEqual(["[line: 1] Error: Unterminated string."]);
  });

  it("reports unexpected characters and keeps scanning", () => {
    const lines: string[] = [];
    const reporter = new Reporter((l) => lines.push(l));
    const tokens = scan("1 @ 2", reporter);

    expect(tokens.map((t) => t.kind)).toEqual([TokenKind.NUMBER, TokenKind.NUMBER, TokenKind.EOF]);
    expect(lines).toEqual(["[line: 1] Error: Unexpected character '@'."]);
    expect(reporter.diagnostics[0].offset).toBe(2);
  });

  it("reports a character outside the BMP once", () => {
    const reporter = new Reporter(silentSink);
    scan("\u{1F600}", reporter);

    expect(reporter.diagnostics).toHaveLength(1);
    expect(reporter.diagnostics[0].message).toBe("Unexpected character '\u{1F600}'.");
    expect(reporter.diagnostics[0].length).toBe(2);
  });

  it("recognises keywords and attaches boolean literals", () => {
    const tokens = scan("and or nil true false foo _bar9", new Reporter(silentSink));

    expect(tokens.map((t) => t.kind)).toEqual([
      TokenKind.AND,
      TokenKind.OR,
      TokenKind.NIL,
      TokenKind.TRUE,
      TokenKind.FALSE,
      TokenKind.IDENTIFIER,
      TokenKind.IDENTIFIER,
      TokenKind.EOF,
    ]);
    expect(tokens[3].literal).toBe(true);
    expect(tokens[4].literal).toBe(false);
    expect(tokens[2].literal).toBeNull();
  });

  it("always ends with exactly one EOF", () => {
    const empty = scan("", new Reporter(silentSink));
    expect(empty).toHaveLength(1);
    expect(empty[0]).toMatchObject({ kind: TokenKind.EOF, line: 1, offset: 0 });

    const trailing = scan("1\n\n", new Reporter(silentSink));
    expect(trailing[trailing.length - 1]).toMatchObject({ kind: TokenKind.EOF, line: 3, offset: 3 });
  });
});
