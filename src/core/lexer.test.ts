import { describe, expect, it } from "vitest";

import { iterableSource } from "./cursor";
import { canBeOperator, Lexer, TokenKind, tokenize, type Token } from "./lexer";

function kinds(tokens: Token[]): TokenKind[] {
  return tokens.map((t) => t.kind);
}

describe("tokenize", () => {
  it("produces nothing for whitespace and comments", () => {
    const r = tokenize("  \t\n# a comment ( ) def\n   # another\n\n");
    expect(r.tokens).toEqual([]);
    expect(r.errors).toEqual([]);
  });

  it("produces nothing for empty input", () => {
    expect(tokenize("")).toEqual({ tokens: [], errors: [] });
  });

  it("reads numbers with optional leading or trailing dot", () => {
    const r = tokenize("123 12 .4 1234. 12345.6");
    expect(r.errors).toEqual([]);
    expect(r.tokens.map((t) => (t.kind === TokenKind.NUMBER ? t.value : null))).toEqual([
      123, 12, 0.4, 1234, 12345.6,
    ]);
  });

  it("reports a number with two dots as one malformed literal", () => {
    const r = tokenize("1.4.2");
    expect(r.tokens).toEqual([]);
    expect(r.errors).toEqual([
      {
        kind: "MalformedNumber",
        text: "1.4.2",
        range: { start: { offset: 0, line: 0, column: 0 }, end: { offset: 5, line: 0, column: 5 } },
      },
    ]);
  });

  it("reports a lone dot as malformed", () => {
    const r = tokenize(". 1");
    expect(r.errors).toHaveLength(1);
    expect(r.errors[0]).toMatchObject({ kind: "MalformedNumber", text: "." });
    expect(r.tokens).toMatchObject([{ kind: TokenKind.NUMBER, value: 1 }]);
  });

  it("classifies keywords, punctuation and operators", () => {
    const r = tokenize("def extern ; ( ) , + - *");
    expect(r.errors).toEqual([]);
    expect(kinds(r.tokens)).toEqual([
      TokenKind.DEF,
      TokenKind.EXTERN,
      TokenKind.DELIMITER,
      TokenKind.LPAREN,
      TokenKind.RPAREN,
      TokenKind.COMMA,
      TokenKind.OPERATOR,
      TokenKind.OPERATOR,
      TokenKind.OPERATOR,
    ]);
    expect(r.tokens.slice(6).map((t) => (t.kind === TokenKind.OPERATOR ? t.op : null))).toEqual(["+", "-", "*"]);
  });

  it("reads identifiers made of letters and digits", () => {
    const r = tokenize("x1 fib2go définir defx");
    expect(r.tokens.map((t) => (t.kind === TokenKind.IDENTIFIER ? t.value : t.kind))).toEqual([
      "x1",
      "fib2go",
      "définir",
      "defx",
    ]);
  });

  it("splits a number followed by letters", () => {
    const r = tokenize("2x");
    expect(r.tokens).toMatchObject([
      { kind: TokenKind.NUMBER, value: 2 },
      { kind: TokenKind.IDENTIFIER, value: "x" },
    ]);
  });

  it("does not treat '_' as part of an identifier", () => {
    const r = tokenize("a_b");
    expect(r.tokens).toMatchObject([
      { kind: TokenKind.IDENTIFIER, value: "a" },
      { kind: TokenKind.IDENTIFIER, value: "b" },
    ]);
    expect(r.errors).toMatchObject([{ kind: "UnrecognizedCharacter", char: "_" }]);
  });

  it("keeps lexing after an unrecognized character", () => {
    const r = tokenize("a $ b");
    expect(r.errors).toEqual([
      {
        kind: "UnrecognizedCharacter",
        char: "$",
        range: { start: { offset: 2, line: 0, column: 2 }, end: { offset: 3, line: 0, column: 3 } },
      },
    ]);
    expect(r.tokens.map((t) => t.lexeme)).toEqual(["a", "b"]);
  });

  it("ends a comment at the newline", () => {
    const r = tokenize("# note\nfoo # trailing\nbar");
    expect(r.tokens.map((t) => t.lexeme)).toEqual(["foo", "bar"]);
    expect(r.tokens[1].range.start).toEqual({ offset: 22, line: 2, column: 0 });
  });

  it("records token ranges", () => {
    const r = tokenize("def f(x)");
    expect(r.tokens[1]).toEqual({
      kind: TokenKind.IDENTIFIER,
      lexeme: "f",
      value: "f",
      range: { start: { offset: 4, line: 0, column: 4 }, end: { offset: 5, line: 0, column: 5 } },
    });
  });

  it("accepts extra operator characters", () => {
    const plain = tokenize("a % b");
    expect(plain.errors).toMatchObject([{ kind: "UnrecognizedCharacter", char: "%" }]);

    const extended = tokenize("a % b", { operators: "%" });
    expect(extended.errors).toEqual([]);
    expect(extended.tokens[1]).toMatchObject({ kind: TokenKind.OPERATOR, op: "%" });
  });

  it("ignores extra operators that would shadow other tokens", () => {
    const r = tokenize("x + .4 (a, b); # c", { operators: "x.(,;#9 %" });
    expect(r.errors).toEqual([]);
    expect(kinds(r.tokens)).toEqual([
      TokenKind.IDENTIFIER,
      TokenKind.OPERATOR,
      TokenKind.NUMBER,
      TokenKind.LPAREN,
      TokenKind.IDENTIFIER,
      TokenKind.COMMA,
      TokenKind.IDENTIFIER,
      TokenKind.RPAREN,
      TokenKind.DELIMITER,
    ]);
    expect(r.tokens[2]).toMatchObject({ value: 0.4 });
  });

  it("reads from chunked sources", () => {
    const r = tokenize(iterableSource(["de", "f fo", "o(1", "2.5)"]));
    expect(r.tokens.map((t) => t.lexeme)).toEqual(["def", "foo", "(", "12.5", ")"]);
  });
});

describe("Lexer", () => {
  it("returns EOF repeatedly after the input ends", () => {
    const lexer = new Lexer("x");
    const first = lexer.next();
    expect(first.ok && first.value.kind).toBe(TokenKind.IDENTIFIER);

    for (let i = 0; i < 3; i++) {
      const r = lexer.next();
      expect(r).toEqual({
        ok: true,
        value: {
          kind: TokenKind.EOF,
          lexeme: "",
          range: { start: { offset: 1, line: 0, column: 1 }, end: { offset: 1, line: 0, column: 1 } },
        },
      });
    }
  });

  it("iterates up to but not including EOF", () => {
    const items = [...new Lexer("a ; ?")];
    expect(items).toHaveLength(3);
    expect(items.map((r) => r.ok)).toEqual([true, true, false]);
  });
});

describe("canBeOperator", () => {
  it("accepts symbols and rejects characters with another meaning", () => {
    expect(["%", "&", "^", "|", "=", "!"].every(canBeOperator)).toBe(true);
    expect(["a", "é", "7", " ", "\n", "(", ")", ",", ";", "#", ".", "", "%%"].some(canBeOperator)).toBe(false);
  });
});
