// src/core/lexer.ts
//
// Kaleidoscope Lexer (Tokenizer)
// ------------------------------
// Pulls characters from an InputCursor and produces one token per request.
//
// Syntax covered:
// - Keywords: def extern
// - Identifiers: a letter followed by letters/digits (abc, x1, fib2go)
// - Numbers: 123, 12.5, .4, 1234.  (one 64-bit float type)
// - Comments: # to end of line
// - Punctuation: ( ) ; ,
// - Operators: + - * / < >  (plus any characters added via LexerOptions.operators)
//
// Errors are values, never a failed lexer state. Every error consumes at least
// the offending character, so a caller may keep asking for tokens after one.

import type { Range } from "./ast";
import { InputCursor, type CharSource } from "./cursor";
import { err, ok, type Result } from "../utils/result";

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  // Meta
  EOF = "EOF",

  // Keywords
  DEF = "DEF",
  EXTERN = "EXTERN",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  NUMBER = "NUMBER",

  // Binary operator; the character travels in `op`
  OPERATOR = "OPERATOR",

  // Punctuation
  DELIMITER = "DELIMITER", // ;
  LPAREN = "LPAREN",
  RPAREN = "RPAREN",
  COMMA = "COMMA",
}

/* =========================================================
   Token Types
   ========================================================= */

type TokenOf<K extends TokenKind> = {
  kind: K;
  lexeme: string;
  range: Range;
};

export type SimpleToken = TokenOf<
  | TokenKind.EOF
  | TokenKind.DEF
  | TokenKind.EXTERN
  | TokenKind.DELIMITER
  | TokenKind.LPAREN
  | TokenKind.RPAREN
  | TokenKind.COMMA
>;

export type IdentifierToken = TokenOf<TokenKind.IDENTIFIER> & {
  value: string;
};

export type NumberToken = TokenOf<TokenKind.NUMBER> & {
  value: number;
};

export type OperatorToken = TokenOf<TokenKind.OPERATOR> & {
  op: string;
};

export type Token = SimpleToken | IdentifierToken | NumberToken | OperatorToken;

/* =========================================================
   Lexical errors
   ========================================================= */

export type MalformedNumber = {
  kind: "MalformedNumber";
  /** Exact literal text scanned, e.g. "1.4.2". */
  text: string;
  range: Range;
};

export type UnrecognizedCharacter = {
  kind: "UnrecognizedCharacter";
  char: string;
  range: Range;
};

export type LexicalError = MalformedNumber | UnrecognizedCharacter;

export type LexResult = Result<Token, LexicalError>;

export function isLexicalError(value: { kind: string }): value is LexicalError {
  return value.kind === "MalformedNumber" || value.kind === "UnrecognizedCharacter";
}

/* =========================================================
   Lexer Options
   ========================================================= */

export const DEFAULT_OPERATORS = "+-*/<>";

export type LexerOptions = {
  /**
   * Extra single-character operators on top of DEFAULT_OPERATORS.
   * Characters for which canBeOperator() is false are ignored.
   */
  operators?: string;
};

// Punctuation, number and comment characters
const RESERVED_CHARS: ReadonlySet<string> = new Set(["(", ")", ",", ";", "#", "."]);

/** False for letters, digits, whitespace and characters with a fixed meaning. */
export function canBeOperator(c: string): boolean {
  return Array.from(c).length === 1 && !/[\p{L}\p{N}\s]/u.test(c) && !RESERVED_CHARS.has(c);
}

/** Anything that hands out tokens one at a time. */
export interface TokenSource {
  next(): LexResult;
}

export type TokenizeResult = {
  tokens: Token[];
  errors: LexicalError[];
};

/* =========================================================
   Core Lexer
   ========================================================= */

export class Lexer implements TokenSource, Iterable<LexResult> {
  private readonly cursor: InputCursor;
  private readonly operators: ReadonlySet<string>;

  constructor(source: InputCursor | CharSource | string, options: LexerOptions = {}) {
    this.cursor = source instanceof InputCursor ? source : new InputCursor(source);
    this.operators = new Set(Array.from(DEFAULT_OPERATORS + (options.operators ?? "")).filter(canBeOperator));
  }

  /**
   * Produces the next token or lexical error. Once the input is exhausted,
   * every call returns an EOF token.
   */
  public next(): LexResult {
    this.skipTrivia();

    const c = this.cursor.current();
    const start = this.cursor.position();

    if (c === null) {
      return ok({ kind: TokenKind.EOF, lexeme: "", range: { start, end: start } });
    }

    switch (c) {
      case "(":
        return ok(this.single(TokenKind.LPAREN));
      case ")":
        return ok(this.single(TokenKind.RPAREN));
      case ";":
        return ok(this.single(TokenKind.DELIMITER));
      case ",":
        return ok(this.single(TokenKind.COMMA));
    }

    if (this.operators.has(c)) {
      this.cursor.advance();
      return ok({ kind: TokenKind.OPERATOR, lexeme: c, op: c, range: { start, end: this.cursor.position() } });
    }

    if (isLetter(c)) return ok(this.lexIdentifierOrKeyword());

    if (isDigit(c) || c === ".") return this.lexNumber();

    this.cursor.advance();
    return err({ kind: "UnrecognizedCharacter", char: c, range: { start, end: this.cursor.position() } });
  }

  /** Yields every token and error up to, not including, EOF. */
  public *[Symbol.iterator](): Iterator<LexResult> {
    for (;;) {
      const r = this.next();
      if (r.ok && r.value.kind === TokenKind.EOF) return;
      yield r;
    }
  }

  /* =========================================================
     Trivia
     ========================================================= */

  private skipTrivia(): void {
    for (;;) {
      let c = this.cursor.current();
      while (c !== null && isWhitespace(c)) c = this.cursor.advance();

      if (c !== "#") return;

      // comment runs through the end of the line, newline included
      while (c !== null && c !== "\n") c = this.cursor.advance();
      this.cursor.advance();
    }
  }

  /* =========================================================
     Tokens
     ========================================================= */

  private single(kind: SimpleToken["kind"]): SimpleToken {
    const start = this.cursor.position();
    const lexeme = this.cursor.current() ?? "";
    this.cursor.advance();
    return { kind, lexeme, range: { start, end: this.cursor.position() } };
  }

  private lexIdentifierOrKeyword(): Token {
    const start = this.cursor.position();
    let text = "";

    let c = this.cursor.current();
    while (c !== null && (isLetter(c) || isDigit(c))) {
      text += c;
      c = this.cursor.advance();
    }

    const range = { start, end: this.cursor.position() };

    const kw = keywordKind(text);
    if (kw) return { kind: kw, lexeme: text, range };

    return { kind: TokenKind.IDENTIFIER, lexeme: text, value: text, range };
  }

  private lexNumber(): LexResult {
    const start = this.cursor.position();
    let text = "";
    let dots = 0;

    // Take the whole run of digits and dots; judge it afterwards so the
    // error can name the full literal.
    let c = this.cursor.current();
    while (c !== null && (isDigit(c) || c === ".")) {
      if (c === ".") dots++;
      text += c;
      c = this.cursor.advance();
    }

    const range = { start, end: this.cursor.position() };
    const value = Number(text);

    if (dots > 1 || !Number.isFinite(value)) {
      return err({ kind: "MalformedNumber", text, range });
    }

    return ok({ kind: TokenKind.NUMBER, lexeme: text, value, range });
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

/** Lexes a whole buffered input, splitting tokens from errors. EOF is not included. */
export function tokenize(source: string | CharSource, options?: LexerOptions): TokenizeResult {
  const tokens: Token[] = [];
  const errors: LexicalError[] = [];

  for (const r of new Lexer(source, options)) {
    if (r.ok) tokens.push(r.value);
    else errors.push(r.error);
  }

  return { tokens, errors };
}

/* =========================================================
   Keyword map
   ========================================================= */

function keywordKind(text: string): TokenKind.DEF | TokenKind.EXTERN | null {
  switch (text) {
    case "def":
      return TokenKind.DEF;
    case "extern":
      return TokenKind.EXTERN;
    default:
      return null;
  }
}

/* =========================================================
   Character utilities
   ========================================================= */

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isLetter(c: string): boolean {
  return /^\p{L}$/u.test(c);
}

function isWhitespace(c: string): boolean {
  return /^\s$/.test(c);
}
