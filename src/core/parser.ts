// src/core/parser.ts
//
// Kaleidoscope Parser
// -------------------
// Turns a token stream (src/core/token-stream.ts) into an AST (src/core/ast.ts).
//
// - Recursive descent for declarations and primaries
// - Precedence climbing for binary operators (fixed table below)
// - Stops at the first error. Resynchronizing (e.g. skipping to the next ';')
//   is left to the caller; see src/language/kaleidoscope.language.ts.
//
// Grammar (comma-separated lists):
//
//   program    := (topLevel)*
//   topLevel   := "def" prototype expression | "extern" prototype | ";" | expression
//   prototype  := ident "(" [ident ("," ident)*] ")"
//   expression := primary (binop primary)*
//   primary    := ident ["(" [expression ("," expression)*] ")"] | number | "(" expression ")"
//
// Exports:
//   - parseSource(source, options?): Result<Program, FrontendError>
//   - parseTokens(tokens, options?): Result<Program, FrontendError>
//   - Parser class (declaration-at-a-time parsing)

import {
  declarationName,
  mergeRanges,
  type Program,
  type TopLevel,
  type ExternDeclaration,
  type FunctionDefinition,
  type FunctionNode,
  type Prototype,
  type Expression,
  type BinaryOp,
  type Call,
  type NumberLiteral,
  type VariableReference,
  type Range,
} from "./ast";

import type { CharSource } from "./cursor";
import {
  Lexer,
  TokenKind,
  type IdentifierToken,
  type LexerOptions,
  type LexicalError,
  type OperatorToken,
  type Token,
  type TokenSource,
} from "./lexer";
import { TokenStream, arrayTokenSource } from "./token-stream";
import { silentLogger, type Logger } from "../utils/logger";
import { err, ok, type Result } from "../utils/result";

/* =========================================================
   Parse errors
   ========================================================= */

export type UnexpectedToken = {
  kind: "UnexpectedToken";
  found: Token;
  /** Human-readable expectation, e.g. "expected ')' after expression". */
  expected: string;
  range: Range;
};

export type UnexpectedEndOfInput = {
  kind: "UnexpectedEndOfInput";
  expected: string;
  range: Range;
};

export type UnknownOperator = {
  kind: "UnknownOperator";
  op: string;
  range: Range;
};

export type ParseError = UnexpectedToken | UnexpectedEndOfInput | UnknownOperator;

/** Anything that can stop a parse: a lexical error met in the stream or a syntax error. */
export type FrontendError = LexicalError | ParseError;

export function isParseError(value: { kind: string }): value is ParseError {
  return value.kind === "UnexpectedToken" || value.kind === "UnexpectedEndOfInput" || value.kind === "UnknownOperator";
}

/* =========================================================
   Operator precedence
   ========================================================= */

/** Higher binds tighter. All operators are left-associative. */
export const BINARY_PRECEDENCE: ReadonlyMap<string, number> = new Map([
  ["<", 10],
  [">", 10],
  ["+", 20],
  ["-", 20],
  ["*", 40],
  ["/", 40],
]);

export function binaryPrecedence(op: string): number | undefined {
  return BINARY_PRECEDENCE.get(op);
}

/* =========================================================
   Options
   ========================================================= */

export const DEFAULT_ANONYMOUS_PREFIX = "__anon_expr";

export const DEFAULT_MAX_NESTING_DEPTH = 512;

export type ParserOptions = {
  /**
   * Prefix of the names given to wrapped top-level expressions
   * (`<prefix>_1`, `<prefix>_2`, ...). Default: "__anon_expr"
   */
  anonymousPrefix?: string;
  /**
   * Parentheses and call argument lists may nest this deep; one level more
   * is reported as an error. Default: 512
   */
  maxNestingDepth?: number;
  /** Receives a trace line per parsed declaration. */
  logger?: Logger;
};

export type ParseOptions = ParserOptions & LexerOptions;

/* =========================================================
   Public helpers
   ========================================================= */

export function parseSource(source: string | CharSource, options: ParseOptions = {}): Result<Program, FrontendError> {
  const lexer = new Lexer(source, { operators: options.operators });
  return new Parser(lexer, options).parseProgram();
}

/** Parses a fixed token array; the array may be parsed again with the same outcome. */
export function parseTokens(tokens: readonly Token[], options: ParserOptions = {}): Result<Program, FrontendError> {
  return new Parser(arrayTokenSource(tokens), options).parseProgram();
}

/* =========================================================
   Parser
   ========================================================= */

// Unwinds from deep inside the descent to the public method that started it.
class ParseAbort extends Error {
  constructor(public readonly error: FrontendError) {
    super(error.kind);
  }
}

export class Parser {
  public readonly tokens: TokenStream;

  private readonly anonymousPrefix: string;
  private readonly logger: Logger;
  private readonly maxNestingDepth: number;
  private anonymousCount = 0;
  private depth = 0;

  constructor(source: TokenStream | TokenSource, options: ParserOptions = {}) {
    this.tokens = source instanceof TokenStream ? source : new TokenStream(source);
    this.anonymousPrefix = options.anonymousPrefix || DEFAULT_ANONYMOUS_PREFIX;
    this.maxNestingDepth = depthLimit(options.maxNestingDepth);
    this.logger = options.logger ?? silentLogger;
  }

  /* =========================================================
     Top-level
     ========================================================= */

  /** Parses every remaining declaration up to EOF. */
  public parseProgram(): Result<Program, FrontendError> {
    return this.guard((): Program => {
      const start = this.current().range.start;
      const body: TopLevel[] = [];

      for (;;) {
        const decl = this.topLevel();
        if (!decl) break;
        body.push(decl);
      }

      return { kind: "Program", range: { start, end: this.current().range.end }, body };
    });
  }

  /**
   * Parses one declaration. Bare ';' are skipped; null means EOF.
   * The token that ends the declaration is left in the stream.
   */
  public parseTopLevel(): Result<TopLevel | null, FrontendError> {
    return this.guard(() => this.topLevel());
  }

  /** Parses a single expression starting at the current token. */
  public parseExpression(): Result<Expression, FrontendError> {
    return this.guard(() => this.expression());
  }

  private topLevel(): TopLevel | null {
    while (this.is(TokenKind.DELIMITER)) this.tokens.advance();

    const t = this.current();
    let decl: TopLevel;

    switch (t.kind) {
      case TokenKind.EOF:
        return null;
      case TokenKind.DEF:
        decl = this.definition(t);
        break;
      case TokenKind.EXTERN:
        decl = this.externDeclaration(t);
        break;
      default:
        decl = this.topLevelExpression();
        break;
    }

    this.logger.trace(`parsed ${decl.kind}`, { name: declarationName(decl) });
    return decl;
  }

  private definition(defTok: Token): FunctionDefinition {
    this.tokens.advance(); // def

    const prototype = this.prototype();
    const body = this.expression();

    const fn: FunctionNode = {
      kind: "Function",
      range: mergeRanges(prototype.range, body.range),
      prototype,
      body,
    };

    return {
      kind: "FunctionDefinition",
      range: { start: defTok.range.start, end: body.range.end },
      function: fn,
      anonymous: false,
    };
  }

  private externDeclaration(externTok: Token): ExternDeclaration {
    this.tokens.advance(); // extern

    const prototype = this.prototype();
    return {
      kind: "ExternDeclaration",
      range: { start: externTok.range.start, end: prototype.range.end },
      prototype,
    };
  }

  // A bare expression becomes the body of a fresh nullary function so codegen
  // can compile and run it like any other definition.
  private topLevelExpression(): FunctionDefinition {
    const body = this.expression();
    this.anonymousCount++;

    const at = body.range.start;
    const prototype: Prototype = {
      kind: "Prototype",
      range: { start: at, end: at },
      name: `${this.anonymousPrefix}_${this.anonymousCount}`,
      params: [],
    };

    return {
      kind: "FunctionDefinition",
      range: body.range,
      function: { kind: "Function", range: body.range, prototype, body },
      anonymous: true,
    };
  }

  private prototype(): Prototype {
    const nameTok = this.expectIdentifier("expected function name in prototype");
    this.expect(TokenKind.LPAREN, "expected '(' in prototype");

    const params: string[] = [];
    if (!this.is(TokenKind.RPAREN)) {
      do {
        params.push(this.expectIdentifier("expected parameter name in prototype").value);
      } while (this.eat(TokenKind.COMMA));
    }

    const close = this.expect(TokenKind.RPAREN, "expected ',' or ')' in prototype");

    return {
      kind: "Prototype",
      range: { start: nameTok.range.start, end: close.range.end },
      name: nameTok.value,
      params,
    };
  }

  /* =========================================================
     Expressions (precedence climbing)
     ========================================================= */

  private expression(): Expression {
    const lhs = this.primary();
    return this.binOpRhs(0, lhs);
  }

  private binOpRhs(minPrecedence: number, lhs: Expression): Expression {
    for (;;) {
      const opTok = this.currentOperator();
      if (!opTok) return lhs;

      const precedence = this.precedenceOf(opTok);
      if (precedence < minPrecedence) return lhs;

      this.tokens.advance(); // operator

      let rhs = this.primary();

      // A tighter operator after rhs takes rhs as its own left operand first.
      const nextTok = this.currentOperator();
      if (nextTok && this.precedenceOf(nextTok) > precedence) {
        rhs = this.binOpRhs(precedence + 1, rhs);
      }

      const node: BinaryOp = {
        kind: "BinaryOp",
        range: mergeRanges(lhs.range, rhs.range),
        op: opTok.op,
        left: lhs,
        right: rhs,
      };
      lhs = node;
    }
  }

  private primary(): Expression {
    const t = this.current();

    switch (t.kind) {
      case TokenKind.IDENTIFIER:
        return this.identifierExpression(t);
      case TokenKind.NUMBER: {
        this.tokens.advance();
        const lit: NumberLiteral = { kind: "NumberLiteral", range: t.range, value: t.value };
        return lit;
      }
      case TokenKind.LPAREN:
        return this.parenExpression(t);
      default:
        throw this.unexpected(t, "expected primary expression");
    }
  }

  private parenExpression(open: Token): Expression {
    this.tokens.advance(); // (
    const inner = this.nested(open, () => this.expression());
    const close = this.expect(TokenKind.RPAREN, "expected ')' after expression");
    // widen range to include the parentheses
    return { ...inner, range: { start: open.range.start, end: close.range.end } };
  }

  private identifierExpression(nameTok: IdentifierToken): Expression {
    this.tokens.advance(); // identifier

    if (!this.is(TokenKind.LPAREN)) {
      const ref: VariableReference = { kind: "VariableReference", range: nameTok.range, name: nameTok.value };
      return ref;
    }

    this.tokens.advance(); // (

    const args: Expression[] = [];
    if (!this.is(TokenKind.RPAREN)) {
      this.nested(nameTok, () => {
        do {
          args.push(this.expression());
        } while (this.eat(TokenKind.COMMA));
      });
    }

    const close = this.expect(TokenKind.RPAREN, "expected ',' or ')' in argument list");

    const call: Call = {
      kind: "Call",
      range: { start: nameTok.range.start, end: close.range.end },
      callee: nameTok.value,
      args,
    };
    return call;
  }

  /* =========================================================
     Utilities
     ========================================================= */

  private guard<T>(fn: () => T): Result<T, FrontendError> {
    try {
      return ok(fn());
    } catch (e: unknown) {
      if (e instanceof ParseAbort) return err(e.error);
      throw e;
    }
  }

  // Expressions recurse through primary(); the cap keeps a deep source from
  // exhausting the call stack.
  private nested<T>(at: Token, fn: () => T): T {
    if (this.depth >= this.maxNestingDepth) {
      throw new ParseAbort({ kind: "UnexpectedToken", found: at, expected: "expression nested too deeply", range: at.range });
    }

    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  /** Current token; a lexical error in its place aborts the parse. */
  private current(): Token {
    const r = this.tokens.current();
    if (!r.ok) throw new ParseAbort(r.error);
    return r.value;
  }

  private currentOperator(): OperatorToken | null {
    const t = this.current();
    return t.kind === TokenKind.OPERATOR ? t : null;
  }

  private precedenceOf(t: OperatorToken): number {
    const p = binaryPrecedence(t.op);
    if (p === undefined) throw new ParseAbort({ kind: "UnknownOperator", op: t.op, range: t.range });
    return p;
  }

  private is(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private eat(kind: TokenKind): boolean {
    if (!this.is(kind)) return false;
    this.tokens.advance();
    return true;
  }

  private expect(kind: TokenKind, expected: string): Token {
    const t = this.current();
    if (t.kind !== kind) throw this.unexpected(t, expected);
    this.tokens.advance();
    return t;
  }

  private expectIdentifier(expected: string): IdentifierToken {
    const t = this.current();
    if (t.kind !== TokenKind.IDENTIFIER) throw this.unexpected(t, expected);
    this.tokens.advance();
    return t;
  }

  private unexpected(t: Token, expected: string): ParseAbort {
    if (t.kind === TokenKind.EOF) {
      return new ParseAbort({ kind: "UnexpectedEndOfInput", expected, range: t.range });
    }
    return new ParseAbort({ kind: "UnexpectedToken", found: t, expected, range: t.range });
  }
}

function depthLimit(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_MAX_NESTING_DEPTH;
  return Math.max(1, Math.floor(value));
}
