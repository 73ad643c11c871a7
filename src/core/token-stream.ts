// src/core/token-stream.ts
//
// Two-token window (current + one ahead) between a token source and the parser.
// Items are fetched lazily, so an interactive lexer is only asked for a token
// when the parser actually looks at it.

import { UNKNOWN_RANGE } from "./ast";
import { TokenKind, type LexResult, type Token, type TokenSource } from "./lexer";
import { ok } from "../utils/result";

export class TokenStream {
  private cur: LexResult | undefined;
  private ahead: LexResult | undefined;

  constructor(private readonly source: TokenSource) {}

  public current(): LexResult {
    if (this.cur === undefined) this.cur = this.source.next();
    return this.cur;
  }

  public peek(): LexResult {
    this.current();
    if (this.ahead === undefined) this.ahead = this.source.next();
    return this.ahead;
  }

  /** Drops the current item; the next one is fetched on demand. */
  public advance(): void {
    this.current();
    this.cur = this.ahead;
    this.ahead = undefined;
  }

  /** True when the current item is the EOF token. */
  public isAtEnd(): boolean {
    const c = this.current();
    return c.ok && c.value.kind === TokenKind.EOF;
  }
}

/**
 * Serves a fixed token array. A trailing EOF is synthesized when the array
 * has none; the array itself is left untouched.
 */
export function arrayTokenSource(tokens: readonly Token[]): TokenSource {
  let index = 0;
  const last = tokens.length > 0 ? tokens[tokens.length - 1] : undefined;
  const endPos = last ? last.range.end : UNKNOWN_RANGE.end;
  const eof: Token = { kind: TokenKind.EOF, lexeme: "", range: { start: endPos, end: endPos } };

  return {
    next(): LexResult {
      if (index >= tokens.length) return ok(eof);
      const t = tokens[index];
      // nothing after an explicit EOF is ever served
      index = t.kind === TokenKind.EOF ? tokens.length : index + 1;
      return ok(t);
    },
  };
}
