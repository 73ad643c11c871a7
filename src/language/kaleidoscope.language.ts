// src/language/kaleidoscope.language.ts
//
// Kaleidoscope language service
// -----------------------------
// A single entrypoint that runs the front end over a source and returns
// everything an editor or driver needs:
//
//   source -> Lexer -> Parser (declaration by declaration) -> Symbols
//
// Unlike parseSource(), which stops at the first error, this keeps going:
// after an error it skips to the next ';' and resumes, so one pass reports
// every broken declaration and still returns the good ones.
//
// Exports:
//   - analyzeSource(source, options?)
//   - analyzeText(text, options?)
//   - AnalyzeOptions / AnalyzeResult

import type { Program, TopLevel } from "../core/ast";
import type { CharSource } from "../core/cursor";
import { Lexer, TokenKind } from "../core/lexer";
import { Parser } from "../core/parser";
import { collectSymbols, unresolvedCalls, type DeclarationSymbol } from "../core/symbols";
import type { TokenStream } from "../core/token-stream";
import { fromFrontendError, hasErrors, type Diagnostic } from "../diagnostics/errors";
import { silentLogger, type Logger } from "../utils/logger";

/* =========================================================
   Public types
   ========================================================= */

export const DEFAULT_MAX_ERRORS = 25;

export type AnalyzeOptions = {
  // Extra single-character operators for the lexer
  operators?: string;
  // Prefix for wrapped top-level expressions
  anonymousPrefix?: string;
  // Deepest nesting of parentheses / call arguments. Default: 512
  maxNestingDepth?: number;
  // Skip to the next ';' after an error and keep parsing. Default: true
  recover?: boolean;
  // Stop after this many errors. Default: 25
  maxErrors?: number;
  logger?: Logger;
};

export type AnalyzeTimings = {
  parseMs: number;
  totalMs: number;
};

export type AnalyzeResult = {
  ok: boolean;
  // Every declaration that parsed, in source order
  program: Program;
  diagnostics: Diagnostic[];
  symbols: DeclarationSymbol[];
  // Callees that no declaration in this source provides
  unresolvedCalls: string[];
  timings: AnalyzeTimings;
};

/** At least 1; anything that is not a finite number means the default. */
export function normalizeMaxErrors(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return DEFAULT_MAX_ERRORS;
  return Math.max(1, Math.floor(value));
}

/* =========================================================
   Main entrypoint
   ========================================================= */

export function analyzeText(text: string, options: AnalyzeOptions = {}): AnalyzeResult {
  return analyzeSource(text, options);
}

export function analyzeSource(source: CharSource | string, options: AnalyzeOptions = {}): AnalyzeResult {
  const log = options.logger ?? silentLogger;
  const recover = options.recover ?? true;
  const maxErrors = normalizeMaxErrors(options.maxErrors);

  const total = log.time("analyze");

  // -------- PARSE --------
  const parseTimer = log.time("parse");
  const lexer = new Lexer(source, { operators: options.operators });
  const parser = new Parser(lexer, {
    anonymousPrefix: options.anonymousPrefix,
    maxNestingDepth: options.maxNestingDepth,
    logger: log,
  });

  const start = parser.tokens.current();
  const body: TopLevel[] = [];
  const diagnostics: Diagnostic[] = [];

  while (diagnostics.length < maxErrors) {
    const r = parser.parseTopLevel();

    if (r.ok) {
      if (r.value === null) break;
      body.push(r.value);
      continue;
    }

    diagnostics.push(fromFrontendError(r.error));
    if (!recover) break;
    skipToDelimiter(parser.tokens);
  }

  const end = parser.tokens.current();
  const program: Program = {
    kind: "Program",
    range: {
      start: start.ok ? start.value.range.start : start.error.range.start,
      end: end.ok ? end.value.range.end : end.error.range.end,
    },
    body,
  };
  const parseMs = parseTimer.end({ declarations: body.length, errors: diagnostics.length });

  // -------- SYMBOLS --------
  const symbols = collectSymbols(program);
  const missing = unresolvedCalls(symbols);

  const totalMs = total.end();

  return {
    ok: !hasErrors(diagnostics),
    program,
    diagnostics,
    symbols,
    unresolvedCalls: missing,
    timings: { parseMs, totalMs },
  };
}

/* =========================================================
   Recovery
   ========================================================= */

/** Drops tokens and lexical errors through the next ';', or up to EOF. */
function skipToDelimiter(tokens: TokenStream): void {
  for (;;) {
    const item = tokens.current();
    if (item.ok && item.value.kind === TokenKind.EOF) return;

    tokens.advance();
    if (item.ok && item.value.kind === TokenKind.DELIMITER) return;
  }
}
