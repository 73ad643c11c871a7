// src/diagnostics/errors.ts
//
// Kaleidoscope diagnostics model + helpers
// ----------------------------------------
// One shared format for:
// - Lexer errors
// - Parser errors
// - Codegen errors reported by a backend
//
// Design goals:
// - Stable rule codes (so you can filter/suppress later)
// - Range-based (offset+line+col)
// - Convenience factories + merging + sorting

import type { Position, Range } from "../core/ast";
import { isLexicalError, type LexicalError } from "../core/lexer";
import type { FrontendError, ParseError } from "../core/parser";
import type { CodegenError } from "../codegen/backend";

export type Severity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "LEX_MALFORMED_NUMBER"
  | "LEX_UNRECOGNIZED_CHARACTER"
  | "PARSE_UNEXPECTED_TOKEN"
  | "PARSE_UNEXPECTED_EOF"
  | "PARSE_UNKNOWN_OPERATOR"
  | "CODEGEN_ERROR";

export type Diagnostic = {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  range: Range;

  source?: "lexer" | "parser" | "codegen";
  hint?: string;
};

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  code: DiagnosticCode,
  message: string,
  range: Range,
  source?: Diagnostic["source"],
  hint?: string
): Diagnostic {
  return { severity, code, message, range, source, hint };
}

export function error(code: DiagnosticCode, message: string, range: Range, source?: Diagnostic["source"], hint?: string): Diagnostic {
  return diag("error", code, message, range, source, hint);
}

/* =========================================================
   Messages
   ========================================================= */

export function describeLexicalError(e: LexicalError): string {
  switch (e.kind) {
    case "MalformedNumber":
      return `Malformed number literal '${e.text}'.`;
    case "UnrecognizedCharacter":
      return `Unrecognized character '${printable(e.char)}'.`;
  }
}

export function describeParseError(e: ParseError): string {
  switch (e.kind) {
    case "UnexpectedToken":
      return `Unexpected '${e.found.lexeme}': ${e.expected}.`;
    case "UnexpectedEndOfInput":
      return `Unexpected end of input: ${e.expected}.`;
    case "UnknownOperator":
      return `Unknown binary operator '${e.op}'.`;
  }
}

export function describeError(e: FrontendError): string {
  return isLexicalError(e) ? describeLexicalError(e) : describeParseError(e);
}

/* =========================================================
   Converters
   ========================================================= */

export function fromFrontendError(e: FrontendError): Diagnostic {
  const message = describeError(e);
  switch (e.kind) {
    case "MalformedNumber":
      return error("LEX_MALFORMED_NUMBER", message, e.range, "lexer", "A number holds digits and at most one '.'.");
    case "UnrecognizedCharacter":
      return error("LEX_UNRECOGNIZED_CHARACTER", message, e.range, "lexer");
    case "UnexpectedToken":
      return error("PARSE_UNEXPECTED_TOKEN", message, e.range, "parser");
    case "UnexpectedEndOfInput":
      return error("PARSE_UNEXPECTED_EOF", message, e.range, "parser");
    case "UnknownOperator":
      return error("PARSE_UNKNOWN_OPERATOR", message, e.range, "parser", "Known operators: < > + - * /");
  }
}

export function fromCodegenError(e: CodegenError, fallback: Range): Diagnostic {
  return error("CODEGEN_ERROR", e.message, e.range ?? fallback, "codegen");
}

/* =========================================================
   Merging & sorting
   ========================================================= */

export function mergeDiagnostics(...lists: Array<Diagnostic[] | undefined>): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const l of lists) {
    if (l) out.push(...l);
  }
  return sortDiagnostics(out);
}

export function sortDiagnostics(list: Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    const ao = a.range.start.offset;
    const bo = b.range.start.offset;
    if (ao !== bo) return ao - bo;

    // severity ordering: error > warning > info
    const sa = severityRank(a.severity);
    const sb = severityRank(b.severity);
    if (sa !== sb) return sb - sa;

    return a.code.localeCompare(b.code);
  });
}

function severityRank(s: Severity): number {
  switch (s) {
    case "error":
      return 3;
    case "warning":
      return 2;
    case "info":
      return 1;
  }
}

export function dedupeDiagnostics(list: Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];

  for (const d of sortDiagnostics(list)) {
    const key = `${d.code}|${d.severity}|${d.range.start.offset}|${d.range.end.offset}|${d.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }

  return out;
}

export function hasErrors(list: Diagnostic[]): boolean {
  return list.some((d) => d.severity === "error");
}

/* =========================================================
   Pretty printing (debug)
   ========================================================= */

export function formatPosition(p: Position): string {
  return `${p.line + 1}:${p.column + 1}`;
}

export function formatDiagnostic(d: Diagnostic): string {
  const src = d.source ? ` [${d.source}]` : "";
  return `${d.severity.toUpperCase()}${src} ${d.code} @ ${formatPosition(d.range.start)}: ${d.message}`;
}

export function formatDiagnostics(list: Diagnostic[]): string {
  return sortDiagnostics(list).map(formatDiagnostic).join("\n");
}

function printable(c: string): string {
  if (c === "\n") return "\\n";
  if (c === "\t") return "\\t";
  if (c === "\r") return "\\r";
  if (c === "\0") return "\\0";
  return c;
}
