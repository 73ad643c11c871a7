import { describe, expect, it } from "vitest";

import type { Range } from "../core/ast";
import { parseSource, type FrontendError } from "../core/parser";
import { codegenError } from "../codegen/backend";
import {
  dedupeDiagnostics,
  describeError,
  error,
  diag,
  formatDiagnostic,
  formatDiagnostics,
  fromCodegenError,
  fromFrontendError,
  hasErrors,
  mergeDiagnostics,
  sortDiagnostics,
} from "./errors";

function at(offset: number, line = 0, column = offset): Range {
  return { start: { offset, line, column }, end: { offset: offset + 1, line, column: column + 1 } };
}

function failure(text: string, options: { operators?: string } = {}): FrontendError {
  const r = parseSource(text, options);
  if (r.ok) throw new Error("expected a parse failure");
  return r.error;
}

describe("describeError", () => {
  it("describes lexical errors", () => {
    expect(describeError(failure("1.4.2"))).toBe("Malformed number literal '1.4.2'.");
    expect(describeError({ kind: "UnrecognizedCharacter", char: "\t", range: at(0) })).toBe(
      "Unrecognized character '\\t'."
    );
  });

  it("describes parse errors", () => {
    expect(describeError(failure("def f x"))).toBe("Unexpected 'x': expected '(' in prototype.");
    expect(describeError(failure("foo(1"))).toBe("Unexpected end of input: expected ',' or ')' in argument list.");
    expect(describeError(failure("a ^ b", { operators: "^" }))).toBe("Unknown binary operator '^'.");
  });
});

describe("fromFrontendError", () => {
  it("maps each error to a stable code", () => {
    expect(fromFrontendError(failure("1..2"))).toEqual({
      severity: "error",
      code: "LEX_MALFORMED_NUMBER",
      message: "Malformed number literal '1..2'.",
      range: { start: { offset: 0, line: 0, column: 0 }, end: { offset: 4, line: 0, column: 4 } },
      source: "lexer",
      hint: "A number holds digits and at most one '.'.",
    });

    expect(fromFrontendError(failure("$")).code).toBe("LEX_UNRECOGNIZED_CHARACTER");
    expect(fromFrontendError(failure(")")).code).toBe("PARSE_UNEXPECTED_TOKEN");
    expect(fromFrontendError(failure("extern")).code).toBe("PARSE_UNEXPECTED_EOF");

    const unknown = fromFrontendError(failure("a ^ b", { operators: "^" }));
    expect(unknown.code).toBe("PARSE_UNKNOWN_OPERATOR");
    expect(unknown.hint).toBe("Known operators: < > + - * /");
  });
});

describe("fromCodegenError", () => {
  it("falls back to the declaration range", () => {
    const d = fromCodegenError(codegenError("boom"), at(3));
    expect(d).toMatchObject({ code: "CODEGEN_ERROR", message: "boom", source: "codegen", range: at(3) });
    expect(fromCodegenError(codegenError("boom", at(7)), at(3)).range).toEqual(at(7));
  });
});

describe("sorting and merging", () => {
  const late = error("PARSE_UNEXPECTED_TOKEN", "late", at(9));
  const earlyWarning = diag("warning", "CODEGEN_ERROR", "w", at(2));
  const earlyError = error("LEX_UNRECOGNIZED_CHARACTER", "e", at(2));

  it("orders by offset, then severity, then code", () => {
    expect(sortDiagnostics([late, earlyWarning, earlyError])).toEqual([earlyError, earlyWarning, late]);
  });

  it("merges lists and skips missing ones", () => {
    expect(mergeDiagnostics([late], undefined, [earlyError])).toEqual([earlyError, late]);
  });

  it("drops exact duplicates", () => {
    expect(dedupeDiagnostics([late, { ...late }, earlyError])).toEqual([earlyError, late]);
  });

  it("detects errors", () => {
    expect(hasErrors([earlyWarning])).toBe(false);
    expect(hasErrors([earlyWarning, late])).toBe(true);
  });
});

describe("formatDiagnostic", () => {
  it("prints one line with a 1-based position", () => {
    const d = fromFrontendError(failure("def f(x)\n  x +"));
    expect(formatDiagnostic(d)).toBe(
      "ERROR [parser] PARSE_UNEXPECTED_EOF @ 2:6: Unexpected end of input: expected primary expression."
    );
  });

  it("prints a sorted list", () => {
    const a = error("PARSE_UNEXPECTED_TOKEN", "second", at(5, 1, 0));
    const b = error("LEX_MALFORMED_NUMBER", "first", at(1));
    expect(formatDiagnostics([a, b])).toBe(
      "ERROR LEX_MALFORMED_NUMBER @ 1:2: first\nERROR PARSE_UNEXPECTED_TOKEN @ 2:1: second"
    );
  });
});
