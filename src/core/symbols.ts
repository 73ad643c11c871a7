// src/core/symbols.ts
//
// Kaleidoscope Symbols
// --------------------
// Flat outline of a parsed Program: one entry per top-level declaration, in
// source order, with the functions each body calls. Editors can show it as an
// outline; drivers can use it to check which externs a program relies on.

import type { Program, Range } from "./ast";
import { walk } from "./walk";

export type SymbolKind = "extern" | "function";

export type DeclarationSymbol = {
  name: string;
  kind: SymbolKind;
  params: string[];
  /** True for wrapped top-level expressions. */
  anonymous: boolean;
  range: Range;
  /**
   * Callee names, deduplicated, in walk order: a call's arguments are
   * reached before the call itself, so `f(g(x))` gives ["g", "f"].
   */
  calls: string[];
};

export function collectSymbols(program: Program): DeclarationSymbol[] {
  return program.body.map((decl): DeclarationSymbol => {
    if (decl.kind === "ExternDeclaration") {
      return {
        name: decl.prototype.name,
        kind: "extern",
        params: [...decl.prototype.params],
        anonymous: false,
        range: decl.range,
        calls: [],
      };
    }

    const calls = new Set<string>();
    walk(decl.function.body, (node) => {
      if (node.kind === "Call") calls.add(node.callee);
    });

    return {
      name: decl.function.prototype.name,
      kind: "function",
      params: [...decl.function.prototype.params],
      anonymous: decl.anonymous,
      range: decl.range,
      calls: [...calls],
    };
  });
}

/** Callees that no declaration in the list defines or declares. */
export function unresolvedCalls(symbols: DeclarationSymbol[]): string[] {
  const known = new Set(symbols.map((s) => s.name));
  const missing = new Set<string>();
  for (const s of symbols) {
    for (const c of s.calls) if (!known.has(c)) missing.add(c);
  }
  return [...missing];
}
