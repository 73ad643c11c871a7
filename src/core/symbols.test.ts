import { describe, expect, it } from "vitest";

import type { AstNode, Program } from "./ast";
import { parseSource } from "./parser";
import { collectSymbols, unresolvedCalls } from "./symbols";
import { childrenOf, walk } from "./walk";

function parseOk(text: string): Program {
  const r = parseSource(text);
  if (!r.ok) throw new Error(`unexpected parse failure: ${r.error.kind}`);
  return r.value;
}

function label(node: AstNode): string {
  switch (node.kind) {
    case "NumberLiteral":
      return String(node.value);
    case "VariableReference":
      return node.name;
    case "BinaryOp":
      return node.op;
    case "Call":
      return `${node.callee}()`;
    case "Prototype":
      return `proto ${node.name}`;
    default:
      return node.kind;
  }
}

describe("walk", () => {
  it("visits children before parents, left to right", () => {
    const visited: string[] = [];
    walk(parseOk("def f(a) g(a, 1) + 2"), (n) => visited.push(label(n)));
    expect(visited).toEqual([
      "proto f",
      "a",
      "1",
      "g()",
      "2",
      "+",
      "Function",
      "FunctionDefinition",
      "Program",
    ]);
  });

  it("visits a single node", () => {
    const program = parseOk("");
    const visited: string[] = [];
    walk(program, (n) => visited.push(n.kind));
    expect(visited).toEqual(["Program"]);
  });

  it("walks deep left-nested chains", () => {
    const text = Array.from({ length: 5000 }, () => "1").join(" - ");
    let literals = 0;
    walk(parseOk(text), (n) => {
      if (n.kind === "NumberLiteral") literals++;
    });
    expect(literals).toBe(5000);
  });

  it("lists direct children", () => {
    const decl = parseOk("extern sin(x)").body[0];
    expect(childrenOf(decl).map((n) => n.kind)).toEqual(["Prototype"]);
  });
});

describe("collectSymbols", () => {
  const program = parseOk(`
    extern sin(x)
    def twice(f) f * 2
    def wave(t) sin(t) + twice(sin(t)) + cos(t)
    wave(1)
  `);

  it("lists one entry per declaration", () => {
    const symbols = collectSymbols(program);
    expect(symbols.map((s) => [s.name, s.kind, s.params, s.anonymous])).toEqual([
      ["sin", "extern", ["x"], false],
      ["twice", "function", ["f"], false],
      ["wave", "function", ["t"], false],
      ["__anon_expr_1", "function", [], true],
    ]);
  });

  it("records deduplicated callees in walk order", () => {
    const symbols = collectSymbols(program);
    expect(symbols.map((s) => s.calls)).toEqual([[], [], ["sin", "twice", "cos"], ["wave"]]);
  });

  it("finds callees with no declaration", () => {
    expect(unresolvedCalls(collectSymbols(program))).toEqual(["cos"]);
  });

  it("uses declaration ranges", () => {
    const symbols = collectSymbols(program);
    expect(symbols[0].range).toEqual(program.body[0].range);
  });
});
