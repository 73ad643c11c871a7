// src/core/ast.ts
//
// Kaleidoscope AST (Abstract Syntax Tree)
// ---------------------------------------
// Canonical tree produced by the parser and consumed by codegen:
//
//   CharSource -> InputCursor -> Lexer -> TokenStream -> Parser -> AST (this file)
//
// Nodes are plain data. Every parent exclusively owns its children; there are
// no back-references and no node is shared between two parents. The parser
// never touches a node again once it has been returned.

export type Integer = number;

/* =========================================================
   Source locations
   ========================================================= */

export type Position = {
  /** Characters (code points) read before this position. */
  offset: Integer;
  /** Line index (0-based). */
  line: Integer;
  /** Column index (0-based). */
  column: Integer;
};

export type Range = {
  start: Position;
  /** Exclusive. */
  end: Position;
};

export const UNKNOWN_POSITION: Position = Object.freeze({
  offset: 0,
  line: 0,
  column: 0,
});

export const UNKNOWN_RANGE: Range = Object.freeze({
  start: UNKNOWN_POSITION,
  end: UNKNOWN_POSITION,
});

export function clonePosition(p: Position): Position {
  return { offset: p.offset, line: p.line, column: p.column };
}

/** Smallest range covering both. */
export function mergeRanges(a: Range, b: Range): Range {
  const start = a.start.offset <= b.start.offset ? a.start : b.start;
  const end = a.end.offset >= b.end.offset ? a.end : b.end;
  return { start: clonePosition(start), end: clonePosition(end) };
}

/* =========================================================
   Node kinds
   ========================================================= */

export const NODE_KINDS = [
  "Program",
  "ExternDeclaration",
  "FunctionDefinition",
  "Function",
  "Prototype",

  // Expressions
  "NumberLiteral",
  "VariableReference",
  "BinaryOp",
  "Call",
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type NodeBase = {
  kind: NodeKind;
  range: Range;
};

/* =========================================================
   Program / declarations
   ========================================================= */

export type Program = NodeBase & {
  kind: "Program";
  body: TopLevel[];
};

export type TopLevel = ExternDeclaration | FunctionDefinition;

export type ExternDeclaration = NodeBase & {
  kind: "ExternDeclaration";
  prototype: Prototype;
};

export type FunctionDefinition = NodeBase & {
  kind: "FunctionDefinition";
  function: FunctionNode;
  /** True when the function wraps a bare top-level expression. */
  anonymous: boolean;
};

/**
 * Signature of a callable: a name plus ordered parameter names.
 * Duplicate parameter names are not rejected here.
 */
export type Prototype = NodeBase & {
  kind: "Prototype";
  name: string;
  params: string[];
};

export type FunctionNode = NodeBase & {
  kind: "Function";
  prototype: Prototype;
  body: Expression;
};

/* =========================================================
   Expressions
   ========================================================= */

export type Expression = NumberLiteral | VariableReference | BinaryOp | Call;

export type NumberLiteral = NodeBase & {
  kind: "NumberLiteral";
  value: number;
};

export type VariableReference = NodeBase & {
  kind: "VariableReference";
  name: string;
};

export type BinaryOp = NodeBase & {
  kind: "BinaryOp";
  /** Operator character; always a key of the parser's precedence table. */
  op: string;
  left: Expression;
  right: Expression;
};

export type Call = NodeBase & {
  kind: "Call";
  callee: string;
  args: Expression[];
};

export type AstNode = Program | TopLevel | FunctionNode | Prototype | Expression;

/* =========================================================
   Guards
   ========================================================= */

const EXPRESSION_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  "NumberLiteral",
  "VariableReference",
  "BinaryOp",
  "Call",
]);

export function isExpression(node: AstNode): node is Expression {
  return EXPRESSION_KINDS.has(node.kind);
}

export function isTopLevel(node: AstNode): node is TopLevel {
  return node.kind === "ExternDeclaration" || node.kind === "FunctionDefinition";
}

/** Name under which a top-level declaration is known to codegen. */
export function declarationName(decl: TopLevel): string {
  return decl.kind === "ExternDeclaration" ? decl.prototype.name : decl.function.prototype.name;
}
