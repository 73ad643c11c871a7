// src/core/walk.ts
//
// Post-order AST traversal: every child is visited before its parent, siblings
// left to right. Uses an explicit stack, so long left-leaning operator chains
// do not grow the call stack.

import type { AstNode } from "./ast";

export type NodeCallback = (node: AstNode) => void;

export function childrenOf(node: AstNode): AstNode[] {
  switch (node.kind) {
    case "Program":
      return node.body;
    case "ExternDeclaration":
      return [node.prototype];
    case "FunctionDefinition":
      return [node.function];
    case "Function":
      return [node.prototype, node.body];
    case "BinaryOp":
      return [node.left, node.right];
    case "Call":
      return node.args;
    case "Prototype":
    case "NumberLiteral":
    case "VariableReference":
      return [];
  }
}

export function walk(root: AstNode, callback: NodeCallback): void {
  const stack: Array<{ node: AstNode; expanded: boolean }> = [{ node: root, expanded: false }];

  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    if (frame.expanded) {
      callback(frame.node);
      continue;
    }

    stack.push({ node: frame.node, expanded: true });
    const children = childrenOf(frame.node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], expanded: false });
    }
  }
}
