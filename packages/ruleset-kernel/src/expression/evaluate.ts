// Ruleset Kernel - Expression walker
//
// Values are numbers: 0 means false, anything else true. AND/OR short-circuit left
// to right; SUM and CMP read every operand.

import type { CompiledExpression, ExprNode } from "./types";

/**
 * Callback that yields the numeric value of one atom.
 */
export type AtomResolver = (name: string) => number;

/**
 * Evaluates a single node. `resolveAtom` is called only for atoms whose value can
 * still affect the result.
 */
export function evaluateNode(node: ExprNode, resolveAtom: AtomResolver): number {
  switch (node.op) {
    case "ATOM":
      return resolveAtom(node.name);
    case "NOT":
      return evaluateNode(node.child, resolveAtom) === 0 ? 1 : 0;
    case "AND": {
      for (const child of node.children) {
        if (evaluateNode(child, resolveAtom) === 0) return 0;
      }
      return 1;
    }
    case "OR": {
      for (const child of node.children) {
        if (evaluateNode(child, resolveAtom) !== 0) return 1;
      }
      return 0;
    }
    case "SUM": {
      let total = 0;
      for (const child of node.children) {
        total += evaluateNode(child, resolveAtom);
      }
      return total;
    }
    case "CMP": {
      const v = evaluateNode(node.operand, resolveAtom);
      switch (node.cmp) {
        case ">":
          return v > node.limit ? 1 : 0;
        case ">=":
          return v >= node.limit ? 1 : 0;
        case "<":
          return v < node.limit ? 1 : 0;
        case "<=":
          return v <= node.limit ? 1 : 0;
        default: {
          const _never: never = node.cmp;
          throw new Error(`UNREACHABLE_CMP_OP: ${String(_never)}`);
        }
      }
    }
    default: {
      // Exhaustiveness guard.
      const _never: never = node;
      throw new Error(`UNREACHABLE_EXPR_OP: ${JSON.stringify(_never)}`);
    }
  }
}

/**
 * Evaluates a compiled expression and returns the root's numeric value.
 */
export function evaluateExpression(expression: CompiledExpression, resolveAtom: AtomResolver): number {
  return evaluateNode(expression.root, resolveAtom);
}
