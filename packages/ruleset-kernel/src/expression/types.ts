// Ruleset Kernel - Expression node types
//
// A compiled expression is a frozen tree. Leaves are ATOM nodes naming a rule;
// every ATOM in a CompiledExpression has already been checked against the rule table.

/**
 * Node kinds. AND/OR/SUM are n-ary (chains of the same operator are flattened).
 */
export type ExprOp = "ATOM" | "NOT" | "AND" | "OR" | "SUM" | "CMP";

/**
 * Comparison operators accepted after a numeric operand.
 */
export type CmpOp = ">" | ">=" | "<" | "<=";

export interface ExprAtom {
  op: "ATOM";
  name: string;
}

export interface ExprNot {
  op: "NOT";
  child: ExprNode;
}

export interface ExprAnd {
  op: "AND";
  children: ReadonlyArray<ExprNode>;
}

export interface ExprOr {
  op: "OR";
  children: ReadonlyArray<ExprNode>;
}

/** SUM: adds the numeric values of all children (no short-circuit). */
export interface ExprSum {
  op: "SUM";
  children: ReadonlyArray<ExprNode>;
}

/** CMP: compares the operand's numeric value against a literal limit. */
export interface ExprCmp {
  op: "CMP";
  cmp: CmpOp;
  operand: ExprNode;
  limit: number;
}

export type ExprNode = ExprAtom | ExprNot | ExprAnd | ExprOr | ExprSum | ExprCmp;

/**
 * Result of a successful compile.
 */
export interface CompiledExpression {
  // Original source text, kept for diagnostics only.
  readonly source: string;

  readonly root: ExprNode;

  // Distinct atom names in first-appearance order.
  readonly atoms: ReadonlyArray<string>;
}

/**
 * Lexical token kinds produced by the tokenizer.
 */
export type TokenKind = "ATOM" | "NOT" | "AND" | "OR" | "PLUS" | "CMP" | "LPAREN" | "RPAREN";

export interface Token {
  kind: TokenKind;
  text: string;
  // Character offset of the first character of the token in the source.
  offset: number;
}
