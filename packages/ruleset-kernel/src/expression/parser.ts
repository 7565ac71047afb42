// Ruleset Kernel - Expression compiler
//
// Grammar (lowest precedence first):
//
//   or      := and ( ("|" | "||") and )*
//   and     := cmp ( ("&" | "&&") cmp )*
//   cmp     := sum ( (">" | ">=" | "<" | "<=") NUMBER )?
//   sum     := unary ( "+" unary )*
//   unary   := "!" unary | primary
//   primary := ATOM | "(" or ")"
//
// Atoms are resolved against the rule table as they are read, so an unknown name
// fails the compile before any later syntax error is looked at.

import { ExpressionSyntaxError, UnknownAtomError } from "../errors";
import { tokenize } from "./tokenizer";
import type { CmpOp, CompiledExpression, ExprNode, Token } from "./types";

const NUMBER_RE = /^-?\d+(\.\d+)?$/;

/**
 * Anything that can answer "is this rule name defined".
 */
export type AtomTable = { has(name: string): boolean };

class ExpressionParser {
  private pos = 0;
  private readonly atoms: string[] = [];

  constructor(
    private readonly source: string,
    private readonly tokens: ReadonlyArray<Token>,
    private readonly knownAtoms: AtomTable,
    private readonly moduleName: string
  ) {}

  parse(): CompiledExpression {
    if (this.tokens.length === 0) {
      throw new ExpressionSyntaxError("empty expression", 0, this.moduleName);
    }

    const root = this.parseOr();

    const trailing = this.peek();
    if (trailing) {
      throw this.syntaxError(`unexpected token "${trailing.text}"`, trailing.offset);
    }

    return Object.freeze({
      source: this.source,
      root,
      atoms: Object.freeze([...this.atoms])
    });
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token | undefined {
    const t = this.tokens[this.pos];
    if (t) this.pos++;
    return t;
  }

  private syntaxError(detail: string, offset: number): ExpressionSyntaxError {
    return new ExpressionSyntaxError(detail, offset, this.moduleName);
  }

  private parseOr(): ExprNode {
    const children = [this.parseAnd()];
    while (this.peek()?.kind === "OR") {
      this.next();
      children.push(this.parseAnd());
    }
    return children.length === 1 ? children[0] : Object.freeze({ op: "OR", children: Object.freeze(children) });
  }

  private parseAnd(): ExprNode {
    const children = [this.parseCmp()];
    while (this.peek()?.kind === "AND") {
      this.next();
      children.push(this.parseCmp());
    }
    return children.length === 1 ? children[0] : Object.freeze({ op: "AND", children: Object.freeze(children) });
  }

  private parseCmp(): ExprNode {
    const operand = this.parseSum();

    const opToken = this.peek();
    if (opToken?.kind !== "CMP") return operand;
    this.next();

    const limitToken = this.next();
    if (!limitToken) {
      throw this.syntaxError(`comparison "${opToken.text}" has no limit`, this.source.length);
    }
    if (limitToken.kind !== "ATOM" || !NUMBER_RE.test(limitToken.text)) {
      throw this.syntaxError(`comparison limit must be a number, got "${limitToken.text}"`, limitToken.offset);
    }

    const chained = this.peek();
    if (chained?.kind === "CMP") {
      throw this.syntaxError("comparisons cannot be chained", chained.offset);
    }

    return Object.freeze({
      op: "CMP",
      cmp: toCmpOp(opToken.text),
      operand,
      limit: Number(limitToken.text)
    });
  }

  private parseSum(): ExprNode {
    const children = [this.parseUnary()];
    while (this.peek()?.kind === "PLUS") {
      this.next();
      children.push(this.parseUnary());
    }
    return children.length === 1 ? children[0] : Object.freeze({ op: "SUM", children: Object.freeze(children) });
  }

  private parseUnary(): ExprNode {
    if (this.peek()?.kind === "NOT") {
      this.next();
      return Object.freeze({ op: "NOT", child: this.parseUnary() });
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ExprNode {
    const t = this.next();
    if (!t) {
      throw this.syntaxError("expected operand but reached end of expression", this.source.length);
    }

    if (t.kind === "LPAREN") {
      const inner = this.parseOr();
      const close = this.next();
      if (close?.kind !== "RPAREN") {
        throw this.syntaxError("unclosed parenthesis", t.offset);
      }
      return inner;
    }

    if (t.kind === "ATOM") {
      return this.resolveAtom(t);
    }

    throw this.syntaxError(`expected operand, got "${t.text}"`, t.offset);
  }

  private resolveAtom(t: Token): ExprNode {
    if (!this.knownAtoms.has(t.text)) {
      throw new UnknownAtomError(t.text, t.offset, this.moduleName);
    }
    if (!this.atoms.includes(t.text)) {
      this.atoms.push(t.text);
    }
    return Object.freeze({ op: "ATOM", name: t.text });
  }
}

function toCmpOp(text: string): CmpOp {
  switch (text) {
    case ">":
    case ">=":
    case "<":
    case "<=":
      return text;
    default:
      throw new Error(`UNREACHABLE_CMP_OP: ${text}`);
  }
}

/**
 * Compiles an expression source against the set of known rule names.
 *
 * @throws UnknownAtomError when the source names an atom missing from `knownAtoms`.
 * @throws ExpressionSyntaxError on malformed input.
 */
export function compileExpression(source: string, knownAtoms: AtomTable, moduleName: string): CompiledExpression {
  return new ExpressionParser(source, tokenize(source), knownAtoms, moduleName).parse();
}
