import assert from "node:assert";
import { describe, test } from "node:test";

import {
  compileExpression,
  evaluateExpression,
  ExpressionSyntaxError,
  isValidAtomName,
  tokenize,
  UnknownAtomError
} from "../index";

const known = new Set(["a", "b", "c", "d", "e", "ip", "from"]);

function compile(source: string) {
  return compileExpression(source, known, "test");
}

// Resolver that records the order atoms were asked for.
function recording(values: Readonly<Record<string, number>>) {
  const calls: string[] = [];
  const resolve = (name: string): number => {
    calls.push(name);
    return values[name] ?? 0;
  };
  return { calls, resolve };
}

describe("tokenize", () => {
  test("splits atoms on delimiters and drops separators", () => {
    const tokens = tokenize("a&&b | !c, (d+e) >= 2");
    assert.deepStrictEqual(
      tokens.map((t) => [t.kind, t.text]),
      [
        ["ATOM", "a"],
        ["AND", "&&"],
        ["ATOM", "b"],
        ["OR", "|"],
        ["NOT", "!"],
        ["ATOM", "c"],
        ["LPAREN", "("],
        ["ATOM", "d"],
        ["PLUS", "+"],
        ["ATOM", "e"],
        ["RPAREN", ")"],
        ["CMP", ">="],
        ["ATOM", "2"]
      ]
    );
    assert.deepStrictEqual(
      tokens.map((t) => t.offset),
      [0, 1, 3, 5, 7, 8, 11, 12, 13, 14, 15, 17, 20]
    );
  });

  test("keeps punctuation outside the delimiter set inside atoms", () => {
    assert.deepStrictEqual(
      tokenize("from.smtp:lower&ip-v4").map((t) => t.text),
      ["from.smtp:lower", "&", "ip-v4"]
    );
  });

  test("isValidAtomName rejects empty names and names with delimiters", () => {
    assert.equal(isValidAtomName("ip_from"), true);
    assert.equal(isValidAtomName(""), false);
    assert.equal(isValidAtomName("a b"), false);
    assert.equal(isValidAtomName("a|b"), false);
  });
});

describe("compileExpression", () => {
  test("NOT binds tighter than AND, AND tighter than OR", () => {
    assert.deepStrictEqual(compile("!a & b | c").root, {
      op: "OR",
      children: [
        {
          op: "AND",
          children: [{ op: "NOT", child: { op: "ATOM", name: "a" } }, { op: "ATOM", name: "b" }]
        },
        { op: "ATOM", name: "c" }
      ]
    });
  });

  test("parentheses override precedence", () => {
    assert.deepStrictEqual(compile("(a | b) & c").root, {
      op: "AND",
      children: [
        { op: "OR", children: [{ op: "ATOM", name: "a" }, { op: "ATOM", name: "b" }] },
        { op: "ATOM", name: "c" }
      ]
    });
  });

  test("flattens chains of the same operator", () => {
    assert.deepStrictEqual(compile("a & b && c").root, {
      op: "AND",
      children: [
        { op: "ATOM", name: "a" },
        { op: "ATOM", name: "b" },
        { op: "ATOM", name: "c" }
      ]
    });
  });

  test("compiles sums compared against a limit", () => {
    assert.deepStrictEqual(compile("a + b + c >= 2").root, {
      op: "CMP",
      cmp: ">=",
      limit: 2,
      operand: {
        op: "SUM",
        children: [
          { op: "ATOM", name: "a" },
          { op: "ATOM", name: "b" },
          { op: "ATOM", name: "c" }
        ]
      }
    });
  });

  test("lists distinct atoms in first-appearance order", () => {
    const expr = compile("b & a | b");
    assert.deepStrictEqual(expr.atoms, ["b", "a"]);
    assert.equal(expr.source, "b & a | b");
  });

  test("produces a frozen tree", () => {
    const expr = compile("a & b");
    assert.ok(Object.isFrozen(expr));
    assert.ok(Object.isFrozen(expr.root));
    assert.ok(Object.isFrozen(expr.atoms));
  });

  test("fails on an unknown atom, naming it and the module", () => {
    assert.throws(
      () => compileExpression("a & zz", known, "whitelist_ip_from"),
      (err: unknown) => {
        assert.ok(err instanceof UnknownAtomError);
        assert.equal(err.atom, "zz");
        assert.equal(err.offset, 4);
        assert.equal(err.moduleName, "whitelist_ip_from");
        assert.equal(err.message, 'UNKNOWN_ATOM: use of undefined rule "zz" at offset 4 @ module:whitelist_ip_from');
        return true;
      }
    );
  });

  test("reports an unknown atom before a later syntax error", () => {
    assert.throws(() => compile("zz & ("), UnknownAtomError);
  });

  const malformed: Array<[string, string, number]> = [
    ["", "empty expression", 0],
    ["  ,  ", "empty expression", 0],
    ["ip & (", "expected operand but reached end of expression", 6],
    ["(a & b", "unclosed parenthesis", 0],
    ["a b", 'unexpected token "b"', 2],
    ["a &", "expected operand but reached end of expression", 3],
    [")", 'expected operand, got ")"', 0],
    ["a > b", 'comparison limit must be a number, got "b"', 4],
    ["a >", 'comparison ">" has no limit', 3],
    ["a + b > 1 > 0", "comparisons cannot be chained", 10]
  ];

  for (const [source, detail, offset] of malformed) {
    test(`rejects malformed source ${JSON.stringify(source)}`, () => {
      assert.throws(
        () => compile(source),
        (err: unknown) => {
          assert.ok(err instanceof ExpressionSyntaxError);
          assert.equal(err.code, "EXPRESSION_SYNTAX");
          assert.equal(err.offset, offset);
          assert.equal(err.message, `EXPRESSION_SYNTAX: ${detail} at offset ${offset} @ module:test`);
          return true;
        }
      );
    });
  }
});

describe("evaluateExpression", () => {
  const andOrOnly = ["a", "a & b", "a | b & c", "(a | b) & (c | a)", "a && b || c & d"];

  test("AND/OR expressions are false with every atom at 0 and true with every atom at 1", () => {
    for (const source of andOrOnly) {
      const expr = compile(source);
      assert.equal(evaluateExpression(expr, () => 0), 0, source);
      assert.notEqual(evaluateExpression(expr, () => 1), 0, source);
    }
  });

  test("NOT at the root inverts the all-ones case", () => {
    assert.equal(evaluateExpression(compile("!a"), () => 1), 0);
    assert.equal(evaluateExpression(compile("!(a & b)"), () => 1), 0);
  });

  test("AND skips the right operand once the left is false", () => {
    const r = recording({ a: 0, b: 1 });
    assert.equal(evaluateExpression(compile("a & b"), r.resolve), 0);
    assert.deepStrictEqual(r.calls, ["a"]);
  });

  test("OR skips the right operand once the left is true", () => {
    const r = recording({ a: 1, b: 0 });
    assert.equal(evaluateExpression(compile("a | b"), r.resolve), 1);
    assert.deepStrictEqual(r.calls, ["a"]);
  });

  test("resolves atoms left to right, stopping inside nested AND", () => {
    const r = recording({ a: 0, b: 0, c: 1 });
    assert.equal(evaluateExpression(compile("a | b & c"), r.resolve), 0);
    assert.deepStrictEqual(r.calls, ["a", "b"]);
  });

  test("SUM reads every operand", () => {
    const r = recording({ a: 1, b: 1, c: 0 });
    assert.equal(evaluateExpression(compile("a + b + c > 1"), r.resolve), 1);
    assert.deepStrictEqual(r.calls, ["a", "b", "c"]);
  });

  test("comparison operators", () => {
    const both = recording({ a: 1, b: 1 }).resolve;
    const one = recording({ a: 1, b: 0 }).resolve;
    const none = recording({}).resolve;
    assert.equal(evaluateExpression(compile("a + b >= 2"), both), 1);
    assert.equal(evaluateExpression(compile("a + b >= 2"), one), 0);
    assert.equal(evaluateExpression(compile("a + b < 1"), none), 1);
    assert.equal(evaluateExpression(compile("a + b <= 1"), one), 1);
  });

  test("NOT inside a sum counts as one", () => {
    assert.equal(evaluateExpression(compile("!a + b"), () => 0), 1);
  });
});
