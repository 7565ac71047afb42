// Ruleset Kernel - Expression tokenizer
//
// An atom is a maximal run of characters outside DELIMITERS. Whitespace and commas
// separate tokens and are otherwise dropped.

import type { Token } from "./types";

/**
 * Characters that can never be part of an atom name.
 */
export const DELIMITERS: ReadonlySet<string> = new Set([" ", "\t", "\r", "\n", ",", "(", ")", ">", "<", "+", "!", "|", "&"]);

const SEPARATORS: ReadonlySet<string> = new Set([" ", "\t", "\r", "\n", ","]);

/**
 * Returns true when `name` could be written as a single atom token.
 */
export function isValidAtomName(name: string): boolean {
  if (name.length === 0) return false;
  for (const c of name) {
    if (DELIMITERS.has(c)) return false;
  }
  return true;
}

/**
 * Splits an expression source into tokens. Tokenizing never fails; structural
 * problems are reported by the parser.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const c = source[i];

    if (SEPARATORS.has(c)) {
      i++;
      continue;
    }

    switch (c) {
      case "(":
        tokens.push({ kind: "LPAREN", text: c, offset: i });
        i++;
        continue;
      case ")":
        tokens.push({ kind: "RPAREN", text: c, offset: i });
        i++;
        continue;
      case "!":
        tokens.push({ kind: "NOT", text: c, offset: i });
        i++;
        continue;
      case "+":
        tokens.push({ kind: "PLUS", text: c, offset: i });
        i++;
        continue;
      case "&":
      case "|": {
        // `&&` and `||` are accepted as spellings of `&` and `|`.
        const doubled = source[i + 1] === c;
        tokens.push({ kind: c === "&" ? "AND" : "OR", text: doubled ? c + c : c, offset: i });
        i += doubled ? 2 : 1;
        continue;
      }
      case ">":
      case "<": {
        const withEq = source[i + 1] === "=";
        tokens.push({ kind: "CMP", text: withEq ? `${c}=` : c, offset: i });
        i += withEq ? 2 : 1;
        continue;
      }
      default:
        break;
    }

    const start = i;
    while (i < source.length && !DELIMITERS.has(source[i])) {
      i++;
    }
    tokens.push({ kind: "ATOM", text: source.slice(start, i), offset: start });
  }

  return tokens;
}
