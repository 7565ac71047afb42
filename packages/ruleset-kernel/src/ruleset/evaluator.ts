// Ruleset Kernel - Ruleset evaluator
//
// All per-request state lives in the closure of a single evaluateRuleset call.
// Nothing reachable from the Ruleset is written to.

import { errorMessage } from "../errors";
import { evaluateExpression } from "../expression/evaluate";
import type { AtomFailure, EvaluationOutcome, EvaluationResult, MatchEvidence, Rule, Ruleset, SelectorOutput } from "./types";

/**
 * How one atom resolved during a call.
 */
type AtomState = "MATCH" | "NO_MATCH" | "ABSTAIN";

function selectorValues(out: SelectorOutput): ReadonlyArray<string> {
  if (out === null || out === undefined) return [];
  if (typeof out === "string") return [out];
  return out;
}

function isHit(payload: unknown): boolean {
  return payload !== undefined && payload !== null && payload !== false;
}

/**
 * Evaluates a ruleset against one request context. Never throws for selector or
 * map failures; those are reported in `failures` and count as no match.
 */
export function evaluateRuleset<C>(ruleset: Ruleset<C>, context: C): EvaluationResult {
  const matches: Record<string, MatchEvidence> = {};
  const failures: AtomFailure[] = [];
  const states = new Map<string, AtomState>();

  const resolveRule = (rule: Rule<C>): AtomState => {
    let values: ReadonlyArray<string>;
    try {
      values = selectorValues(rule.selector(context));
    } catch (err) {
      failures.push({ rule: rule.name, stage: "selector", message: errorMessage(err) });
      return "ABSTAIN";
    }

    if (values.length === 0) {
      return "ABSTAIN";
    }

    // First value that hits wins; later values are not looked up.
    for (const value of values) {
      let payload: unknown;
      try {
        payload = rule.map.getKey(value);
      } catch (err) {
        failures.push({ rule: rule.name, stage: "map", message: errorMessage(err) });
        return "NO_MATCH";
      }
      if (isHit(payload)) {
        // Own property even for names like `__proto__`.
        Object.defineProperty(matches, rule.name, {
          value: { matched_value: value, map_result: payload },
          enumerable: true,
          writable: true,
          configurable: true
        });
        return "MATCH";
      }
    }
    return "NO_MATCH";
  };

  const resolveAtom = (name: string): number => {
    let state = states.get(name);
    if (state === undefined) {
      const rule = ruleset.rules.get(name);
      if (!rule) {
        // Compilation guarantees every atom is bound.
        throw new Error(`INTERNAL_BUG_UNBOUND_ATOM: ${name} @ module:${ruleset.moduleName}`);
      }
      state = resolveRule(rule);
      states.set(name, state);
    }
    return state === "MATCH" ? 1 : 0;
  };

  const value = evaluateExpression(ruleset.expression, resolveAtom);

  let outcome: EvaluationOutcome;
  if (value !== 0) {
    outcome = true;
  } else if (states.size > 0 && [...states.values()].every((s) => s === "ABSTAIN")) {
    outcome = "UNDETERMINED";
  } else {
    outcome = false;
  }

  return { outcome, matches, failures };
}

/**
 * Caller-side gate: only a determinate true counts as a match.
 */
export function isRulesetMatch(result: EvaluationResult): boolean {
  return result.outcome === true;
}
