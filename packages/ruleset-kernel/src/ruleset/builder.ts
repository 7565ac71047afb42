// Ruleset Kernel - Ruleset builder
//
// Construction is all-or-nothing: every rule is bound, then the expression is
// compiled against the bound rule names. The first failure throws and nothing
// partially built escapes.

import { ConfigError, DuplicateRuleNameError, MissingPolicyElementError } from "../errors";
import { compileExpression } from "../expression/parser";
import { bindRule } from "./binder";
import type { NamedRuleSpec, PolicyBlock, Rule, RuleResolvers, RuleSpec, Ruleset } from "./types";

export const DEFAULT_MODULE_NAME = "maps_expressions";

/**
 * Rule table that rejects writes after construction. `ReadonlyMap` on the
 * Ruleset type only holds at compile time.
 */
class FrozenMap<K, V> extends Map<K, V> {
  private readonly sealed: boolean;

  constructor(entries: ReadonlyArray<readonly [K, V]>) {
    super(entries);
    this.sealed = true;
    Object.freeze(this);
  }

  set(key: K, value: V): this {
    if (this.sealed) throw new TypeError("RULESET_IMMUTABLE: rule table cannot be modified");
    return super.set(key, value);
  }

  delete(_key: K): boolean {
    throw new TypeError("RULESET_IMMUTABLE: rule table cannot be modified");
  }

  clear(): void {
    throw new TypeError("RULESET_IMMUTABLE: rule table cannot be modified");
  }
}

export type BuildRulesetResult<C> = { ok: true; ruleset: Ruleset<C> } | { ok: false; error: ConfigError };

function isRuleList(rules: PolicyBlock["rules"]): rules is ReadonlyArray<NamedRuleSpec> {
  return Array.isArray(rules);
}

/**
 * Flattens both accepted `rules` shapes into ordered [name, spec] pairs.
 */
function ruleEntries(block: PolicyBlock, moduleName: string): Array<[string, RuleSpec]> {
  const rules = block.rules;
  if (rules === undefined) {
    throw new MissingPolicyElementError("rules", moduleName);
  }

  const out: Array<[string, RuleSpec]> = [];
  if (isRuleList(rules)) {
    const seen = new Set<string>();
    for (const { name, ...spec } of rules) {
      if (seen.has(name)) {
        throw new DuplicateRuleNameError(name, moduleName);
      }
      seen.add(name);
      out.push([name, spec]);
    }
  } else {
    for (const [name, spec] of Object.entries(rules)) {
      out.push([name, spec]);
    }
  }

  if (out.length === 0) {
    throw new MissingPolicyElementError("rules", moduleName);
  }
  return out;
}

/**
 * Builds an immutable Ruleset from a policy block.
 *
 * @throws ConfigError (one of its subclasses) on any configuration problem.
 */
export function buildRuleset<C>(block: PolicyBlock, resolvers: RuleResolvers<C>): Ruleset<C> {
  const moduleName = block.module_name ?? DEFAULT_MODULE_NAME;

  const entries = ruleEntries(block, moduleName);
  // A blank expression is present but malformed; the compiler reports it.
  if (block.expression === undefined) {
    throw new MissingPolicyElementError("expression", moduleName);
  }

  const bound: Array<[string, Rule<C>]> = [];
  for (const [name, spec] of entries) {
    bound.push([name, bindRule(name, spec, resolvers, moduleName, block.description)]);
  }
  const rules = new FrozenMap(bound);

  const expression = compileExpression(block.expression, rules, moduleName);

  return Object.freeze({
    moduleName,
    description: block.description,
    rules,
    expression
  });
}

/**
 * Same as buildRuleset but returns configuration failures as a value.
 * Errors that are not ConfigError (programming errors) still throw.
 */
export function tryBuildRuleset<C>(block: PolicyBlock, resolvers: RuleResolvers<C>): BuildRulesetResult<C> {
  try {
    return { ok: true, ruleset: buildRuleset(block, resolvers) };
  } catch (err) {
    if (err instanceof ConfigError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
