// Ruleset Kernel - Ruleset types
//
// Selectors and maps are capabilities supplied by the caller. The kernel never
// constructs them itself; it reaches them through the resolver interfaces below.

import type { CompiledExpression } from "../expression/types";

/**
 * What a selector may return. `null`, `undefined` and `[]` all mean "no value".
 */
export type SelectorOutput = string | ReadonlyArray<string> | null | undefined;

/**
 * Extracts candidate values from a request context.
 */
export type Selector<C> = (context: C) => SelectorOutput;

/**
 * Read-only key lookup. `undefined`, `null` and `false` mean no match; any other
 * value is the opaque payload reported in MatchEvidence.
 */
export interface LookupMap {
  getKey(value: string): unknown;
}

/**
 * Where a map's entries come from. Interpretation belongs to the map resolver.
 */
export type MapSource = string | ReadonlyArray<string> | Readonly<Record<string, string>>;

/**
 * One rule as written in a policy block.
 */
export interface RuleSpec {
  selector: string;
  map: MapSource;
  // Map kind; "set" when omitted.
  map_kind?: string;
}

export interface NamedRuleSpec extends RuleSpec {
  name: string;
}

/**
 * Policy block accepted by buildRuleset.
 */
export interface PolicyBlock {
  module_name?: string;
  description?: string;
  rules?: Readonly<Record<string, RuleSpec>> | ReadonlyArray<NamedRuleSpec>;
  expression?: string;
}

/**
 * Turns a selector string into a callable selector, or `undefined` if unknown.
 */
export interface SelectorResolver<C> {
  resolveSelector(spec: string): Selector<C> | undefined;
}

/**
 * Turns a map source of a given kind into a lookup map, or `undefined` if unknown.
 * `description` labels the map in the resolver's own diagnostics.
 */
export interface MapResolver {
  resolveMap(source: MapSource, kind: string, description: string): LookupMap | undefined;
}

export interface RuleResolvers<C> {
  selectors: SelectorResolver<C>;
  maps: MapResolver;
}

/**
 * A bound rule: one selector paired with one map under a stable name.
 */
export interface Rule<C> {
  readonly name: string;
  readonly selector: Selector<C>;
  readonly map: LookupMap;
  readonly selectorSpec: string;
  readonly mapKind: string;
}

/**
 * Immutable compiled policy. Shared read-only across concurrent evaluations.
 */
export interface Ruleset<C> {
  readonly moduleName: string;
  readonly description?: string;
  readonly rules: ReadonlyMap<string, Rule<C>>;
  readonly expression: CompiledExpression;
}

/**
 * Evidence for one rule whose map produced a hit.
 */
export interface MatchEvidence {
  matched_value: string;
  map_result: unknown;
}

/**
 * A selector or map call that threw during one evaluation.
 */
export interface AtomFailure {
  rule: string;
  stage: "selector" | "map";
  message: string;
}

/**
 * Tri-state outcome. UNDETERMINED means every atom resolved in the call abstained;
 * callers treat it as "no match".
 */
export type EvaluationOutcome = boolean | "UNDETERMINED";

export interface EvaluationResult {
  outcome: EvaluationOutcome;
  matches: Record<string, MatchEvidence>;
  failures: AtomFailure[];
}
