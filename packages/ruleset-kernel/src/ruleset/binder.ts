// Ruleset Kernel - Rule binder

import { UnknownMapError, UnknownSelectorError } from "../errors";
import type { LookupMap, Rule, RuleResolvers, RuleSpec, Selector } from "./types";

export const DEFAULT_MAP_KIND = "set";

/**
 * Binds one rule spec to concrete selector and map capabilities.
 *
 * Resolver throws are folded into the corresponding ConfigError so that the caller
 * only ever sees one error family at build time.
 */
export function bindRule<C>(
  name: string,
  spec: RuleSpec,
  resolvers: RuleResolvers<C>,
  moduleName: string,
  description?: string
): Rule<C> {
  let selector: Selector<C> | undefined;
  try {
    selector = resolvers.selectors.resolveSelector(spec.selector);
  } catch (err) {
    throw new UnknownSelectorError(name, spec.selector, moduleName, err);
  }
  if (!selector) {
    throw new UnknownSelectorError(name, spec.selector, moduleName);
  }

  const mapKind = spec.map_kind ?? DEFAULT_MAP_KIND;
  let map: LookupMap | undefined;
  try {
    map = resolvers.maps.resolveMap(spec.map, mapKind, description ?? moduleName);
  } catch (err) {
    throw new UnknownMapError(name, mapKind, moduleName, err);
  }
  if (!map) {
    throw new UnknownMapError(name, mapKind, moduleName);
  }

  return Object.freeze({
    name,
    selector,
    map,
    selectorSpec: spec.selector,
    mapKind
  });
}
