// In-process stand-ins for selector and map resolvers used by the kernel tests.
//
// Selector specs:
//   "<field>"  reads context[field]
//   "boom"     throws on every call
//   "?..."     cannot be resolved
// Map kinds:
//   "set"      array source, payload true
//   "hash"     object source, payload is the mapped value
//   "broken"   getKey always throws

import type { LookupMap, MapSource, RuleResolvers, Selector, SelectorOutput } from "../index";

export type TestContext = Readonly<Record<string, SelectorOutput>>;

export interface CallLog {
  // Selector specs in invocation order.
  selectors: string[];
  // Values passed to any map, in invocation order.
  lookups: string[];
}

export function newCallLog(): CallLog {
  return { selectors: [], lookups: [] };
}

function setMap(entries: ReadonlyArray<string>, log: CallLog): LookupMap {
  const set = new Set(entries);
  return {
    getKey(value: string): unknown {
      log.lookups.push(value);
      return set.has(value) ? true : undefined;
    }
  };
}

function hashMap(entries: Readonly<Record<string, string>>, log: CallLog): LookupMap {
  const table = new Map(Object.entries(entries));
  return {
    getKey(value: string): unknown {
      log.lookups.push(value);
      return table.get(value);
    }
  };
}

function isEntryList(source: MapSource): source is ReadonlyArray<string> {
  return Array.isArray(source);
}

export function testResolvers(log: CallLog = newCallLog()): RuleResolvers<TestContext> {
  return {
    selectors: {
      resolveSelector(spec: string): Selector<TestContext> | undefined {
        if (spec.startsWith("?")) return undefined;
        if (spec === "boom") {
          return () => {
            log.selectors.push(spec);
            throw new Error("selector exploded");
          };
        }
        return (ctx) => {
          log.selectors.push(spec);
          return ctx[spec];
        };
      }
    },
    maps: {
      resolveMap(source: MapSource, kind: string): LookupMap | undefined {
        if (kind === "set" && isEntryList(source)) return setMap(source, log);
        if (kind === "hash" && typeof source === "object" && !isEntryList(source)) return hashMap(source, log);
        if (kind === "broken") {
          return {
            getKey(value: string): unknown {
              log.lookups.push(value);
              throw new Error("map backend unavailable");
            }
          };
        }
        return undefined;
      }
    }
  };
}
