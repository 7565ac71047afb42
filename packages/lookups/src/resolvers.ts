// Lookups - Resolver wiring for the ruleset kernel

import type { MessageContextV1 } from "@mapsexpr/contracts";
import type { LookupMap, MapSource, RuleResolvers, Selector } from "@mapsexpr/ruleset-kernel";
import { errorMessage } from "@mapsexpr/ruleset-kernel";
import { createLookupMap, isMapKind } from "./maps/map_kinds";
import { readMapEntries } from "./maps/map_source";
import { parseMessageSelector } from "./selectors/message_selectors";

export interface MessageResolverOptions {
  // Directory that relative map file paths are resolved against.
  baseDir: string;
}

/**
 * Resolvers over MessageContextV1 using the built-in selectors and map kinds.
 * Map sources are read once here; later edits to a map file are not picked up.
 */
export function createMessageResolvers(opts: MessageResolverOptions): RuleResolvers<MessageContextV1> {
  return {
    selectors: {
      resolveSelector(spec: string): Selector<MessageContextV1> | undefined {
        return parseMessageSelector(spec);
      }
    },
    maps: {
      resolveMap(source: MapSource, kind: string, description: string): LookupMap | undefined {
        if (!isMapKind(kind)) return undefined;
        try {
          return createLookupMap(kind, readMapEntries(source, kind === "hash", opts.baseDir));
        } catch (err) {
          throw new Error(`MAP_SOURCE_INVALID: ${errorMessage(err)} @ ${description}`, { cause: err });
        }
      }
    }
  };
}
