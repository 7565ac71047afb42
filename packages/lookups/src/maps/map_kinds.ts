// Lookups - Map kinds
//
// Every map is built once from its entries and is read-only afterwards, so a single
// instance can serve any number of concurrent lookups.

import net from "node:net";
import type { LookupMap } from "@mapsexpr/ruleset-kernel";
import type { MapEntry } from "./map_source";

export const MAP_KINDS = ["set", "hash", "regexp", "glob", "radix"] as const;

export type MapKind = (typeof MAP_KINDS)[number];

export function isMapKind(x: string): x is MapKind {
  return (MAP_KINDS as readonly string[]).includes(x);
}

/** set: exact membership, payload `true`. */
function setMap(entries: ReadonlyArray<MapEntry>): LookupMap {
  const keys = new Set(entries.map((e) => e.key));
  return {
    getKey: (value) => (keys.has(value) ? true : undefined)
  };
}

/** hash: exact key, payload is the mapped value. */
function hashMap(entries: ReadonlyArray<MapEntry>): LookupMap {
  const table = new Map<string, string>();
  for (const e of entries) {
    table.set(e.key, e.value ?? "");
  }
  return {
    getKey: (value) => table.get(value)
  };
}

function compilePattern(pattern: string): RegExp {
  // `/body/flags` form; anything else is a bare pattern. `g` and `y` would make test() stateful.
  const m = /^\/(.*)\/([a-z]*)$/.exec(pattern);
  return m ? new RegExp(m[1], m[2].replace(/[gy]/g, "")) : new RegExp(pattern);
}

/** regexp: first matching pattern wins, payload is the pattern as written. */
function regexpMap(entries: ReadonlyArray<MapEntry>): LookupMap {
  const patterns = entries.map((e) => ({ source: e.key, re: compilePattern(e.key) }));
  return {
    getKey: (value) => patterns.find((p) => p.re.test(value))?.source
  };
}

function globToRegExp(glob: string): RegExp {
  const body = glob.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".");
  return new RegExp(`^${body}$`, "i");
}

/** glob: `*` and `?` wildcards, case-insensitive, payload is the glob as written. */
function globMap(entries: ReadonlyArray<MapEntry>): LookupMap {
  const globs = entries.map((e) => ({ source: e.key, re: globToRegExp(e.key) }));
  return {
    getKey: (value) => globs.find((g) => g.re.test(value))?.source
  };
}

function ipFamily(address: string): "ipv4" | "ipv6" | undefined {
  const v = net.isIP(address);
  if (v === 4) return "ipv4";
  if (v === 6) return "ipv6";
  return undefined;
}

/** `::ffff:192.0.2.10` and friends look up as the IPv4 address they carry. */
function unmapIPv4(value: string): string {
  const m = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i.exec(value);
  return m ? m[1] : value;
}

/** radix: IP addresses and CIDR blocks, payload is the entry that covered the value. */
function radixMap(entries: ReadonlyArray<MapEntry>): LookupMap {
  const blocks = entries.map((e) => {
    const [address, prefixText] = e.key.split("/", 2);
    const family = ipFamily(address);
    if (!family) {
      throw new Error(`RADIX_ENTRY_INVALID: ${e.key}`);
    }
    const list = new net.BlockList();
    if (prefixText === undefined) {
      list.addAddress(address, family);
    } else {
      const max = family === "ipv4" ? 32 : 128;
      const prefix = Number(prefixText);
      if (!/^\d{1,3}$/.test(prefixText) || prefix > max) {
        throw new Error(`RADIX_PREFIX_INVALID: ${e.key}`);
      }
      list.addSubnet(address, prefix, family);
    }
    return { source: e.key, family, list };
  });

  return {
    getKey: (raw) => {
      const value = unmapIPv4(raw);
      const family = ipFamily(value);
      if (!family) return undefined;
      return blocks.find((b) => b.family === family && b.list.check(value, family))?.source;
    }
  };
}

/**
 * Builds a lookup map of the given kind. Malformed entries (bad pattern, bad CIDR)
 * throw; an unknown kind returns undefined.
 */
export function createLookupMap(kind: string, entries: ReadonlyArray<MapEntry>): LookupMap | undefined {
  if (!isMapKind(kind)) return undefined;
  switch (kind) {
    case "set":
      return setMap(entries);
    case "hash":
      return hashMap(entries);
    case "regexp":
      return regexpMap(entries);
    case "glob":
      return globMap(entries);
    case "radix":
      return radixMap(entries);
    default: {
      const _never: never = kind;
      throw new Error(`UNREACHABLE_MAP_KIND: ${String(_never)}`);
    }
  }
}
