// Lookups - Map sources
//
// Inline arrays, inline objects and map files all normalise to a list of entries.
// Map files hold one entry per line; `#` starts a comment. For hash maps a line is
// `key value`, split on the first run of whitespace.

import fs from "node:fs";
import path from "node:path";
import type { MapSource } from "@mapsexpr/ruleset-kernel";

export interface MapEntry {
  key: string;
  value?: string;
}

function isEntryList(source: MapSource): source is ReadonlyArray<string> {
  return Array.isArray(source);
}

function lineEntry(line: string, withValues: boolean): MapEntry {
  if (!withValues) return { key: line };
  const m = /^(\S+)\s+(.*)$/.exec(line);
  return m ? { key: m[1], value: m[2] } : { key: line, value: "" };
}

/**
 * Reads the lines of a map file, dropping comments and blank lines.
 */
export function readMapFileLines(file: string): string[] {
  const raw = fs.readFileSync(file, "utf8");
  const out: string[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const hash = line.indexOf("#");
    const s = (hash >= 0 ? line.slice(0, hash) : line).trim();
    if (s) out.push(s);
  }
  return out;
}

/**
 * Normalises a map source into entries. String sources are file paths resolved
 * against `baseDir`. `withValues` enables `key value` parsing for list sources.
 */
export function readMapEntries(source: MapSource, withValues: boolean, baseDir: string): MapEntry[] {
  if (typeof source === "string") {
    const file = path.resolve(baseDir, source);
    return readMapFileLines(file).map((line) => lineEntry(line, withValues));
  }
  if (isEntryList(source)) {
    return source
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((line) => lineEntry(line, withValues));
  }
  return Object.entries(source).map(([key, value]) => ({ key, value }));
}
