// Lookups - Message selectors
//
// Selector grammar: name[(arg)][.transform]*
//
//   ip | helo | hostname | user | subject
//   from(smtp|mime)        default smtp
//   rcpts(smtp|mime)       default smtp
//   header(Name)           case-insensitive header name
//
// Transforms apply left to right: lower, upper, domain, first, last.

import type { MessageContextV1 } from "@mapsexpr/contracts";
import type { Selector } from "@mapsexpr/ruleset-kernel";

type Extractor = (ctx: MessageContextV1) => string[];
type Transform = (values: string[]) => string[];

const SELECTOR_RE = /^([a-z_]+)(?:\(([^()]*)\))?((?:\.[a-z_]+)*)$/;

function one(v: string | undefined): string[] {
  return v === undefined ? [] : [v];
}

function addressSource(arg: string | undefined): "smtp" | "mime" | undefined {
  if (arg === undefined || arg === "" || arg === "smtp") return "smtp";
  if (arg === "mime") return "mime";
  return undefined;
}

function headerValues(ctx: MessageContextV1, name: string): string[] {
  const wanted = name.toLowerCase();
  const out: string[] = [];
  for (const [key, value] of Object.entries(ctx.headers ?? {})) {
    if (key.toLowerCase() !== wanted) continue;
    if (typeof value === "string") out.push(value);
    else out.push(...value);
  }
  return out;
}

/**
 * Returns the extractor for `name(arg)`, or undefined when the pair is not known.
 */
function extractorFor(name: string, arg: string | undefined): Extractor | undefined {
  switch (name) {
    case "ip":
    case "helo":
    case "hostname":
    case "user":
    case "subject": {
      if (arg !== undefined) return undefined;
      const field = name;
      return (ctx) => one(ctx[field]);
    }
    case "from": {
      const src = addressSource(arg);
      if (!src) return undefined;
      return (ctx) => one(ctx.from?.[src]);
    }
    case "rcpts": {
      const src = addressSource(arg);
      if (!src) return undefined;
      return (ctx) => [...(ctx.rcpts?.[src] ?? [])];
    }
    case "header": {
      const headerName = arg?.trim();
      if (!headerName) return undefined;
      return (ctx) => headerValues(ctx, headerName);
    }
    default:
      return undefined;
  }
}

const TRANSFORMS: Readonly<Record<string, Transform>> = {
  lower: (values) => values.map((v) => v.toLowerCase()),
  upper: (values) => values.map((v) => v.toUpperCase()),
  // Values without an "@" have no domain and are dropped.
  domain: (values) =>
    values.flatMap((v) => {
      const at = v.lastIndexOf("@");
      return at >= 0 && at < v.length - 1 ? [v.slice(at + 1)] : [];
    }),
  first: (values) => values.slice(0, 1),
  last: (values) => values.slice(-1)
};

/**
 * Parses a selector spec into a selector over MessageContextV1.
 * Returns undefined for anything the grammar or the extractor table does not know.
 */
export function parseMessageSelector(spec: string): Selector<MessageContextV1> | undefined {
  const m = SELECTOR_RE.exec(spec.trim());
  if (!m) return undefined;

  const [, name, arg, transformPart] = m;
  const extract = extractorFor(name, arg);
  if (!extract) return undefined;

  const transforms: Transform[] = [];
  for (const t of transformPart.split(".").filter(Boolean)) {
    if (!Object.prototype.hasOwnProperty.call(TRANSFORMS, t)) return undefined;
    transforms.push(TRANSFORMS[t]);
  }

  return (ctx) => transforms.reduce((values, t) => t(values), extract(ctx));
}
