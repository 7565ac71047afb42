import { z } from "zod"; // zod: runtime schema checks (admission control for policy files)
import { isValidAtomName } from "@mapsexpr/ruleset-kernel"; // delimiter set comes from the expression tokenizer

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // SemVer: no free-text versions

// A rule name must be writable as a single expression atom, otherwise no expression could reference it.
// Rule names become keys of the verdict's `matches` object.
const RESERVED_RULE_NAMES: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

export const RuleNameV1Z = z
  .string()
  .min(1)
  .refine(isValidAtomName, {
    message: "rule name must not contain whitespace, commas, parentheses or operator characters"
  })
  .refine((name) => !RESERVED_RULE_NAMES.has(name), { message: "rule name is reserved" });

export const MapSourceV1Z = z.union([
  z.string().min(1), // file path, resolved against the config directory
  z.array(z.string()), // inline entries
  z.record(z.string()) // inline key/value pairs (hash maps)
]);

export const RuleSpecV1Z = z
  .object({
    selector: z.string().min(1),
    map: MapSourceV1Z,
    map_kind: z.string().min(1).optional() // defaults to "set" at bind time
  })
  .strict(); // no extra fields: weights or priorities have no meaning here

export const NamedRuleSpecV1Z = RuleSpecV1Z.extend({ name: RuleNameV1Z }).strict();

export const PolicyBlockV1Z = z
  .object({
    type: z.literal("policy_block_v1"),
    schema_version: SemVerZ,
    module_name: z.string().min(1),
    description: z.string().min(1).optional(),
    enabled: z.boolean().optional(), // false keeps the block on file but out of service
    rules: z.union([z.record(RuleNameV1Z, RuleSpecV1Z), z.array(NamedRuleSpecV1Z).min(1)]),
    expression: z.string() // syntax, including emptiness, is checked by the compiler
  })
  .strict();

// A config file holds either one block or `{ policies: [...] }`. Entries stay unparsed here so each
// block is admitted (or rejected) on its own.
export const PolicyListFileV1Z = z.object({ policies: z.array(z.unknown()) }).strict();

export type PolicyBlockV1 = z.infer<typeof PolicyBlockV1Z>;
export type RuleSpecV1 = z.infer<typeof RuleSpecV1Z>;
export type NamedRuleSpecV1 = z.infer<typeof NamedRuleSpecV1Z>;
