import { z } from "zod"; // zod: output contract for evaluation responses

const SemVerZ = z
  .string()
  .regex(/^\d+\.\d+\.\d+$/); // schema_version must be SemVer

export const MatchEvidenceV1Z = z
  .object({
    matched_value: z.string(), // selector value that hit the map
    map_result: z.unknown() // map payload, passed through untouched
  })
  .strict();

export const AtomFailureV1Z = z
  .object({
    rule: z.string().min(1),
    stage: z.enum(["selector", "map"]),
    message: z.string()
  })
  .strict();

export const PolicyVerdictV1Z = z
  .object({
    type: z.literal("policy_verdict_v1"), // discriminator (frozen)
    schema_version: SemVerZ,
    policy: z.string().min(1), // module name of the evaluated policy block
    outcome: z.union([z.boolean(), z.literal("UNDETERMINED")]), // tri-state result
    matched: z.boolean(), // true only when outcome === true
    matches: z.record(MatchEvidenceV1Z), // evidence per rule, reported regardless of outcome
    failures: z.array(AtomFailureV1Z), // soft failures absorbed during evaluation
    evaluated_at_ts: z.number().int().nonnegative() // ms timestamp
  })
  .strict()
  .refine((v) => v.matched === (v.outcome === true), {
    message: "matched must equal (outcome === true)"
  });

export type PolicyVerdictV1 = z.infer<typeof PolicyVerdictV1Z>;

export function parsePolicyVerdictV1(input: unknown): PolicyVerdictV1 {
  return PolicyVerdictV1Z.parse(input); // throws on shape drift
}
