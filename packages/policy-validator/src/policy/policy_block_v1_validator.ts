import { PolicyBlockV1Z, PolicyListFileV1Z } from "./policy_block_v1_zod"; // structural schema: close the shape first
import type { PolicyBlockV1 } from "./policy_block_v1_zod";
import { compileExpression, DuplicateRuleNameError } from "@mapsexpr/ruleset-kernel"; // the kernel owns expression syntax

export function policyRuleNames(block: PolicyBlockV1): string[] {
  return Array.isArray(block.rules) ? block.rules.map((r) => r.name) : Object.keys(block.rules);
}

function ensureUniqueRuleNames(block: PolicyBlockV1): void {
  if (!Array.isArray(block.rules)) return; // object keys are unique by construction
  const seen = new Set<string>();
  for (const r of block.rules) {
    if (seen.has(r.name)) throw new DuplicateRuleNameError(r.name, block.module_name);
    seen.add(r.name);
  }
}

export function validatePolicyBlockV1(input: unknown): PolicyBlockV1 {
  const parsed = PolicyBlockV1Z.parse(input); // gate 1: strict structural parse (ZodError on failure)

  ensureUniqueRuleNames(parsed); // gate 2: array form must not repeat a rule name

  compileExpression(parsed.expression, new Set(policyRuleNames(parsed)), parsed.module_name); // gate 3: syntax + every atom declared

  return parsed;
}

export function isPolicyBlockV1(input: unknown): input is PolicyBlockV1 {
  try {
    validatePolicyBlockV1(input);
    return true;
  } catch {
    return false;
  }
}

/**
 * Rules declared by the block but never referenced from its expression.
 * Only meaningful for a block that already passed validatePolicyBlockV1.
 */
export function collectUnusedRules(block: PolicyBlockV1): string[] {
  const names = policyRuleNames(block);
  const used = new Set(compileExpression(block.expression, new Set(names), block.module_name).atoms);
  return names.filter((n) => !used.has(n));
}

/**
 * Splits a parsed policy file into its raw block entries without admitting them.
 */
export function splitPolicyFileV1(input: unknown): unknown[] {
  const list = PolicyListFileV1Z.safeParse(input);
  return list.success ? list.data.policies : [input];
}
