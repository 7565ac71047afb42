import type { FastifyBaseLogger } from "fastify";
import { ZodError } from "zod";

import type { MessageContextV1, PolicyVerdictV1 } from "@mapsexpr/contracts";
import { parsePolicyVerdictV1 } from "@mapsexpr/contracts";
import { collectUnusedRules, validatePolicyBlockV1 } from "@mapsexpr/policy-validator";
import type { PolicyBlockV1 } from "@mapsexpr/policy-validator";
import { ConfigError, errorMessage, evaluateRuleset, isRulesetMatch, tryBuildRuleset } from "@mapsexpr/ruleset-kernel";
import type { RuleResolvers, Ruleset } from "@mapsexpr/ruleset-kernel";
import type { PolicySourceEntry } from "./config/policies";

export type PolicyState =
  | {
      name: string;
      origin: string;
      enabled: true;
      ruleset: Ruleset<MessageContextV1>;
      unusedRules: string[];
    }
  | {
      name: string;
      origin: string;
      enabled: false;
      reason: string;
    };

export class PolicyNotFound extends Error {
  readonly status = 404;

  constructor(name: string) {
    super(`POLICY_NOT_FOUND: ${name}`);
  }
}

export class PolicyDisabled extends Error {
  readonly status = 404;

  constructor(name: string, reason: string) {
    super(`POLICY_DISABLED: ${name} (${reason})`);
  }
}

function admissionErrorCode(err: unknown): string {
  if (err instanceof ZodError) return "POLICY_SCHEMA_INVALID";
  if (err instanceof ConfigError) return err.code;
  return "POLICY_ADMISSION_INVALID";
}

function rawModuleName(raw: unknown): string | undefined {
  if (typeof raw !== "object" || raw === null || !("module_name" in raw)) return undefined;
  return typeof raw.module_name === "string" && raw.module_name.length > 0 ? raw.module_name : undefined;
}

/**
 * Holds one immutable ruleset per configured policy block. Blocks that fail
 * admission or build are logged once here and kept only as disabled entries.
 */
export class PolicyRegistry {
  private readonly policies = new Map<string, PolicyState>();

  constructor(
    entries: ReadonlyArray<PolicySourceEntry>,
    resolvers: RuleResolvers<MessageContextV1>,
    private readonly log: FastifyBaseLogger,
    private readonly now: () => number = Date.now
  ) {
    for (const entry of entries) {
      this.admit(entry, resolvers);
    }
  }

  private disable(name: string, origin: string, reason: string, code: string): void {
    this.log.error({ policy: name, origin, code }, `policy disabled: ${reason}`);
    // A later block under a taken name must not replace the earlier one.
    if (!this.policies.has(name)) {
      this.policies.set(name, { name, origin, enabled: false, reason });
    }
  }

  private admit(entry: PolicySourceEntry, resolvers: RuleResolvers<MessageContextV1>): void {
    if ("loadError" in entry) {
      this.disable(entry.origin, entry.origin, entry.loadError, "POLICY_FILE_UNREADABLE");
      return;
    }

    const fallbackName = rawModuleName(entry.raw) ?? entry.origin;
    if (this.policies.has(fallbackName)) {
      this.disable(fallbackName, entry.origin, `DUPLICATE_POLICY: ${fallbackName} is already defined`, "DUPLICATE_POLICY");
      return;
    }

    let block: PolicyBlockV1;
    try {
      block = validatePolicyBlockV1(entry.raw);
    } catch (err) {
      this.disable(fallbackName, entry.origin, errorMessage(err), admissionErrorCode(err));
      return;
    }

    const name = block.module_name;
    if (block.enabled === false) {
      this.log.info({ policy: name, origin: entry.origin }, "policy disabled by configuration");
      this.policies.set(name, { name, origin: entry.origin, enabled: false, reason: "disabled by configuration" });
      return;
    }

    const built = tryBuildRuleset<MessageContextV1>(block, resolvers);
    if (!built.ok) {
      this.disable(name, entry.origin, built.error.message, built.error.code);
      return;
    }

    const unusedRules = collectUnusedRules(block);
    if (unusedRules.length > 0) {
      this.log.warn({ policy: name, unusedRules }, "policy declares rules its expression never uses");
    }

    this.policies.set(name, { name, origin: entry.origin, enabled: true, ruleset: built.ruleset, unusedRules });
    this.log.info({ policy: name, atoms: built.ruleset.expression.atoms }, "policy enabled");
  }

  list(): PolicyState[] {
    return [...this.policies.values()];
  }

  enabled(): Array<Extract<PolicyState, { enabled: true }>> {
    const out: Array<Extract<PolicyState, { enabled: true }>> = [];
    for (const p of this.policies.values()) {
      if (p.enabled) out.push(p);
    }
    return out;
  }

  /**
   * Evaluates one enabled policy. Throws PolicyNotFound / PolicyDisabled; never
   * throws for selector or map failures.
   */
  evaluate(name: string, context: MessageContextV1): PolicyVerdictV1 {
    const state = this.policies.get(name);
    if (!state) throw new PolicyNotFound(name);
    if (!state.enabled) throw new PolicyDisabled(name, state.reason);
    return this.verdict(state.ruleset, context);
  }

  evaluateAll(context: MessageContextV1): PolicyVerdictV1[] {
    return this.enabled().map((p) => this.verdict(p.ruleset, context));
  }

  private verdict(ruleset: Ruleset<MessageContextV1>, context: MessageContextV1): PolicyVerdictV1 {
    const result = evaluateRuleset(ruleset, context);
    if (result.failures.length > 0) {
      this.log.warn({ policy: ruleset.moduleName, failures: result.failures }, "soft failures during policy evaluation");
    }
    return parsePolicyVerdictV1({
      type: "policy_verdict_v1",
      schema_version: "1.0.0",
      policy: ruleset.moduleName,
      outcome: result.outcome,
      matched: isRulesetMatch(result),
      matches: result.matches,
      failures: result.failures,
      evaluated_at_ts: this.now()
    });
  }
}
