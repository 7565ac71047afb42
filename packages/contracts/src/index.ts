export * from "./schema/message_context_v1";
export * from "./schema/policy_verdict_v1"; // PolicyVerdict v1: produced by the policy server
