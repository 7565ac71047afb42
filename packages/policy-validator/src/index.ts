// @mapsexpr/policy-validator
// Admission checks for policy block files.

export * from "./policy/policy_block_v1_zod";
export * from "./policy/policy_block_v1_validator";
