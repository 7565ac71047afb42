// @mapsexpr/ruleset-kernel
// Entry point exports for the maps-expressions kernel.

export * from "./errors";
export * from "./expression/types";
export * from "./expression/tokenizer";
export * from "./expression/parser";
export * from "./expression/evaluate";
export * from "./ruleset/types";
export * from "./ruleset/binder";
export * from "./ruleset/builder";
export * from "./ruleset/evaluator";
