// Ruleset Kernel - Configuration error taxonomy
//
// Every failure that prevents a Ruleset from existing is a ConfigError.
// Messages follow `CODE: detail @ module:<name>` so the configuration loader can
// report them verbatim. Request-time failures never surface as errors; they are
// recorded as AtomFailure entries by the evaluator.

/**
 * Stable machine-readable codes for configuration failures.
 */
export type ConfigErrorCode =
  | "POLICY_ELEMENTS_MISSING"
  | "DUPLICATE_RULE_NAME"
  | "UNKNOWN_SELECTOR"
  | "UNKNOWN_MAP"
  | "UNKNOWN_ATOM"
  | "EXPRESSION_SYNTAX";

export interface ConfigErrorDetails {
  moduleName: string;
  ruleName?: string;
  cause?: unknown;
}

/**
 * Base class for all build-time failures.
 */
export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly moduleName: string;
  readonly ruleName?: string;

  constructor(code: ConfigErrorCode, detail: string, details: ConfigErrorDetails) {
    super(`${code}: ${detail} @ module:${details.moduleName}`, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.code = code;
    this.moduleName = details.moduleName;
    this.ruleName = details.ruleName;
  }
}

export class MissingPolicyElementError extends ConfigError {
  readonly element: "rules" | "expression";

  constructor(element: "rules" | "expression", moduleName: string) {
    super("POLICY_ELEMENTS_MISSING", `required element "${element}" is missing`, { moduleName });
    this.element = element;
  }
}

export class DuplicateRuleNameError extends ConfigError {
  constructor(ruleName: string, moduleName: string) {
    super("DUPLICATE_RULE_NAME", `rule "${ruleName}" is declared more than once`, { moduleName, ruleName });
  }
}

export class UnknownSelectorError extends ConfigError {
  readonly selectorSpec: string;

  constructor(ruleName: string, selectorSpec: string, moduleName: string, cause?: unknown) {
    super("UNKNOWN_SELECTOR", `cannot resolve selector "${selectorSpec}" for rule "${ruleName}"`, {
      moduleName,
      ruleName,
      cause
    });
    this.selectorSpec = selectorSpec;
  }
}

export class UnknownMapError extends ConfigError {
  readonly mapKind: string;

  constructor(ruleName: string, mapKind: string, moduleName: string, cause?: unknown) {
    super("UNKNOWN_MAP", `cannot resolve map of kind "${mapKind}" for rule "${ruleName}"`, {
      moduleName,
      ruleName,
      cause
    });
    this.mapKind = mapKind;
  }
}

export class UnknownAtomError extends ConfigError {
  readonly atom: string;
  readonly offset: number;

  constructor(atom: string, offset: number, moduleName: string) {
    super("UNKNOWN_ATOM", `use of undefined rule "${atom}" at offset ${offset}`, { moduleName });
    this.atom = atom;
    this.offset = offset;
  }
}

export class ExpressionSyntaxError extends ConfigError {
  readonly offset: number;

  constructor(detail: string, offset: number, moduleName: string) {
    super("EXPRESSION_SYNTAX", `${detail} at offset ${offset}`, { moduleName });
    this.offset = offset;
  }
}

/**
 * Narrowing helper for callers that catch unknown values.
 */
export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError;
}

/**
 * Renders any thrown value as a single-line message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
