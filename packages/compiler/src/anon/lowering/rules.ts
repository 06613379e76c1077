import type { RequirementKind } from "../ir.js";
import type { Coverage, LoweringPath, WitnessStrategy } from "../passes/contracts.js";

/**
 * How a requirement gets its witness in a synthesized struct, keyed by the
 * requirement's kind and how it is covered for one literal.
 */
export const WITNESS_RULES = Object.freeze({
  method: {
    capture: "unsupported",
    default: "inherit-default",
    synthesized: "inherit-synthesized",
    uncovered: "literal-body",
  },
  "readonly-property": {
    capture: "bind-capture",
    default: "inherit-default",
    synthesized: "inherit-synthesized",
    uncovered: "literal-getter",
  },
  "readonly-subscript": {
    capture: "unsupported",
    default: "inherit-default",
    synthesized: "inherit-synthesized",
    uncovered: "literal-subscript-getter",
  },
  "mutable-property": {
    capture: "bind-capture",
    default: "inherit-default",
    synthesized: "inherit-synthesized",
    uncovered: "literal-accessors",
  },
  "mutable-subscript": {
    capture: "unsupported",
    default: "inherit-default",
    synthesized: "inherit-synthesized",
    uncovered: "literal-subscript-accessors",
  },
  "static-method": {
    capture: "unsupported",
    default: "inherit-default",
    synthesized: "inherit-synthesized",
    uncovered: "literal-static-body",
  },
} as const satisfies Record<RequirementKind, Record<Coverage, WitnessStrategy>>);

export function witnessStrategy(kind: RequirementKind, coverage: Coverage): WitnessStrategy {
  return WITNESS_RULES[kind][coverage];
}

// Path a lone uncovered requirement selects, by its strategy.
export const SINGLE_RESIDUAL_PATHS = Object.freeze({
  "literal-body": "single-requirement",
  "literal-getter": "single-requirement",
  "literal-subscript-getter": "single-requirement",
  "literal-accessors": "accessor",
  "literal-subscript-accessors": "accessor",
  "literal-static-body": "metatype",
  "bind-capture": undefined,
  "inherit-default": undefined,
  "inherit-synthesized": undefined,
  unsupported: undefined,
} as const satisfies Record<WitnessStrategy, LoweringPath | undefined>);

export function isInheritedStrategy(strategy: WitnessStrategy): boolean {
  return strategy === "inherit-default" || strategy === "inherit-synthesized";
}
