import type {
  ClosureLiteral,
  Expr,
  LiteralBodyKind,
  MemberDecl,
  Param,
  RequirementKind,
  RequirementSignature,
  Span,
  TypeRef,
} from "../ir.js";
import type { RejectionReason } from "../diagnostics.js";

/** Frozen snapshot of `items`; pass results are never mutated after they are returned. */
export function frozenList<T>(items: Iterable<T>): readonly T[] {
  return Object.freeze([...items]);
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export type Requirement = {
  readonly key: string;
  readonly protocol: string;
  readonly kind: RequirementKind;
  readonly name: string;
  readonly signature: RequirementSignature;
  readonly hasDefaultImplementation: boolean;
  readonly isCompilerSynthesizable: boolean;
  readonly defaultImplementation?: MemberDecl;
  readonly span?: Span;
};

export type RequirementSet = {
  readonly key: string;
  readonly protocols: readonly string[];
  readonly requirements: readonly Requirement[];
  readonly staticRequirements: readonly Requirement[];
  readonly uncoveredRequirements: readonly Requirement[];
};

export type CaptureMutability = "immutable" | "mutable";

export type CaptureSourceKind = "explicit-in-capture-list" | "implicit-free-variable";

export type CaptureDescriptor = {
  readonly name: string;
  readonly declaredType: TypeRef;
  readonly mutability: CaptureMutability;
  readonly initializerExpression: Expr;
  readonly attributes: readonly string[];
  readonly sourceKind: CaptureSourceKind;
  readonly span?: Span;
};

export type Expectation = "value" | "metatype";

export type ClosureLiteralContext = {
  readonly literal: ClosureLiteral;
  readonly captures: readonly CaptureDescriptor[];
  readonly params: readonly Param[];
  readonly bodyKind: LiteralBodyKind;
  readonly hasCaptureList: boolean;
  readonly expectation: Expectation;
  readonly conformances: readonly string[];
  readonly requirements: RequirementSet;
};

export type Coverage = "capture" | "default" | "synthesized" | "uncovered";

export type WitnessStrategy =
  | "bind-capture"
  | "inherit-default"
  | "inherit-synthesized"
  | "literal-body"
  | "literal-getter"
  | "literal-subscript-getter"
  | "literal-accessors"
  | "literal-subscript-accessors"
  | "literal-static-body"
  | "unsupported";

export type CoveredRequirement = {
  readonly requirement: Requirement;
  readonly coverage: Coverage;
  readonly strategy: WitnessStrategy;
};

export type LoweringPath = "bodyless" | "single-requirement" | "accessor" | "multi-declaration" | "metatype";

export type Rejection = {
  readonly reason: RejectionReason;
  readonly message: string;
  readonly span?: Span;
};

export type Resolution =
  | {
      readonly kind: "accept";
      readonly path: LoweringPath;
      readonly fulfilled?: CoveredRequirement;
      readonly coverage: readonly CoveredRequirement[];
      readonly residual: readonly CoveredRequirement[];
    }
  | { readonly kind: "reject"; readonly rejection: Rejection };

export type Acceptance = Extract<Resolution, { kind: "accept" }>;

export type StructField = {
  readonly name: string;
  readonly type: TypeRef;
  readonly mutable: boolean;
  readonly visibility: "private";
  readonly attributes: readonly string[];
};

export type WitnessSource = "literal-body" | "capture-field" | "default" | "synthesized" | "declared-member";

export type Witness = {
  readonly requirement: string;
  readonly protocol: string;
  readonly source: WitnessSource;
};

export type SynthesizedStructType = {
  readonly name: string;
  readonly literalId: string;
  readonly path: LoweringPath;
  readonly conformances: readonly string[];
  readonly fields: readonly StructField[];
  readonly members: readonly MemberDecl[];
  readonly witnesses: readonly Witness[];
  readonly span?: Span;
};

export type SelfBindingTag = "captured-outer-self" | "synthesized-type-self";

export type RegionOrigin = "literal" | "adopted";

export type BodyRegion = {
  readonly id: number;
  readonly label: string;
  readonly origin: RegionOrigin;
  readonly tag: SelfBindingTag;
};

export type SelfBinding = {
  readonly regions: readonly BodyRegion[];
};
