import type { Expr, MemberDecl, Param, Stmt, TypedParam } from "../ir.js";
import { failWith } from "../diagnostics.js";
import {
  anonStructName,
  DEFAULT_ANON_PREFIX,
  escapeIdentifier,
  isValidNamePrefix,
  OUTER_SELF_FIELD,
} from "../lowering/common.js";
import { walkBody } from "../lowering/walk.js";
import { memberRequirementKey } from "./requirements.js";
import {
  frozenList,
  type Acceptance,
  type CaptureDescriptor,
  type ClosureLiteralContext,
  type CoveredRequirement,
  type Requirement,
  type StructField,
  type SynthesizedStructType,
  type Witness,
  type WitnessSource,
} from "./contracts.js";

/**
 * Per-unit table of synthesized declarations. Names come from a counter
 * that only advances when a literal is registered for the first time.
 */
export class DeclarationRegistry {
  readonly prefix: string;
  #next = 1;
  readonly #byLiteral = new Map<string, SynthesizedStructType>();
  readonly #declarations: SynthesizedStructType[] = [];

  constructor(prefix: string = DEFAULT_ANON_PREFIX) {
    if (!isValidNamePrefix(prefix)) {
      throw new Error(`Invalid anonymous struct name prefix '${prefix}'.`);
    }
    this.prefix = prefix;
  }

  get declarations(): readonly SynthesizedStructType[] {
    return this.#declarations;
  }

  lookup(literalId: string): SynthesizedStructType | undefined {
    return this.#byLiteral.get(literalId);
  }

  // Name reservation and append happen together; `build` must not throw.
  register(literalId: string, build: (name: string) => SynthesizedStructType): SynthesizedStructType {
    const existing = this.#byLiteral.get(literalId);
    if (existing) return existing;
    const name = anonStructName(this.prefix, this.#next);
    this.#next++;
    const decl = Object.freeze(build(name));
    this.#byLiteral.set(literalId, decl);
    this.#declarations.push(decl);
    return decl;
  }
}

export type StructShape = Omit<SynthesizedStructType, "name">;

type MutationRegion = {
  readonly label: string;
  readonly stmts: readonly Stmt[];
  readonly params: readonly string[];
  readonly mayMutate: boolean;
  readonly closureStyle: boolean;
};

function typedParams(literalParams: readonly Param[], required: readonly TypedParam[]): readonly TypedParam[] {
  return literalParams.map((p, i) => ({
    name: p.name,
    type: p.type ?? required[i]?.type ?? { kind: "named", name: "unknown", args: [] },
    span: p.span,
  }));
}

function literalStatements(ctx: ClosureLiteralContext): readonly Stmt[] {
  return ctx.literal.body.kind === "statement" ? ctx.literal.body.stmts : [];
}

function singleMember(ctx: ClosureLiteralContext, req: Requirement): MemberDecl {
  const sig = req.signature;
  const params = typedParams(ctx.params, sig.params);
  const stmts = literalStatements(ctx);
  switch (req.kind) {
    case "method":
    case "static-method":
      return {
        kind: "method",
        name: req.name,
        isStatic: req.kind === "static-method",
        mutating: sig.mutating,
        throws: sig.throws,
        params,
        ret: sig.result,
        body: stmts,
        span: ctx.literal.span,
      };
    case "readonly-property":
      return { kind: "property", name: req.name, type: sig.result, getter: stmts, span: ctx.literal.span };
    case "readonly-subscript":
      return { kind: "subscript", params, type: sig.result, getter: stmts, span: ctx.literal.span };
    case "mutable-property":
    case "mutable-subscript": {
      const body = ctx.literal.body;
      const getter = body.kind === "accessor" ? body.getter : [];
      const setter = body.kind === "accessor" ? body.setter : undefined;
      if (req.kind === "mutable-property") {
        return { kind: "property", name: req.name, type: sig.result, getter, setter, span: ctx.literal.span };
      }
      return { kind: "subscript", params, type: sig.result, getter, setter, span: ctx.literal.span };
    }
  }
}

function memberLabel(member: MemberDecl): string {
  return member.kind === "subscript" ? "subscript" : member.name;
}

function memberFulfils(member: MemberDecl, req: Requirement): boolean {
  if (memberRequirementKey(member) !== req.key) return false;
  switch (req.kind) {
    case "method":
      return member.kind === "method" && !member.isStatic;
    case "static-method":
      return member.kind === "method" && member.isStatic;
    case "readonly-property":
      return member.kind === "property";
    case "mutable-property":
      return member.kind === "property" && member.setter !== undefined;
    case "readonly-subscript":
      return member.kind === "subscript";
    case "mutable-subscript":
      return member.kind === "subscript" && member.setter !== undefined;
  }
}

function declaredMembers(ctx: ClosureLiteralContext, acceptance: Acceptance): readonly MemberDecl[] {
  const body = ctx.literal.body;
  const members = body.kind === "multi-declaration" ? body.members : [];
  for (const member of members) {
    if (member.kind === "stored") {
      failWith(
        "stored-property-in-multi-declaration-body",
        `Stored property '${member.name}' is not allowed in a declaration body. Capture the value instead.`,
        member.span ?? ctx.literal.span
      );
    }
  }
  for (const { requirement } of acceptance.residual) {
    const witness = members.find((m) => memberFulfils(m, requirement));
    if (!witness) {
      failWith(
        "unfulfilled-requirement",
        `The declaration body does not fulfil '${requirement.protocol}.${requirement.name}' (${requirement.kind}).`,
        ctx.literal.span
      );
    }
    if (witness.kind === "method" && witness.mutating && !requirement.signature.mutating) {
      failWith(
        "mutating-via-body-disallowed",
        `'${witness.name}' is declared mutating but '${requirement.protocol}.${requirement.name}' is not.`,
        witness.span ?? ctx.literal.span
      );
    }
    if (
      (witness.kind === "method" || witness.kind === "subscript") &&
      witness.params.length !== requirement.signature.params.length
    ) {
      failWith(
        "parameter-arity-mismatch",
        `'${memberLabel(witness)}' takes ${witness.params.length} parameter(s) but '${requirement.protocol}.${requirement.name}' takes ${requirement.signature.params.length}.`,
        witness.span ?? ctx.literal.span
      );
    }
  }
  return members;
}

function membersFor(ctx: ClosureLiteralContext, acceptance: Acceptance): readonly MemberDecl[] {
  switch (acceptance.path) {
    case "bodyless":
      return [];
    case "single-requirement":
    case "accessor":
    case "metatype":
      return acceptance.fulfilled ? [singleMember(ctx, acceptance.fulfilled.requirement)] : [];
    case "multi-declaration":
      return declaredMembers(ctx, acceptance);
  }
}

function regionsOf(member: MemberDecl, closureStyle: boolean, mutatingMethod: boolean): readonly MutationRegion[] {
  switch (member.kind) {
    case "method":
      return [
        {
          label: member.name,
          stmts: member.body,
          params: member.params.map((p) => p.name),
          mayMutate: mutatingMethod,
          closureStyle,
        },
      ];
    case "property":
    case "subscript": {
      const keys = member.kind === "subscript" ? member.params.map((p) => p.name) : [];
      const label = memberLabel(member);
      const regions: MutationRegion[] = [
        { label: `${label} getter`, stmts: member.getter, params: keys, mayMutate: false, closureStyle },
      ];
      if (member.setter) {
        regions.push({
          label: `${label} setter`,
          stmts: member.setter.body,
          params: [...keys, member.setter.valueName],
          mayMutate: true,
          closureStyle,
        });
      }
      return regions;
    }
    case "stored":
      return [];
  }
}

// Capture field a store writes into, if any.
function assignedField(target: Expr, closureStyle: boolean, isLocal: (name: string) => boolean): string | undefined {
  let base = target;
  let firstMember: string | undefined;
  while (base.kind === "member" || base.kind === "index") {
    if (base.kind === "member" && base.object.kind === "self") firstMember = base.name;
    base = base.object;
  }
  if (base.kind === "ident") return isLocal(base.name) ? undefined : escapeIdentifier(base.name);
  if (base.kind === "self") return closureStyle ? OUTER_SELF_FIELD : firstMember;
  return undefined;
}

function checkMutations(regions: readonly MutationRegion[], captures: readonly CaptureDescriptor[]): void {
  const byName = new Map(captures.map((c) => [c.name, c] as const));
  for (const region of regions) {
    walkBody(region.stmts, region.params, {
      assign: (stmt, _root, locals) => {
        const field = assignedField(stmt.target, region.closureStyle, (name) => locals.has(name));
        const captured = field === undefined ? undefined : byName.get(field);
        if (!captured) return;
        if (captured.mutability === "immutable") {
          failWith(
            "immutable-capture-assignment",
            `Cannot assign to immutable capture '${captured.name}' in ${region.label}. Capture it with mutable() to allow mutation.`,
            stmt.span
          );
        }
        if (!region.mayMutate) {
          failWith(
            "mutating-via-body-disallowed",
            `${region.label} mutates capture '${captured.name}' but is not a mutating member or setter.`,
            stmt.span
          );
        }
      },
    });
  }
}

function witnessSource(entry: CoveredRequirement, path: Acceptance["path"]): WitnessSource {
  switch (entry.coverage) {
    case "capture":
      return "capture-field";
    case "default":
      return "default";
    case "synthesized":
      return "synthesized";
    case "uncovered":
      return path === "multi-declaration" ? "declared-member" : "literal-body";
  }
}

function fieldOf(capture: CaptureDescriptor): StructField {
  return {
    name: capture.name,
    type: capture.declaredType,
    mutable: capture.mutability === "mutable",
    visibility: "private",
    attributes: capture.attributes,
  };
}

/** Builds and checks the declaration shape for an accepted literal, without naming it. */
export function synthesizeStruct(ctx: ClosureLiteralContext, acceptance: Acceptance): StructShape {
  const members = membersFor(ctx, acceptance);
  const closureStyle = acceptance.path !== "multi-declaration";
  const fulfilledMutating = acceptance.fulfilled?.requirement.signature.mutating ?? false;
  const regions = members.flatMap((m) =>
    regionsOf(m, closureStyle, m.kind === "method" && (closureStyle ? fulfilledMutating : m.mutating))
  );
  checkMutations(regions, ctx.captures);

  const witnesses: Witness[] = acceptance.coverage.map((entry) => ({
    requirement: entry.requirement.key,
    protocol: entry.requirement.protocol,
    source: witnessSource(entry, acceptance.path),
  }));
  return {
    literalId: ctx.literal.id,
    path: acceptance.path,
    conformances: frozenList([...new Set(ctx.conformances)]),
    fields: frozenList(ctx.captures.map(fieldOf)),
    members: frozenList(members),
    witnesses: frozenList(witnesses),
    span: ctx.literal.span,
  };
}

export function registerStruct(registry: DeclarationRegistry, shape: StructShape): SynthesizedStructType {
  return registry.register(shape.literalId, (name) => ({ name, ...shape }));
}
